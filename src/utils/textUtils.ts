/**
 * Limit for log previews of verse text (characters).
 */
export const PREVIEW_LIMIT = 80;

/**
 * Escapes a string for safe inclusion in a regular expression.
 *
 * Escapes all regex metacharacters: `.*+?^${}()|[\]\\`
 *
 * @example
 * escapeRegex('hello.world')   // → 'hello\\.world'
 * escapeRegex('[test]')        // → '\\[test\\]'
 * escapeRegex('a+b*c?')        // → 'a\\+b\\*c\\?'
 */
export const escapeRegex = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Collapses every whitespace run (newlines, tabs, U+00A0 included) into one space and trims.
 */
export const collapseWhitespace = (text: string) => text.replace(/\s+/g, ' ').trim();

/**
 * Creates a short single-line preview of text for log output.
 * Truncates content exceeding `limit`.
 */
export const buildPreview = (text: string, limit = PREVIEW_LIMIT) => {
    const normalized = collapseWhitespace(text);
    if (normalized.length <= limit) {
        return normalized;
    }
    return `${normalized.slice(0, limit)}...`;
};
