import type { NoiseSpanSelector } from '@/types/profiles.js';
import { escapeRegex } from '@/utils/textUtils.js';

/**
 * Opening tag of `selector.tag` whose quoted `class` attribute lists `selector.className`.
 */
const buildOpeningTagRegex = ({ className, tag }: NoiseSpanSelector) =>
    new RegExp(
        `<${escapeRegex(tag)}\\s(?:[^>]*\\s)?class\\s*=\\s*(["'])(?:[^"']*\\s)?${escapeRegex(className)}(?:\\s[^"']*)?\\1[^>]*>`,
        'gi',
    );

const buildAnyTagRegex = (tag: string) => new RegExp(`<(/?)${escapeRegex(tag)}\\b[^>]*>`, 'gi');

/**
 * Walks same-name tags after an opening tag and returns the offset just past
 * the closing tag that balances it, or `undefined` when the element is never closed.
 */
const findMatchingClose = (html: string, tags: RegExp, from: number) => {
    let depth = 1;
    tags.lastIndex = from;

    for (let m = tags.exec(html); m; m = tags.exec(html)) {
        if (m[1] === '/') {
            depth--;
        } else if (!m[0].endsWith('/>')) {
            depth++;
        }

        if (depth === 0) {
            return m.index + m[0].length;
        }
    }

    return undefined;
};

const removeElements = (html: string, selector: NoiseSpanSelector) => {
    const opening = buildOpeningTagRegex(selector);
    const tags = buildAnyTagRegex(selector.tag);
    let result = '';
    let cursor = 0;

    for (let m = opening.exec(html); m; m = opening.exec(html)) {
        const afterOpening = m.index + m[0].length;
        // Unclosed: only the opening tag goes.
        const end = m[0].endsWith('/>') ? afterOpening : (findMatchingClose(html, tags, afterOpening) ?? afterOpening);

        result += html.slice(cursor, m.index);
        cursor = end;
        opening.lastIndex = end;
    }

    return cursor === 0 ? html : result + html.slice(cursor);
};

/**
 * Removes annotation elements (footnote popups and the like) from a chapter
 * fragment, each from its opening tag through the closing tag that balances it.
 *
 * Nested elements of the same name are counted, so
 * `<span class="popup">a <span>b</span> c</span>` disappears entirely.
 *
 * This is a tolerant scan over one tag name at a time, not an HTML parser:
 * malformed markup never throws.
 *
 * @example
 * stripNoiseSpans('light<span class="popup">Or, day</span>.', [{ className: 'popup', tag: 'span' }])
 * // → 'light.'
 */
export const stripNoiseSpans = (html: string, selectors: readonly NoiseSpanSelector[]) => {
    let result = html;
    for (const selector of selectors) {
        result = removeElements(result, selector);
    }
    return result;
};
