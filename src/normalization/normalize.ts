import type { TranslationProfile } from '@/types/profiles.js';
import { collapseWhitespace, escapeRegex } from '@/utils/textUtils.js';

const AMP = '&amp;';

/**
 * Replaces every tag with a single space.
 *
 * A space rather than nothing, so `one<br/>two` stays two words.
 */
export const replaceTags = (text: string) => text.replace(/<[^>]+>/g, ' ');

/**
 * Decodes the entities of a profile's table. `&amp;` is always decoded last.
 *
 * Anything not in the table (numeric references other than `&#160;`, `&copy;`, ...) is left as is.
 */
export const decodeEntities = (text: string, entities: Readonly<Record<string, string>>) => {
    if (!text.includes('&')) {
        return text;
    }

    let result = text;
    for (const [entity, literal] of Object.entries(entities)) {
        if (entity !== AMP) {
            result = result.replaceAll(entity, literal);
        }
    }

    const amp = entities[AMP];
    return amp === undefined ? result : result.replaceAll(AMP, amp);
};

/**
 * Removes the square brackets some editions put around words supplied by the translators.
 *
 * @example
 * stripSupplyBrackets('and [there was] light') // → 'and there was light'
 */
export const stripSupplyBrackets = (text: string) => text.replace(/[[\]]/g, '');

/**
 * Removes every occurrence of the given footnote glyphs.
 */
export const removeGlyphs = (text: string, glyphs: readonly string[]) => {
    const usable = glyphs.filter(Boolean);
    if (!usable.length) {
        return text;
    }
    return text.replace(new RegExp(usable.map(escapeRegex).join('|'), 'gu'), '');
};

/**
 * Removes whitespace left in front of sentence punctuation, which tag
 * replacement produces in bodies like `the <i>beginning</i>.`.
 *
 * @example
 * tightenPunctuation('the beginning .') // → 'the beginning.'
 */
export const tightenPunctuation = (text: string) => text.replace(/\s+([.,;:!?])/g, '$1');

/**
 * Turns a raw verse body (HTML between two markers) into plain text.
 *
 * Steps, in order:
 * 1. tags → single space
 * 2. entity decoding
 * 3. supplied-word brackets removed (when the profile asks for it)
 * 4. footnote glyphs removed
 * 5. whitespace collapsed and trimmed, then no space left before `.,;:!?`
 *
 * Tags are replaced before entities are decoded, so `&lt;b&gt;` in the source
 * stays in the text as `<b>`.
 *
 * Running it on text with no markup and no entities gives the same result
 * as running it on its own output.
 */
export const normalizeVerseText = (body: string, profile: TranslationProfile) => {
    let text = decodeEntities(replaceTags(body), profile.entities);

    if (profile.stripSupplyBrackets) {
        text = stripSupplyBrackets(text);
    }

    return tightenPunctuation(collapseWhitespace(removeGlyphs(text, profile.footnoteGlyphs)));
};
