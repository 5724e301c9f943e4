import { normalizeVerseText } from '@/normalization/normalize.js';
import { resolveProfile } from '@/profiles/profiles.js';
import type { ExtractedVerse } from '@/types/index.js';
import type { ExtractionOptions } from '@/types/options.js';
import { buildPreview } from '@/utils/textUtils.js';
import { stripNoiseSpans } from './noise.js';

/**
 * A verse marker and its body.
 *
 * - `id="V<n>">` then the display number and a non-breaking space, then `</span>`
 * - the body runs until the next verse span, the end of the paragraph `</div>`,
 *   or the end of the fragment (the last verse of a chapter often has no sentinel)
 *
 * Groups: 1 = identifier number, 2 = display number, 3 = raw body.
 */
const VERSE_PATTERN =
    /id="V(\d+)">(\d+)(?:&#160;|&nbsp;|\u00A0)<\/span>([\s\S]*?)(?=<span\b[^>]*\b(?:class="verse"|id="V\d+")|<\/div>|$)/g;

/**
 * Extracts the verses of one chapter fragment.
 *
 * Noise spans of the profile are removed first, so footnote bodies never reach
 * verse text. Each marker's body is then normalized with `normalizeVerseText()`
 * and dropped when nothing is left.
 *
 * Verses come back in marker order. They are not sorted and duplicates are
 * kept: a chapter with irregular markers passes its irregularity through.
 *
 * @param html - Chapter HTML; does not need to be well formed
 * @returns Verses with non-empty text, possibly none
 *
 * @example
 * extractVerses('<span class="verse" id="V1">1&#160;</span>In the <i>beginning</i>.')
 * // → [{ text: 'In the beginning.', verseNumber: 1 }]
 */
export const extractVerses = (html: string, options: ExtractionOptions = {}): ExtractedVerse[] => {
    const profile = resolveProfile(options.profile);
    const { logger } = options;
    const content = stripNoiseSpans(html, profile.noiseSpans);
    const verses: ExtractedVerse[] = [];

    for (const [, id, display, body] of content.matchAll(VERSE_PATTERN)) {
        const verseNumber = Number.parseInt(id, 10);
        if (verseNumber < 1) {
            logger?.debug?.('[extract] ignored marker with verse number 0', { id });
            continue;
        }

        if (display !== id) {
            logger?.debug?.('[extract] marker id and display number differ, using id', { display, id });
        }

        const text = normalizeVerseText(body, profile);
        if (!text) {
            logger?.trace?.('[extract] dropped empty verse', { verseNumber });
            continue;
        }

        logger?.trace?.('[extract] verse', { preview: buildPreview(text), verseNumber });
        verses.push({ text, verseNumber });
    }

    return verses;
};
