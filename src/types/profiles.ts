/**
 * Identifies an inline annotation element whose whole content must be dropped
 * before verse extraction (footnote popups and the like).
 *
 * @example
 * // <span class="popup">...</span>
 * { className: 'popup', tag: 'span' }
 */
export type NoiseSpanSelector = {
    /** Element name, matched case-insensitively. */
    tag: string;

    /** A class that must appear in the element's `class` attribute. */
    className: string;
};

/**
 * Names of the built-in profiles in `PROFILES`.
 */
export type ProfileName = 'web' | 'darby';

/**
 * Normalization settings for one translation edition.
 *
 * Editions of the same corpus differ in small ways: some wrap footnotes in
 * popups, some mark supplied words with square brackets, some leave footnote
 * glyphs inline. A profile captures those differences so one extractor
 * handles every edition.
 */
export type TranslationProfile = {
    /** Profile identifier, used in logs. */
    name: string;

    /** Default `translation` label for records built with this profile. */
    translation: string;

    /** Elements removed (opening tag through matching closing tag) before verse matching. */
    noiseSpans: readonly NoiseSpanSelector[];

    /**
     * Entity → literal text. Applied in insertion order, except that `&amp;`
     * is always decoded last.
     */
    entities: Readonly<Record<string, string>>;

    /** Remove `[` and `]` around words supplied by the translators, keeping the words. */
    stripSupplyBrackets: boolean;

    /** Footnote/reference glyphs removed wherever they appear in verse text. */
    footnoteGlyphs: readonly string[];

    /**
     * - `'canonical'`: `bookNumber` is the 1-based canonical rank
     * - `'none'`: `bookNumber` is always `0`
     */
    bookNumbering: 'canonical' | 'none';
};
