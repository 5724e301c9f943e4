/**
 * A single verse as it comes out of `extractVerses()`.
 *
 * @example
 * { text: 'In the beginning.', verseNumber: 1 }
 */
export type ExtractedVerse = {
    /** Verse number taken from the marker's `id="V<n>"` attribute. */
    verseNumber: number;

    /** Plain text with markup removed, entities decoded and whitespace collapsed. Never empty. */
    text: string;
};

/**
 * Old or New Testament, decided by a book's position in canonical order.
 */
export type Testament = 'Old' | 'New';

/**
 * One flattened verse row written to the output JSON array.
 *
 * `reference` and `fullText` are derived from the other fields and are
 * stored so the consuming data layer does not have to rebuild them.
 *
 * @example
 * {
 *   book: 'John',
 *   bookNumber: 43,
 *   chapter: 3,
 *   fullText: 'John 3:16: For God so loved the world...',
 *   reference: 'John 3:16',
 *   testament: 'New',
 *   text: 'For God so loved the world...',
 *   translation: 'Darby',
 *   verse: 16,
 * }
 */
export type VerseRecord = {
    /** Canonical English book name, e.g. `'1 Samuel'`. */
    book: string;
    chapter: number;
    verse: number;
    text: string;
    translation: string;
    testament: Testament;

    /**
     * 1-based rank in canonical order (Genesis = 1, Revelation = 66),
     * or `0` when the profile does not rank books.
     */
    bookNumber: number;

    /** `"{book} {chapter}:{verse}"` */
    reference: string;

    /** `"{reference}: {text}"` */
    fullText: string;
};

/**
 * Why a chapter file produced no records.
 *
 * - `unknown_book_code`: the filename has the chapter shape but its code is not in the canon table
 * - `read_failed`: the file could not be read
 * - `no_verses`: the file was read but no verse survived extraction
 */
export type SkipReason = 'unknown_book_code' | 'read_failed' | 'no_verses';

export type SkippedChapterFile = {
    file: string;
    reason: SkipReason;
    message?: string;
};

/**
 * Result of `extractCorpus()`.
 */
export type CorpusReport = {
    /** `true` when no chapter file was skipped. */
    ok: boolean;

    /** Records in file order (lexical filename order), then marker order. */
    records: VerseRecord[];

    /** Chapter files that were processed into at least one record. */
    filesProcessed: number;

    skipped: SkippedChapterFile[];
};

/**
 * Where chapter HTML comes from.
 *
 * `createDirectorySource()` reads a directory with `node:fs`; tests pass an
 * in-memory implementation.
 */
export interface ChapterSource {
    /** File names (not paths) available in the source, in any order. */
    list(): string[];

    /** Full UTF-8 content of one file. May throw; the batch driver records the failure. */
    read(name: string): string;
}

export type { BatchOptions, ExtractionOptions, KeyStyle, Logger, Replacement, WriteOptions } from './options.js';
export type { NoiseSpanSelector, ProfileName, TranslationProfile } from './profiles.js';
