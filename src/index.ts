/**
 * verse-extractor - Extracts Bible verses from chapter HTML files into JSON records.
 *
 * Reads a directory of `<BOOK><chapter>.htm` files (one chapter per file),
 * pulls out each verse between its `<span class="verse">` markers, cleans the
 * text for the chosen translation profile, and writes one flat JSON array of
 * verse records.
 *
 * @packageDocumentation
 *
 * @example
 * import { createDirectorySource, extractCorpus, writeVerseJson } from 'verse-extractor';
 *
 * const report = extractCorpus({ profile: 'darby', source: createDirectorySource('./darby') });
 * writeVerseJson('./Data/Bible/darby.json', report.records);
 */

// ─────────────────────────────────────────────────────────────
// Verse Extraction
// ─────────────────────────────────────────────────────────────

export { stripNoiseSpans } from './extraction/noise.js';
export { extractVerses } from './extraction/verse-extractor.js';
export {
    decodeEntities,
    normalizeVerseText,
    removeGlyphs,
    replaceTags,
    stripSupplyBrackets,
    tightenPunctuation,
} from './normalization/normalize.js';

// ─────────────────────────────────────────────────────────────
// Book Resolution
// ─────────────────────────────────────────────────────────────

export { BOOK_ORDER, CANON_BOOKS, getBookNumber, getTestament, OLD_TESTAMENT_BOOK_COUNT, resolveBook } from './canon/canon.js';
export type { CanonBook } from './canon/canon.js';
export type { ParsedChapterFilename, ResolvedChapterFile } from './canon/resolver.js';
export { isChapterFilename, parseChapterFilename, resolveChapterFile } from './canon/resolver.js';

// ─────────────────────────────────────────────────────────────
// Batch
// ─────────────────────────────────────────────────────────────

export { extractCorpus } from './batch/driver.js';
export type { ChapterContext, PascalVerseRecord } from './batch/records.js';
export { buildVerseRecord, formatRecords, formatReference } from './batch/records.js';
export { createDirectorySource, createMemorySource } from './batch/source.js';
export { serializeRecords, writeVerseJson } from './batch/writer.js';

// ─────────────────────────────────────────────────────────────
// Profiles & Corrections
// ─────────────────────────────────────────────────────────────

export type { CompiledReplacement } from './preprocessing/replace.js';
export { applyCorrections, compileReplacements } from './preprocessing/replace.js';
export { DEFAULT_ENTITIES, defineProfile, getProfile, isProfileName, PROFILES } from './profiles/profiles.js';

// Utils
export { escapeRegex } from './utils/textUtils.js';

// Type definitions
export type {
    BatchOptions,
    ChapterSource,
    CorpusReport,
    ExtractedVerse,
    ExtractionOptions,
    KeyStyle,
    Logger,
    NoiseSpanSelector,
    ProfileName,
    Replacement,
    SkippedChapterFile,
    SkipReason,
    Testament,
    TranslationProfile,
    VerseRecord,
    WriteOptions,
} from './types/index.js';
