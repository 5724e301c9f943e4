import type { ChapterSource } from './index.js';
import type { ProfileName, TranslationProfile } from './profiles.js';

/**
 * Logger interface for custom logging implementations.
 *
 * All methods are optional - only implement the verbosity levels you need.
 * When no logger is provided, no logging overhead is incurred.
 *
 * @example
 * // Simple console logger
 * const logger: Logger = {
 *   debug: console.debug,
 *   info: console.info,
 *   warn: console.warn,
 *   error: console.error,
 * };
 *
 * @example
 * // Only surface skipped files
 * const quietLogger: Logger = {
 *   warn: (msg, ...args) => report.push({ msg, args }),
 * };
 */
export interface Logger {
    /** Log a debug message (verbose debugging output) */
    debug?: (message: string, ...args: unknown[]) => void;
    /** Log an error message (critical failures) */
    error?: (message: string, ...args: unknown[]) => void;
    /** Log an informational message (key progress points) */
    info?: (message: string, ...args: unknown[]) => void;
    /** Log a trace message (extremely verbose, per-verse details) */
    trace?: (message: string, ...args: unknown[]) => void;
    /** Log a warning message (skipped files, empty chapters) */
    warn?: (message: string, ...args: unknown[]) => void;
}

/**
 * A regex replacement applied to raw chapter HTML before verse extraction.
 *
 * Used to patch known defects in a corpus (a broken marker, a stray tag)
 * without editing the source files.
 *
 * Notes:
 * - `regex` is a raw JavaScript regex source string.
 * - Default flags are `gu` (global + unicode).
 * - If `flags` is provided, it is validated and `g` + `u` are always enforced.
 * - If `files` is omitted, the rule applies to every chapter file.
 * - If `files` is `[]`, the rule applies to no file (rule is skipped).
 *
 * @example
 * // Repair a marker that lost its non-breaking space in one chapter
 * { regex: 'id="V7">7</span>', replacement: 'id="V7">7&#160;</span>', files: ['GEN05.htm'] }
 */
export type Replacement = {
    regex: string;
    replacement: string;
    flags?: string;
    files?: string[];
};

/**
 * Options for `extractVerses()`.
 */
export type ExtractionOptions = {
    /**
     * Profile name from `PROFILES`, or a full profile object.
     *
     * @default 'web'
     */
    profile?: ProfileName | TranslationProfile;

    /** Optional logger, see {@link Logger}. */
    logger?: Logger;
};

/**
 * Options for `extractCorpus()`.
 *
 * @example
 * const report = extractCorpus({
 *   source: createDirectorySource('./darby'),
 *   profile: 'darby',
 *   logger: { warn: console.warn },
 * });
 */
export type BatchOptions = ExtractionOptions & {
    /** Chapter files to process. */
    source: ChapterSource;

    /**
     * Label written into every record's `translation` field.
     *
     * @default the profile's `translation`
     */
    translation?: string;

    /**
     * Log an info line each time the record count crosses a multiple of this value.
     * `0` disables progress logging.
     *
     * @default 500
     */
    progressInterval?: number;

    /** Corrections applied to raw chapter HTML before extraction, in order. */
    replace?: Replacement[];
};

/**
 * Output object keys.
 *
 * - `'camel'`: `book`, `chapter`, `fullText`, ...
 * - `'pascal'`: `Book`, `Chapter`, `FullText`, ... (for consumers that bind case-sensitively)
 */
export type KeyStyle = 'camel' | 'pascal';

/**
 * Options for `writeVerseJson()`.
 */
export type WriteOptions = {
    /** @default 'camel' */
    keyStyle?: KeyStyle;

    /** @default 2 */
    indent?: number;

    logger?: Logger;
};
