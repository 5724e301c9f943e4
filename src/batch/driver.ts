import { isChapterFilename, resolveChapterFile } from '@/canon/resolver.js';
import { extractVerses } from '@/extraction/verse-extractor.js';
import { applyCorrections, compileReplacements } from '@/preprocessing/replace.js';
import { resolveProfile } from '@/profiles/profiles.js';
import type { CorpusReport, SkippedChapterFile, VerseRecord } from '@/types/index.js';
import type { BatchOptions } from '@/types/options.js';
import { buildPreview } from '@/utils/textUtils.js';
import { buildVerseRecord } from './records.js';

const DEFAULT_PROGRESS_INTERVAL = 500;

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Extracts every chapter file of a source into one list of verse records.
 *
 * Files are processed one at a time in lexical file name order. Names that do
 * not look like `<bookCode><chapter>.htm` are ignored. A chapter file that
 * cannot be used (unknown book code, read failure, no verses) is reported in
 * `skipped` and the batch carries on.
 *
 * @throws when the source cannot be listed, or a correction rule does not compile
 *
 * @example
 * const report = extractCorpus({ profile: 'darby', source: createDirectorySource('./darby') });
 * writeVerseJson('./darby.json', report.records);
 */
export const extractCorpus = (options: BatchOptions): CorpusReport => {
    const { logger, progressInterval = DEFAULT_PROGRESS_INTERVAL, source } = options;
    const profile = resolveProfile(options.profile);
    const translation = options.translation ?? profile.translation;
    const corrections = compileReplacements(options.replace ?? []);

    const names = source.list();
    const files = names.filter(isChapterFilename).sort();
    logger?.info?.(`[batch] Found ${files.length} chapter files`, { ignored: names.length - files.length, profile: profile.name });

    const records: VerseRecord[] = [];
    const skipped: SkippedChapterFile[] = [];
    let filesProcessed = 0;

    for (const file of files) {
        const resolved = resolveChapterFile(file);
        if (!resolved.ok && resolved.reason === 'unrecognized_filename') {
            logger?.debug?.(`[batch] Ignoring ${file}: chapter number is 0`);
            continue;
        }

        if (!resolved.ok) {
            logger?.warn?.(`[batch] Skipping ${file}: unknown book code`, { bookCode: resolved.bookCode });
            skipped.push({ file, message: `Unknown book code: ${resolved.bookCode}`, reason: 'unknown_book_code' });
            continue;
        }

        let html: string;
        try {
            html = source.read(file);
        } catch (error) {
            const message = describeError(error);
            logger?.error?.(`[batch] Error reading ${file}`, { error: message });
            skipped.push({ file, message, reason: 'read_failed' });
            continue;
        }

        const verses = extractVerses(applyCorrections(file, html, corrections), { logger, profile });
        if (!verses.length) {
            logger?.warn?.(`[batch] No verses found in ${file}`);
            skipped.push({ file, reason: 'no_verses' });
            continue;
        }

        const context = {
            book: resolved.book,
            bookNumber: profile.bookNumbering === 'canonical' ? resolved.bookNumber : 0,
            chapter: resolved.chapter,
            testament: resolved.testament,
            translation,
        };
        const chapterRecords = verses.map((verse) => buildVerseRecord(context, verse));

        if (filesProcessed === 0) {
            logger?.debug?.(`[batch] Sample verse from ${file}`, { preview: buildPreview(chapterRecords[0].fullText) });
        }

        const before = records.length;
        records.push(...chapterRecords);
        filesProcessed++;

        if (progressInterval > 0 && Math.floor(records.length / progressInterval) > Math.floor(before / progressInterval)) {
            logger?.info?.(`[batch] Processed ${records.length} verses so far...`);
        }
    }

    logger?.info?.(`[batch] Total verses extracted: ${records.length}`, { filesProcessed, skipped: skipped.length });

    return { filesProcessed, ok: skipped.length === 0, records, skipped };
};
