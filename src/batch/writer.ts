import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { VerseRecord } from '@/types/index.js';
import type { WriteOptions } from '@/types/options.js';
import { formatRecords } from './records.js';

/**
 * Serializes records as one indented JSON array. Non-ASCII text is written as is.
 */
export const serializeRecords = (records: readonly VerseRecord[], options: Omit<WriteOptions, 'logger'> = {}) =>
    `${JSON.stringify(formatRecords(records, options.keyStyle), null, options.indent ?? 2)}\n`;

/**
 * Writes the verse JSON file, creating parent directories as needed.
 *
 * The JSON goes to `<outputPath>.tmp` first and is renamed over `outputPath`,
 * so a failed run never leaves a truncated file behind.
 *
 * @returns Number of records written
 * @throws the underlying file system error when the output cannot be written
 */
export const writeVerseJson = (outputPath: string, records: readonly VerseRecord[], options: WriteOptions = {}) => {
    const { logger } = options;
    const tempPath = `${outputPath}.tmp`;

    mkdirSync(path.dirname(outputPath), { recursive: true });

    try {
        writeFileSync(tempPath, serializeRecords(records, options), 'utf-8');
        renameSync(tempPath, outputPath);
    } catch (error) {
        rmSync(tempPath, { force: true });
        logger?.error?.(`Failed to write ${outputPath}`, error);
        throw error;
    }

    logger?.info?.(`Output written to: ${outputPath}`, { records: records.length });
    return records.length;
};
