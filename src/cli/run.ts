import { extractCorpus } from '@/batch/driver.js';
import { createDirectorySource } from '@/batch/source.js';
import { writeVerseJson } from '@/batch/writer.js';
import { getProfile } from '@/profiles/profiles.js';
import type { Logger } from '@/types/options.js';
import { HELP_TEXT, parseCliArguments } from './args.js';
import { loadConfiguration, resolveRunOptions } from './config.js';
import { createConsoleLogger } from './console-logger.js';

export type CliIO = {
    /** Where the help text and the final summary go. */
    print: (line: string) => void;

    /** Replaces the console logger (tests). */
    logger?: Logger;
};

const defaultIO: CliIO = { print: (line) => console.log(line) };

/**
 * Runs the extractor from command line arguments.
 *
 * Skipped chapter files are listed in the summary but do not fail the run.
 *
 * @returns Process exit code: `0` on success, `1` on a fatal error
 */
export const run = (argv: string[], io: CliIO = defaultIO) => {
    let logger: Logger = io.logger ?? createConsoleLogger('info');

    try {
        const args = parseCliArguments(argv);
        if (args.help) {
            io.print(HELP_TEXT);
            return 0;
        }

        const options = resolveRunOptions(args, loadConfiguration(args.config));
        logger = io.logger ?? createConsoleLogger(options.debug ? 'debug' : 'info');
        const profile = getProfile(options.profile);

        logger.info?.(`Processing ${profile.translation} chapters from: ${options.source}`);
        logger.debug?.('Configuration', options);

        const report = extractCorpus({
            logger,
            profile,
            progressInterval: options.progressInterval,
            replace: options.replace,
            source: createDirectorySource(options.source),
            translation: options.translation,
        });

        const written = writeVerseJson(options.output, report.records, { keyStyle: options.keyStyle, logger });

        io.print(`Records written: ${written}`);
        io.print(`Files processed: ${report.filesProcessed}`);
        if (report.skipped.length) {
            io.print(`Files skipped: ${report.skipped.length}`);
            for (const { file, message, reason } of report.skipped) {
                io.print(`  ${file}: ${reason}${message ? ` (${message})` : ''}`);
            }
        }

        return 0;
    } catch (error) {
        logger.error?.('Fatal error during extraction', error);
        return 1;
    }
};
