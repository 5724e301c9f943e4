import { parseArgs } from 'node:util';
import type { KeyStyle } from '@/types/options.js';

export type CliArgs = {
    config?: string;
    debug: boolean;
    help: boolean;
    keyStyle?: KeyStyle;
    output?: string;
    profile?: string;
    progressInterval?: number;
    source?: string;
    translation?: string;
};

export const HELP_TEXT = `
Verse Extractor CLI

Usage: verse-extractor [options] [source] [output]

Options:
  -s, --source <directory>        Directory of <BOOK><chapter>.htm files
  -o, --output <file>             JSON file to write
  -p, --profile <name>            Translation profile: web, darby (default: web)
  -t, --translation <label>       Translation label written into each record
  -c, --config <file>             JSON configuration file
  -k, --key-style <style>         Output keys: camel, pascal (default: camel)
      --progress-interval <n>     Log progress every n verses (0 disables, default: 500)
  -d, --debug                     Enable debug logging
  -h, --help                      Show this help message

Examples:
  verse-extractor ./bible ./Data/Bible/web.json
  verse-extractor --source ./darby --output ./Data/Bible/darby.json --profile darby
  verse-extractor --config ./extract.json --key-style pascal
`;

export const isKeyStyle = (value: string): value is KeyStyle => value === 'camel' || value === 'pascal';

/**
 * Parses a non-negative integer option.
 *
 * @throws Error naming the option when the value is not a non-negative integer
 */
export const parseCount = (name: string, value: string) => {
    if (!/^\d+$/.test(value)) {
        throw new Error(`${name} must be a non-negative integer, got: ${value}`);
    }
    return Number.parseInt(value, 10);
};

/**
 * Parses command line arguments (without the node and script entries).
 *
 * `source` and `output` may also be given positionally, in that order.
 *
 * @throws Error on unknown options or invalid values
 */
export const parseCliArguments = (argv: string[]): CliArgs => {
    const { positionals, values } = parseArgs({
        allowPositionals: true,
        args: argv,
        options: {
            config: { short: 'c', type: 'string' },
            debug: { short: 'd', type: 'boolean' },
            help: { short: 'h', type: 'boolean' },
            'key-style': { short: 'k', type: 'string' },
            output: { short: 'o', type: 'string' },
            profile: { short: 'p', type: 'string' },
            'progress-interval': { type: 'string' },
            source: { short: 's', type: 'string' },
            translation: { short: 't', type: 'string' },
        },
    });

    const keyStyle = values['key-style'];
    if (keyStyle !== undefined && !isKeyStyle(keyStyle)) {
        throw new Error(`Unknown key style: ${keyStyle}. Use camel or pascal`);
    }

    const progressInterval = values['progress-interval'];

    return {
        config: values.config,
        debug: values.debug ?? false,
        help: values.help ?? false,
        keyStyle,
        output: values.output ?? positionals[1],
        profile: values.profile,
        progressInterval: progressInterval === undefined ? undefined : parseCount('--progress-interval', progressInterval),
        source: values.source ?? positionals[0],
        translation: values.translation,
    };
};
