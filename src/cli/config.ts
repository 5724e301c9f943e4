import { readFileSync } from 'node:fs';
import type { KeyStyle, Replacement } from '@/types/options.js';
import { type CliArgs, isKeyStyle } from './args.js';

/**
 * Shape of the `--config` JSON file. Every key is optional; command line flags win.
 *
 * @example
 * {
 *   "source": "./darby",
 *   "output": "./Data/Bible/darby.json",
 *   "profile": "darby",
 *   "replace": [{ "regex": "id=\"V7\">7</span>", "replacement": "id=\"V7\">7&#160;</span>", "files": ["GEN05.htm"] }]
 * }
 */
export type CliConfig = {
    keyStyle?: KeyStyle;
    output?: string;
    profile?: string;
    progressInterval?: number;
    replace?: Replacement[];
    source?: string;
    translation?: string;
};

export type RunOptions = {
    debug: boolean;
    keyStyle: KeyStyle;
    output: string;
    profile: string;
    progressInterval?: number;
    replace: Replacement[];
    source: string;
    translation?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (config: Record<string, unknown>, key: string): string | undefined => {
    const value = config[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value === 'string') {
        return value;
    }
    throw new Error(`Config "${key}" must be a string`);
};

const readCount = (config: Record<string, unknown>, key: string): number | undefined => {
    const value = config[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
        return value;
    }
    throw new Error(`Config "${key}" must be a non-negative integer`);
};

const readStringArray = (value: unknown, key: string): string[] => {
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new Error(`Config "${key}" must be an array of strings`);
    }
    return value;
};

const readReplacement = (value: unknown, index: number): Replacement => {
    const key = `replace[${index}]`;
    if (!isRecord(value)) {
        throw new Error(`Config "${key}" must be an object`);
    }

    const regex = readString(value, 'regex');
    const replacement = readString(value, 'replacement');
    if (regex === undefined || replacement === undefined) {
        throw new Error(`Config "${key}" needs "regex" and "replacement"`);
    }

    return {
        files: value.files === undefined ? undefined : readStringArray(value.files, `${key}.files`),
        flags: readString(value, 'flags'),
        regex,
        replacement,
    };
};

const readReplacements = (value: unknown) => {
    if (!Array.isArray(value)) {
        throw new Error('Config "replace" must be an array');
    }
    return value.map(readReplacement);
};

/**
 * Checks a parsed config file and returns it typed.
 *
 * @throws Error naming the first invalid key
 */
export const parseConfig = (raw: unknown): CliConfig => {
    if (!isRecord(raw)) {
        throw new Error('Config file must contain a JSON object');
    }

    const keyStyle = readString(raw, 'keyStyle');
    if (keyStyle !== undefined && !isKeyStyle(keyStyle)) {
        throw new Error(`Config "keyStyle" must be camel or pascal, got: ${keyStyle}`);
    }

    return {
        keyStyle,
        output: readString(raw, 'output'),
        profile: readString(raw, 'profile'),
        progressInterval: readCount(raw, 'progressInterval'),
        replace: raw.replace === undefined ? undefined : readReplacements(raw.replace),
        source: readString(raw, 'source'),
        translation: readString(raw, 'translation'),
    };
};

/**
 * Reads and checks the `--config` file.
 *
 * @throws Error when the file cannot be read, is not JSON, or has invalid keys
 */
export const loadConfiguration = (configPath?: string): CliConfig => {
    if (!configPath) {
        return {};
    }

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
        throw new Error(`Failed to load configuration file: ${configPath}`, { cause: error });
    }

    return parseConfig(raw);
};

/**
 * Merges defaults, the config file and command line flags, in increasing precedence.
 *
 * @throws Error when no source directory or output file is given
 */
export const resolveRunOptions = (args: CliArgs, config: CliConfig): RunOptions => {
    const source = args.source ?? config.source;
    const output = args.output ?? config.output;

    if (!source) {
        throw new Error('A source directory is required. Use --help for usage information.');
    }
    if (!output) {
        throw new Error('An output file is required. Use --help for usage information.');
    }

    return {
        debug: args.debug,
        keyStyle: args.keyStyle ?? config.keyStyle ?? 'camel',
        output,
        profile: args.profile ?? config.profile ?? 'web',
        progressInterval: args.progressInterval ?? config.progressInterval,
        replace: config.replace ?? [],
        source,
        translation: args.translation ?? config.translation,
    };
};
