import { readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import type { ChapterSource } from '@/types/index.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads chapter files from a directory.
 *
 * `list()` throws when the directory cannot be read; `extractCorpus()` lets
 * that propagate since there is no batch to run. Symbolic links are listed
 * along with regular files.
 *
 * `read()` throws on bytes that are not valid UTF-8.
 */
export const createDirectorySource = (directory: string): ChapterSource => ({
    list: () =>
        readdirSync(directory, { withFileTypes: true })
            .filter((entry) => entry.isFile() || entry.isSymbolicLink())
            .map((entry) => entry.name),
    read: (name) => utf8.decode(readFileSync(path.join(directory, name))),
});

/**
 * In-memory source keyed by file name.
 */
export const createMemorySource = (files: Readonly<Record<string, string>>): ChapterSource => ({
    list: () => Object.keys(files),
    read: (name) => {
        if (!Object.hasOwn(files, name)) {
            throw new Error(`ENOENT: no such file: ${name}`);
        }
        return files[name];
    },
});
