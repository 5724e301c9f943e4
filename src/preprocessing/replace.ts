import type { Replacement } from '@/types/options.js';

const DEFAULT_REPLACE_FLAGS = 'gu';

const normalizeReplaceFlags = (flags?: string) => {
    if (!flags) {
        return DEFAULT_REPLACE_FLAGS;
    }

    const allowed = new Set(['g', 'i', 'm', 's', 'u', 'y']);
    const set = new Set(
        flags.split('').filter((ch) => {
            if (!allowed.has(ch)) {
                throw new Error(`Invalid replace regex flag: "${ch}" (allowed: gimsyu)`);
            }
            return true;
        }),
    );
    set.add('g');
    set.add('u');

    return ['g', 'i', 'm', 's', 'y', 'u'].filter((c) => set.has(c)).join('');
};

export type CompiledReplacement = {
    fileSet?: ReadonlySet<string>;
    re: RegExp;
    replacement: string;
};

/**
 * Compiles correction rules once per batch.
 *
 * Rules with `files: []` are dropped.
 *
 * @throws Error on an unknown flag or an invalid regex
 */
export const compileReplacements = (rules: Replacement[]): CompiledReplacement[] =>
    rules
        .filter((r) => !(r.files && r.files.length === 0))
        .map((r) => ({
            fileSet: r.files ? new Set(r.files) : undefined,
            re: new RegExp(r.regex, normalizeReplaceFlags(r.flags)),
            replacement: r.replacement,
        }));

/**
 * Applies compiled corrections to one chapter file's raw HTML, in order.
 *
 * A rule scoped with `files` only touches the listed file names.
 */
export const applyCorrections = (file: string, html: string, rules: CompiledReplacement[]) => {
    let content = html;
    for (const rule of rules) {
        if (!rule.fileSet || rule.fileSet.has(file)) {
            content = content.replace(rule.re, rule.replacement);
        }
    }
    return content;
};
