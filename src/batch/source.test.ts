import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { extractCorpus } from './driver.js';
import { createDirectorySource, createMemorySource } from './source.js';

const chapter = (text: string) => `<div class="p"><span class="verse" id="V1">1&#160;</span>${text}</div>`;

describe('source', () => {
    describe('createDirectorySource', () => {
        let dir: string;
        let source: string;

        beforeEach(() => {
            dir = mkdtempSync(path.join(tmpdir(), 'verse-extractor-source-'));
            source = path.join(dir, 'bible');
            mkdirSync(source);
        });

        afterEach(() => {
            rmSync(dir, { force: true, recursive: true });
        });

        it('should list regular files and skip directories', () => {
            writeFileSync(path.join(source, 'GEN01.htm'), chapter('In the beginning.'));
            mkdirSync(path.join(source, 'images'));

            expect(createDirectorySource(source).list()).toEqual(['GEN01.htm']);
        });

        it('should list and read chapter files that are symbolic links', () => {
            const target = path.join(dir, 'genesis-1.htm');
            writeFileSync(target, chapter('In the beginning.'));
            symlinkSync(target, path.join(source, 'GEN01.htm'));

            const report = extractCorpus({ source: createDirectorySource(source) });

            expect(report.ok).toBe(true);
            expect(report.records.map((r) => r.fullText)).toEqual(['Genesis 1:1: In the beginning.']);
        });

        it('should report a link to a directory as a read failure', () => {
            writeFileSync(path.join(source, 'GEN01.htm'), chapter('In the beginning.'));
            mkdirSync(path.join(dir, 'exodus'));
            symlinkSync(path.join(dir, 'exodus'), path.join(source, 'EXO01.htm'));

            const report = extractCorpus({ source: createDirectorySource(source) });

            expect(report.records.map((r) => r.reference)).toEqual(['Genesis 1:1']);
            expect(report.skipped).toEqual([{ file: 'EXO01.htm', message: expect.any(String), reason: 'read_failed' }]);
        });

        it('should reject bytes that are not valid UTF-8', () => {
            const html = Buffer.concat([
                Buffer.from(chapter('Ab'), 'utf-8').subarray(0, -6),
                Buffer.from([0xff, 0xfe]),
                Buffer.from('c</div>', 'utf-8'),
            ]);
            writeFileSync(path.join(source, 'GEN01.htm'), html);

            expect(() => createDirectorySource(source).read('GEN01.htm')).toThrow(TypeError);
        });

        it('should skip a chapter file that is not valid UTF-8', () => {
            writeFileSync(path.join(source, 'GEN01.htm'), Buffer.from([0x3c, 0x64, 0x69, 0x76, 0x3e, 0xff, 0xfe]));
            writeFileSync(path.join(source, 'GEN02.htm'), chapter('Thus the heavens were finished.'));

            const report = extractCorpus({ source: createDirectorySource(source) });

            expect(report.records.map((r) => r.text)).toEqual(['Thus the heavens were finished.']);
            expect(report.skipped).toEqual([{ file: 'GEN01.htm', message: expect.any(String), reason: 'read_failed' }]);
        });

        it('should keep multi-byte UTF-8 text', () => {
            writeFileSync(path.join(source, 'GEN01.htm'), chapter('“Let there be light,” and there was light.'));

            expect(createDirectorySource(source).read('GEN01.htm')).toBe(chapter('“Let there be light,” and there was light.'));
        });
    });

    describe('createMemorySource', () => {
        it('should list and read its files', () => {
            const source = createMemorySource({ 'GEN01.htm': 'html' });

            expect(source.list()).toEqual(['GEN01.htm']);
            expect(source.read('GEN01.htm')).toBe('html');
        });

        it('should throw for a missing file', () => {
            expect(() => createMemorySource({}).read('GEN01.htm')).toThrow('ENOENT: no such file: GEN01.htm');
        });
    });
});
