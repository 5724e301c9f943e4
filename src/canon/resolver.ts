import type { Testament } from '@/types/index.js';
import { getBookNumber, getTestament, resolveBook } from './canon.js';

/**
 * `<bookCode><chapter>.htm`. The code is lazy so the chapter takes every
 * trailing digit: `1CH01` → `1CH` + `01`, `PSA023` → `PSA` + `023`.
 */
const CHAPTER_FILENAME = /^([A-Z0-9]+?)(\d+)\.htm$/;

export type ParsedChapterFilename = {
    bookCode: string;
    chapter: number;
};

export type ResolvedChapterFile =
    | {
          ok: true;
          book: string;
          bookCode: string;
          bookNumber: number;
          chapter: number;
          testament: Testament;
      }
    | {
          ok: false;
          reason: 'unrecognized_filename' | 'unknown_book_code';
          bookCode?: string;
      };

/**
 * Checks that a file name has the chapter file shape without resolving its code.
 */
export const isChapterFilename = (name: string) => CHAPTER_FILENAME.test(name);

/**
 * Splits a chapter file name into its book code and chapter number.
 *
 * @returns `null` when the name does not have the chapter shape or the chapter is 0
 *
 * @example
 * parseChapterFilename('JHN03.htm') // → { bookCode: 'JHN', chapter: 3 }
 * parseChapterFilename('index.htm') // → null
 */
export const parseChapterFilename = (name: string): ParsedChapterFilename | null => {
    const match = CHAPTER_FILENAME.exec(name);
    if (!match) {
        return null;
    }

    const chapter = Number.parseInt(match[2], 10);
    if (chapter < 1) {
        return null;
    }

    return { bookCode: match[1], chapter };
};

/**
 * Resolves a chapter file name to the book metadata every record of that file carries.
 *
 * `bookNumber` is always the canonical rank here; profiles that do not rank
 * books override it when records are built.
 *
 * @example
 * resolveChapterFile('JHN03.htm')
 * // → { ok: true, book: 'John', bookCode: 'JHN', bookNumber: 43, chapter: 3, testament: 'New' }
 *
 * resolveChapterFile('XYZ01.htm')
 * // → { ok: false, reason: 'unknown_book_code', bookCode: 'XYZ' }
 */
export const resolveChapterFile = (name: string): ResolvedChapterFile => {
    const parsed = parseChapterFilename(name);
    if (!parsed) {
        return { ok: false, reason: 'unrecognized_filename' };
    }

    const book = resolveBook(parsed.bookCode);
    if (!book) {
        return { bookCode: parsed.bookCode, ok: false, reason: 'unknown_book_code' };
    }

    return {
        book,
        bookCode: parsed.bookCode,
        bookNumber: getBookNumber(book),
        chapter: parsed.chapter,
        ok: true,
        testament: getTestament(book),
    };
};
