import type { Testament } from '@/types/index.js';
import canonData from './books.json';

/**
 * A book of the 66-book Protestant canon.
 */
export type CanonBook = {
    /** Source file code, e.g. `'GEN'`, `'1SA'`, `'JHN'`. */
    code: string;
    /** Canonical English name, e.g. `'1 Samuel'`. */
    name: string;
};

/**
 * All 66 books in canonical reading order.
 */
export const CANON_BOOKS: readonly CanonBook[] = Object.freeze(
    canonData.books.map((b) => Object.freeze({ code: b.code, name: b.name })),
);

/**
 * Number of books before the split point between the Old and New Testament.
 */
export const OLD_TESTAMENT_BOOK_COUNT = canonData.oldTestamentCount;

/**
 * Canonical names in reading order.
 */
export const BOOK_ORDER: readonly string[] = Object.freeze(CANON_BOOKS.map((b) => b.name));

const NAME_BY_CODE: ReadonlyMap<string, string> = new Map(CANON_BOOKS.map((b) => [b.code, b.name]));

const RANK_BY_NAME: ReadonlyMap<string, number> = new Map(BOOK_ORDER.map((name, i) => [name, i + 1]));

/**
 * Maps a source file code to its canonical book name.
 *
 * @returns `undefined` for codes outside the table (front matter, glossaries, apocrypha)
 *
 * @example
 * resolveBook('JHN') // → 'John'
 * resolveBook('FRT') // → undefined
 */
export const resolveBook = (code: string) => NAME_BY_CODE.get(code);

/**
 * 1-based rank of a book in canonical order (Genesis = 1, Revelation = 66).
 *
 * @returns `0` for names that are not canonical
 */
export const getBookNumber = (book: string) => RANK_BY_NAME.get(book) ?? 0;

/**
 * `'Old'` for the first 39 books of canonical order, `'New'` for everything else.
 */
export const getTestament = (book: string): Testament => {
    const rank = getBookNumber(book);
    return rank > 0 && rank <= OLD_TESTAMENT_BOOK_COUNT ? 'Old' : 'New';
};
