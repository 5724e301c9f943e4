import type { ExtractedVerse, Testament, VerseRecord } from '@/types/index.js';
import type { KeyStyle } from '@/types/options.js';

/**
 * What every record of one chapter file shares.
 */
export type ChapterContext = {
    book: string;
    bookNumber: number;
    chapter: number;
    testament: Testament;
    translation: string;
};

export const formatReference = (book: string, chapter: number, verse: number) => `${book} ${chapter}:${verse}`;

/**
 * Builds the frozen output record for one extracted verse.
 *
 * @example
 * buildVerseRecord({ book: 'John', bookNumber: 43, chapter: 11, testament: 'New', translation: 'WEB' },
 *     { text: 'Jesus wept.', verseNumber: 35 })
 * // → { ..., reference: 'John 11:35', fullText: 'John 11:35: Jesus wept.' }
 */
export const buildVerseRecord = (context: ChapterContext, verse: ExtractedVerse): VerseRecord => {
    const reference = formatReference(context.book, context.chapter, verse.verseNumber);

    return Object.freeze({
        book: context.book,
        bookNumber: context.bookNumber,
        chapter: context.chapter,
        fullText: `${reference}: ${verse.text}`,
        reference,
        testament: context.testament,
        text: verse.text,
        translation: context.translation,
        verse: verse.verseNumber,
    });
};

/**
 * A record with the keys the original data layer binds to.
 */
export type PascalVerseRecord = {
    Book: string;
    Chapter: number;
    Verse: number;
    Text: string;
    Translation: string;
    Reference: string;
    FullText: string;
    Testament: Testament;
    BookNumber: number;
};

export const toPascalRecord = (record: VerseRecord): PascalVerseRecord => ({
    Book: record.book,
    Chapter: record.chapter,
    Verse: record.verse,
    Text: record.text,
    Translation: record.translation,
    Reference: record.reference,
    FullText: record.fullText,
    Testament: record.testament,
    BookNumber: record.bookNumber,
});

/**
 * Field order used in the written JSON, matching the order readers of the
 * existing verse files expect.
 */
export const toCamelRecord = (record: VerseRecord): VerseRecord => ({
    book: record.book,
    chapter: record.chapter,
    verse: record.verse,
    text: record.text,
    translation: record.translation,
    reference: record.reference,
    fullText: record.fullText,
    testament: record.testament,
    bookNumber: record.bookNumber,
});

export const formatRecords = (records: readonly VerseRecord[], keyStyle: KeyStyle = 'camel') =>
    keyStyle === 'pascal' ? records.map(toPascalRecord) : records.map(toCamelRecord);
