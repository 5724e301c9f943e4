import { describe, expect, it } from 'vitest';
import { DEFAULT_ENTITIES, defineProfile, PROFILES } from '@/profiles/profiles.js';
import {
    decodeEntities,
    normalizeVerseText,
    removeGlyphs,
    replaceTags,
    stripSupplyBrackets,
    tightenPunctuation,
} from './normalize.js';

describe('normalize', () => {
    describe('replaceTags', () => {
        it('should replace each tag with a space so adjacent words do not fuse', () => {
            expect(replaceTags('one<br/>two')).toBe('one two');
            expect(replaceTags('<i>In</i><b>the</b>')).toBe(' In  the ');
        });

        it('should leave text without tags unchanged', () => {
            expect(replaceTags('In the beginning')).toBe('In the beginning');
        });
    });

    describe('decodeEntities', () => {
        it('should decode non-breaking spaces', () => {
            expect(decodeEntities('a&#160;b&nbsp;c', DEFAULT_ENTITIES)).toBe('a b c');
        });

        it('should decode markup-significant entities', () => {
            expect(decodeEntities('&quot;Peace&quot; &apos;be&apos; &lt;with&gt; you', DEFAULT_ENTITIES)).toBe(
                `"Peace" 'be' <with> you`,
            );
        });

        it('should decode &amp; after everything else', () => {
            expect(decodeEntities('Tom &amp; Jerry', DEFAULT_ENTITIES)).toBe('Tom & Jerry');
            expect(decodeEntities('&amp;lt;', DEFAULT_ENTITIES)).toBe('&lt;');
        });

        it('should leave unknown entities alone', () => {
            expect(decodeEntities('&copy; 2001', DEFAULT_ENTITIES)).toBe('&copy; 2001');
        });

        it('should skip &amp; when the table does not have it', () => {
            expect(decodeEntities('a&amp;b&nbsp;c', { '&nbsp;': ' ' })).toBe('a&amp;b c');
        });
    });

    describe('stripSupplyBrackets', () => {
        it('should drop the brackets and keep the supplied words', () => {
            expect(stripSupplyBrackets('and [there was] light')).toBe('and there was light');
        });
    });

    describe('removeGlyphs', () => {
        it('should remove every listed glyph', () => {
            expect(removeGlyphs('word† here‡ and§ there¶', ['†', '‡', '§', '¶'])).toBe('word here and there');
        });

        it('should treat glyphs as literals', () => {
            expect(removeGlyphs('a*b.c', ['*'])).toBe('ab.c');
        });

        it('should return the text unchanged when there are no glyphs', () => {
            expect(removeGlyphs('a†b', [])).toBe('a†b');
        });
    });

    describe('tightenPunctuation', () => {
        it('should pull sentence punctuation back onto the previous word', () => {
            expect(tightenPunctuation('the beginning . And God said , Let')).toBe('the beginning. And God said, Let');
        });

        it('should leave spaces after punctuation alone', () => {
            expect(tightenPunctuation('light; and darkness')).toBe('light; and darkness');
        });
    });

    describe('normalizeVerseText', () => {
        it('should not leave a space where a closing tag met punctuation', () => {
            expect(normalizeVerseText('In the <i>beginning</i>.', PROFILES.web)).toBe('In the beginning.');
        });

        it('should apply every web step in order', () => {
            expect(normalizeVerseText('\n  In the <i>beginning</i>&#160;God†\n', PROFILES.web)).toBe(
                'In the beginning God',
            );
        });

        it('should keep angle brackets that were escaped in the source', () => {
            expect(normalizeVerseText('a &lt;b&gt; c', PROFILES.web)).toBe('a <b> c');
            expect(normalizeVerseText('&lt;i&gt;light&lt;/i&gt;', PROFILES.darby)).toBe('<i>light</i>');
        });

        it('should keep brackets under the web profile', () => {
            expect(normalizeVerseText('and [there was] light', PROFILES.web)).toBe('and [there was] light');
        });

        it('should strip brackets under the darby profile', () => {
            expect(normalizeVerseText('And God said, Let there be light. And there was light.', PROFILES.darby)).toBe(
                'And God said, Let there be light. And there was light.',
            );
            expect(normalizeVerseText('and [there] was <span class="add">[light]</span>', PROFILES.darby)).toBe(
                'and there was light',
            );
        });

        it('should keep footnote glyphs when the profile lists none', () => {
            expect(normalizeVerseText('light†', PROFILES.darby)).toBe('light†');
        });

        it('should use a custom glyph set', () => {
            const profile = defineProfile('darby', { footnoteGlyphs: ['*'] });
            expect(normalizeVerseText('light* and [dark]', profile)).toBe('light and dark');
        });

        it('should return an empty string for markup-only bodies', () => {
            expect(normalizeVerseText(' <br/> &#160; <p></p>\n', PROFILES.web)).toBe('');
        });

        it('should be idempotent on text without markup or entities', () => {
            const samples = [
                '  In the beginning   God created\nthe heavens.',
                'and [there was] light†',
                'Jesus wept.',
                '',
                '\t“Peace be with you,” he said. ',
            ];

            for (const profile of [PROFILES.web, PROFILES.darby]) {
                for (const sample of samples) {
                    const once = normalizeVerseText(sample, profile);
                    expect(normalizeVerseText(once, profile)).toBe(once);
                }
            }
        });
    });
});
