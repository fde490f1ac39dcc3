/**
 * Tests for sentence segmentation -- splitSentences() and mergeShortFragments().
 */

import { describe, it, expect } from 'vitest';
import { splitSentences, mergeShortFragments } from './sentence-splitter.js';
import { normalizeText } from './normalizer.js';

const stripWhitespace = (s: string) => s.replace(/\s+/g, '');

describe('splitSentences', () => {
    it('returns an empty list for empty or blank input', () => {
        expect(splitSentences('')).toEqual([]);
        expect(splitSentences('   ')).toEqual([]);
    });

    it('keeps split marks attached to their fragment', () => {
        expect(splitSentences('今天天气很好,我们去公园散步吧.明天见!')).toEqual([
            '今天天气很好, 我们去公园散步吧.',
            '明天见!',
        ]);
    });

    it('merges short fragments into one sentence', () => {
        expect(splitSentences('你好,世界.')).toEqual(['你好, 世界.']);
    });

    it('folds a stray trailing sentence into its predecessor', () => {
        expect(splitSentences('abcdefghijk,x.')).toEqual(['abcdefghijk, x.']);
    });

    it('honours a custom minimum length', () => {
        expect(splitSentences('one two, three four; five six.', 5)).toEqual([
            'one two,',
            'three four;',
            'five six.',
        ]);
    });

    it('splits on full-width marks that survived normalization', () => {
        expect(splitSentences('第一句话说得很长很长。第二句话也说得很长很长！')).toEqual([
            '第一句话说得很长很长。',
            '第二句话也说得很长很长！',
        ]);
    });

    it('preserves every non-whitespace character of the input', () => {
        const inputs = [
            '你好，世界！今天天气不错。我们一起去看看吧？好的',
            'Hello there, general. How are you; fine!',
            '一,二,三,四,五,六,七,八,九,十',
            '没有标点的一整段文字',
        ];
        for (const raw of inputs) {
            const normalized = normalizeText(raw);
            const sentences = splitSentences(normalized);
            expect(stripWhitespace(sentences.join(''))).toBe(stripWhitespace(normalized));
        }
    });
});

describe('mergeShortFragments', () => {
    it('flushes once the running length exceeds the minimum', () => {
        expect(mergeShortFragments(['abcd', 'efgh', 'ijkl', 'mn'], 7)).toEqual(['abcd efgh', 'ijkl mn']);
    });

    it('folds every sentence of two characters or fewer', () => {
        expect(mergeShortFragments(['a,', 'b,', 'c'], 1)).toEqual(['a, b, c']);
    });

    it('keeps a short first sentence when nothing precedes it', () => {
        expect(mergeShortFragments(['ab'], 10)).toEqual(['ab']);
    });
});
