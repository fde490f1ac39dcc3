/**
 * Pseudo-word segmentation with tone-sandhi merge passes.
 *
 * There is no statistical word segmenter here: CJK characters accumulate
 * into one noun-like token until whitespace, punctuation or a Latin word
 * ends it. The merge passes then fuse the particles whose tone depends on
 * their neighbour (不, 一) and reduplicated words.
 */

import { isEnglishChar, isPunctuation } from './punctuation.js';

export type TokenCategory = 'noun' | 'eng' | 'punct';

export interface Token {
    surface: string;
    category: TokenCategory;
}

const NEGATION = '不';
const ONE = '一';

/** Split a sentence into noun-like, English and punctuation tokens. */
export function tokenize(sentence: string): Token[] {
    const tokens: Token[] = [];
    const chars = Array.from(sentence);
    let word = '';

    const flush = () => {
        if (word) {
            tokens.push({ surface: word, category: 'noun' });
            word = '';
        }
    };

    for (let i = 0; i < chars.length; i++) {
        const ch = chars[i];
        if (isEnglishChar(ch)) {
            flush();
            let end = i;
            while (end < chars.length && isEnglishChar(chars[end])) end++;
            tokens.push({ surface: chars.slice(i, end).join(''), category: 'eng' });
            i = end - 1;
        } else if (isPunctuation(ch)) {
            flush();
            tokens.push({ surface: ch, category: 'punct' });
        } else if (/\s/u.test(ch)) {
            flush();
        } else {
            word += ch;
        }
    }
    flush();

    return tokens;
}

/** Fuse `不` with the word it negates. */
export function mergeBu(tokens: Token[]): Token[] {
    const result: Token[] = [];
    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        const next = tokens[i + 1];
        if (token.surface === NEGATION && next && next.category !== 'punct') {
            result.push({ surface: NEGATION + next.surface, category: next.category });
            i++;
        } else {
            result.push({ ...token });
        }
    }
    return result;
}

/** Fold `X 一 X` into `X一X`; otherwise fuse a standalone `一` with the following word. */
export function mergeYi(tokens: Token[]): Token[] {
    const result: Token[] = [];
    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        const prev = result[result.length - 1];
        const next = tokens[i + 1];
        if (token.surface !== ONE || !next || next.category === 'punct') {
            result.push({ ...token });
            continue;
        }
        if (prev && prev.category !== 'punct' && prev.surface === next.surface) {
            prev.surface = prev.surface + ONE + next.surface;
        } else {
            result.push({ surface: ONE + next.surface, category: next.category });
        }
        i++;
    }
    return result;
}

/**
 * Fuse a token with an identical predecessor. Fusion cascades, so the
 * output never holds two equal neighbours and a second pass is a no-op.
 */
export function mergeReduplication(tokens: Token[]): Token[] {
    const result: Token[] = [];
    for (const token of tokens) {
        result.push({ ...token });
        while (result.length > 1 && result[result.length - 1].surface === result[result.length - 2].surface) {
            const last = result.pop();
            if (last) result[result.length - 1].surface += last.surface;
        }
    }
    return result;
}

/** Tokenize a sentence and run the merge passes in their fixed order. */
export function segmentWords(sentence: string): Token[] {
    return mergeReduplication(mergeYi(mergeBu(tokenize(sentence))));
}
