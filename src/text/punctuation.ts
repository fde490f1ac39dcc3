/** Characters treated as standalone punctuation tokens. */
export const PUNCTUATION = new Set<string>([
    '!', '?', '…', ',', '.', "'", '-', ';', ':', '¿', '¡',
    '。', '，', '、', '；', '：', '？', '！',
    '“', '”', '‘', '’', '（', '）', '《', '》',
    '【', '】', '—', '～', '「', '」',
]);

export function isPunctuation(ch: string): boolean {
    return PUNCTUATION.has(ch);
}

/** Latin letters and the apostrophe form English words. */
export function isEnglishChar(ch: string): boolean {
    return /^[A-Za-z']$/.test(ch);
}

export function isEnglishWord(word: string): boolean {
    return word.length > 0 && /^[A-Za-z']+$/.test(word);
}
