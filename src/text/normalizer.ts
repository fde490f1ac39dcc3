/**
 * Text normalization: punctuation variants, digits and whitespace.
 * Pure and total over any input string.
 */

import type { Language } from '../config/index.js';

/** Ordered: `...` must collapse to an ellipsis before anything else touches the dots. */
const PUNCTUATION_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
    ['...', '…'],
    ['：', ','], ['；', ','], ['，', ','], ['、', ','], ['·', ','],
    ['。', '.'], ['！', '!'], ['？', '?'], ['\r\n', '.'], ['\n', '.'], ['$', '.'],
    ['“', "'"], ['”', "'"], ['‘', "'"], ['’', "'"], ['＂', "'"], ['＇', "'"],
    ['（', "'"], ['）', "'"], ['(', "'"], [')', "'"],
    ['《', "'"], ['》', "'"], ['【', "'"], ['】', "'"],
    ['[', "'"], [']', "'"], ['「', "'"], ['」', "'"],
    ['—', '-'], ['–', '-'], ['－', '-'], ['～', '-'], ['~', '-'],
];

const ENGLISH_ABBREVIATIONS: ReadonlyArray<readonly [RegExp, string]> = [
    [/\bmr\./g, 'mister'],
    [/\bmrs\./g, 'missus'],
    [/\bdr\./g, 'doctor'],
    [/\bst\./g, 'street'],
    [/\bave\./g, 'avenue'],
    [/\bvs\./g, 'versus'],
];

const ZH_DIGITS = ['零', '一', '二', '三', '四', '五', '六', '七', '八', '九'];
const ZH_UNITS = ['', '十', '百', '千'];
const ZH_SECTION_UNITS = ['', '万', '亿', '万亿'];

const EN_ONES = [
    'zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine',
    'ten', 'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen', 'sixteen', 'seventeen', 'eighteen', 'nineteen',
];
const EN_TENS = ['', '', 'twenty', 'thirty', 'forty', 'fifty', 'sixty', 'seventy', 'eighty', 'ninety'];

const NUMBER_PATTERN = /(\d+)(?:\.(\d+))?(%)?/g;

function readZhSection(section: number): string {
    let out = '';
    let pendingZero = false;
    for (let i = 3; i >= 0; i--) {
        const digit = Math.floor(section / 10 ** i) % 10;
        if (digit === 0) {
            if (out) pendingZero = true;
            continue;
        }
        if (pendingZero) {
            out += '零';
            pendingZero = false;
        }
        out += ZH_DIGITS[digit] + ZH_UNITS[i];
    }
    return out;
}

function readZhDigits(digits: string): string {
    return Array.from(digits, d => ZH_DIGITS[Number(d)]).join('');
}

/** Read a digit string as a Chinese numeral (`2024` → `二千零二十四`). */
export function readChineseInteger(digits: string): string {
    const trimmed = digits.replace(/^0+/, '');
    if (!trimmed) return '零';
    if (trimmed.length > 16) return readZhDigits(digits);

    const sections: number[] = [];
    for (let end = trimmed.length; end > 0; end -= 4) {
        sections.unshift(Number(trimmed.slice(Math.max(0, end - 4), end)));
    }

    let out = '';
    let pendingZero = false;
    sections.forEach((section, idx) => {
        const unit = ZH_SECTION_UNITS[sections.length - 1 - idx];
        if (section === 0) {
            if (out) pendingZero = true;
            return;
        }
        if (out && (pendingZero || section < 1000)) out += '零';
        out += readZhSection(section) + unit;
        pendingZero = false;
    });

    return out.startsWith('一十') ? out.slice(1) : out;
}

function readEnglishHundreds(n: number): string[] {
    const words: string[] = [];
    const hundreds = Math.floor(n / 100);
    const rest = n % 100;
    if (hundreds) words.push(EN_ONES[hundreds], 'hundred');
    if (rest >= 20) {
        words.push(EN_TENS[Math.floor(rest / 10)]);
        if (rest % 10) words.push(EN_ONES[rest % 10]);
    } else if (rest) {
        words.push(EN_ONES[rest]);
    }
    return words;
}

/** Read a digit string as English words (`42` → `forty two`); long runs are read digit by digit. */
export function readEnglishInteger(digits: string): string {
    if (digits.length > 9) return Array.from(digits, d => EN_ONES[Number(d)]).join(' ');
    const n = Number(digits);
    if (n === 0) return 'zero';

    const words: string[] = [];
    const millions = Math.floor(n / 1_000_000);
    const thousands = Math.floor(n / 1000) % 1000;
    const rest = n % 1000;
    if (millions) words.push(...readEnglishHundreds(millions), 'million');
    if (thousands) words.push(...readEnglishHundreds(thousands), 'thousand');
    if (rest) words.push(...readEnglishHundreds(rest));
    return words.join(' ');
}

function verbalizeChineseNumbers(text: string): string {
    return text.replace(NUMBER_PATTERN, (_match, int: string, frac: string | undefined, percent: string | undefined) => {
        let spoken = readChineseInteger(int);
        if (frac) spoken += '点' + readZhDigits(frac);
        return percent ? '百分之' + spoken : spoken;
    });
}

function verbalizeEnglishNumbers(text: string): string {
    return text.replace(NUMBER_PATTERN, (_match, int: string, frac: string | undefined, percent: string | undefined) => {
        let spoken = readEnglishInteger(int);
        if (frac) spoken += ' point ' + Array.from(frac, d => EN_ONES[Number(d)]).join(' ');
        if (percent) spoken += ' percent';
        return ` ${spoken} `;
    });
}

/** Replace full-width and typographic punctuation with the ASCII forms the lexicon knows. */
export function replacePunctuation(text: string): string {
    let result = text;
    for (const [from, to] of PUNCTUATION_REPLACEMENTS) {
        result = result.replaceAll(from, to);
    }
    return result;
}

/**
 * Canonicalize punctuation, digits and whitespace.
 * English text is also lowercased with common abbreviations expanded.
 */
export function normalizeText(text: string, language: Language = 'zh'): string {
    let result = text;

    if (language === 'en') {
        result = result.toLowerCase();
        for (const [pattern, expansion] of ENGLISH_ABBREVIATIONS) {
            result = result.replace(pattern, expansion);
        }
    }

    result = replacePunctuation(result);
    result = language === 'en' ? verbalizeEnglishNumbers(result) : verbalizeChineseNumbers(result);

    return result.replace(/\s+/g, ' ').trim();
}
