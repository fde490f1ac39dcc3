/**
 * Text → parallel phoneme-ID / tone-ID sequences.
 *
 * Drives normalization, sentence splitting and word segmentation, then
 * resolves every token against the lexicon and the phoneme table. Nothing
 * here throws for unknown input: misses are logged and replaced by the
 * unknown symbol so the acoustic model always receives a usable sequence.
 */

import type { Language } from '../config/index.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import { normalizeText } from '../text/normalizer.js';
import { isPunctuation } from '../text/punctuation.js';
import { splitSentences } from '../text/sentence-splitter.js';
import { segmentWords, type Token } from '../text/word-segmenter.js';
import { Lexicon, type Pronunciation } from './lexicon.js';
import { firstFound, mapLookup, notFound, type Lookup } from './lookup.js';
import { PhonemeRemap } from './phoneme-remap.js';
import { PAUSE_TOKEN, PhonemeTable } from './phoneme-table.js';

export const MAX_TONE = 5;

export interface PhoneToneUnit {
    id: number;
    tone: number;
}

export interface PhonemeSequence {
    phones: number[];
    tones: number[];
}

export interface ResolverStats {
    phonemes: number;
    lexiconEntries: number;
    englishEntries: number;
    remapEntries: number;
}

export interface PhonemeResolverOptions {
    logger?: Logger;
}

export interface PhonemeResolverPaths {
    lexiconPath: string;
    tokensPath: string;
    remapPath: string;
}

const SCOPE = 'Lexicon';

/** Split a trailing tone digit off a phoneme (`ao3` → `ao`, 3). */
function splitTone(phoneme: string): { base: string; tone: number } | null {
    const match = /^(.*)(\d)$/.exec(phoneme);
    if (!match) return null;
    return { base: match[1], tone: Math.min(MAX_TONE, Number(match[2])) };
}

/** Insert `blank` before, between and after the elements: length `2n + 1`. */
export function intersperse(sequence: readonly number[], blank = 0): number[] {
    const result = new Array<number>(sequence.length * 2 + 1).fill(blank);
    sequence.forEach((value, i) => {
        result[i * 2 + 1] = value;
    });
    return result;
}

export class PhonemeResolver {
    private readonly logger: Logger;

    constructor(
        private readonly table: PhonemeTable,
        private readonly lexicon: Lexicon,
        private readonly remap: PhonemeRemap = new PhonemeRemap(),
        options: PhonemeResolverOptions = {},
    ) {
        this.logger = options.logger ?? defaultLogger;
    }

    /** Load the phoneme table first so a broken model directory fails on the smaller file. */
    static load(paths: PhonemeResolverPaths, options: PhonemeResolverOptions = {}): PhonemeResolver {
        const log = options.logger ?? defaultLogger;
        const table = PhonemeTable.load(paths.tokensPath, log);
        const lexicon = Lexicon.load(paths.lexiconPath, log);
        const remap = PhonemeRemap.load(paths.remapPath);
        return new PhonemeResolver(table, lexicon, remap, options);
    }

    get padId(): number {
        return this.table.padId;
    }

    get unknownId(): number {
        return this.table.unknownId;
    }

    stats(): ResolverStats {
        return {
            phonemes: this.table.size,
            lexiconEntries: this.lexicon.size,
            englishEntries: this.lexicon.englishSize,
            remapEntries: this.remap.size,
        };
    }

    /**
     * Convert raw text into equal-length, non-empty phone and tone sequences.
     * `minSentenceLength` is forwarded to the sentence splitter.
     */
    convert(text: string, language: Language = 'zh', minSentenceLength = 10): PhonemeSequence {
        const normalized = normalizeText(text, language);
        this.logger.debug(`Normalized: ${normalized}`, SCOPE);

        const units: PhoneToneUnit[] = [];
        for (const sentence of splitSentences(normalized, minSentenceLength)) {
            const tokens = segmentWords(sentence);
            this.logger.debug(`Sentence "${sentence}" → ${tokens.map(t => t.surface).join(' | ')}`, SCOPE);
            for (const token of tokens) {
                units.push(...this.resolveToken(token));
            }
        }

        const sequence = this.validateSequences(units.map(u => u.id), units.map(u => u.tone));
        this.logger.debug(`Resolved ${sequence.phones.length} phonemes: ${this.describe(sequence.phones).join(' ')}`, SCOPE);
        return sequence;
    }

    /**
     * Repair a phone/tone pair: equal length, known IDs, tones in range,
     * never empty.
     */
    validateSequences(phones: readonly number[], tones: readonly number[]): PhonemeSequence {
        const length = Math.min(phones.length, tones.length);
        if (phones.length !== tones.length) {
            this.logger.warn(`Phone/tone length mismatch (${phones.length} vs ${tones.length}), truncating to ${length}`, SCOPE);
        }

        const result: PhonemeSequence = { phones: [], tones: [] };
        for (let i = 0; i < length; i++) {
            result.phones.push(this.table.hasId(phones[i]) ? phones[i] : this.unknownId);
            const tone = tones[i];
            result.tones.push(Number.isInteger(tone) && tone >= 0 && tone <= MAX_TONE ? tone : 0);
        }

        if (result.phones.length === 0) {
            return { phones: [this.unknownId], tones: [0] };
        }
        return result;
    }

    /** Map IDs back to their tokens; unknown IDs render as `#<id>`. */
    describe(phones: readonly number[]): string[] {
        return phones.map(id => this.table.tokenOf(id) ?? `#${id}`);
    }

    private resolveToken(token: Token): PhoneToneUnit[] {
        if (token.category === 'eng') {
            const entry = this.lexicon.lookupEnglish(token.surface);
            if (entry.found) return this.resolvePronunciation(entry.value);
            return Array.from(token.surface, ch => this.resolveLetter(ch));
        }

        const entry = this.lexicon.lookup(token.surface);
        if (entry.found) return this.resolvePronunciation(entry.value);
        return Array.from(token.surface).flatMap(ch => this.resolveCharacter(ch));
    }

    private resolvePronunciation(phonemes: Pronunciation): PhoneToneUnit[] {
        return phonemes.map(phoneme => {
            const unit = this.resolvePhoneme(phoneme);
            if (unit.found) return unit.value;
            this.logger.warn(`Unknown phoneme "${phoneme}"`, SCOPE);
            return this.unknownUnit();
        });
    }

    private resolveLetter(ch: string): PhoneToneUnit {
        const unit = firstFound(
            () => this.table.lookup(ch),
            () => this.table.lookup(ch.toLowerCase()),
        );
        if (unit.found) return { id: unit.value, tone: 0 };
        this.logger.warn(`No phoneme for letter "${ch}"`, SCOPE);
        return this.unknownUnit();
    }

    private resolveCharacter(ch: string): PhoneToneUnit[] {
        const entry = this.lexicon.lookup(ch);
        if (entry.found) return this.resolvePronunciation(entry.value);

        if (isPunctuation(ch)) {
            const id = firstFound(
                () => this.table.lookup(ch),
                () => this.table.lookup(PAUSE_TOKEN),
            );
            return [{ id: id.found ? id.value : this.unknownId, tone: 0 }];
        }

        this.logger.warn(`Character not in lexicon: "${ch}"`, SCOPE);
        return [this.unknownUnit()];
    }

    /**
     * Phoneme → (ID, tone). Tone-marked prefix first, then the whole
     * string, then the remap table.
     */
    resolvePhoneme(phoneme: string): Lookup<PhoneToneUnit> {
        const marked = splitTone(phoneme);
        const tone = marked?.tone ?? 0;

        return firstFound(
            () => marked ? mapLookup(this.table.lookup(marked.base), id => ({ id, tone })) : notFound,
            () => mapLookup(this.table.lookup(phoneme), id => ({ id, tone })),
            () => this.resolveRemapped(phoneme),
        );
    }

    /** The tone comes from the remapped phoneme alone; one without a digit is toneless. */
    private resolveRemapped(phoneme: string): Lookup<PhoneToneUnit> {
        const mapped = this.remap.apply(phoneme);
        if (mapped === phoneme) return notFound;

        const own = splitTone(mapped);
        const unit = firstFound(
            () => mapLookup(this.table.lookup(mapped), id => ({ id, tone: own?.tone ?? 0 })),
            () => own ? mapLookup(this.table.lookup(own.base), id => ({ id, tone: own.tone })) : notFound,
        );
        if (unit.found) {
            this.logger.debug(`Remapped phoneme "${phoneme}" → "${mapped}"`, SCOPE);
            return unit;
        }
        return notFound;
    }

    private unknownUnit(): PhoneToneUnit {
        return { id: this.unknownId, tone: 0 };
    }
}
