/**
 * Pronunciation dictionary: `<word> <phoneme> <phoneme> ...` per line.
 * Purely Latin entries are also indexed as an English sub-dictionary.
 */

import { readFileSync } from 'node:fs';
import { ConfigurationError, getErrorMessage } from '../infra/errors.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import { isEnglishWord } from '../text/punctuation.js';
import { firstFound, fromNullable, type Lookup } from './lookup.js';

export type Pronunciation = readonly string[];

export class Lexicon {
    private readonly words = new Map<string, Pronunciation>();
    private readonly english = new Map<string, Pronunciation>();

    constructor(entries: Iterable<readonly [string, Pronunciation]>) {
        for (const [word, phonemes] of entries) {
            this.words.set(word, phonemes);
            if (isEnglishWord(word)) this.english.set(word, phonemes);
        }
    }

    /** Parse dictionary text. Lines without at least one phoneme are skipped. */
    static parse(content: string): Lexicon {
        const entries: Array<[string, string[]]> = [];
        for (const rawLine of content.split('\n')) {
            const [word, ...phonemes] = rawLine.replace(/\r/g, '').trim().split(/\s+/);
            if (!word || phonemes.length === 0) continue;
            entries.push([word, phonemes]);
        }
        return new Lexicon(entries);
    }

    static load(filePath: string, logger: Logger = defaultLogger): Lexicon {
        let content: string;
        try {
            content = readFileSync(filePath, 'utf8');
        } catch (err) {
            throw new ConfigurationError(`Failed to load lexicon "${filePath}": ${getErrorMessage(err)}`, { cause: err });
        }
        const lexicon = Lexicon.parse(content);
        if (lexicon.size === 0) {
            throw new ConfigurationError(`Lexicon "${filePath}" has no entries`);
        }
        logger.info(`Loaded ${lexicon.size} lexicon entries (${lexicon.englishSize} English) from ${filePath}`, 'Lexicon');
        return lexicon;
    }

    get size(): number {
        return this.words.size;
    }

    get englishSize(): number {
        return this.english.size;
    }

    lookup(word: string): Lookup<Pronunciation> {
        return fromNullable(this.words.get(word));
    }

    /** Exact match first, then the lowercased spelling. */
    lookupEnglish(word: string): Lookup<Pronunciation> {
        return firstFound(
            () => fromNullable(this.english.get(word)),
            () => fromNullable(this.english.get(word.toLowerCase())),
        );
    }
}
