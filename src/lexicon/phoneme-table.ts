/**
 * Bidirectional phoneme token ↔ ID table, loaded from `<token> <id>` lines.
 */

import { readFileSync } from 'node:fs';
import { ConfigurationError, getErrorMessage } from '../infra/errors.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import { fromNullable, type Lookup } from './lookup.js';

export const PAD_TOKEN = '_';
export const UNKNOWN_TOKEN = 'UNK';
/** Short pause; used for punctuation the table has no entry for. */
export const PAUSE_TOKEN = 'SP';

export class PhonemeTable {
    private readonly tokenToId = new Map<string, number>();
    private readonly idToToken = new Map<number, string>();

    constructor(entries: Iterable<readonly [string, number]>) {
        for (const [token, id] of entries) {
            this.tokenToId.set(token, id);
            this.idToToken.set(id, token);
        }
    }

    /** Parse table text. Lines without a token and an integer ID are skipped. */
    static parse(content: string, logger: Logger = defaultLogger): PhonemeTable {
        const entries: Array<[string, number]> = [];
        for (const rawLine of content.split('\n')) {
            const [token, idText] = rawLine.replace(/\r/g, '').trim().split(/\s+/);
            if (!token || idText === undefined || !/^-?\d+$/.test(idText)) continue;
            entries.push([token, Number(idText)]);
        }

        const table = new PhonemeTable(entries);
        if (!table.tokenToId.has(PAD_TOKEN)) {
            logger.warn(`Phoneme table has no padding symbol "${PAD_TOKEN}"`, 'Lexicon');
        }
        if (!table.tokenToId.has(UNKNOWN_TOKEN)) {
            logger.warn(`Phoneme table has no unknown symbol "${UNKNOWN_TOKEN}"`, 'Lexicon');
        }
        return table;
    }

    static load(filePath: string, logger: Logger = defaultLogger): PhonemeTable {
        let content: string;
        try {
            content = readFileSync(filePath, 'utf8');
        } catch (err) {
            throw new ConfigurationError(`Failed to load phoneme table "${filePath}": ${getErrorMessage(err)}`, { cause: err });
        }
        const table = PhonemeTable.parse(content, logger);
        if (table.size === 0) {
            throw new ConfigurationError(`Phoneme table "${filePath}" has no entries`);
        }
        logger.info(`Loaded ${table.size} phonemes from ${filePath}`, 'Lexicon');
        return table;
    }

    get size(): number {
        return this.tokenToId.size;
    }

    lookup(token: string): Lookup<number> {
        return fromNullable(this.tokenToId.get(token));
    }

    hasId(id: number): boolean {
        return this.idToToken.has(id);
    }

    tokenOf(id: number): string | undefined {
        return this.idToToken.get(id);
    }

    /** ID interleaved between phonemes; 0 when the table has no pad symbol. */
    get padId(): number {
        return this.tokenToId.get(PAD_TOKEN) ?? 0;
    }

    /** ID substituted for anything unresolvable; falls back to the pad ID. */
    get unknownId(): number {
        return this.tokenToId.get(UNKNOWN_TOKEN) ?? this.padId;
    }
}
