/**
 * Hand-curated phoneme simplifications (retroflex → dental initials,
 * spelling variants of finals, ...), consulted when a phoneme from the
 * dictionary is missing from the phoneme table. The entries live in a
 * JSON file so a voice can ship its own.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../infra/errors.js';

const remapSchema = z.record(z.string(), z.string());

export class PhonemeRemap {
    private readonly mappings: ReadonlyMap<string, string>;

    constructor(mappings: Record<string, string> = {}) {
        this.mappings = new Map(Object.entries(mappings));
    }

    static load(filePath: string): PhonemeRemap {
        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(filePath, 'utf8'));
        } catch (err) {
            throw new ConfigurationError(`Failed to load phoneme remap table "${filePath}": ${getErrorMessage(err)}`, { cause: err });
        }
        const parsed = remapSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ConfigurationError(`Phoneme remap table "${filePath}" must map strings to strings: ${parsed.error.message}`);
        }
        return new PhonemeRemap(parsed.data);
    }

    get size(): number {
        return this.mappings.size;
    }

    /**
     * Direct entry first; for a tone-marked phoneme, the entry of its
     * toneless base, else the base itself.
     */
    apply(phoneme: string): string {
        const direct = this.mappings.get(phoneme);
        if (direct !== undefined) return direct;

        if (/\d$/.test(phoneme)) {
            const base = phoneme.slice(0, -1);
            return this.mappings.get(base) ?? base;
        }
        return phoneme;
    }
}
