import { describe, it, expect } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { Lexicon } from './lexicon.js';
import { createLogger } from '../infra/logger.js';
import { ConfigurationError } from '../infra/errors.js';

const silent = createLogger({ silent: true, sink: () => undefined });

describe('Lexicon', () => {
    const lexicon = Lexicon.parse('你好 n i3 h ao3\r\nhello HH AH0 L OW1\ndon\'t D OW1 N T\n孤\n');

    it('looks up whole words', () => {
        expect(lexicon.lookup('你好')).toEqual({ found: true, value: ['n', 'i3', 'h', 'ao3'] });
        expect(lexicon.lookup('再见')).toEqual({ found: false });
    });

    it('skips entries without phonemes', () => {
        expect(lexicon.size).toBe(3);
        expect(lexicon.lookup('孤').found).toBe(false);
    });

    it('indexes Latin entries as English', () => {
        expect(lexicon.englishSize).toBe(2);
        expect(lexicon.lookupEnglish("don't")).toEqual({ found: true, value: ['D', 'OW1', 'N', 'T'] });
        expect(lexicon.lookupEnglish('你好').found).toBe(false);
    });

    it('falls back to the lowercased spelling for English', () => {
        expect(lexicon.lookupEnglish('Hello')).toEqual({ found: true, value: ['HH', 'AH0', 'L', 'OW1'] });
    });

    it('loads from disk and reports unreadable files', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexitone-test-'));
        try {
            const lexiconPath = path.join(dir, 'lexicon.txt');
            await fs.writeFile(lexiconPath, '好 h ao3\n');
            expect(Lexicon.load(lexiconPath, silent).size).toBe(1);

            expect(() => Lexicon.load(path.join(dir, 'missing.txt'), silent)).toThrow(ConfigurationError);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
