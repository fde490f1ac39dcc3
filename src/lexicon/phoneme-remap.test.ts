import { describe, it, expect } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { PhonemeRemap } from './phoneme-remap.js';
import { DEFAULT_REMAP_PATH } from '../config/index.js';
import { ConfigurationError } from '../infra/errors.js';

describe('PhonemeRemap', () => {
    const remap = PhonemeRemap.load(DEFAULT_REMAP_PATH);

    it('loads the bundled table', () => {
        expect(remap.size).toBeGreaterThan(0);
    });

    it('prefers a direct entry', () => {
        expect(remap.apply('zh')).toBe('z');
        expect(remap.apply('sh4')).toBe('sh');
    });

    it('falls back to the toneless base entry, then the bare base', () => {
        expect(remap.apply('zh3')).toBe('z');
        expect(remap.apply('x5')).toBe('x');
    });

    it('returns an unmapped toneless phoneme unchanged', () => {
        expect(remap.apply('x')).toBe('x');
    });

    it('rejects a file that is not a string map', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexitone-test-'));
        try {
            const badPath = path.join(dir, 'remap.json');
            await fs.writeFile(badPath, JSON.stringify({ zh: 1 }));
            expect(() => PhonemeRemap.load(badPath)).toThrow(ConfigurationError);

            const brokenPath = path.join(dir, 'broken.json');
            await fs.writeFile(brokenPath, '{');
            expect(() => PhonemeRemap.load(brokenPath)).toThrow(ConfigurationError);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
