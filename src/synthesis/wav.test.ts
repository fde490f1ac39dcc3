/**
 * Tests for createWavBuffer -- WAV file generation from raw audio samples.
 */

import { describe, it, expect } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { createWavBuffer, writeWavFile } from './wav.js';
import { InvalidArgumentError } from '../infra/errors.js';

describe('createWavBuffer', () => {
    it('creates a valid WAV header', () => {
        const buffer = createWavBuffer([0, 0, 0, 0], 44100);

        expect(buffer.toString('ascii', 0, 4)).toBe('RIFF');
        expect(buffer.readUInt32LE(4)).toBe(36 + 8);
        expect(buffer.toString('ascii', 8, 12)).toBe('WAVE');
        expect(buffer.toString('ascii', 12, 16)).toBe('fmt ');
        expect(buffer.readUInt16LE(20)).toBe(1);
        expect(buffer.readUInt16LE(22)).toBe(1);
        expect(buffer.readUInt32LE(24)).toBe(44100);
        expect(buffer.toString('ascii', 36, 40)).toBe('data');
    });

    it('defaults to 16-bit samples', () => {
        const buffer = createWavBuffer([0, 0.5, -0.5, 1.0], 22050);
        expect(buffer.readUInt16LE(34)).toBe(16);
        expect(buffer.readUInt32LE(28)).toBe(22050 * 2);
        expect(buffer.length).toBe(44 + 4 * 2);
        expect(buffer.readInt16LE(46)).toBe(16383);
    });

    it('writes 24-bit samples in three bytes', () => {
        const buffer = createWavBuffer([1.0, -1.0], 44100, 24);
        expect(buffer.readUInt16LE(32)).toBe(3);
        expect(buffer.readUInt16LE(34)).toBe(24);
        expect(buffer.length).toBe(44 + 2 * 3);
        expect(buffer.readIntLE(44, 3)).toBe(8388607);
        expect(buffer.readIntLE(47, 3)).toBe(-8388607);
    });

    it('writes 32-bit samples', () => {
        const buffer = createWavBuffer([1.0], 44100, 32);
        expect(buffer.readUInt16LE(34)).toBe(32);
        expect(buffer.readInt32LE(44)).toBe(2147483647);
    });

    it('clamps samples to [-1, 1] range', () => {
        const buffer = createWavBuffer([2.0, -2.0], 22050);
        expect(buffer.readInt16LE(44)).toBe(32767);
        expect(buffer.readInt16LE(46)).toBe(-32767);
    });

    it('handles empty audio data', () => {
        expect(createWavBuffer([], 22050).length).toBe(44);
    });

    it('rejects unsupported bit depths', () => {
        expect(() => createWavBuffer([0], 22050, 8)).toThrow(InvalidArgumentError);
    });

    it('writes the encoded file', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexitone-test-'));
        try {
            const file = path.join(dir, 'out.wav');
            await writeWavFile(file, new Float32Array([0, 0.5]), 16000);
            const written = await fs.readFile(file);
            expect(written.equals(createWavBuffer([0, 0.5], 16000))).toBe(true);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
