import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { stripVTControlCharacters } from 'node:util';
import { InvalidArgumentError as OptionError } from 'commander';
import {
    formatPhonemes,
    parseBitDepthOption,
    parseNumberOption,
    phonemizeCommand,
    synthesizeCommand,
    type SynthesizeCommandOptions,
} from './commands.js';
import { createLogger } from '../infra/logger.js';
import { InvalidArgumentError } from '../infra/errors.js';

// Encoder: 4 frames of silence, 8 predicted samples. Decoder: declares a
// [1, 2, 4] → [1, 1, 8] window and decodes it to a constant 0.5.
vi.mock('../synthesis/onnx-engine.js', () => ({
    OnnxEngine: {
        create: vi.fn(async (modelPath: string) => {
            const isEncoder = modelPath.endsWith('encoder.onnx');
            return {
                inputNames: [],
                outputNames: isEncoder ? ['z_p', 'pronoun_lens', 'audio_len'] : ['audio'],
                inputShapes: isEncoder ? {} : { z_p: [1, 2, 4], g: [1, 256, 1] },
                outputShapes: isEncoder ? {} : { audio: [1, 1, 8] },
                run: async () => isEncoder
                    ? [
                        { type: 'float32', data: new Float32Array(8), dims: [1, 2, 4] },
                        { type: 'int32', data: Int32Array.of(4), dims: [1] },
                        { type: 'int32', data: Int32Array.of(8), dims: [1] },
                    ]
                    : [{ type: 'float32', data: new Float32Array(8).fill(0.5), dims: [1, 1, 8] }],
                release: async () => undefined,
            };
        }),
    },
}));

const logger = createLogger({ silent: true, sink: () => undefined });

describe('option parsers', () => {
    it('parses numbers', () => {
        expect(parseNumberOption('1.5')).toBe(1.5);
        expect(() => parseNumberOption('fast')).toThrow(OptionError);
        expect(() => parseNumberOption(' ')).toThrow(OptionError);
    });

    it('accepts only supported bit depths', () => {
        expect(parseBitDepthOption('24')).toBe(24);
        expect(() => parseBitDepthOption('8')).toThrow('Bit depth must be one of 16, 24, 32.');
    });
});

describe('formatPhonemes', () => {
    it('pairs tokens with tones and lists the IDs', () => {
        const text = formatPhonemes({ phones: [1, 2], tones: [0, 3], tokens: ['n', 'i'] });
        expect(stripVTControlCharacters(text)).toBe('n/0 i/3\nids:   1 2\ntones: 0 3');
    });
});

describe('commands', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexitone-test-'));
        await fs.writeFile(path.join(dir, 'tokens.txt'), '_ 0\nn 1\ni 2\nh 3\nao 4\nUNK 5\n');
        await fs.writeFile(path.join(dir, 'lexicon.txt'), '你好 n i3 h ao3\n');
        await fs.writeFile(path.join(dir, 'speakers.bin'), Buffer.alloc(256 * 4));
        await fs.writeFile(path.join(dir, 'model.json'), JSON.stringify({ sampleRate: 22050 }));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    const synthesizeOptions = (overrides: Partial<SynthesizeCommandOptions> = {}): SynthesizeCommandOptions => ({
        modelDir: dir,
        output: path.join(dir, 'out.wav'),
        language: 'zh',
        speed: 1,
        speaker: 0,
        bitDepth: 16,
        enhance: true,
        verbose: false,
        ...overrides,
    });

    it('synthesizes text into a WAV file', async () => {
        const output = await synthesizeCommand('你好', synthesizeOptions(), logger);

        const wav = await fs.readFile(output);
        expect(wav.length).toBe(44 + 8 * 2);
        expect(wav.readUInt32LE(24)).toBe(22050);
        expect(wav.readInt16LE(44)).toBe(16383);
    });

    it('overrides the sample rate and bit depth', async () => {
        const output = await synthesizeCommand('你好', synthesizeOptions({ sampleRate: 16000, bitDepth: 32 }), logger);

        const wav = await fs.readFile(output);
        expect(wav.readUInt32LE(24)).toBe(16000);
        expect(wav.readUInt16LE(34)).toBe(32);
    });

    it('rejects unsupported languages before loading models', async () => {
        await expect(synthesizeCommand('hola', synthesizeOptions({ language: 'es' }), logger)).rejects.toThrow(InvalidArgumentError);
    });

    it('phonemizes with the lexicon files only', () => {
        const result = phonemizeCommand('你好', { modelDir: dir, language: 'zh', verbose: false }, logger);
        expect(result).toEqual({ phones: [1, 2, 3, 4], tones: [0, 3, 0, 3], tokens: ['n', 'i', 'h', 'ao'] });
    });
});
