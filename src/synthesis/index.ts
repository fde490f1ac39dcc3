/**
 * Synthesis public API.
 * Re-exports the engine and provides model-directory loading helpers.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { config, type BitDepth, type SynthesisConfig } from '../config/index.js';
import { ConfigurationError, getErrorMessage } from '../infra/errors.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import { PhonemeResolver } from '../lexicon/phoneme-resolver.js';
import { resolveWindowShape } from './chunk-assembler.js';
import { Synthesizer } from './engine.js';
import { OnnxEngine } from './onnx-engine.js';
import { SpeakerTable } from './speaker-table.js';
import type { InferenceEngine } from './tensor.js';

export { Synthesizer, type TtsEngine, type PhonemizeResult, type SaveOptions } from './engine.js';
export { createWavBuffer, writeWavFile } from './wav.js';
export type { InferenceEngine, TensorValue, TensorMap, TensorShape } from './tensor.js';

const MODEL_CONFIG_FILE = 'model.json';

/** `model.json` in the model directory. Every field is optional. */
export const modelConfigSchema = z.object({
    sampleRate: z.number().int().positive().default(44100),
    /** Used only where the waveform model leaves a dimension open. */
    window: z.object({
        channels: z.number().int().positive().optional(),
        frames: z.number().int().positive().optional(),
        samples: z.number().int().positive().optional(),
    }).default({}),
    languages: z.object({
        zh: z.number().int().nonnegative().default(3),
        en: z.number().int().nonnegative().default(2),
    }).default({}),
    files: z.object({
        lexicon: z.string().default('lexicon.txt'),
        tokens: z.string().default('tokens.txt'),
        speakers: z.string().default('speakers.bin'),
        encoder: z.string().default('encoder.onnx'),
        decoder: z.string().default('decoder.onnx'),
    }).default({}),
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;

export interface LoadSynthesizerOptions {
    modelDir: string;
    remapPath?: string;
    config?: Partial<SynthesisConfig>;
    bitDepth?: BitDepth;
    logger?: Logger;
    /** Opens one model file. Defaults to an ONNX Runtime session. */
    createEngine?: (modelPath: string) => Promise<InferenceEngine>;
}

/** Read and validate `model.json`; a missing file means all defaults. */
export function readModelConfig(modelDir: string, logger: Logger = defaultLogger): ModelConfig {
    const filePath = path.join(modelDir, MODEL_CONFIG_FILE);
    if (!fs.existsSync(filePath)) {
        logger.debug(`No ${MODEL_CONFIG_FILE} in ${modelDir}, using defaults`, 'Loader');
        return modelConfigSchema.parse({});
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
        throw new ConfigurationError(`Failed to load model file "${filePath}": ${getErrorMessage(err)}`, { cause: err });
    }
    const parsed = modelConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid ${MODEL_CONFIG_FILE}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    return parsed.data;
}

/** Load the lexicon, speaker table and both models from a directory. */
export async function loadSynthesizer(options: LoadSynthesizerOptions): Promise<Synthesizer> {
    const logger = options.logger ?? defaultLogger;
    const { modelDir } = options;
    logger.info('Loading TTS models from: ' + modelDir, 'Loader');

    const model = readModelConfig(modelDir, logger);
    const resolve = (file: string) => path.join(modelDir, file);
    const createEngine = options.createEngine ?? ((modelPath: string) => OnnxEngine.create(modelPath, { logger }));

    const resolver = PhonemeResolver.load({
        tokensPath: resolve(model.files.tokens),
        lexiconPath: resolve(model.files.lexicon),
        remapPath: options.remapPath ?? config.tts.remapPath,
    }, { logger });
    const speakers = SpeakerTable.load(resolve(model.files.speakers), logger);

    const acoustic = await createEngine(resolve(model.files.encoder));
    let decoder: InferenceEngine;
    try {
        decoder = await createEngine(resolve(model.files.decoder));
    } catch (err) {
        await acoustic.release();
        throw err;
    }

    const window = resolveWindowShape(decoder, model.window, logger);
    logger.debug(`Waveform window: ${window.channels} × ${window.frames} → ${window.samples} samples`, 'Loader');

    const synthesizer = new Synthesizer({
        resolver,
        speakers,
        acoustic,
        decoder,
        window,
        languageIds: model.languages,
        config: { sampleRate: model.sampleRate, ...options.config },
        bitDepth: options.bitDepth,
        logger,
    });
    logger.success(`Models ready (${resolver.stats().phonemes} phonemes, ${speakers.count} speaker(s))`, 'Loader');
    return synthesizer;
}

/** Run `fn` with a freshly loaded synthesizer, releasing it on every exit path. */
export async function withSynthesizer<T>(options: LoadSynthesizerOptions, fn: (synthesizer: Synthesizer) => Promise<T>): Promise<T> {
    const synthesizer = await loadSynthesizer(options);
    try {
        return await fn(synthesizer);
    } finally {
        await synthesizer.release();
    }
}
