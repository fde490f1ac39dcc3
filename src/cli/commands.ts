/**
 * CLI command implementations, kept apart from argument parsing so they
 * can run in tests.
 */

import chalk from 'chalk';
import path from 'node:path';
import { InvalidArgumentError as OptionError } from 'commander';
import { BIT_DEPTHS, config, resolveLanguage, type BitDepth, type Language, type SynthesisConfig } from '../config/index.js';
import { InvalidArgumentError } from '../infra/errors.js';
import { createLogger, logger as processLogger, type Logger } from '../infra/logger.js';
import { PhonemeResolver } from '../lexicon/phoneme-resolver.js';
import { readModelConfig, withSynthesizer, type PhonemizeResult } from '../synthesis/index.js';

export interface SynthesizeCommandOptions {
    modelDir: string;
    output: string;
    language: string;
    speed: number;
    speaker: number;
    sampleRate?: number;
    bitDepth: BitDepth;
    enhance: boolean;
    verbose: boolean;
}

export interface PhonemizeCommandOptions {
    modelDir: string;
    language: string;
    verbose: boolean;
}

/** Commander argument parser for a finite number. */
export function parseNumberOption(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new OptionError(`"${value}" is not a number.`);
    }
    return parsed;
}

export function parseBitDepthOption(value: string): BitDepth {
    const depth = BIT_DEPTHS.find(d => String(d) === value);
    if (depth === undefined) {
        throw new OptionError(`Bit depth must be one of ${BIT_DEPTHS.join(', ')}.`);
    }
    return depth;
}

function commandLogger(verbose: boolean): Logger {
    return verbose ? createLogger({ level: 'debug' }) : processLogger;
}

function requireLanguage(tag: string): Language {
    const language = resolveLanguage(tag);
    if (!language) {
        throw new InvalidArgumentError(`Unsupported language "${tag}"`);
    }
    return language;
}

/** Synthesize `text` into a WAV file and return its path. */
export async function synthesizeCommand(text: string, options: SynthesizeCommandOptions, logger: Logger = commandLogger(options.verbose)): Promise<string> {
    const language = requireLanguage(options.language);
    const synthesis: Partial<SynthesisConfig> = {
        language,
        speed: options.speed,
        speakerId: options.speaker,
        noiseScale: config.tts.noiseScale,
        noiseScaleW: config.tts.noiseScaleW,
        sdpRatio: config.tts.sdpRatio,
        enhanceAudio: options.enhance,
    };
    if (options.sampleRate !== undefined) synthesis.sampleRate = options.sampleRate;

    return withSynthesizer({ modelDir: options.modelDir, bitDepth: options.bitDepth, config: synthesis, logger }, async synthesizer => {
        const audio = await synthesizer.synthesize(text, language);
        await synthesizer.save(audio, options.output);
        return path.resolve(options.output);
    });
}

/** Resolve `text` to phonemes using only the lexicon files of a model directory. */
export function phonemizeCommand(text: string, options: PhonemizeCommandOptions, logger: Logger = commandLogger(options.verbose)): PhonemizeResult {
    const language = requireLanguage(options.language);
    const model = readModelConfig(options.modelDir, logger);
    const resolver = PhonemeResolver.load({
        tokensPath: path.join(options.modelDir, model.files.tokens),
        lexiconPath: path.join(options.modelDir, model.files.lexicon),
        remapPath: config.tts.remapPath,
    }, { logger });

    const { phones, tones } = resolver.convert(text, language);
    return { phones, tones, tokens: resolver.describe(phones) };
}

/** One `token/tone` pair per phoneme, followed by the raw IDs. */
export function formatPhonemes(result: PhonemizeResult): string {
    const pairs = result.tokens.map((token, i) => `${token}${chalk.dim('/')}${result.tones[i]}`);
    return [
        pairs.join(' '),
        chalk.dim(`ids:   ${result.phones.join(' ')}`),
        chalk.dim(`tones: ${result.tones.join(' ')}`),
    ].join('\n');
}
