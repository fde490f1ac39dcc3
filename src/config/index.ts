/**
 * Centralized configuration -- loads environment variables and provides
 * typed, defaulted access to all lexitone settings.
 */

import dotenv from 'dotenv';
import path from 'node:path';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

dotenv.config();

const pkgPath = path.join(process.cwd(), 'package.json');
let version = '0.0.0';
try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    version = pkg.version || '0.0.0';
} catch { /* fallback to 0.0.0 */ }

export const SUPPORTED_LANGUAGES = ['zh', 'en'] as const;
export type Language = typeof SUPPORTED_LANGUAGES[number];

const LANGUAGE_ALIASES: Record<string, Language> = {
    'zh': 'zh', 'zh-cn': 'zh', 'cn': 'zh',
    'en': 'en', 'en-us': 'en', 'en-gb': 'en',
};

/** Resolve a language tag (`zh`, `zh-CN`, `en-US`, ...) to a supported language, or null. */
export function resolveLanguage(tag: string): Language | null {
    return LANGUAGE_ALIASES[tag.trim().toLowerCase()] ?? null;
}

export const BIT_DEPTHS = [16, 24, 32] as const;
export type BitDepth = typeof BIT_DEPTHS[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevelName = typeof LOG_LEVELS[number];

function validateLanguage(raw: string | undefined): Language {
    const value = raw || 'zh';
    const language = resolveLanguage(value);
    if (language) return language;
    console.warn(`[Config] Invalid TTS_LANG "${value}", falling back to "zh". Valid: ${SUPPORTED_LANGUAGES.join(', ')}`);
    return 'zh';
}

function validateBitDepth(raw: string | undefined): BitDepth {
    const value = Number(raw || 16);
    const depth = BIT_DEPTHS.find(d => d === value);
    if (depth !== undefined) return depth;
    console.warn(`[Config] Invalid TTS_BIT_DEPTH "${raw}", falling back to 16. Valid: ${BIT_DEPTHS.join(', ')}`);
    return 16;
}

function validateLogLevel(raw: string | undefined): LogLevelName {
    const value = (raw || 'info').toLowerCase();
    const level = LOG_LEVELS.find(l => l === value);
    if (level) return level;
    console.warn(`[Config] Invalid LOG_LEVEL "${value}", falling back to "info". Valid: ${LOG_LEVELS.join(', ')}`);
    return 'info';
}

function parseNumber(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
}

/**
 * Per-engine synthesis parameters. Validated as a whole by `setConfig`;
 * an invalid object is replaced by the defaults.
 */
export const synthesisConfigSchema = z.object({
    /** 1.0 is normal speed; the acoustic model receives `length_scale = 1 / speed`. */
    speed: z.number().positive().default(1.0),
    speakerId: z.number().int().nonnegative().default(0),
    noiseScale: z.number().min(0).max(1).default(0.3),
    /** Duration-predictor noise. */
    noiseScaleW: z.number().min(0).max(1).default(0.6),
    sdpRatio: z.number().min(0).max(1).default(0.2),
    sampleRate: z.number().int().positive().default(44100),
    language: z.enum(SUPPORTED_LANGUAGES).default('zh'),
    /** Run the enhancer even when the signal measures clean. */
    enhanceAudio: z.boolean().default(true),
    /** Minimum sentence length before fragments are flushed. */
    minSentenceLength: z.number().int().positive().default(10),
});

export type SynthesisConfig = z.infer<typeof synthesisConfigSchema>;

export const DEFAULT_SYNTHESIS_CONFIG: SynthesisConfig = synthesisConfigSchema.parse({});

/** Bundled remap table, resolved beside the package so it works from src/ and dist/. */
export const DEFAULT_REMAP_PATH = fileURLToPath(new URL('../../data/phoneme-remap.json', import.meta.url));

export const config = {
    version,

    tts: {
        modelDir: process.env.TTS_MODEL_DIR || path.join(process.cwd(), 'models'),
        language: validateLanguage(process.env.TTS_LANG),
        speed: parseNumber(process.env.TTS_SPEED, 1.0),
        speakerId: parseNumber(process.env.TTS_SPEAKER_ID, 0),
        noiseScale: parseNumber(process.env.TTS_NOISE_SCALE, 0.3),
        noiseScaleW: parseNumber(process.env.TTS_NOISE_SCALE_W, 0.6),
        sdpRatio: parseNumber(process.env.TTS_SDP_RATIO, 0.2),
        bitDepth: validateBitDepth(process.env.TTS_BIT_DEPTH),
        enhance: process.env.TTS_ENHANCE !== 'false',
        /** Phoneme remap table; replaceable without touching code. */
        remapPath: process.env.TTS_REMAP_PATH || DEFAULT_REMAP_PATH,
    },

    logging: {
        level: validateLogLevel(process.env.LOG_LEVEL),
        silent: process.env.LOG_SILENT === 'true',
    },
} as const;

// Type export for use elsewhere
export type Config = typeof config;
