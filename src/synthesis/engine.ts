/**
 * The synthesis pipeline behind a single `TtsEngine` interface.
 *
 * text → phoneme/tone IDs → acoustic model → windowed waveform decoding →
 * enhancement. Stages run strictly in order, one model call at a time.
 */

import { performance } from 'node:perf_hooks';
import {
    DEFAULT_SYNTHESIS_CONFIG,
    resolveLanguage,
    synthesisConfigSchema,
    type BitDepth,
    type Language,
    type SynthesisConfig,
} from '../config/index.js';
import { InvalidArgumentError } from '../infra/errors.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import { intersperse, type PhonemeResolver } from '../lexicon/phoneme-resolver.js';
import { AcousticBridge } from './acoustic-bridge.js';
import { enhanceAudio, measureSignal, shouldEnhance } from './audio-enhancer.js';
import { ChunkAssembler, type WindowShape } from './chunk-assembler.js';
import type { SpeakerTable } from './speaker-table.js';
import type { InferenceEngine } from './tensor.js';
import { writeWavFile } from './wav.js';

export interface PhonemizeResult {
    phones: number[];
    tones: number[];
    /** Phone IDs rendered as table tokens. */
    tokens: string[];
}

export interface SaveOptions {
    sampleRate?: number;
    bitDepth?: BitDepth;
}

export interface TtsEngine {
    synthesize(text: string, language?: string): Promise<Float32Array>;
    phonemize(text: string, language?: string): PhonemizeResult;
    save(audio: Float32Array, filePath: string, options?: SaveOptions): Promise<void>;
    setSpeed(speed: number): void;
    setSpeakerId(speakerId: number): void;
    setNoiseScale(noiseScale: number): void;
    setConfig(config: unknown): void;
    getConfig(): SynthesisConfig;
    release(): Promise<void>;
}

export interface SynthesizerComponents {
    resolver: PhonemeResolver;
    speakers: SpeakerTable;
    acoustic: InferenceEngine;
    decoder: InferenceEngine;
    window: WindowShape;
    /** Model-specific language ID for every supported language. */
    languageIds: Record<Language, number>;
    config?: Partial<SynthesisConfig>;
    bitDepth?: BitDepth;
    logger?: Logger;
}

const SCOPE = 'Synth';

export class Synthesizer implements TtsEngine {
    private config: SynthesisConfig;
    private released = false;
    private readonly resolver: PhonemeResolver;
    private readonly speakers: SpeakerTable;
    private readonly acoustic: InferenceEngine;
    private readonly decoder: InferenceEngine;
    private readonly bridge: AcousticBridge;
    private readonly assembler: ChunkAssembler;
    private readonly languageIds: Record<Language, number>;
    private readonly bitDepth: BitDepth;
    private readonly logger: Logger;

    constructor(components: SynthesizerComponents) {
        this.logger = components.logger ?? defaultLogger;
        this.resolver = components.resolver;
        this.speakers = components.speakers;
        this.acoustic = components.acoustic;
        this.decoder = components.decoder;
        this.languageIds = components.languageIds;
        this.bitDepth = components.bitDepth ?? 16;
        this.bridge = new AcousticBridge(components.acoustic);
        this.assembler = new ChunkAssembler(components.decoder, components.window, this.logger);
        this.config = { ...DEFAULT_SYNTHESIS_CONFIG };
        if (components.config) this.applyOverrides(components.config);
    }

    async synthesize(text: string, language: string = this.config.language): Promise<Float32Array> {
        if (this.released) {
            throw new InvalidArgumentError('Synthesizer has been released');
        }
        if (text.trim() === '') {
            throw new InvalidArgumentError('Text must not be empty');
        }
        const lang = this.requireLanguage(language);
        const { speed, speakerId, noiseScale, noiseScaleW, sdpRatio, enhanceAudio: enhance, minSentenceLength } = this.config;

        const started = performance.now();
        const { phones, tones } = this.resolver.convert(text, lang, minSentenceLength);
        const phoneIds = intersperse(phones, this.resolver.padId);
        const toneIds = intersperse(tones, 0);
        const languageIds = new Array<number>(phoneIds.length).fill(this.languageIds[lang]);
        const embedding = this.speakers.get(speakerId);
        const resolved = performance.now();

        const { features, predictedLength } = await this.bridge.run({
            phones: phoneIds,
            tones: toneIds,
            languageIds,
            speakerEmbedding: embedding,
            noiseScale,
            noiseScaleW,
            lengthScale: 1 / speed,
            sdpRatio,
        });
        const encoded = performance.now();

        const audio = await this.assembler.assemble(features, predictedLength, embedding);
        const decoded = performance.now();

        const stats = measureSignal(audio);
        const output = shouldEnhance(stats, enhance) ? enhanceAudio(audio) : audio;
        const finished = performance.now();

        this.logger.debug(
            `Signal: ${stats.powerDb.toFixed(1)} dB, peak ${stats.peak.toFixed(3)}, ${(stats.nearZeroRatio * 100).toFixed(1)}% near zero`,
            SCOPE,
        );
        this.logger.debug(
            `Timings (ms): phonemes ${(resolved - started).toFixed(1)}, acoustic ${(encoded - resolved).toFixed(1)}, `
            + `waveform ${(decoded - encoded).toFixed(1)}, enhance ${(finished - decoded).toFixed(1)}`,
            SCOPE,
        );
        this.logger.info(`Synthesized ${output.length} samples (${(output.length / this.config.sampleRate).toFixed(2)}s)`, SCOPE);
        return output;
    }

    phonemize(text: string, language: string = this.config.language): PhonemizeResult {
        const { phones, tones } = this.resolver.convert(text, this.requireLanguage(language), this.config.minSentenceLength);
        return { phones, tones, tokens: this.resolver.describe(phones) };
    }

    async save(audio: Float32Array, filePath: string, options: SaveOptions = {}): Promise<void> {
        if (audio.length === 0) {
            throw new InvalidArgumentError('Cannot save empty audio');
        }
        const sampleRate = options.sampleRate ?? this.config.sampleRate;
        await writeWavFile(filePath, audio, sampleRate, options.bitDepth ?? this.bitDepth);
        this.logger.success(`Saved ${filePath} (${sampleRate} Hz)`, SCOPE);
    }

    setSpeed(speed: number): void {
        if (!(speed > 0) || !Number.isFinite(speed)) {
            this.logger.warn(`Invalid speed ${speed}, using 1.0`, SCOPE);
            this.config.speed = 1.0;
            return;
        }
        this.config.speed = speed;
    }

    setSpeakerId(speakerId: number): void {
        if (!Number.isInteger(speakerId) || speakerId < 0) {
            this.logger.warn(`Invalid speaker ID ${speakerId}, using 0`, SCOPE);
            this.config.speakerId = 0;
            return;
        }
        this.config.speakerId = speakerId;
    }

    setNoiseScale(noiseScale: number): void {
        if (!(noiseScale >= 0 && noiseScale <= 1)) {
            this.logger.warn(`Invalid noise scale ${noiseScale}, using 0.3`, SCOPE);
            this.config.noiseScale = 0.3;
            return;
        }
        this.config.noiseScale = noiseScale;
    }

    /** Replace the whole configuration; anything invalid resets it to the defaults. */
    setConfig(candidate: unknown): void {
        const parsed = synthesisConfigSchema.safeParse(candidate);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
            this.logger.warn(`Invalid synthesis config (${issues}), using defaults`, SCOPE);
            this.config = { ...DEFAULT_SYNTHESIS_CONFIG };
            return;
        }
        this.config = parsed.data;
    }

    getConfig(): SynthesisConfig {
        return { ...this.config };
    }

    /** Release both model sessions. Safe to call more than once. */
    async release(): Promise<void> {
        if (this.released) return;
        this.released = true;
        try {
            await this.acoustic.release();
        } finally {
            await this.decoder.release();
        }
        this.logger.debug('Released model sessions', SCOPE);
    }

    /** Speed, speaker and noise scale go through their setters, so one bad value resets only itself. */
    private applyOverrides(overrides: Partial<SynthesisConfig>): void {
        const { speed, speakerId, noiseScale, ...rest } = overrides;
        this.setConfig({ ...DEFAULT_SYNTHESIS_CONFIG, ...rest });
        if (speed !== undefined) this.setSpeed(speed);
        if (speakerId !== undefined) this.setSpeakerId(speakerId);
        if (noiseScale !== undefined) this.setNoiseScale(noiseScale);
    }

    private requireLanguage(tag: string): Language {
        const language = resolveLanguage(tag);
        if (!language) {
            throw new InvalidArgumentError(`Unsupported language "${tag}"`);
        }
        return language;
    }
}
