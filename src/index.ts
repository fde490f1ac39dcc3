/**
 * lexitone library entry point.
 */

export {
    config,
    resolveLanguage,
    synthesisConfigSchema,
    DEFAULT_SYNTHESIS_CONFIG,
    SUPPORTED_LANGUAGES,
    type BitDepth,
    type Language,
    type SynthesisConfig,
} from './config/index.js';
export { TtsError, ConfigurationError, InferenceError, InvalidArgumentError, getErrorMessage } from './infra/errors.js';
export { createLogger, consoleSink, LogLevel, type Logger, type LogEvent, type LogSink } from './infra/logger.js';
export { normalizeText } from './text/normalizer.js';
export { splitSentences } from './text/sentence-splitter.js';
export { segmentWords, type Token, type TokenCategory } from './text/word-segmenter.js';
export { PhonemeTable } from './lexicon/phoneme-table.js';
export { Lexicon } from './lexicon/lexicon.js';
export { PhonemeRemap } from './lexicon/phoneme-remap.js';
export { PhonemeResolver, intersperse, type PhonemeSequence, type PhoneToneUnit } from './lexicon/phoneme-resolver.js';
export type { Lookup } from './lexicon/lookup.js';
export { AcousticBridge, type AcousticInputs, type AcousticOutput } from './synthesis/acoustic-bridge.js';
export { ChunkAssembler, DEFAULT_WINDOW, resolveWindowShape, type WindowShape } from './synthesis/chunk-assembler.js';
export { enhanceAudio, measureSignal, shouldEnhance, type SignalStats } from './synthesis/audio-enhancer.js';
export { SpeakerTable } from './synthesis/speaker-table.js';
export { OnnxEngine, type OnnxEngineOptions } from './synthesis/onnx-engine.js';
export {
    Synthesizer,
    loadSynthesizer,
    withSynthesizer,
    readModelConfig,
    modelConfigSchema,
    createWavBuffer,
    writeWavFile,
    type TtsEngine,
    type PhonemizeResult,
    type SaveOptions,
    type LoadSynthesizerOptions,
    type ModelConfig,
    type InferenceEngine,
    type TensorValue,
    type TensorMap,
    type TensorShape,
} from './synthesis/index.js';
