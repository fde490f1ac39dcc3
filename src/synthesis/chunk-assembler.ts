/**
 * Tiles the acoustic features into fixed-size windows for the waveform
 * model and stitches the decoded slices back together.
 */

import { InferenceError } from '../infra/errors.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import { SPEAKER_EMBEDDING_SIZE, toInferenceError } from './acoustic-bridge.js';
import { float32Tensor, type InferenceEngine, type TensorShape, type TensorValue } from './tensor.js';

/** Fixed input/output geometry of the waveform model. */
export interface WindowShape {
    channels: number;
    frames: number;
    /** Samples produced per window. */
    samples: number;
}

export const DEFAULT_WINDOW: WindowShape = { channels: 192, frames: 128, samples: 65536 };

const FEATURE_INPUT = 'z_p';

function dimension(shape: TensorShape | undefined, index: number): number | undefined {
    return shape?.at(index) ?? undefined;
}

/**
 * Window geometry declared by a waveform model: `C` and `W` from its
 * `z_p[1, C, W]` input, `S` from the last dimension of its first output.
 * `configured` only fills dimensions the model leaves open; anything still
 * unknown takes the default.
 */
export function resolveWindowShape(
    engine: InferenceEngine,
    configured: Partial<WindowShape> = {},
    logger: Logger = defaultLogger,
): WindowShape {
    const input = engine.inputShapes?.[FEATURE_INPUT];
    const [outputName] = engine.outputNames;
    const output = outputName === undefined ? undefined : engine.outputShapes?.[outputName];

    const pick = (field: keyof WindowShape, declared: number | undefined): number => {
        const override = configured[field];
        if (declared === undefined) return override ?? DEFAULT_WINDOW[field];
        if (override !== undefined && override !== declared) {
            logger.warn(`Waveform model declares ${field} = ${declared}, ignoring configured ${override}`, 'Assembler');
        }
        return declared;
    };

    return {
        channels: pick('channels', dimension(input, 1)),
        frames: pick('frames', dimension(input, 2)),
        samples: pick('samples', dimension(output, -1)),
    };
}

export class ChunkAssembler {
    private readonly logger: Logger;

    constructor(
        private readonly engine: InferenceEngine,
        private readonly window: WindowShape,
        logger: Logger = defaultLogger,
    ) {
        this.logger = logger;
    }

    /** Decode `features` into exactly `predictedLength` samples. */
    async assemble(features: Float32Array, predictedLength: number, embedding: Float32Array): Promise<Float32Array> {
        const { channels, frames: windowFrames, samples: windowSamples } = this.window;
        const totalFrames = features.length / channels;
        if (!Number.isInteger(totalFrames)) {
            throw new InferenceError(`Feature buffer of ${features.length} values is not divisible into ${channels} channels`);
        }

        const audio = new Float32Array(predictedLength);
        const windowCount = Math.ceil(totalFrames / windowFrames);
        const g = float32Tensor(embedding, [1, SPEAKER_EMBEDDING_SIZE, 1]);
        let written = 0;

        for (let w = 0; w < windowCount && written < predictedLength; w++) {
            const offset = w * windowFrames;
            const frames = Math.min(windowFrames, totalFrames - offset);
            const chunk = new Float32Array(channels * windowFrames);
            for (let c = 0; c < channels; c++) {
                const src = c * totalFrames + offset;
                chunk.set(features.subarray(src, src + frames), c * windowFrames);
            }

            const decoded = await this.decode(chunk, g);
            const take = Math.min(windowSamples, decoded.length, predictedLength - written);
            audio.set(decoded.subarray(0, take), written);
            written += take;
        }

        if (written < predictedLength) {
            this.logger.debug(`Decoded ${written} of ${predictedLength} samples, padding with silence`, 'Assembler');
        }
        this.logger.debug(`Assembled ${windowCount} window(s) from ${totalFrames} frames`, 'Assembler');
        return audio;
    }

    private async decode(chunk: Float32Array, g: TensorValue): Promise<Float32Array> {
        const { channels, frames } = this.window;
        let outputs: TensorValue[];
        try {
            outputs = await this.engine.run({ [FEATURE_INPUT]: float32Tensor(chunk, [1, channels, frames]), g });
        } catch (err) {
            throw toInferenceError('Waveform model', err);
        }
        const [audio] = outputs;
        if (!audio || audio.type !== 'float32') {
            throw new InferenceError('Waveform model must return float32 audio');
        }
        return audio.data;
    }
}
