/**
 * Acoustic model call: interspersed phone/tone/language IDs plus speaker
 * embedding in, latent feature buffer and predicted sample count out.
 */

import { InferenceError, TtsError, getErrorMessage } from '../infra/errors.js';
import { float32Tensor, int32Tensor, scalarTensor, type InferenceEngine, type TensorValue } from './tensor.js';

export const SPEAKER_EMBEDDING_SIZE = 256;

export interface AcousticInputs {
    phones: readonly number[];
    tones: readonly number[];
    languageIds: readonly number[];
    speakerEmbedding: Float32Array;
    noiseScale: number;
    noiseScaleW: number;
    /** `1 / speed`. */
    lengthScale: number;
    sdpRatio: number;
}

export interface AcousticOutput {
    /** `[channels, frames]`, channel-major. */
    features: Float32Array;
    /** Samples the waveform should have after assembly. */
    predictedLength: number;
}

/** Read the predicted length from a one-element integer (or integral float) tensor. */
export function readPredictedLength(tensor: TensorValue): number {
    if (tensor.data.length !== 1) {
        throw new InferenceError(`Predicted length must hold one element, got ${tensor.data.length}`);
    }
    const value = tensor.type === 'int64' ? Number(tensor.data[0]) : tensor.data[0];
    if (!Number.isInteger(value) || value < 0) {
        throw new InferenceError(`Predicted length must be a non-negative integer, got ${value}`);
    }
    return value;
}

/** Wrap anything but our own errors so callers see one failure type per stage. */
export function toInferenceError(stage: string, err: unknown): TtsError {
    if (err instanceof TtsError) return err;
    return new InferenceError(`${stage} failed: ${getErrorMessage(err)}`, { cause: err });
}

export class AcousticBridge {
    constructor(private readonly engine: InferenceEngine) { }

    async run(inputs: AcousticInputs): Promise<AcousticOutput> {
        const n = inputs.phones.length;
        if (n === 0 || inputs.tones.length !== n || inputs.languageIds.length !== n) {
            throw new InferenceError(
                `Acoustic inputs must be non-empty and equal-length (phones ${n}, tones ${inputs.tones.length}, languages ${inputs.languageIds.length})`,
            );
        }
        if (inputs.speakerEmbedding.length !== SPEAKER_EMBEDDING_SIZE) {
            throw new InferenceError(`Speaker embedding must have ${SPEAKER_EMBEDDING_SIZE} values, got ${inputs.speakerEmbedding.length}`);
        }
        if (this.engine.outputNames.length < 3) {
            throw new InferenceError(`Acoustic model must have 3 outputs, found ${this.engine.outputNames.length}`);
        }

        let outputs: TensorValue[];
        try {
            outputs = await this.engine.run({
                phone: int32Tensor(Int32Array.from(inputs.phones), [n]),
                tone: int32Tensor(Int32Array.from(inputs.tones), [n]),
                language: int32Tensor(Int32Array.from(inputs.languageIds), [n]),
                g: float32Tensor(inputs.speakerEmbedding, [1, SPEAKER_EMBEDDING_SIZE, 1]),
                noise_scale: scalarTensor(inputs.noiseScale),
                noise_scale_w: scalarTensor(inputs.noiseScaleW),
                length_scale: scalarTensor(inputs.lengthScale),
                sdp_ratio: scalarTensor(inputs.sdpRatio),
            });
        } catch (err) {
            throw toInferenceError('Acoustic model', err);
        }

        const [features, , length] = outputs;
        if (!features || !length) {
            throw new InferenceError(`Acoustic model returned ${outputs.length} outputs, expected 3`);
        }
        if (features.type !== 'float32') {
            throw new InferenceError(`Acoustic features must be float32, got ${features.type}`);
        }
        return { features: features.data, predictedLength: readPredictedLength(length) };
    }
}
