import { describe, it, expect } from 'vitest';
import { AcousticBridge, readPredictedLength, type AcousticInputs } from './acoustic-bridge.js';
import { float32Tensor, int32Tensor, type InferenceEngine, type TensorMap, type TensorValue } from './tensor.js';
import { InferenceError } from '../infra/errors.js';

class FakeAcoustic implements InferenceEngine {
    readonly inputNames = ['phone', 'tone', 'language', 'g', 'noise_scale', 'noise_scale_w', 'length_scale', 'sdp_ratio'];
    feeds: TensorMap[] = [];

    constructor(
        private readonly outputs: TensorValue[],
        readonly outputNames: readonly string[] = ['z_p', 'pronoun_lens', 'audio_len'],
    ) { }

    async run(feeds: TensorMap): Promise<TensorValue[]> {
        this.feeds.push(feeds);
        return this.outputs;
    }

    async release(): Promise<void> { }
}

const features = float32Tensor(new Float32Array([0.1, 0.2, 0.3, 0.4]), [1, 2, 2]);
const lens = int32Tensor(Int32Array.of(3), [1]);

function inputs(overrides: Partial<AcousticInputs> = {}): AcousticInputs {
    return {
        phones: [0, 1, 0],
        tones: [0, 3, 0],
        languageIds: [3, 3, 3],
        speakerEmbedding: new Float32Array(256).fill(0.5),
        noiseScale: 0.3,
        noiseScaleW: 0.6,
        lengthScale: 0.5,
        sdpRatio: 0.2,
        ...overrides,
    };
}

describe('readPredictedLength', () => {
    it('reads int32, int64 and integral float tensors', () => {
        expect(readPredictedLength(int32Tensor(Int32Array.of(42), [1]))).toBe(42);
        expect(readPredictedLength({ type: 'int64', data: BigInt64Array.of(7n), dims: [1] })).toBe(7);
        expect(readPredictedLength(float32Tensor(Float32Array.of(9), [1]))).toBe(9);
    });

    it('rejects negative, fractional and multi-element lengths', () => {
        expect(() => readPredictedLength(int32Tensor(Int32Array.of(-1), [1]))).toThrow(InferenceError);
        expect(() => readPredictedLength(float32Tensor(Float32Array.of(1.5), [1]))).toThrow(InferenceError);
        expect(() => readPredictedLength(int32Tensor(Int32Array.of(1, 2), [2]))).toThrow(InferenceError);
    });
});

describe('AcousticBridge', () => {
    it('builds the named input tensors', async () => {
        const engine = new FakeAcoustic([features, lens, int32Tensor(Int32Array.of(1024), [1])]);
        await new AcousticBridge(engine).run(inputs());

        const [feeds] = engine.feeds;
        expect(Object.keys(feeds).sort()).toEqual([...engine.inputNames].sort());
        expect(feeds.phone).toEqual(int32Tensor(Int32Array.of(0, 1, 0), [3]));
        expect(feeds.tone).toEqual(int32Tensor(Int32Array.of(0, 3, 0), [3]));
        expect(feeds.language).toEqual(int32Tensor(Int32Array.of(3, 3, 3), [3]));
        expect(feeds.g.dims).toEqual([1, 256, 1]);
        expect(feeds.length_scale).toEqual(float32Tensor(Float32Array.of(0.5), [1]));
    });

    it('returns the features and predicted length', async () => {
        const engine = new FakeAcoustic([features, lens, { type: 'int64', data: BigInt64Array.of(2048n), dims: [1] }]);
        const result = await new AcousticBridge(engine).run(inputs());

        expect(result.features).toBe(features.data);
        expect(result.predictedLength).toBe(2048);
    });

    it('rejects an engine with fewer than three outputs', async () => {
        const engine = new FakeAcoustic([features, lens], ['z_p', 'pronoun_lens']);
        await expect(new AcousticBridge(engine).run(inputs())).rejects.toThrow(InferenceError);
        expect(engine.feeds).toHaveLength(0);
    });

    it('rejects unequal or empty inputs before inference', async () => {
        const engine = new FakeAcoustic([features, lens, lens]);
        const bridge = new AcousticBridge(engine);

        await expect(bridge.run(inputs({ tones: [0] }))).rejects.toThrow(InferenceError);
        await expect(bridge.run(inputs({ phones: [], tones: [], languageIds: [] }))).rejects.toThrow(InferenceError);
        await expect(bridge.run(inputs({ speakerEmbedding: new Float32Array(10) }))).rejects.toThrow(InferenceError);
        expect(engine.feeds).toHaveLength(0);
    });

    it('rejects non-float features', async () => {
        const engine = new FakeAcoustic([lens, lens, lens]);
        await expect(new AcousticBridge(engine).run(inputs())).rejects.toThrow('Acoustic features must be float32, got int32');
    });

    it('wraps engine failures', async () => {
        const engine = new FakeAcoustic([]);
        engine.run = async () => { throw new Error('out of memory'); };
        await expect(new AcousticBridge(engine).run(inputs())).rejects.toThrow('Acoustic model failed: out of memory');
    });
});
