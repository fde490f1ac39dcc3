/**
 * Runtime-neutral tensors and the inference seam.
 *
 * The pipeline talks to its two models only through `InferenceEngine`.
 * `OnnxEngine` adapts ONNX Runtime to it; tests substitute in-process fakes.
 */

export type TensorValue =
    | { type: 'float32'; data: Float32Array; dims: readonly number[] }
    | { type: 'int32'; data: Int32Array; dims: readonly number[] }
    | { type: 'int64'; data: BigInt64Array; dims: readonly number[] };

export type TensorMap = Record<string, TensorValue>;

/** Declared dimensions; `null` marks one that is only fixed at run time. */
export type TensorShape = readonly (number | null)[];

export interface InferenceEngine {
    readonly inputNames: readonly string[];
    readonly outputNames: readonly string[];
    /** Shapes the model declares, by name, where it declares any. */
    readonly inputShapes?: Readonly<Record<string, TensorShape>>;
    readonly outputShapes?: Readonly<Record<string, TensorShape>>;
    /** Run the model once. Outputs are returned in `outputNames` order. */
    run(feeds: TensorMap): Promise<TensorValue[]>;
    release(): Promise<void>;
}

export function float32Tensor(data: Float32Array, dims: readonly number[]): TensorValue {
    return { type: 'float32', data, dims };
}

export function int32Tensor(data: Int32Array, dims: readonly number[]): TensorValue {
    return { type: 'int32', data, dims };
}

/** A one-element float tensor, shape `[1]`. */
export function scalarTensor(value: number): TensorValue {
    return float32Tensor(Float32Array.of(value), [1]);
}
