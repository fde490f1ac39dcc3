/**
 * ONNX Runtime adapter for the `InferenceEngine` seam.
 */

import * as ort from 'onnxruntime-node';
import { ConfigurationError, InferenceError, getErrorMessage } from '../infra/errors.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import type { InferenceEngine, TensorMap, TensorShape, TensorValue } from './tensor.js';

export interface OnnxEngineOptions {
    intraOpNumThreads?: number;
    logger?: Logger;
}

function toOrtTensor(tensor: TensorValue): ort.Tensor {
    const dims = [...tensor.dims];
    switch (tensor.type) {
        case 'float32': return new ort.Tensor('float32', tensor.data, dims);
        case 'int32': return new ort.Tensor('int32', tensor.data, dims);
        case 'int64': return new ort.Tensor('int64', tensor.data, dims);
    }
}

function fromOrtTensor(name: string, tensor: ort.Tensor): TensorValue {
    const dims = [...tensor.dims];
    const { data } = tensor;
    if (data instanceof Float32Array) return { type: 'float32', data, dims };
    if (data instanceof Int32Array) return { type: 'int32', data, dims };
    if (data instanceof BigInt64Array) return { type: 'int64', data, dims };
    throw new InferenceError(`Output "${name}" has unsupported tensor type ${tensor.type}`);
}

/** Symbolic or unknown dimensions become `null`. */
function declaredShapes(metadata: ort.InferenceSession['inputMetadata']): Record<string, TensorShape> {
    const shapes: Record<string, TensorShape> = {};
    for (const value of metadata) {
        if (!value.isTensor) continue;
        shapes[value.name] = value.shape.map(dim => typeof dim === 'number' && dim > 0 ? dim : null);
    }
    return shapes;
}

export class OnnxEngine implements InferenceEngine {
    private released = false;
    readonly inputShapes: Readonly<Record<string, TensorShape>>;
    readonly outputShapes: Readonly<Record<string, TensorShape>>;

    private constructor(
        private readonly session: ort.InferenceSession,
        private readonly modelPath: string,
        private readonly logger: Logger,
    ) {
        this.inputShapes = declaredShapes(session.inputMetadata);
        this.outputShapes = declaredShapes(session.outputMetadata);
    }

    static async create(modelPath: string, options: OnnxEngineOptions = {}): Promise<OnnxEngine> {
        const logger = options.logger ?? defaultLogger;
        let session: ort.InferenceSession;
        try {
            session = await ort.InferenceSession.create(modelPath, {
                graphOptimizationLevel: 'all',
                intraOpNumThreads: options.intraOpNumThreads ?? 1,
            });
        } catch (err) {
            throw new ConfigurationError(`Failed to load model "${modelPath}": ${getErrorMessage(err)}`, { cause: err });
        }
        logger.debug(`Loaded ${modelPath} (inputs: ${session.inputNames.join(', ')}; outputs: ${session.outputNames.join(', ')})`, 'ONNX');
        return new OnnxEngine(session, modelPath, logger);
    }

    get inputNames(): readonly string[] {
        return this.session.inputNames;
    }

    get outputNames(): readonly string[] {
        return this.session.outputNames;
    }

    async run(feeds: TensorMap): Promise<TensorValue[]> {
        if (this.released) {
            throw new InferenceError(`Session for "${this.modelPath}" has been released`);
        }
        const ortFeeds: Record<string, ort.Tensor> = {};
        for (const [name, tensor] of Object.entries(feeds)) {
            ortFeeds[name] = toOrtTensor(tensor);
        }

        let results: ort.InferenceSession.ReturnType;
        try {
            results = await this.session.run(ortFeeds);
        } catch (err) {
            throw new InferenceError(`Inference failed for "${this.modelPath}": ${getErrorMessage(err)}`, { cause: err });
        }

        return this.session.outputNames.map(name => {
            const tensor = results[name];
            if (!tensor) throw new InferenceError(`Model "${this.modelPath}" returned no output "${name}"`);
            return fromOrtTensor(name, tensor);
        });
    }

    async release(): Promise<void> {
        if (this.released) return;
        this.released = true;
        await this.session.release();
        this.logger.debug(`Released ${this.modelPath}`, 'ONNX');
    }
}
