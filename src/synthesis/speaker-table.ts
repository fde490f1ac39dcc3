/**
 * Speaker embeddings: a flat blob of N × 256 little-endian float32 values.
 */

import { readFileSync } from 'node:fs';
import { ConfigurationError, getErrorMessage } from '../infra/errors.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import { SPEAKER_EMBEDDING_SIZE } from './acoustic-bridge.js';

const BYTES_PER_SPEAKER = SPEAKER_EMBEDDING_SIZE * Float32Array.BYTES_PER_ELEMENT;

export class SpeakerTable {
    private readonly embeddings: Float32Array[];

    constructor(embeddings: Float32Array[], private readonly logger: Logger = defaultLogger) {
        if (embeddings.length === 0) {
            throw new ConfigurationError('Speaker table is empty');
        }
        for (const embedding of embeddings) {
            if (embedding.length !== SPEAKER_EMBEDDING_SIZE) {
                throw new ConfigurationError(`Speaker embeddings must have ${SPEAKER_EMBEDDING_SIZE} values, got ${embedding.length}`);
            }
        }
        this.embeddings = embeddings;
    }

    /** Decode a blob independently of host endianness. */
    static fromBuffer(bytes: Uint8Array, logger: Logger = defaultLogger): SpeakerTable {
        if (bytes.byteLength === 0 || bytes.byteLength % BYTES_PER_SPEAKER !== 0) {
            throw new ConfigurationError(
                `Speaker blob of ${bytes.byteLength} bytes is not a whole number of ${BYTES_PER_SPEAKER}-byte embeddings`,
            );
        }
        const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        const embeddings: Float32Array[] = [];
        for (let offset = 0; offset < bytes.byteLength; offset += BYTES_PER_SPEAKER) {
            const embedding = new Float32Array(SPEAKER_EMBEDDING_SIZE);
            for (let i = 0; i < SPEAKER_EMBEDDING_SIZE; i++) {
                embedding[i] = view.getFloat32(offset + i * Float32Array.BYTES_PER_ELEMENT, true);
            }
            embeddings.push(embedding);
        }
        return new SpeakerTable(embeddings, logger);
    }

    static load(filePath: string, logger: Logger = defaultLogger): SpeakerTable {
        let bytes: Buffer;
        try {
            bytes = readFileSync(filePath);
        } catch (err) {
            throw new ConfigurationError(`Failed to load speaker embeddings "${filePath}": ${getErrorMessage(err)}`, { cause: err });
        }
        const table = SpeakerTable.fromBuffer(bytes, logger);
        logger.info(`Loaded ${table.count} speaker embedding(s) from ${filePath}`, 'Speakers');
        return table;
    }

    get count(): number {
        return this.embeddings.length;
    }

    /** A copy of the embedding for `id`; out-of-range IDs fall back to speaker 0. */
    get(id: number): Float32Array {
        const embedding = Number.isInteger(id) ? this.embeddings[id] : undefined;
        if (embedding) return embedding.slice();
        this.logger.warn(`Speaker ${id} out of range (0-${this.count - 1}), using speaker 0`, 'Speakers');
        return this.embeddings[0].slice();
    }
}
