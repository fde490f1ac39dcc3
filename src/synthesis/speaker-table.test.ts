import { describe, it, expect } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { SpeakerTable } from './speaker-table.js';
import { createLogger, type LogEvent } from '../infra/logger.js';
import { ConfigurationError } from '../infra/errors.js';

/** Blob of `count` embeddings where every value of speaker n is n + 0.5. */
function blob(count: number): Buffer {
    const bytes = Buffer.alloc(count * 256 * 4);
    for (let s = 0; s < count; s++) {
        for (let i = 0; i < 256; i++) bytes.writeFloatLE(s + 0.5, (s * 256 + i) * 4);
    }
    return bytes;
}

describe('SpeakerTable', () => {
    it('decodes little-endian embeddings', () => {
        const table = SpeakerTable.fromBuffer(blob(2));
        expect(table.count).toBe(2);
        expect(table.get(1)).toEqual(new Float32Array(256).fill(1.5));
    });

    it('falls back to speaker 0 with a warning', () => {
        const events: LogEvent[] = [];
        const logger = createLogger({ sink: e => events.push(e) });
        const table = SpeakerTable.fromBuffer(blob(2), logger);

        expect(table.get(5)).toEqual(new Float32Array(256).fill(0.5));
        expect(table.get(-1)).toEqual(new Float32Array(256).fill(0.5));
        expect(events.map(e => e.message)).toEqual([
            'Speaker 5 out of range (0-1), using speaker 0',
            'Speaker -1 out of range (0-1), using speaker 0',
        ]);
    });

    it('hands out copies of the stored embeddings', () => {
        const table = SpeakerTable.fromBuffer(blob(1), createLogger({ silent: true, sink: () => undefined }));
        table.get(0).fill(9);
        table.get(3).fill(9);
        expect(table.get(0)).toEqual(new Float32Array(256).fill(0.5));
    });

    it('rejects empty or truncated blobs', () => {
        expect(() => SpeakerTable.fromBuffer(Buffer.alloc(0))).toThrow(ConfigurationError);
        expect(() => SpeakerTable.fromBuffer(Buffer.alloc(1023))).toThrow(ConfigurationError);
    });

    it('loads from disk', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexitone-test-'));
        try {
            const logger = createLogger({ silent: true, sink: () => undefined });
            const file = path.join(dir, 'speakers.bin');
            await fs.writeFile(file, blob(3));
            expect(SpeakerTable.load(file, logger).count).toBe(3);
            expect(() => SpeakerTable.load(path.join(dir, 'missing.bin'), logger)).toThrow(ConfigurationError);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
