/**
 * RIFF/WAVE encoding of mono float samples.
 */

import fs from 'node:fs/promises';
import { BIT_DEPTHS, type BitDepth } from '../config/index.js';
import { InvalidArgumentError } from '../infra/errors.js';

const FULL_SCALE: Record<BitDepth, number> = {
    16: 32767,
    24: 8388607,
    32: 2147483647,
};

function isBitDepth(value: number): value is BitDepth {
    return BIT_DEPTHS.some(depth => depth === value);
}

/** Convert raw audio samples to a PCM WAV buffer. */
export function createWavBuffer(audioData: ArrayLike<number>, sampleRate: number, bitDepth: number = 16): Buffer {
    if (!isBitDepth(bitDepth)) {
        throw new InvalidArgumentError(`Unsupported bit depth ${bitDepth}. Valid: ${BIT_DEPTHS.join(', ')}`);
    }
    const numChannels = 1;
    const bytesPerSample = bitDepth / 8;
    const byteRate = sampleRate * numChannels * bytesPerSample;
    const blockAlign = numChannels * bytesPerSample;
    const dataSize = audioData.length * bytesPerSample;

    const buffer = Buffer.alloc(44 + dataSize);

    buffer.write('RIFF', 0);
    buffer.writeUInt32LE(36 + dataSize, 4);
    buffer.write('WAVE', 8);
    buffer.write('fmt ', 12);
    buffer.writeUInt32LE(16, 16);
    buffer.writeUInt16LE(1, 20);
    buffer.writeUInt16LE(numChannels, 22);
    buffer.writeUInt32LE(sampleRate, 24);
    buffer.writeUInt32LE(byteRate, 28);
    buffer.writeUInt16LE(blockAlign, 32);
    buffer.writeUInt16LE(bitDepth, 34);
    buffer.write('data', 36);
    buffer.writeUInt32LE(dataSize, 40);

    const scale = FULL_SCALE[bitDepth];
    for (let i = 0; i < audioData.length; i++) {
        const sample = Math.max(-1, Math.min(1, audioData[i]));
        buffer.writeIntLE(Math.floor(sample * scale), 44 + i * bytesPerSample, bytesPerSample);
    }

    return buffer;
}

/** Encode and write a WAV file. */
export async function writeWavFile(filePath: string, audioData: ArrayLike<number>, sampleRate: number, bitDepth: number = 16): Promise<void> {
    await fs.writeFile(filePath, createWavBuffer(audioData, sampleRate, bitDepth));
}
