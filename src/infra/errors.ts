/**
 * Error taxonomy for the synthesis pipeline, plus the shared helper that
 * avoids duplicating the `err instanceof Error ? err.message : String(err)` pattern.
 *
 * Lookup misses during phoneme resolution are not errors: they are logged
 * and substituted, so nothing here covers them.
 */

/** Extract a human-readable message from an unknown thrown value. */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/** Base class for every failure the engine reports to its caller. */
export class TtsError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Missing or malformed model assets. Fatal while loading the engine. */
export class ConfigurationError extends TtsError { }

/** The acoustic or waveform model failed, or returned tensors of the wrong shape. */
export class InferenceError extends TtsError { }

/** Rejected caller input (empty text, unknown language, bad bit depth). */
export class InvalidArgumentError extends TtsError { }
