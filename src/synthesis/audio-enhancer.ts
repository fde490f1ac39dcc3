/**
 * Post-processing for decoded audio: peak normalization, a soft limiter
 * and a noise gate. Quiet or mostly-silent output is always enhanced,
 * whatever the configuration says.
 */

export interface SignalStats {
    /** Mean-square power in dB. */
    powerDb: number;
    /** Share of samples with |x| < 0.001. */
    nearZeroRatio: number;
    peak: number;
}

const NEAR_ZERO = 0.001;
const POWER_FLOOR = 1e-10;

const TARGET_PEAK = 0.85;
/** Float32 rounding of the target peak. */
const PEAK_TOLERANCE = 1e-6;
const KNEE = 0.95;
const GATE = 0.01;

const QUIET_POWER_DB = -40;
const SILENT_RATIO = 0.5;
const LOW_PEAK = 0.1;

export function measureSignal(audio: Float32Array): SignalStats {
    let sumSquares = 0;
    let nearZero = 0;
    let peak = 0;
    for (const sample of audio) {
        const magnitude = Math.abs(sample);
        sumSquares += sample * sample;
        if (magnitude < NEAR_ZERO) nearZero++;
        if (magnitude > peak) peak = magnitude;
    }
    const meanSquare = audio.length > 0 ? sumSquares / audio.length : 0;
    return {
        powerDb: 10 * Math.log10(Math.max(meanSquare, POWER_FLOOR)),
        nearZeroRatio: audio.length > 0 ? nearZero / audio.length : 1,
        peak,
    };
}

/** Enhancement runs when enabled, or regardless when the signal is quiet or sparse. */
export function shouldEnhance(stats: SignalStats, enabled: boolean): boolean {
    return enabled
        || stats.powerDb < QUIET_POWER_DB
        || stats.nearZeroRatio > SILENT_RATIO
        || stats.peak < LOW_PEAK;
}

function softLimit(sample: number): number {
    const magnitude = Math.abs(sample);
    if (magnitude <= KNEE) return sample;
    const limited = KNEE + (1 - KNEE) * Math.tanh((magnitude - KNEE) / (1 - KNEE));
    return Math.sign(sample) * limited;
}

/**
 * Gain that brings the peak to the target. Peaks above the target are
 * attenuated and quiet ones boosted; a peak already in the clean range
 * keeps unit gain, as does near-silence.
 */
function normalizationGain(peak: number): number {
    if (peak < NEAR_ZERO) return 1;
    if (peak < LOW_PEAK || peak > TARGET_PEAK + PEAK_TOLERANCE) return TARGET_PEAK / peak;
    return 1;
}

/** Returns a new buffer; the input is left untouched. */
export function enhanceAudio(audio: Float32Array): Float32Array {
    const gain = normalizationGain(measureSignal(audio).peak);

    const result = new Float32Array(audio.length);
    audio.forEach((sample, i) => {
        const limited = softLimit(sample * gain);
        result[i] = Math.abs(limited) < GATE ? 0 : limited;
    });
    return result;
}
