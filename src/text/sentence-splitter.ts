/**
 * Sentence segmentation. Splits at sentence-level punctuation and re-merges
 * short fragments so every utterance handed to the acoustic model has
 * enough context for natural prosody.
 */

/** Split marks stay attached to the fragment they close. */
const SPLIT_PATTERN = /(?<=[,.!?;。！？；])/u;

/** Sentences at or below this length are folded into their predecessor. */
const STRAY_SENTENCE_LENGTH = 2;

/** Greedily join fragments until each group's summed length exceeds `minLength`. */
export function mergeShortFragments(fragments: string[], minLength: number): string[] {
    const merged: string[] = [];
    let current: string[] = [];
    let currentLength = 0;

    fragments.forEach((fragment, idx) => {
        current.push(fragment);
        currentLength += fragment.length;
        if (currentLength > minLength || idx === fragments.length - 1) {
            merged.push(current.join(' '));
            current = [];
            currentLength = 0;
        }
    });

    const result: string[] = [];
    for (const sentence of merged) {
        if (result.length > 0 && sentence.length <= STRAY_SENTENCE_LENGTH) {
            result[result.length - 1] += ' ' + sentence;
        } else {
            result.push(sentence);
        }
    }
    return result;
}

/** Split normalized text into ordered sentences of at least `minLength` code units (except possibly the last). */
export function splitSentences(text: string, minLength = 10): string[] {
    const fragments = text
        .split(SPLIT_PATTERN)
        .map(f => f.trim())
        .filter(f => f.length > 0);
    return mergeShortFragments(fragments, minLength);
}
