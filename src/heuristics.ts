import { APOSTROPHE, POSSESSIVE_SUFFIX, endsWithDigit, isWhitespace, startsWithDigit } from './constants';

function shouldMerge(prev: string, curr: string): boolean {
    if (isWhitespace(prev) || isWhitespace(curr)) return false;

    // Lone apostrophe: "dogs" + "'"
    if (curr === APOSTROPHE) return true;

    // Possessive: "sheriff" + "'s", but not "dogs'" + "'s"
    if (curr.toLowerCase() === POSSESSIVE_SUFFIX) {
        return !prev.endsWith(APOSTROPHE);
    }

    // Numerals: "3" + "2"
    return startsWithDigit(curr) && endsWithDigit(prev);
}

/**
 * Re-attaches fragments the cost search tears off a word: lone apostrophes,
 * possessive suffixes and digits of a longer numeral. Whitespace tokens are
 * never merged.
 */
export function mergeFragments(segments: readonly string[]): string[] {
    const merged: string[] = [];

    for (const curr of segments) {
        if (merged.length > 0) {
            const prev = merged[merged.length - 1];
            if (shouldMerge(prev, curr)) {
                merged[merged.length - 1] = prev + curr;
                continue;
            }
        }
        merged.push(curr);
    }

    return merged;
}
