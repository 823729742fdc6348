import type { Dictionary } from './dictionary';
import { UNREACHABLE_COST } from './constants';
import { chunkText } from './chunker';
import { mergeFragments } from './heuristics';

/**
 * Single best split: minimum total word cost over every way of cutting a run
 * of non-whitespace characters into tokens.
 */
export class Segmenter {
    readonly dictionary: Dictionary;

    constructor(dictionary: Dictionary) {
        this.dictionary = dictionary;
    }

    /** Whitespace runs are passed through as tokens of their own. */
    segment(text: string): string[] {
        const segments: string[] = [];
        for (const chunk of chunkText(text)) {
            if (chunk.whitespace) {
                segments.push(chunk.text);
            } else {
                segments.push(...this.segmentRun(chunk.text));
            }
        }
        return segments;
    }

    segmentRun(run: string): string[] {
        const chars = Array.from(run);
        // Lowercase the whole run so context-dependent mappings (final sigma)
        // match BeamSearch; per character only when that changes the length
        const loweredRun = Array.from(run.toLowerCase());
        const lowered = loweredRun.length === chars.length ? loweredRun : chars.map((c) => c.toLowerCase());
        const n = chars.length;
        if (n === 0) return [];

        // Per-call buffers: the model is shared and read-only
        const dpCost = new Float64Array(n + 1);
        const dpLength = new Int32Array(n + 1);
        const maxWordLen = this.dictionary.maxWordLength;

        for (let i = 1; i <= n; i++) {
            const window = Math.min(i, maxWordLen);
            const costs = this.dictionary.lookbackCosts(lowered, i, window);

            let best = Infinity;
            let bestLen = 1;
            // Shortest word first; only a strictly lower cost replaces it
            for (let k = 1; k <= window; k++) {
                const wordCost = costs[k - 1];
                if (wordCost >= UNREACHABLE_COST) continue;
                const total = dpCost[i - k] + wordCost;
                if (total < best) {
                    best = total;
                    bestLen = k;
                }
            }

            dpCost[i] = best;
            dpLength[i] = bestLen;
        }

        // Backtrack
        const segments: string[] = [];
        let curr = n;
        while (curr > 0) {
            const len = dpLength[curr];
            segments.push(chars.slice(curr - len, curr).join(''));
            curr -= len;
        }
        segments.reverse();

        return mergeFragments(segments);
    }
}
