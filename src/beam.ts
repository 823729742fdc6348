import type { Dictionary } from './dictionary';
import { MIN_BEAM_WIDTH, UNREACHABLE_COST } from './constants';
import { chunkText } from './chunker';
import { mergeFragments } from './heuristics';

export interface Candidate {
    tokens: string[];
    /** Sum of the word costs of the tokens before fragments were merged. */
    cost: number;
}

const byCost = (a: Candidate, b: Candidate) => a.cost - b.cost;

/**
 * Top-N splits of mixed text. Each non-whitespace run gets its own bounded DP
 * that keeps the `beamWidth` cheapest partial splits per position; runs are
 * then combined left to right, re-pruning the global beam after every run.
 */
export class BeamSearch {
    readonly dictionary: Dictionary;

    constructor(dictionary: Dictionary) {
        this.dictionary = dictionary;
    }

    search(text: string, topN: number): Candidate[] {
        const beamWidth = Math.max(topN, MIN_BEAM_WIDTH);
        let beam: Candidate[] = [{ tokens: [], cost: 0 }];

        for (const chunk of chunkText(text.toLowerCase())) {
            const next: Candidate[] = [];

            if (chunk.whitespace) {
                for (const prev of beam) {
                    next.push({ tokens: [...prev.tokens, chunk.text], cost: prev.cost });
                }
            } else {
                let runCandidates = this.searchRun(Array.from(chunk.text), beamWidth);
                if (runCandidates.length === 0) {
                    runCandidates = [{ tokens: [chunk.text], cost: UNREACHABLE_COST }];
                }
                for (const prev of beam) {
                    for (const cand of runCandidates) {
                        next.push({ tokens: [...prev.tokens, ...cand.tokens], cost: prev.cost + cand.cost });
                    }
                }
            }

            next.sort(byCost);
            beam = next.slice(0, beamWidth);
        }

        return beam.slice(0, topN).map((cand) => ({
            tokens: mergeFragments(cand.tokens),
            cost: cand.cost,
        }));
    }

    /** `chars` must already be lowercased, one code point per entry. */
    searchRun(chars: readonly string[], beamWidth: number): Candidate[] {
        const n = chars.length;
        const dp: Candidate[][] = new Array(n + 1);
        dp[0] = [{ tokens: [], cost: 0 }];
        const maxWordLen = this.dictionary.maxWordLength;

        for (let i = 1; i <= n; i++) {
            const window = Math.min(i, maxWordLen);
            const costs = this.dictionary.lookbackCosts(chars, i, window);
            const candidates: Candidate[] = [];

            // Longest word first, so equal costs keep that order after the stable sort
            for (let k = window; k >= 1; k--) {
                const wordCost = costs[k - 1];
                if (wordCost >= UNREACHABLE_COST) continue;
                const word = chars.slice(i - k, i).join('');
                for (const prev of dp[i - k]) {
                    candidates.push({ tokens: [...prev.tokens, word], cost: prev.cost + wordCost });
                }
            }

            candidates.sort(byCost);
            dp[i] = candidates.slice(0, beamWidth);
        }

        return dp[n];
    }
}
