import * as fs from 'fs';
import * as zlib from 'zlib';
import { promisify } from 'util';
import { UNKNOWN_CHAR_COST, UNREACHABLE_COST } from './constants';
import { ArtifactError } from './errors';
import { createLogger } from './logger';

const gunzip = promisify(zlib.gunzip);
const log = createLogger('dictionary');

// Trie over reversed words: walking from a position towards the start of the
// text visits every dictionary word ending at that position.
class TrieNode {
    children: Map<number, TrieNode> | null = null;
    isWord: boolean = false;
    cost: number = 0;

    getChild(charCode: number): TrieNode | null {
        if (!this.children) return null;
        return this.children.get(charCode) || null;
    }

    getOrCreateChild(charCode: number): TrieNode {
        if (!this.children) {
            this.children = new Map();
        }
        let child = this.children.get(charCode);
        if (!child) {
            child = new TrieNode();
            this.children.set(charCode, child);
        }
        return child;
    }
}

export interface CostModelOptions {
    /** Words to add. Existing entries are kept unless `overwrite` is set. */
    addWords?: readonly string[];
    /** Words to remove before anything is added. */
    blacklist?: readonly string[];
    /** Insert `addWords` as the most frequent words instead of the least frequent. */
    addToTop?: boolean;
    /** Drop base entries that also appear in `addWords`, so the added position wins. */
    overwrite?: boolean;
}

/**
 * Applies blacklist and add-word directives to a ranked list (most frequent first).
 */
export function buildWordList(words: readonly string[], options: CostModelOptions = {}, artifactPath?: string): string[] {
    if (words.length === 0) {
        throw new ArtifactError('Dictionary is empty', artifactPath);
    }

    let ranked = [...words];

    if (options.blacklist && options.blacklist.length > 0) {
        const blacklist = new Set(options.blacklist.map((w) => w.toLowerCase()));
        ranked = ranked.filter((w) => !blacklist.has(w));
        log.debug(`blacklist removed ${words.length - ranked.length} words`);
        if (ranked.length === 0) {
            throw new ArtifactError('Dictionary is empty after applying the blacklist', artifactPath);
        }
    }

    if (options.addWords && options.addWords.length > 0) {
        let added = [...new Set(options.addWords.map((w) => w.toLowerCase()))];
        if (options.overwrite) {
            const replaced = new Set(added);
            ranked = ranked.filter((w) => !replaced.has(w));
        } else {
            const existing = new Set(ranked);
            added = added.filter((w) => !existing.has(w));
        }
        log.debug(`adding ${added.length} words at the ${options.addToTop ? 'top' : 'bottom'}`);

        ranked = options.addToTop ? [...added, ...ranked] : [...ranked, ...added];
    }

    return ranked;
}

/**
 * Immutable word-cost table built from a ranked word list.
 *
 * The word at rank `i` costs `ln((i + 1) * ln(N))`, which is Zipf's law
 * expressed as a negative log probability.
 */
export class Dictionary {
    readonly words: ReadonlyMap<string, number>;
    readonly maxWordLength: number;
    private readonly trie: TrieNode;

    private constructor(words: Map<string, number>, maxWordLength: number, trie: TrieNode) {
        this.words = words;
        this.maxWordLength = maxWordLength;
        this.trie = trie;
    }

    static fromRankedWords(ranked: readonly string[], artifactPath?: string): Dictionary {
        const n = ranked.length;
        if (n < 2) {
            throw new ArtifactError(`Dictionary needs at least two words, got ${n}`, artifactPath);
        }

        const logN = Math.log(n);
        const words = new Map<string, number>();
        const trie = new TrieNode();
        let maxLen = 0;

        ranked.forEach((word, rank) => {
            const cost = Math.log((rank + 1) * logN);
            words.set(word, cost);

            let node = trie;
            for (let i = word.length - 1; i >= 0; i--) {
                node = node.getOrCreateChild(word.charCodeAt(i));
            }
            node.isWord = true;
            node.cost = cost;

            const len = Array.from(word).length;
            if (len > maxLen) maxLen = len;
        });

        return new Dictionary(words, maxLen, trie);
    }

    get size(): number {
        return this.words.size;
    }

    contains(word: string): boolean {
        return this.words.has(word);
    }

    getWordCost(word: string): number | undefined {
        return this.words.get(word);
    }

    /**
     * Costs of the tokens `chars[end - k .. end)` for k = 1..window, indexed by k - 1.
     * `chars` holds one lowercased code point per entry. Unknown single characters
     * cost UNKNOWN_CHAR_COST; longer unknown substrings cost UNREACHABLE_COST.
     */
    lookbackCosts(chars: readonly string[], end: number, window: number): number[] {
        const costs: number[] = new Array(window).fill(UNREACHABLE_COST);
        let node: TrieNode | null = this.trie;

        for (let k = 1; k <= window && node; k++) {
            const piece = chars[end - k];
            for (let c = piece.length - 1; c >= 0 && node; c--) {
                node = node.getChild(piece.charCodeAt(c));
            }
            if (node && node.isWord) {
                costs[k - 1] = node.cost;
            }
        }

        if (window > 0 && costs[0] === UNREACHABLE_COST) {
            costs[0] = UNKNOWN_CHAR_COST;
        }
        return costs;
    }
}

function isGzip(bytes: Buffer): boolean {
    return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

/**
 * Reads a dictionary artifact: whitespace-separated words, most frequent first,
 * plain text or gzip-compressed.
 */
export async function loadWordList(filePath: string): Promise<string[]> {
    let raw: Buffer;
    try {
        raw = await fs.promises.readFile(filePath);
    } catch (err) {
        throw new ArtifactError('Dictionary artifact is unreadable', filePath, { cause: err });
    }

    let bytes = raw;
    if (isGzip(raw)) {
        try {
            bytes = await gunzip(raw);
        } catch (err) {
            throw new ArtifactError('Dictionary artifact is not valid gzip data', filePath, { cause: err });
        }
    }

    let content: string;
    try {
        content = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (err) {
        throw new ArtifactError('Dictionary artifact is not valid UTF-8', filePath, { cause: err });
    }

    return content.split(/\s+/).filter((w) => w.length > 0);
}
