import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

export const FIXTURES_DIR = fileURLToPath(new URL('./fixtures', import.meta.url));

export const EN_DICT = path.join(FIXTURES_DIR, 'en_dict.txt.gz');
export const EN_WORDS = path.join(FIXTURES_DIR, 'en_words.txt');
export const CUSTOM_DICT = path.join(FIXTURES_DIR, 'custom_dict.txt.gz');

export function readFixtureWords(): string[] {
    return fs.readFileSync(EN_WORDS, 'utf-8').split(/\s+/).filter((w) => w.length > 0);
}

/** Cost of the word at `rank` in a list of `n` words. */
export function rankCost(rank: number, n: number): number {
    return Math.log((rank + 1) * Math.log(n));
}
