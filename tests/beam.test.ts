import { describe, it, expect, beforeAll } from 'vitest';
import { Dictionary } from '../src/dictionary';
import { BeamSearch } from '../src/beam';
import { Segmenter } from '../src/segmenter';
import { UNKNOWN_CHAR_COST } from '../src/constants';
import { readFixtureWords, rankCost } from './helpers';

describe('BeamSearch', () => {
    let words: string[];
    let beam: BeamSearch;
    let segmenter: Segmenter;

    const cost = (word: string) => rankCost(words.indexOf(word), words.length);

    beforeAll(() => {
        words = readFixtureWords();
        const dictionary = Dictionary.fromRankedWords(words);
        beam = new BeamSearch(dictionary);
        segmenter = new Segmenter(dictionary);
    });

    it('should return the cheapest splits first', () => {
        const result = beam.search('derekanderson', 3);
        expect(result.map((c) => c.tokens)).toEqual([
            ['derek', 'anderson'],
            ['derek', 'anders', 'on'],
            ['derek', 'and', 'ers', 'on'],
        ]);
        expect(result[0].cost).toBeCloseTo(cost('derek') + cost('anderson'), 10);
        expect(result[2].cost).toBeCloseTo(cost('derek') + cost('and') + cost('ers') + cost('on'), 10);
    });

    it('should keep costs strictly ascending', () => {
        const result = beam.search('derekanderson', 5);
        expect(result.map((c) => c.tokens)).toEqual([
            ['derek', 'anderson'],
            ['derek', 'anders', 'on'],
            ['derek', 'and', 'ers', 'on'],
            ['derek', 'an', 'd', 'ers', 'on'],
            ['derek', 'anders', 'o', 'n'],
        ]);
        for (let i = 1; i < result.length; i++) {
            expect(result[i].cost).toBeGreaterThan(result[i - 1].cost);
        }
    });

    it('should charge unknown characters', () => {
        const [best] = beam.search('derekanderson', 5).slice(3);
        expect(best.cost).toBeCloseTo(
            cost('derek') + cost('an') + UNKNOWN_CHAR_COST + cost('ers') + cost('on'),
            10
        );
    });

    it('should merge digits and possessives in every candidate', () => {
        expect(beam.search('win32intel', 2).map((c) => c.tokens)).toEqual([
            ['win', '32', 'intel'],
            ['w', 'in', '32', 'intel'],
        ]);
        expect(beam.search("that'sthesheriff'sbadge", 2).map((c) => c.tokens)).toEqual([
            ["that's", 'the', "sheriff's", 'badge'],
            ["that's", 't', 'he', "sheriff's", 'badge'],
        ]);
    });

    it('should carry whitespace through and lowercase the tokens', () => {
        const result = beam.search('Derek  Anderson', 2);
        expect(result.map((c) => c.tokens)).toEqual([
            ['derek', '  ', 'anderson'],
            ['derek', '  ', 'anders', 'on'],
        ]);
        expect(result[0].cost).toBeCloseTo(cost('derek') + cost('anderson'), 10);
    });

    it('should return one empty candidate for empty text', () => {
        expect(beam.search('', 3)).toEqual([{ tokens: [], cost: 0 }]);
    });

    it('should return nothing for topN = 0', () => {
        expect(beam.search('derekanderson', 0)).toEqual([]);
    });

    it('should never exceed topN candidates', () => {
        expect(beam.search('coinc', 3).map((c) => c.tokens)).toEqual([
            ['coin', 'c'],
            ['co', 'inc'],
            ['co', 'in', 'c'],
        ]);
        expect(beam.search('a b c d', 25).length).toBeLessThanOrEqual(25);
    });

    it('should agree with the single best split on untied input', () => {
        const inputs = ['derekanderson', "that'sthesheriff'sbadge", 'win32intel', 'youarewearing', 'coinc'];
        for (const input of inputs) {
            expect(beam.search(input, 1)[0].tokens).toEqual(segmenter.segment(input));
        }
    });

    it('should order equal-cost splits differently from the single best split', () => {
        const dictionary = Dictionary.fromRankedWords(['aa', 'a', 'b']);
        const tied = new BeamSearch(dictionary).search('aaa', 2);
        expect(tied.map((c) => c.tokens)).toEqual([['a', 'aa'], ['aa', 'a']]);
        expect(tied[0].cost).toBe(tied[1].cost);
        expect(new Segmenter(dictionary).segment('aaa')).toEqual(['aa', 'a']);
    });
});
