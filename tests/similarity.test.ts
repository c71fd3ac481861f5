import { SequenceMatcher, similarityRatio } from '../src/ontology/similarity.js';

describe('similarityRatio', () => {
    test('identical strings score 1', () => {
        expect(similarityRatio('occupation', 'occupation')).toBe(1);
    });

    test('two empty strings score 1', () => {
        expect(similarityRatio('', '')).toBe(1);
    });

    test('one empty string scores 0', () => {
        expect(similarityRatio('abc', '')).toBe(0);
        expect(similarityRatio('', 'abc')).toBe(0);
    });

    test('counts characters of all matching blocks', () => {
        expect(similarityRatio('abcd', 'bcde')).toBeCloseTo(0.75, 10);
        expect(similarityRatio('occupations', 'occupation')).toBeCloseTo(20 / 21, 10);
        expect(similarityRatio('date of birth', 'dateofbirth')).toBeCloseTo(22 / 24, 10);
    });

    test('recursion only looks left and right of the longest block', () => {
        // "birth" is matched first; "date" sits on the other side of it in b
        expect(similarityRatio('birth date', 'dateofbirth')).toBeCloseTo(10 / 21, 10);
    });

    test('scores low for unrelated surface forms', () => {
        expect(similarityRatio('born', 'date of birth')).toBeCloseTo(4 / 17, 10);
        expect(similarityRatio('job', 'occupation')).toBeCloseTo(2 / 13, 10);
    });

    test('frequent characters in long inputs still match', () => {
        const long = 'x'.repeat(250);
        expect(similarityRatio(long, long)).toBe(1);
    });
});

describe('SequenceMatcher', () => {
    test('finds matching blocks in order', () => {
        const matcher = new SequenceMatcher('abxcd', 'abcd');
        expect(matcher.getMatchingBlocks()).toEqual([
            { a: 0, b: 0, size: 2 },
            { a: 3, b: 2, size: 2 },
        ]);
    });

    test('longest match prefers the earliest position', () => {
        const matcher = new SequenceMatcher('ab ab', 'ab');
        expect(matcher.findLongestMatch(0, 5, 0, 2)).toEqual({ a: 0, b: 0, size: 2 });
    });

    test('no common characters gives no blocks', () => {
        expect(new SequenceMatcher('abc', 'xyz').getMatchingBlocks()).toEqual([]);
    });
});
