import { describe, it, expect } from 'vitest';
import { matchPartition, normalizeTitle, titleSimilarity } from '../nlp/fuzzy-match.js';

describe('normalizeTitle', () => {
    it('should lowercase and replace punctuation with spaces', () => {
        expect(normalizeTitle('  Deep-Learning: A Survey! ')).toBe('deep learning a survey');
    });

    it('should keep letters outside ASCII', () => {
        expect(normalizeTitle('Análise de Código')).toBe('análise de código');
    });
});

describe('titleSimilarity', () => {
    it('should score identical titles as 1', () => {
        expect(titleSimilarity('Detecting Code Smells', 'detecting code smells.')).toBe(1);
    });

    it('should score a title contained in the candidate as 1', () => {
        expect(titleSimilarity('Detecting Code Smells', 'Detecting Code Smells in Java')).toBe(1);
    });

    it('should lose one edit per mismatched character', () => {
        expect(titleSimilarity('abc', 'abd')).toBeCloseTo(2 / 3);
        expect(titleSimilarity('Detecting Code Smells', 'Detecting code smell in Java')).toBeCloseTo(20 / 21);
    });

    it('should score an empty title as 0', () => {
        expect(titleSimilarity('', 'anything')).toBe(0);
        expect(titleSimilarity('!!!', 'anything')).toBe(0);
    });

    it('should stay within [0, 1]', () => {
        const score = titleSimilarity('a rather long title about refactoring', 'xyz');
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
    });
});

describe('matchPartition', () => {
    it('should report no candidate when the list is empty', () => {
        expect(matchPartition(['code smell'], [])).toEqual([{ candidateIndex: -1, score: 0 }]);
    });

    it('should pick the best candidate for every title', () => {
        const matches = matchPartition(['code smell', 'god class'], ['god class detection', 'code smells in java']);

        expect(matches).toEqual([
            { candidateIndex: 1, score: 1 },
            { candidateIndex: 0, score: 1 },
        ]);
    });

    it('should break ties towards the lower candidate index', () => {
        const [match] = matchPartition(['abc'], ['xbc', 'axc']);

        expect(match?.candidateIndex).toBe(0);
        expect(match?.score).toBeCloseTo(2 / 3);
    });
});
