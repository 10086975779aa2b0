import { describe, it, expect } from 'vitest';
import { evaluate, EvaluationInputError } from '../evaluation/evaluate.js';
import { MatchWorkerPool } from '../evaluation/worker-pool.js';
import { matchPartition } from '../nlp/fuzzy-match.js';
import type { Study } from '../types/index.js';

const detecting: Study = { id: 'gs-1', title: 'Detecting Code Smells' };
const antipattern: Study = { id: 'gs-2', title: 'Antipattern Mining' };

// Helper: a GS where the even-numbered studies have a verbatim candidate
function makeWorkload(): { gs: Study[]; candidates: string[] } {
    const gs: Study[] = Array.from({ length: 12 }, (_, i) => ({
        id: `gs-${i}`,
        title: i % 2 === 0 ? `Refactoring approach number ${i} for legacy systems` : `Energy consumption of mobile app ${i}`,
    }));
    const candidates = Array.from({ length: 30 }, (_, j) =>
        j % 2 === 0
            ? `A refactoring approach number ${j} for legacy systems: an experience report`
            : `Unrelated work on topic ${j}`
    );
    return { gs, candidates };
}

describe('evaluate', () => {
    it('should find a study whose title appears inside a candidate title', async () => {
        const report = await evaluate(
            ['Detecting Code Smells in Java', 'Unrelated Paper'],
            [detecting, antipattern],
            [detecting],
            0.8
        );

        expect(report.qgsRecall).toBe(1);
        expect(report.gsRecall).toBe(0.5);
        expect(report.gsFound).toEqual(['gs-1']);
        expect(report.qgsFound).toEqual(['gs-1']);
        expect(report.matches[0]).toEqual({
            studyId: 'gs-1',
            title: 'Detecting Code Smells',
            status: 'found',
            score: 1,
            candidateIndex: 0,
            candidateTitle: 'Detecting Code Smells in Java',
        });
        expect(report.matches[1]?.status).toBe('not-found');
        expect(report.matches[1]?.score).toBeLessThan(0.8);
    });

    it('should define recall over empty sets as 0', async () => {
        const report = await evaluate(['Detecting Code Smells'], [], [], 0.9);

        expect(report.gsRecall).toBe(0);
        expect(report.qgsRecall).toBe(0);
        expect(report.gsSize).toBe(0);
        expect(report.matches).toEqual([]);
    });

    it('should report nothing found when there are no candidates', async () => {
        const report = await evaluate([], [detecting], [detecting], 0.9);

        expect(report.gsRecall).toBe(0);
        expect(report.qgsRecall).toBe(0);
        expect(report.matches[0]).toMatchObject({ status: 'not-found', score: 0, candidateIndex: null, candidateTitle: null });
    });

    it('should report studies without a usable title and keep them in the denominator', async () => {
        const report = await evaluate(
            ['Detecting Code Smells in Java'],
            [detecting, { id: 'gs-3', title: null }, { id: 'gs-4', title: '???' }],
            [],
            0.9
        );

        expect(report.gsSize).toBe(3);
        expect(report.gsRecall).toBeCloseTo(1 / 3);
        expect(report.matches.map((m) => m.status)).toEqual(['found', 'invalid', 'invalid']);
        expect(report.matches[1]?.reason).toBe('missing title');
        expect(report.matches[2]?.reason).toBe('title has no letters or digits');
    });

    it('should reject a threshold outside [0, 1]', async () => {
        await expect(evaluate([], [], [], 1.5)).rejects.toBeInstanceOf(EvaluationInputError);
        await expect(evaluate([], [], [], Number.NaN)).rejects.toBeInstanceOf(EvaluationInputError);
    });

    it('should count a duplicated study id once', async () => {
        const report = await evaluate(
            ['Detecting Code Smells in Java'],
            [detecting, { id: 'gs-1', title: 'Another title' }],
            [],
            0.9
        );

        expect(report.gsSize).toBe(1);
        expect(report.matches).toHaveLength(1);
        expect(report.matches[0]?.title).toBe('Detecting Code Smells');
    });

    it('should still match QGS studies that are missing from the GS', async () => {
        const report = await evaluate(['Antipattern Mining at Scale'], [detecting], [antipattern], 0.9);

        expect(report.qgsRecall).toBe(1);
        expect(report.gsRecall).toBe(0);
        expect(report.matches.map((m) => m.studyId)).toEqual(['gs-1', 'gs-2']);
    });

    it('should only lose studies as the threshold rises', async () => {
        const candidates = ['Detecting code smell in Java'];
        const loose = await evaluate(candidates, [detecting, antipattern], [], 0.9);
        const strict = await evaluate(candidates, [detecting, antipattern], [], 0.99);

        expect(loose.gsFound).toEqual(['gs-1']);
        expect(strict.gsFound).toEqual([]);
        expect(strict.gsFound.every((id) => loose.gsFound.includes(id))).toBe(true);
    });

    it('should keep both recalls within [0, 1]', async () => {
        const { gs, candidates } = makeWorkload();

        for (const threshold of [0, 0.5, 0.9, 1]) {
            const report = await evaluate(candidates, gs, gs.slice(0, 5), threshold);
            expect(report.gsRecall).toBeGreaterThanOrEqual(0);
            expect(report.gsRecall).toBeLessThanOrEqual(1);
            expect(report.qgsRecall).toBeGreaterThanOrEqual(0);
            expect(report.qgsRecall).toBeLessThanOrEqual(1);
        }
    });

    describe('parallel matching', () => {
        it('should produce the same report for any number of workers', async () => {
            const { gs, candidates } = makeWorkload();
            const qgs = gs.slice(0, 6);

            const inline = await evaluate(candidates, gs, qgs, 0.9, { parallelThreshold: Number.POSITIVE_INFINITY });
            const one = await evaluate(candidates, gs, qgs, 0.9, { workers: 1, parallelThreshold: 0 });
            const two = await evaluate(candidates, gs, qgs, 0.9, { workers: 2, parallelThreshold: 0 });
            const three = await evaluate(candidates, gs, qgs, 0.9, { workers: 3, parallelThreshold: 0 });

            expect(one).toEqual(inline);
            expect(two).toEqual(inline);
            expect(three).toEqual(inline);
            // Even-numbered studies have a verbatim candidate
            expect(inline.gsFound).toEqual(['gs-0', 'gs-2', 'gs-4', 'gs-6', 'gs-8', 'gs-10']);
        });

        it('should match the same studies on worker threads as inline', async () => {
            const report = await evaluate(
                ['Detecting Code Smells in Java', 'Unrelated Paper'],
                [detecting, antipattern],
                [detecting],
                0.8,
                { workers: 2, parallelThreshold: 0 }
            );

            expect(report.qgsRecall).toBe(1);
            expect(report.gsRecall).toBe(0.5);
        });
    });
});

describe('MatchWorkerPool', () => {
    it('should reject a non-positive size', () => {
        expect(() => new MatchWorkerPool(0)).toThrow(RangeError);
    });

    it('should return the inline matches in title order', async () => {
        const titles = ['code smell', 'anti pattern', 'technical debt', 'god class', 'feature envy'];
        const candidates = ['a study of code smells', 'god class detection', 'paying technical debt'];

        const pooled = await new MatchWorkerPool(2).run(titles, candidates);

        expect(pooled).toEqual(matchPartition(titles, candidates));
    });

    it('should return nothing for no titles', async () => {
        await expect(new MatchWorkerPool(2).run([], ['a'])).resolves.toEqual([]);
    });
});
