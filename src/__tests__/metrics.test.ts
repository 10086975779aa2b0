import { describe, it, expect } from 'vitest';
import { computeMetrics } from '../evaluation/metrics.js';
import { buildCitationGraph, reachableFrom, snowballingRecall } from '../evaluation/snowballing.js';
import type { Citation, EvaluationReport, Study } from '../types/index.js';

// Helper: a report with the given GS ids found
function makeReport(gsFound: string[], gsSize: number): EvaluationReport {
    return {
        threshold: 0.9,
        gsSize,
        qgsSize: 0,
        candidateCount: 0,
        gsRecall: gsSize === 0 ? 0 : gsFound.length / gsSize,
        qgsRecall: 0,
        gsFound,
        qgsFound: [],
        matches: [],
    };
}

describe('computeMetrics', () => {
    it('should compute precision against the reported total', () => {
        const metrics = computeMetrics(makeReport(['a', 'b'], 4), 10);

        expect(metrics.retrievableResults).toBe(10);
        expect(metrics.precision).toBeCloseTo(0.2);
        expect(metrics.recall).toBe(0.5);
        expect(metrics.f1).toBeCloseTo((2 * 0.2 * 0.5) / 0.7);
    });

    it('should cap the denominator at the retrievable maximum', () => {
        const metrics = computeMetrics(makeReport(['a', 'b'], 4), 12000);

        expect(metrics.retrievableResults).toBe(5000);
        expect(metrics.precision).toBeCloseTo(2 / 5000);
    });

    it('should return zeros when nothing was retrieved', () => {
        expect(computeMetrics(makeReport([], 4), 0)).toEqual({ retrievableResults: 0, precision: 0, recall: 0, f1: 0 });
    });
});

describe('snowballing', () => {
    const gs: Study[] = ['A', 'B', 'C', 'D'].map((id) => ({ id, title: `Study ${id}` }));
    // A cites B, B cites C, D cites A
    const citations: Citation[] = [
        { from: 'A', to: 'B' },
        { from: 'B', to: 'C' },
        { from: 'D', to: 'A' },
    ];

    it('should skip self-citations and citations outside the GS', () => {
        const graph = buildCitationGraph(gs, [...citations, { from: 'A', to: 'A' }, { from: 'A', to: 'Z' }]);

        expect(graph.order).toBe(4);
        expect(graph.size).toBe(3);
    });

    it('should follow references only for backward snowballing', () => {
        const graph = buildCitationGraph(gs, citations);

        expect(reachableFrom(graph, ['A'], 'out')).toEqual(['A', 'B', 'C']);
    });

    it('should follow both directions for backward and forward snowballing', () => {
        const graph = buildCitationGraph(gs, citations);

        expect([...reachableFrom(graph, ['A'], 'both')].sort()).toEqual(['A', 'B', 'C', 'D']);
    });

    it('should compute recall after snowballing', () => {
        const result = snowballingRecall(makeReport(['A'], 4), gs, citations);

        expect(result.backwardRecall).toBe(0.75);
        expect(result.backwardForwardRecall).toBe(1);
    });

    it('should be 0 when the search found nothing', () => {
        const result = snowballingRecall(makeReport([], 4), gs, citations);

        expect(result.backwardRecall).toBe(0);
        expect(result.backwardForwardRecall).toBe(0);
    });

    it('should be 0 for an empty GS', () => {
        const result = snowballingRecall(makeReport([], 0), [], []);

        expect(result.backwardRecall).toBe(0);
        expect(result.backwardForwardRecall).toBe(0);
    });
});
