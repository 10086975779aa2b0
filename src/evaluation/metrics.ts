import type { EvaluationReport } from '../types/index.js';

/**
 * The search service never returns more than this many results per query.
 */
export const DEFAULT_RESULT_CAP = 5000;

export interface SearchMetrics {
    /** Results actually retrievable: min(cap, reported total) */
    retrievableResults: number;
    precision: number;
    recall: number;
    f1: number;
}

/**
 * Precision, recall and F1 of a search string.
 *
 * Precision is measured against the retrievable result count, since the
 * service stops paging at the cap. With no results precision is 0; F1 is 0
 * when precision and recall are both 0.
 */
export function computeMetrics(
    report: EvaluationReport,
    totalResults: number,
    resultCap = DEFAULT_RESULT_CAP
): SearchMetrics {
    const retrievableResults = Math.min(resultCap, Math.max(0, totalResults));
    const precision = retrievableResults === 0 ? 0 : Math.min(1, report.gsFound.length / retrievableResults);
    const recall = report.gsRecall;
    const denominator = precision + recall;

    return {
        retrievableResults,
        precision,
        recall,
        f1: denominator === 0 ? 0 : (2 * precision * recall) / denominator,
    };
}
