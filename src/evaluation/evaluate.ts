import { availableParallelism } from 'node:os';
import type { EvaluationReport, MatchResult, Study } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { matchPartition, normalizeTitle, type PartitionMatch } from '../nlp/fuzzy-match.js';
import { getLogger } from '../utils/logger.js';
import { MatchWorkerPool } from './worker-pool.js';

const logger = getLogger();

/**
 * A whole-call input contract violation (per-study problems are reported
 * inside the EvaluationReport instead).
 */
export class EvaluationInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EvaluationInputError';
    }
}

export interface EvaluateOptions {
    /** Worker threads for matching. Defaults to available parallelism. */
    workers?: number;
    /** Below this many title comparisons the matcher runs inline */
    parallelThreshold?: number;
}

interface PreparedStudy {
    study: Study;
    title: string;
    normalized: string;
    invalidReason: string | null;
}

/**
 * Score a candidate title list against the gold standard.
 *
 * Every distinct study of GS ∪ QGS is matched against every candidate; a
 * study is found when its best score reaches `threshold`. Recall over an
 * empty set is 0. Studies without a usable title are reported as invalid,
 * count as not found, and stay in their set's denominator.
 *
 * Output does not depend on how the work is partitioned: each study's match
 * is computed independently and results are merged by study position.
 */
export async function evaluate(
    candidateTitles: readonly string[],
    gs: readonly Study[],
    qgs: readonly Study[],
    threshold: number,
    options: EvaluateOptions = {}
): Promise<EvaluationReport> {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
        throw new EvaluationInputError(`Threshold must be within [0, 1], got ${threshold}`);
    }

    const gsIds = uniqueIds(gs, 'GS');
    const qgsIds = uniqueIds(qgs, 'QGS');

    const outsideGs = [...qgsIds].filter((id) => !gsIds.has(id));
    if (outsideGs.length > 0) {
        logger.warn({ ids: outsideGs }, 'QGS studies missing from GS; matching them anyway');
    }

    // GS order first, then QGS-only studies
    const studies = new Map<string, PreparedStudy>();
    for (const study of [...gs, ...qgs]) {
        if (!studies.has(study.id)) studies.set(study.id, prepare(study));
    }
    const prepared = [...studies.values()];
    const valid = prepared.filter((p) => p.invalidReason === null);
    const candidates = candidateTitles.map((title) => normalizeTitle(title));

    const matches = await matchTitles(
        valid.map((p) => p.normalized),
        candidates,
        options
    );

    const byId = new Map<string, MatchResult>();
    valid.forEach((p, index) => {
        const match = matches[index] ?? { candidateIndex: -1, score: 0 };
        const hasCandidate = match.candidateIndex >= 0;
        byId.set(p.study.id, {
            studyId: p.study.id,
            title: p.title,
            status: hasCandidate && match.score >= threshold ? 'found' : 'not-found',
            score: match.score,
            candidateIndex: hasCandidate ? match.candidateIndex : null,
            candidateTitle: hasCandidate ? candidateTitles[match.candidateIndex] ?? null : null,
        });
    });

    const results: MatchResult[] = prepared.map((p): MatchResult =>
        byId.get(p.study.id) ?? {
            studyId: p.study.id,
            title: p.title,
            status: 'invalid',
            score: 0,
            candidateIndex: null,
            candidateTitle: null,
            reason: p.invalidReason ?? 'invalid study',
        }
    );

    const isFound = (id: string): boolean => byId.get(id)?.status === 'found';
    const gsFound = [...gsIds].filter(isFound);
    const qgsFound = [...qgsIds].filter(isFound);

    const report: EvaluationReport = {
        threshold,
        gsSize: gsIds.size,
        qgsSize: qgsIds.size,
        candidateCount: candidateTitles.length,
        gsRecall: ratio(gsFound.length, gsIds.size),
        qgsRecall: ratio(qgsFound.length, qgsIds.size),
        gsFound,
        qgsFound,
        matches: results,
    };

    const invalid = results.filter((r) => r.status === 'invalid').length;
    logger.info(
        { gsRecall: report.gsRecall, qgsRecall: report.qgsRecall, candidates: candidates.length, invalid },
        'Evaluation complete'
    );

    return report;
}

/**
 * Run the matcher inline or on the worker pool, depending on the workload.
 */
async function matchTitles(
    titles: readonly string[],
    candidates: readonly string[],
    options: EvaluateOptions
): Promise<PartitionMatch[]> {
    const comparisons = titles.length * candidates.length;
    const parallelThreshold = options.parallelThreshold ?? DEFAULT_CONFIG.evaluation.parallelThreshold;

    if (titles.length === 0 || comparisons < parallelThreshold) {
        return matchPartition(titles, candidates);
    }

    const pool = new MatchWorkerPool(options.workers ?? availableParallelism());
    return pool.run(titles, candidates);
}

function prepare(study: Study): PreparedStudy {
    const title = typeof study.title === 'string' ? study.title : '';
    const normalized = normalizeTitle(title);

    let invalidReason: string | null = null;
    if (title.trim() === '') {
        invalidReason = 'missing title';
    } else if (normalized === '') {
        invalidReason = 'title has no letters or digits';
    }

    return { study, title, normalized, invalidReason };
}

function uniqueIds(studies: readonly Study[], label: string): Set<string> {
    const ids = new Set<string>();
    for (const study of studies) {
        if (ids.has(study.id)) {
            logger.warn({ id: study.id, set: label }, 'Duplicate study id ignored');
        }
        ids.add(study.id);
    }
    return ids;
}

function ratio(part: number, whole: number): number {
    return whole === 0 ? 0 : part / whole;
}
