/**
 * A gold-standard study, as handed over by the study-list loader.
 * Only `id` and `title` are read by the evaluation engine.
 */
export interface Study {
    id: string;
    title?: string | null;
    abstract?: string | null;
    keywords?: string[];
}

export type MatchStatus = 'found' | 'not-found' | 'invalid';

/**
 * Best match of one study against the candidate titles.
 */
export interface MatchResult {
    studyId: string;
    title: string;
    status: MatchStatus;

    /** Similarity of the best candidate, in [0, 1] */
    score: number;

    /** Index into the candidate list, or null when nothing was compared */
    candidateIndex: number | null;
    candidateTitle: string | null;

    /** Why the study could not be evaluated (status 'invalid' only) */
    reason?: string;
}

export interface EvaluationReport {
    threshold: number;
    gsSize: number;
    qgsSize: number;
    candidateCount: number;

    gsRecall: number;
    qgsRecall: number;

    /** Ids of GS studies found among the candidates, in GS order */
    gsFound: string[];
    /** Ids of QGS studies found among the candidates, in QGS order */
    qgsFound: string[];

    /** One result per distinct study of GS ∪ QGS, GS order first */
    matches: MatchResult[];
}

/**
 * A directed citation: `from` cites `to`.
 */
export interface Citation {
    from: string;
    to: string;
}
