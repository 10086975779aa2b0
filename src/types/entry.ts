/**
 * One result record returned by the search service.
 * Normalized from the raw response and never mutated afterwards.
 */
export interface Entry {
    /** Stable identifier (e.g. "SCOPUS_ID:85012345678") */
    readonly id: string;

    /** Study title as returned by the service */
    readonly title: string;

    /** Digital Object Identifier, when the service reports one */
    readonly doi: string | null;

    /** Cover date / publication date string, when reported */
    readonly date: string | null;
}

/**
 * One page request. Frozen once built.
 */
export interface PageRequest {
    readonly query: string;
    /** Zero-based offset of the first entry */
    readonly offset: number;
    readonly pageSize: number;
}

/**
 * A single parsed page of results.
 */
export interface SearchPage {
    readonly query: string;
    readonly offset: number;
    readonly entries: readonly Entry[];

    /** Total number of results reported by the service */
    readonly totalResults: number;

    /** True when the page was served from the run cache */
    readonly fromCache: boolean;
}

/**
 * All entries collected for one logical query.
 */
export interface SearchResult {
    readonly query: string;
    readonly fingerprint: string;
    readonly entries: readonly Entry[];

    /** Total reported by the service (may exceed what the service lets us page through) */
    readonly totalResults: number;

    /** True when `totalResults` exceeded the retrievable maximum */
    readonly truncated: boolean;
}

/**
 * Build a frozen page request.
 */
export function createPageRequest(query: string, offset: number, pageSize: number): PageRequest {
    return Object.freeze({ query, offset, pageSize });
}
