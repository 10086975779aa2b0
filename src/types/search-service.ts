import type { PageRequest, SearchPage } from './entry.js';

/**
 * Read-only view of an API credential.
 * Exhaustion state is owned by the credential pool.
 */
export interface Credential {
    readonly id: string;
    readonly token: string;
}

/**
 * Interface for search service adapters.
 * Implementations issue exactly one request per call and throw classified
 * `ServiceError`s; throttling, key rotation and retries live in the client.
 */
export interface SearchService {
    /** Human-readable service name */
    readonly name: string;

    /**
     * Fetch one page of results.
     * @param signal - Aborts the request when the query is cancelled
     */
    fetchPage(request: PageRequest, credential: Credential, signal?: AbortSignal): Promise<SearchPage>;
}

/**
 * Options for search service initialization.
 */
export interface SearchServiceOptions {
    /** Base URL of the search endpoint */
    baseUrl?: string;

    /** Per-request timeout in milliseconds */
    timeoutMs?: number;
}
