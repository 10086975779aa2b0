import type { SearchResult, SearchService, SlrSearchConfig } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { partitionCredentials } from './credential-pool.js';
import { PoolExhaustedError } from './errors.js';
import type { Clock } from './rate-limiter.js';
import { createSearchClient, type SearchClient } from './search-client.js';

const logger = getLogger();

/**
 * Create `n` independent clients over disjoint slices of one key list.
 * Each client has its own limiter, so the per-client ceiling times `n`
 * bounds the combined rate, and no key is shared between clients.
 */
export function createClientsWithDisjointCredentials(
    tokens: readonly string[],
    n: number,
    config: SlrSearchConfig = DEFAULT_CONFIG,
    options: { service?: SearchService; clock?: Clock; sleep?: (ms: number) => Promise<void> } = {}
): SearchClient[] {
    return partitionCredentials(tokens, n)
        .filter((group) => group.length > 0)
        .map((group) => createSearchClient(group, config, options));
}

/**
 * Lifecycle hooks for `searchMany`. All optional.
 */
export interface SearchManyHooks {
    onStart?(clientIndex: number, queryIndex: number): void;
    onComplete?(clientIndex: number, queryIndex: number, result: SearchResult): void;
    onError?(clientIndex: number, queryIndex: number, error: unknown): void;
}

export type QueryOutcome =
    | { status: 'fulfilled'; query: string; result: SearchResult }
    | { status: 'rejected'; query: string; error: unknown }
    | { status: 'skipped'; query: string };

/**
 * Run a list of queries over several clients.
 *
 * Each client pulls the next unclaimed query when it becomes free. A client
 * whose credentials run out stops taking work; its failed query is reported
 * as rejected and queries nobody could run are reported as skipped.
 */
export async function searchMany(
    clients: readonly SearchClient[],
    queries: readonly string[],
    hooks: SearchManyHooks = {}
): Promise<QueryOutcome[]> {
    const outcomes: QueryOutcome[] = queries.map((query): QueryOutcome => ({ status: 'skipped', query }));
    let next = 0;

    const worker = async (client: SearchClient, clientIndex: number): Promise<void> => {
        while (next < queries.length) {
            const queryIndex = next++;
            const query = queries[queryIndex] ?? '';
            hooks.onStart?.(clientIndex, queryIndex);

            try {
                const result = await client.collect(query);
                outcomes[queryIndex] = { status: 'fulfilled', query, result };
                hooks.onComplete?.(clientIndex, queryIndex, result);
            } catch (error) {
                outcomes[queryIndex] = { status: 'rejected', query, error };
                hooks.onError?.(clientIndex, queryIndex, error);

                if (error instanceof PoolExhaustedError) {
                    logger.warn({ client: clientIndex }, 'Client out of credentials, leaving the queue');
                    return;
                }
            }
        }
    };

    await Promise.all(clients.map((client, index) => worker(client, index)));

    const skipped = outcomes.filter((o) => o.status === 'skipped').length;
    if (skipped > 0) {
        logger.warn({ skipped }, 'Some queries were not run: every client ran out of credentials');
    }

    return outcomes;
}
