/**
 * Public API.
 */
export * from './types/index.js';
export { SlidingWindowRateLimiter, systemClock, type Clock, type RateLimiterOptions } from './client/rate-limiter.js';
export { CredentialPool, partitionCredentials } from './client/credential-pool.js';
export { RetryPolicy, isTransient, type RetryOptions } from './client/retry-policy.js';
export { SearchClient, createSearchClient, type SearchClientOptions, type SearchClientStats } from './client/search-client.js';
export { createClientsWithDisjointCredentials, searchMany, type SearchManyHooks, type QueryOutcome } from './client/multi-client.js';
export {
    ServiceError,
    InvalidQueryError,
    CredentialRejectedError,
    RateLimitedError,
    TransientServiceError,
    PoolExhaustedError,
    TransientFetchError,
    type ServiceErrorKind,
} from './client/errors.js';
export { RunCache, fingerprint, normalizeQuery } from './cache/run-cache.js';
export { ScopusSearchService, SCOPUS_SEARCH_URL } from './sources/scopus.js';
export { evaluate, EvaluationInputError, type EvaluateOptions } from './evaluation/evaluate.js';
export { MatchWorkerPool } from './evaluation/worker-pool.js';
export { computeMetrics, DEFAULT_RESULT_CAP, type SearchMetrics } from './evaluation/metrics.js';
export { snowballingRecall, buildCitationGraph, reachableFrom, type SnowballingRecall } from './evaluation/snowballing.js';
export { normalizeTitle, titleSimilarity, matchPartition, type PartitionMatch } from './nlp/fuzzy-match.js';
export { initLogger, getLogger } from './utils/logger.js';
export { resolveConfig, getApiKeys } from './utils/config.js';
