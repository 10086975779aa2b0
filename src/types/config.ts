/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Retry/backoff configuration for a single page request.
 */
export interface RetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    factor: number;
    maxDelayMs: number;
    jitter: boolean;
}

/**
 * Fuzzy evaluation configuration.
 */
export interface EvaluationConfig {
    /** Minimum similarity for a study to count as found */
    threshold: number;
    /** Worker threads used for matching. Defaults to available parallelism. */
    workers?: number;
    /** Below this many title comparisons the matcher runs on the calling thread */
    parallelThreshold: number;
}

/**
 * Full slrsearch configuration merged from CLI flags, env vars, and config file.
 */
export interface SlrSearchConfig {
    // Throttling
    maxRequestsPerSecond: number;
    windowMs: number;

    // Requests
    timeoutMs: number;
    pageSize: number;
    maxResults: number;
    pageConcurrency: number;

    // Retry
    retry: RetryConfig;

    // Evaluation
    evaluation: EvaluationConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 *
 * The service allows 9 requests per second per key; the client stays at 7.
 */
export const DEFAULT_CONFIG: SlrSearchConfig = {
    maxRequestsPerSecond: 7,
    windowMs: 1000,
    timeoutMs: 15000,
    pageSize: 25,
    maxResults: 5000,
    pageConcurrency: 7,
    retry: {
        maxAttempts: 4,
        baseDelayMs: 500,
        factor: 2,
        maxDelayMs: 30000,
        jitter: true,
    },
    evaluation: {
        threshold: 0.9,
        parallelThreshold: 20000,
    },
    logLevel: 'info',
    jsonLogs: false,
};
