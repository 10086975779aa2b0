/**
 * Error taxonomy for the search client.
 *
 * `ServiceError` subclasses describe one failed service call and say whether
 * retrying the same call can help. The remaining classes are terminal
 * conditions surfaced from `SearchClient`.
 */

export type ServiceErrorKind = 'invalid-query' | 'credential-rejected' | 'rate-limited' | 'transient' | 'unexpected';

/**
 * A classified failure of a single service call.
 */
export class ServiceError extends Error {
    constructor(
        message: string,
        public readonly kind: ServiceErrorKind,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ServiceError';
    }
}

/**
 * The service rejected the query. Caller-correctable: reformulate the string.
 * `reason` is 'too-large' when the service refused the payload size.
 */
export class InvalidQueryError extends ServiceError {
    constructor(
        message: string,
        public readonly query: string,
        public readonly reason: 'syntax' | 'too-large',
        status: number,
        response?: unknown
    ) {
        super(message, 'invalid-query', status, false, response);
        this.name = 'InvalidQueryError';
    }
}

/**
 * The credential used for the call is invalid or out of quota.
 */
export class CredentialRejectedError extends ServiceError {
    constructor(
        message: string,
        public readonly credentialId: string,
        status: number,
        public readonly resetsAt: Date | null = null
    ) {
        super(message, 'credential-rejected', status, false);
        this.name = 'CredentialRejectedError';
    }
}

/**
 * The service throttled the request.
 */
export class RateLimitedError extends ServiceError {
    constructor(
        message: string,
        public readonly retryAfterMs: number | null = null
    ) {
        super(message, 'rate-limited', 429, true);
        this.name = 'RateLimitedError';
    }
}

/**
 * Timeout, connection failure or 5xx.
 */
export class TransientServiceError extends ServiceError {
    constructor(message: string, status: number, options?: { cause?: unknown; response?: unknown }) {
        super(message, 'transient', status, true, options?.response, { cause: options?.cause });
        this.name = 'TransientServiceError';
    }
}

/**
 * Every credential has been marked exhausted during this run.
 */
export class PoolExhaustedError extends Error {
    constructor(public readonly poolSize: number) {
        super(
            poolSize === 0
                ? 'No credentials were configured'
                : `All ${poolSize} credentials are exhausted; supply fresh credentials to continue`
        );
        this.name = 'PoolExhaustedError';
    }
}

/**
 * Retries for one page ran out. `cause` holds the last failure.
 */
export class TransientFetchError extends Error {
    constructor(
        public readonly attempts: number,
        cause: unknown,
        public readonly offset: number | null = null
    ) {
        super(
            `Request failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${cause instanceof Error ? cause.message : String(cause)}`,
            { cause }
        );
        this.name = 'TransientFetchError';
    }
}
