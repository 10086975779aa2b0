/**
 * Network error codes that indicate a transient failure.
 */
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    timeout?: number;
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper. The body is kept as text; callers decide how to parse it.
 */
export interface HttpResponse {
    status: number;
    statusText: string;
    headers: Record<string, string>;
    body: string;
    ok: boolean;
}

/**
 * HTTP error with classification. Status 0 means no response was received.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Thin fetch wrapper with a per-request timeout.
 *
 * Non-2xx responses are returned, not thrown: the search service encodes its
 * error kinds in status codes and headers, and the adapter classifies them.
 * Only failures with no response at all (timeout, connection errors) throw.
 */
export class HttpClient {
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: { timeout?: number; version?: string }) {
        this.defaultTimeout = options?.timeout ?? 15000;
        this.userAgent = `slrsearch/${options?.version ?? '1.0.0'}`;
    }

    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { method = 'GET', headers = {}, timeout = this.defaultTimeout, signal } = options;

        if (signal?.aborted) {
            throw signal.reason;
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);
        const onCallerAbort = (): void => controller.abort();
        signal?.addEventListener('abort', onCallerAbort, { once: true });

        try {
            const response = await fetch(url, {
                method,
                headers: { 'User-Agent': this.userAgent, ...headers },
                signal: controller.signal,
            });

            const body = await response.text();

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key.toLowerCase()] = value;
            });

            return {
                status: response.status,
                statusText: response.statusText,
                headers: responseHeaders,
                body,
                ok: response.ok,
            };
        } catch (error) {
            if (signal?.aborted) {
                // Cancelled by the caller, not a network condition
                throw signal.reason;
            }

            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
            }

            const errorCode = networkErrorCode(error);
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0,
                // fetch reports most connection failures as a bare TypeError
                errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : error instanceof TypeError
            );
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onCallerAbort);
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }
}

/**
 * Dig the errno-style code out of a fetch failure (undici wraps it in `cause`).
 */
function networkErrorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;

    const candidates: unknown[] = [error, error.cause];
    for (const candidate of candidates) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate) {
            const { code } = candidate;
            if (typeof code === 'string') return code;
        }
    }
    return undefined;
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | undefined, now = Date.now()): number | null {
    if (!header) return null;

    // Try parsing as seconds
    const seconds = Number(header);
    if (Number.isFinite(seconds) && header.trim() !== '') return Math.max(0, seconds * 1000);

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - now);
    }

    return null;
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: { timeout?: number; version?: string }): HttpClient {
    return new HttpClient(options);
}
