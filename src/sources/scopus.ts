import { z } from 'zod';
import type { Credential, Entry, PageRequest, SearchPage, SearchService, SearchServiceOptions } from '../types/index.js';
import { createHttpClient, HttpError, parseRetryAfter, type HttpClient, type HttpResponse } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import {
    CredentialRejectedError,
    InvalidQueryError,
    RateLimitedError,
    ServiceError,
    TransientServiceError,
} from '../client/errors.js';

const logger = getLogger();

export const SCOPUS_SEARCH_URL = 'https://api.elsevier.com/content/search/scopus';

/**
 * Scopus Search API response (subset of relevant fields).
 * Numeric fields arrive as strings.
 */
const ScopusEntrySchema = z.object({
    'dc:identifier': z.string().optional(),
    'eid': z.string().optional(),
    'dc:title': z.string().optional(),
    'prism:doi': z.string().optional(),
    'prism:coverDate': z.string().optional(),
    // Present on the placeholder entry of an empty result set
    'error': z.string().optional(),
});

const ScopusSearchResponseSchema = z.object({
    'search-results': z.object({
        'opensearch:totalResults': z.coerce.number().int().nonnegative(),
        'entry': z.array(ScopusEntrySchema).default([]),
    }),
});

const ScopusServiceErrorSchema = z.object({
    'service-error': z.object({
        status: z.object({
            statusCode: z.string().optional(),
            statusText: z.string().optional(),
        }),
    }),
});

type ScopusEntry = z.infer<typeof ScopusEntrySchema>;

/**
 * Elsevier Scopus Search API adapter.
 * Issues one request per call and maps every failure onto the client's
 * error taxonomy.
 *
 * @see https://dev.elsevier.com/documentation/ScopusSearchAPI.wadl
 */
export class ScopusSearchService implements SearchService {
    readonly name = 'Scopus';
    private httpClient: HttpClient;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    constructor(options?: SearchServiceOptions) {
        this.baseUrl = options?.baseUrl ?? SCOPUS_SEARCH_URL;
        this.timeoutMs = options?.timeoutMs ?? 15000;
        this.httpClient = createHttpClient({ timeout: this.timeoutMs });
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async fetchPage(request: PageRequest, credential: Credential, signal?: AbortSignal): Promise<SearchPage> {
        const params = new URLSearchParams({
            query: request.query,
            start: String(request.offset),
            count: String(request.pageSize),
        });

        const url = `${this.baseUrl}?${params.toString()}`;
        logger.debug({ offset: request.offset, credential: credential.id }, 'Scopus page request');

        let response: HttpResponse;
        try {
            response = await this.httpClient.get(url, {
                headers: {
                    'Accept': 'application/json',
                    'X-ELS-APIKey': credential.token,
                },
                timeout: this.timeoutMs,
                signal,
            });
        } catch (error) {
            if (error instanceof HttpError) {
                if (error.retryable) {
                    throw new TransientServiceError(error.message, error.status, { cause: error });
                }
                throw new ServiceError(error.message, 'unexpected', error.status, false, undefined, { cause: error });
            }
            throw error;
        }

        this.classify(response, request, credential);
        return this.parsePage(response, request);
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Throw the matching ServiceError for a non-successful response.
     */
    private classify(response: HttpResponse, request: PageRequest, credential: Credential): void {
        const { status, headers } = response;

        // Quota headers can accompany any status, so they are checked first
        const remaining = headers['x-ratelimit-remaining'];
        const quotaExceeded =
            (remaining !== undefined && Number(remaining) <= 0) ||
            (headers['x-els-status'] ?? '').startsWith('QUOTA_EXCEEDED');

        if (quotaExceeded || status === 401 || status === 403) {
            throw new CredentialRejectedError(
                quotaExceeded ? 'API key quota exceeded' : `API key rejected (HTTP ${status})`,
                credential.id,
                status,
                parseResetDate(headers['x-ratelimit-reset'])
            );
        }

        if (status === 400) {
            throw new InvalidQueryError(
                `Query rejected: ${serviceErrorText(response.body) ?? response.statusText}`,
                request.query,
                'syntax',
                status,
                response.body
            );
        }

        if (status === 413) {
            throw new InvalidQueryError('Query too large', request.query, 'too-large', status);
        }

        if (status === 429) {
            throw new RateLimitedError('Throttled by the service', parseRetryAfter(headers['retry-after']));
        }

        if (status >= 500) {
            throw new TransientServiceError(`HTTP ${status}: ${response.statusText}`, status, { response: response.body });
        }

        if (!response.ok) {
            throw new ServiceError(`HTTP ${status}: ${response.statusText}`, 'unexpected', status, false, response.body);
        }
    }

    private parsePage(response: HttpResponse, request: PageRequest): SearchPage {
        let json: unknown;
        try {
            json = JSON.parse(response.body);
        } catch {
            // The service answers oversized queries with a non-JSON body
            throw new InvalidQueryError('Query too large (unparseable response)', request.query, 'too-large', response.status);
        }

        const parsed = ScopusSearchResponseSchema.safeParse(json);
        if (!parsed.success) {
            throw new TransientServiceError(
                `Malformed search response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
                response.status,
                { response: json }
            );
        }

        const results = parsed.data['search-results'];
        const entries = results.entry
            .map((entry) => normalizeEntry(entry))
            .filter((entry): entry is Entry => entry !== null);

        return {
            query: request.query,
            offset: request.offset,
            entries,
            totalResults: results['opensearch:totalResults'],
            fromCache: false,
        };
    }
}

/**
 * Map a raw entry to an Entry. Entries without a title or identifier
 * (including the "Result set was empty" placeholder) are dropped.
 */
export function normalizeEntry(entry: ScopusEntry): Entry | null {
    if (entry.error !== undefined) return null;

    const id = entry['dc:identifier'] ?? entry.eid;
    const title = entry['dc:title']?.trim();
    if (!id || !title) return null;

    return Object.freeze({
        id,
        title,
        doi: entry['prism:doi'] ?? null,
        date: entry['prism:coverDate'] ?? null,
    });
}

/**
 * X-RateLimit-Reset carries epoch seconds.
 */
function parseResetDate(header: string | undefined): Date | null {
    if (!header) return null;
    const seconds = Number(header);
    return Number.isFinite(seconds) ? new Date(seconds * 1000) : null;
}

function serviceErrorText(body: string): string | null {
    try {
        const parsed = ScopusServiceErrorSchema.safeParse(JSON.parse(body));
        return parsed.success ? parsed.data['service-error'].status.statusText ?? null : null;
    } catch {
        return null;
    }
}
