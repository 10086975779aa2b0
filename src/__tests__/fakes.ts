import type { Credential, Entry, PageRequest, SearchPage, SearchService } from '../types/index.js';
import type { Clock } from '../client/rate-limiter.js';
import { CredentialRejectedError } from '../client/errors.js';

// Helper: build `count` entries with stable ids
export function makeEntries(count: number, start = 0): Entry[] {
    return Array.from({ length: count }, (_, i) => ({
        id: `SCOPUS_ID:${1000 + start + i}`,
        title: `Study ${start + i}`,
        doi: null,
        date: null,
    }));
}

/**
 * Clock whose time only moves when someone sleeps. The advance happens on the
 * next macrotask, so work already queued as microtasks sees the old time.
 */
export class VirtualClock implements Clock {
    private time = 0;

    now(): number {
        return this.time;
    }

    async sleep(ms: number): Promise<void> {
        await new Promise<void>((resolve) => setImmediate(resolve));
        this.time += ms;
    }
}

/**
 * In-process search service over a fixed entry list.
 */
export class FakeSearchService implements SearchService {
    readonly name = 'Fake';
    readonly calls: Array<{ offset: number; credentialId: string; at: number }> = [];
    private readonly failures = new Map<number, unknown[]>();
    private readonly pages = new Map<number, Entry[]>();
    private readonly rejected = new Set<string>();

    constructor(
        private readonly entries: readonly Entry[],
        private readonly options: { totalResults?: number; clock?: Clock } = {}
    ) {}

    /** Queue errors thrown by the next calls for `offset`, in order */
    failAt(offset: number, ...errors: unknown[]): this {
        this.failures.set(offset, [...(this.failures.get(offset) ?? []), ...errors]);
        return this;
    }

    /** Serve `entries` for `offset` instead of the matching slice */
    pageAt(offset: number, entries: Entry[]): this {
        this.pages.set(offset, entries);
        return this;
    }

    /** Reject every call made with credential `id` */
    rejectCredential(id: string): this {
        this.rejected.add(id);
        return this;
    }

    async fetchPage(request: PageRequest, credential: Credential): Promise<SearchPage> {
        this.calls.push({ offset: request.offset, credentialId: credential.id, at: this.options.clock?.now() ?? 0 });

        if (this.rejected.has(credential.id)) {
            throw new CredentialRejectedError('API key rejected (HTTP 401)', credential.id, 401);
        }

        const queued = this.failures.get(request.offset);
        if (queued && queued.length > 0) {
            throw queued.shift();
        }

        return {
            query: request.query,
            offset: request.offset,
            entries: this.pages.get(request.offset) ?? this.entries.slice(request.offset, request.offset + request.pageSize),
            totalResults: this.options.totalResults ?? this.entries.length,
            fromCache: false,
        };
    }

    offsets(): number[] {
        return this.calls.map((call) => call.offset);
    }
}

/**
 * Largest number of timestamps falling inside any window `[t, t + windowMs)`
 * that starts at one of the timestamps.
 */
export function maxInAnyWindow(times: readonly number[], windowMs: number): number {
    let max = 0;
    for (const start of times) {
        const count = times.filter((t) => t >= start && t < start + windowMs).length;
        max = Math.max(max, count);
    }
    return max;
}
