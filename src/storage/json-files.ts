import { readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import type { Citation, SearchResult, Study } from '../types/index.js';

/**
 * Study files are JSON arrays. A missing title is allowed here: the
 * evaluation engine reports such studies individually.
 */
const StudySchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    title: z.string().nullish(),
    abstract: z.string().nullish(),
    keywords: z.array(z.string()).optional(),
});

const CitationSchema = z.object({
    from: z.union([z.string(), z.number()]).transform(String),
    to: z.union([z.string(), z.number()]).transform(String),
});

const EntrySchema = z.object({
    id: z.string(),
    title: z.string(),
    doi: z.string().nullable().default(null),
    date: z.string().nullable().default(null),
});

const SearchResultSchema = z.object({
    query: z.string(),
    fingerprint: z.string(),
    totalResults: z.number().int().nonnegative(),
    truncated: z.boolean(),
    entries: z.array(EntrySchema),
});

function readJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid ${label} file ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape'}`);
    }
    return parsed.data;
}

export function loadStudies(path: string): Study[] {
    return readJson(path, z.array(StudySchema), 'study');
}

export function loadCitations(path: string): Citation[] {
    return readJson(path, z.array(CitationSchema), 'citation');
}

export function loadSearchResult(path: string): SearchResult {
    return readJson(path, SearchResultSchema, 'search result');
}

export function saveSearchResult(path: string, result: SearchResult): void {
    writeFileSync(path, JSON.stringify(result, null, 2), 'utf-8');
}
