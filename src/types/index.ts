/**
 * Barrel export for all shared types.
 */
export type { Entry, PageRequest, SearchPage, SearchResult } from './entry.js';
export { createPageRequest } from './entry.js';
export type { Study, MatchStatus, MatchResult, EvaluationReport, Citation } from './study.js';
export { DEFAULT_CONFIG } from './config.js';
export type { SlrSearchConfig, LogLevel, RetryConfig, EvaluationConfig } from './config.js';
export type { Credential, SearchService, SearchServiceOptions } from './search-service.js';
