/**
 * Barrel export for all shared types.
 */
export type {
    Author,
    Journal,
    Paper,
    SessionHandle,
    SearchResult,
    SearchOutcome,
    RetrievalResponse,
} from './paper.js';
export { DEFAULT_CONFIG, requestsPerSecondFor } from './config.js';
export type { PharmaPapersConfig, LogLevel } from './config.js';
export type { LiteratureSource, LiteratureSourceOptions } from './literature-source.js';
