/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PharmaPapersConfig {
    // Input
    query?: string;
    maxResults: number;
    batchSize: number;

    // NCBI identification
    email?: string;
    apiKey?: string;
    toolName: string;

    // Requests
    maxRetries: number;
    timeoutMs: number;

    // Output
    file?: string;
    stats: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PharmaPapersConfig = {
    maxResults: 10000,
    batchSize: 100,
    toolName: 'get-papers-list',
    maxRetries: 3,
    timeoutMs: 30000,
    stats: false,
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * NCBI allows 3 requests/second anonymously and 10 with an API key.
 */
export function requestsPerSecondFor(apiKey: string | undefined): number {
    return apiKey ? 10 : 3;
}
