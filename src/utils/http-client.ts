import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 * Network failures and timeouts are always retried.
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Minimum-interval rate limiter.
 * The clock only moves on success, so failed attempts don't widen the window.
 */
export class RequestThrottle {
    private lastRequestAt = 0;
    readonly minIntervalMs: number;

    constructor(requestsPerSecond: number) {
        this.minIntervalMs = 1000 / requestsPerSecond;
    }

    async wait(): Promise<void> {
        const elapsed = Date.now() - this.lastRequestAt;
        if (elapsed >= this.minIntervalMs) return;

        const waitMs = Math.ceil(this.minIntervalMs - elapsed);
        getLogger().debug({ waitMs }, 'Rate limiting');
        await sleep(waitMs);
    }

    markSuccess(): void {
        this.lastRequestAt = Date.now();
    }
}

/**
 * HTTP client options.
 */
export interface HttpClientOptions {
    /** Per-attempt timeout in ms */
    timeout?: number;
    requestsPerSecond?: number;
    /** Total attempts per request, including the first */
    maxRetries?: number;
    /** Backoff unit; attempt n waits backoffBaseMs * 2^n */
    backoffBaseMs?: number;
    toolName?: string;
    version?: string;
    email?: string;
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
}

/**
 * HTTP response wrapper. E-utilities answers in XML, so the body stays text.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: string;
    ok: boolean;
}

/**
 * Failure of a single attempt. Only network failures, timeouts and the
 * statuses in RETRYABLE_STATUS_CODES are retried; any other HTTP status
 * (400, 404, ...) ends the request on the first attempt.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly retryAfterMs: number | null = null
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Terminal failure of a request, after retries (if any) ran out.
 */
export class RequestError extends Error {
    constructor(
        message: string,
        public readonly attempts: number,
        public readonly status: number | null,
        cause: unknown
    ) {
        super(message, { cause });
        this.name = 'RequestError';
    }
}

/**
 * Rate-limited HTTP client with retry and exponential backoff.
 * Calls on one client run one at a time, in the order they were made.
 */
export class HttpClient {
    private readonly throttle: RequestThrottle;
    private readonly defaultTimeout: number;
    private readonly maxRetries: number;
    private readonly backoffBaseMs: number;
    private readonly userAgent: string;
    private pending: Promise<void> = Promise.resolve();
    private requestCount = 0;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.maxRetries = Math.max(1, options.maxRetries ?? 3);
        this.backoffBaseMs = options.backoffBaseMs ?? 1000;
        this.throttle = new RequestThrottle(options.requestsPerSecond ?? 3);

        const toolName = options.toolName ?? 'get-papers-list';
        const version = options.version ?? '1.0';
        const email = options.email ?? 'unknown@example.com';
        this.userAgent = `${toolName}/${version} (mailto:${email})`;
    }

    /**
     * GET a URL and return its body as text.
     * @throws RequestError once every attempt has failed
     */
    get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const run = this.pending.then(() => this.send(url, options));
        this.pending = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    /**
     * Number of requests issued through this client (not attempts).
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    resetCounts(): void {
        this.requestCount = 0;
    }

    private async send(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
        const logger = getLogger();
        const timeout = options.timeout ?? this.defaultTimeout;
        const headers: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...options.headers,
        };

        await this.throttle.wait();
        this.requestCount += 1;

        let lastError: unknown = null;

        for (let attempt = 0; attempt < this.maxRetries; attempt++) {
            try {
                logger.debug({ url, attempt: attempt + 1 }, 'Making request');
                const response = await this.attempt(url, headers, timeout);
                this.throttle.markSuccess();
                logger.debug({ status: response.status, chars: response.data.length }, 'Response received');
                return response;
            } catch (error) {
                lastError = error;
                const status = error instanceof HttpError ? error.status : null;

                logger.warn(
                    { url, attempt: attempt + 1, maxRetries: this.maxRetries, status, error: describeError(error) },
                    'Request failed'
                );

                if (error instanceof HttpError && !error.retryable) {
                    throw new RequestError(
                        `Request failed after ${attempt + 1} attempt(s): ${error.message}`,
                        attempt + 1,
                        status,
                        error
                    );
                }

                if (attempt < this.maxRetries - 1) {
                    const retryAfter = error instanceof HttpError ? error.retryAfterMs : null;
                    await sleep(retryAfter ?? this.backoffBaseMs * 2 ** attempt);
                }
            }
        }

        throw new RequestError(
            `Request failed after ${this.maxRetries} attempts: ${describeError(lastError)}`,
            this.maxRetries,
            lastError instanceof HttpError ? lastError.status : null,
            lastError
        );
    }

    private async attempt(url: string, headers: Record<string, string>, timeout: number): Promise<HttpResponse> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers,
                signal: controller.signal,
            });

            const data = await response.text();

            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    RETRYABLE_STATUS_CODES.has(response.status),
                    parseRetryAfter(response.headers.get('retry-after'))
                );
            }

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            return { status: response.status, headers: responseHeaders, data, ok: true };
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }
}

function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    // Try parsing as seconds
    const seconds = parseInt(header, 10);
    if (!isNaN(seconds)) return seconds * 1000;

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Shared client instance; the process-wide rate limit lives here.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client. Options only apply on the first call.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
