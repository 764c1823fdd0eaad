import { describe, it, expect, vi, afterEach, type Mock } from 'vitest';
import { HttpClient, HttpError, RequestError, RequestThrottle, createHttpClient } from '../utils/http-client.js';

type FetchMock = Mock<(url: string, init?: RequestInit) => Promise<Response>>;

function stubFetch(handler: (url: string, init?: RequestInit) => Promise<Response>): FetchMock {
    const mockFetch = vi.fn(handler);
    vi.stubGlobal('fetch', mockFetch);
    return mockFetch;
}

describe('HttpClient', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('HttpError', () => {
        it('should carry status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.retryAfterMs).toBeNull();
            expect(error.name).toBe('HttpError');
        });
    });

    describe('requests', () => {
        it('should return the body as text and send the tool User-Agent', async () => {
            const mockFetch = stubFetch(async () => new Response('<ok/>', { status: 200 }));
            const client = createHttpClient({ toolName: 'test-tool', email: 'dev@example.org', requestsPerSecond: 1000 });

            const response = await client.get('https://api.example.com/a');

            expect(response.ok).toBe(true);
            expect(response.status).toBe(200);
            expect(response.data).toBe('<ok/>');
            expect(mockFetch.mock.calls[0]?.[1]?.headers).toEqual({
                'User-Agent': 'test-tool/1.0 (mailto:dev@example.org)',
            });
            expect(client.getRequestCount()).toBe(1);
        });

        it('should retry a transient status and then succeed', async () => {
            let calls = 0;
            const mockFetch = stubFetch(async () => {
                calls += 1;
                return calls === 1
                    ? new Response('busy', { status: 503, statusText: 'Service Unavailable' })
                    : new Response('done', { status: 200 });
            });
            const client = new HttpClient({ requestsPerSecond: 1000, backoffBaseMs: 1 });

            const response = await client.get('https://api.example.com/b');

            expect(response.data).toBe('done');
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(client.getRequestCount()).toBe(1);
        });

        it('should give up after maxRetries attempts on network errors', async () => {
            const mockFetch = stubFetch(async () => {
                throw new TypeError('fetch failed');
            });
            const client = new HttpClient({ requestsPerSecond: 1000, backoffBaseMs: 1, maxRetries: 3 });

            const error = await client.get('https://api.example.com/c').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RequestError);
            expect(error).toMatchObject({
                message: 'Request failed after 3 attempts: fetch failed',
                attempts: 3,
                status: null,
            });
            expect(mockFetch).toHaveBeenCalledTimes(3);
        });

        it('should not retry a non-retryable status', async () => {
            const mockFetch = stubFetch(async () => new Response('', { status: 404, statusText: 'Not Found' }));
            const client = new HttpClient({ requestsPerSecond: 1000, backoffBaseMs: 1 });

            const error = await client.get('https://api.example.com/d').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RequestError);
            expect(error).toMatchObject({
                message: 'Request failed after 1 attempt(s): HTTP 404: Not Found',
                attempts: 1,
                status: 404,
            });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should turn an aborted attempt into a timeout error', async () => {
            stubFetch(
                (_url, init) =>
                    new Promise<Response>((_resolve, reject) => {
                        init?.signal?.addEventListener('abort', () => {
                            const abort = new Error('This operation was aborted');
                            abort.name = 'AbortError';
                            reject(abort);
                        });
                    })
            );
            const client = new HttpClient({ requestsPerSecond: 1000, timeout: 20, maxRetries: 1 });

            const error = await client.get('https://api.example.com/slow').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RequestError);
            expect(error).toMatchObject({
                message: 'Request failed after 1 attempts: Request timeout after 20ms: https://api.example.com/slow',
                status: 0,
            });
        });
    });

    describe('rate limiting', () => {
        it('should space requests by the minimum interval', async () => {
            stubFetch(async () => new Response('ok', { status: 200 }));
            const client = new HttpClient({ requestsPerSecond: 10 });

            const start = Date.now();
            await Promise.all([
                client.get('https://api.example.com/1'),
                client.get('https://api.example.com/2'),
                client.get('https://api.example.com/3'),
                client.get('https://api.example.com/4'),
            ]);
            const elapsed = Date.now() - start;

            // First request goes immediately, the other three wait ~100ms each
            expect(elapsed).toBeGreaterThanOrEqual(290);
            expect(client.getRequestCount()).toBe(4);
        });

        it('should only advance the throttle on success', async () => {
            stubFetch(async (url) =>
                url.endsWith('/missing')
                    ? new Response('', { status: 404, statusText: 'Not Found' })
                    : new Response('ok', { status: 200 })
            );
            const client = new HttpClient({ requestsPerSecond: 2 });

            const start = Date.now();
            await client.get('https://api.example.com/first');
            await expect(client.get('https://api.example.com/missing')).rejects.toBeInstanceOf(RequestError);
            await client.get('https://api.example.com/third');
            const elapsed = Date.now() - start;

            expect(elapsed).toBeGreaterThanOrEqual(490);
            expect(elapsed).toBeLessThan(900);
        });

        it('should compute the interval from the rate', () => {
            expect(new RequestThrottle(3).minIntervalMs).toBeCloseTo(333.33, 1);
            expect(new RequestThrottle(10).minIntervalMs).toBe(100);
        });
    });

    describe('request counting', () => {
        it('should reset counts', async () => {
            stubFetch(async () => new Response('ok', { status: 200 }));
            const client = new HttpClient({ requestsPerSecond: 1000 });

            await client.get('https://api.example.com/x');
            client.resetCounts();

            expect(client.getRequestCount()).toBe(0);
        });
    });
});
