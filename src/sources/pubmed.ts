import type {
    LiteratureSource,
    LiteratureSourceOptions,
    Paper,
    RetrievalResponse,
    SearchOutcome,
    SearchResult,
} from '../types/index.js';
import { describeError, getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { MissingSessionError, RetrievalError } from './errors.js';
import { buildIdFetchUrl, buildSearchUrl, buildSessionFetchUrl, type EutilsIdentity } from './eutils-urls.js';
import { parsePapersXml, parseSearchXml } from './pubmed-parser.js';

/**
 * Result sets up to this size are fetched with one explicit-id request.
 * Fresh WebEnv handles for tiny result sets are sometimes not yet usable.
 */
export const DIRECT_FETCH_THRESHOLD = 50;

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_MAX_RESULTS = 10000;

/**
 * PubMed source backed by NCBI E-utilities (esearch + efetch).
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25499/
 */
export class PubMedSource implements LiteratureSource {
    readonly name = 'PubMed';
    private httpClient: HttpClient;
    private readonly identity: EutilsIdentity;
    private readonly batchSize: number;

    constructor(options?: LiteratureSourceOptions) {
        this.identity = {
            tool: options?.toolName ?? 'get-papers-list',
            email: options?.email,
            apiKey: options?.apiKey,
        };
        this.batchSize = options?.batchSize ?? DEFAULT_BATCH_SIZE;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async search(query: string, maxResults = DEFAULT_MAX_RESULTS): Promise<SearchOutcome> {
        const logger = getLogger();
        logger.info({ query }, 'Searching PubMed');

        try {
            const url = buildSearchUrl(query, { retmax: maxResults, retstart: 0 }, this.identity);
            const response = await this.httpClient.get(url);
            const result = parseSearchXml(response.data, query);

            logger.info(
                { totalResults: result.total_results, ids: result.pubmed_ids.length, session: result.session !== null },
                'Search complete'
            );
            return { ok: true, result };
        } catch (error) {
            const message = describeError(error);
            logger.error({ query, error: message }, 'Search failed');
            return {
                ok: false,
                error: message,
                result: { query, total_results: 0, pubmed_ids: [], session: null },
            };
        }
    }

    async fetchPapers(searchResult: SearchResult, batchSize = this.batchSize): Promise<RetrievalResponse> {
        const logger = getLogger();
        const totalToFetch = searchResult.pubmed_ids.length;

        if (totalToFetch === 0) {
            return { success: true, papers: [], error_message: null, total_count: 0, retrieved_count: 0 };
        }

        logger.info({ totalToFetch, batchSize }, 'Fetching papers');

        let papers: Paper[];
        try {
            papers =
                totalToFetch <= DIRECT_FETCH_THRESHOLD
                    ? await this.fetchByIds(searchResult.pubmed_ids)
                    : await this.fetchBySession(searchResult, batchSize);
        } catch (error) {
            const message =
                error instanceof RetrievalError ? error.message : `Failed to fetch papers: ${describeError(error)}`;
            logger.error({ error: message }, 'Fetch failed');
            return { success: false, papers: [], error_message: message, total_count: totalToFetch, retrieved_count: 0 };
        }

        logger.info({ retrieved: papers.length, requested: totalToFetch }, 'Fetch complete');

        return {
            success: true,
            papers,
            error_message: null,
            total_count: totalToFetch,
            retrieved_count: papers.length,
        };
    }

    async searchAndFetch(query: string, maxResults = DEFAULT_MAX_RESULTS): Promise<RetrievalResponse> {
        const logger = getLogger();
        const outcome = await this.search(query, maxResults);

        if (!outcome.ok) {
            logger.warn({ query, error: outcome.error }, 'Search failed; treating as no results');
        }

        const searchResult = outcome.result;
        if (searchResult.total_results === 0) {
            return { success: true, papers: [], error_message: null, total_count: 0, retrieved_count: 0 };
        }

        // total_results is kept as reported; only the id list is capped
        if (searchResult.pubmed_ids.length > maxResults) {
            logger.info({ maxResults, returned: searchResult.pubmed_ids.length }, 'Limiting fetch to requested maximum');
            return this.fetchPapers({ ...searchResult, pubmed_ids: searchResult.pubmed_ids.slice(0, maxResults) });
        }

        return this.fetchPapers(searchResult);
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchByIds(pubmedIds: string[]): Promise<Paper[]> {
        getLogger().debug({ count: pubmedIds.length }, 'Using direct id fetch for small result set');

        const response = await this.httpClient.get(buildIdFetchUrl(pubmedIds, this.identity));
        return parsePapersXml(response.data);
    }

    /**
     * Page through the stored result set. A failed batch is logged and
     * skipped, leaving a gap rather than failing the whole fetch.
     */
    private async fetchBySession(searchResult: SearchResult, batchSize: number): Promise<Paper[]> {
        const logger = getLogger();
        const total = searchResult.pubmed_ids.length;
        const session = searchResult.session;

        if (!session) {
            throw new MissingSessionError(total);
        }
        if (!Number.isInteger(batchSize) || batchSize < 1) {
            throw new RetrievalError(`Batch size must be a positive integer, got ${batchSize}`);
        }

        const papers: Paper[] = [];
        for (let start = 0; start < total; start += batchSize) {
            const size = Math.min(batchSize, total - start);

            try {
                logger.debug({ start, size }, 'Fetching batch');
                const url = buildSessionFetchUrl(session, { retmax: size, retstart: start }, this.identity);
                const response = await this.httpClient.get(url);
                const batch = parsePapersXml(response.data);
                papers.push(...batch);
                logger.debug({ start, retrieved: batch.length }, 'Batch complete');
            } catch (error) {
                logger.error({ start, size, error: describeError(error) }, 'Failed to fetch batch; skipping');
            }
        }

        return papers;
    }
}
