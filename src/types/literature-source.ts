import type { RetrievalResponse, SearchOutcome, SearchResult } from './paper.js';

/**
 * Interface for bibliographic sources that search, then fetch full records.
 */
export interface LiteratureSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Run a query and collect matching ids plus any session handle.
     * Never rejects: failures come back as `{ ok: false }`.
     */
    search(query: string, maxResults?: number): Promise<SearchOutcome>;

    /**
     * Fetch and parse the records behind a search result.
     * @param batchSize - Records per request when paging through a session
     */
    fetchPapers(searchResult: SearchResult, batchSize?: number): Promise<RetrievalResponse>;

    /**
     * Search, cap the id list at `maxResults`, then fetch.
     */
    searchAndFetch(query: string, maxResults?: number): Promise<RetrievalResponse>;
}

/**
 * Options for source initialization.
 */
export interface LiteratureSourceOptions {
    /** NCBI API key (raises the rate limit) */
    apiKey?: string;

    /** Contact email sent with every request */
    email?: string;

    /** Tool name sent with every request */
    toolName?: string;

    /** Records per efetch request for large result sets */
    batchSize?: number;
}
