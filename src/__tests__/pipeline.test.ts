import { describe, it, expect } from 'vitest';
import { AffiliationClassifier } from '../classifier/affiliation-classifier.js';
import { processPapers, runPipeline } from '../pipeline/paper-pipeline.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { Author, LiteratureSource, Paper, RetrievalResponse, SearchOutcome } from '../types/index.js';

function makeAuthor(affiliation: string | null): Author {
    return {
        first_name: 'Jane',
        last_name: 'Doe',
        initials: 'J',
        affiliation,
        email: null,
        is_corresponding: false,
        is_non_academic: false,
        company_affiliations: [],
    };
}

function makePaper(pubmedId: string, affiliations: (string | null)[]): Paper {
    return {
        pubmed_id: pubmedId,
        title: `Paper ${pubmedId}`,
        publication_date: null,
        authors: affiliations.map(makeAuthor),
        journal: { title: null, issn: null, volume: null, issue: null, pages: null },
        abstract: null,
        doi: null,
        pmc_id: null,
    };
}

/**
 * In-memory source that records how it was called.
 */
class FakeSource implements LiteratureSource {
    readonly name = 'Fake';
    readonly calls: { query: string; maxResults?: number }[] = [];

    constructor(private readonly response: RetrievalResponse) {}

    async search(query: string): Promise<SearchOutcome> {
        return { ok: true, result: { query, total_results: 0, pubmed_ids: [], session: null } };
    }

    async fetchPapers(): Promise<RetrievalResponse> {
        return this.response;
    }

    async searchAndFetch(query: string, maxResults?: number): Promise<RetrievalResponse> {
        this.calls.push({ query, maxResults });
        return this.response;
    }
}

const papers = [
    makePaper('1', ['Pfizer Inc, New York, NY, USA', 'University of Oslo, Norway']),
    makePaper('2', ['Department of Medicine, University of Example']),
    makePaper('3', [null]),
];

describe('processPapers', () => {
    it('should classify every paper and filter to those with industry authors', () => {
        const result = processPapers(papers, new AffiliationClassifier());

        expect(result.papers).toHaveLength(3);
        expect(result.filtered.map((p) => p.pubmed_id)).toEqual(['1']);
        expect(result.filtered[0]?.authors[0]?.company_affiliations).toEqual(['Pfizer']);
    });
});

describe('runPipeline', () => {
    it('should search with the configured query and limit', async () => {
        const source = new FakeSource({
            success: true,
            papers,
            error_message: null,
            total_count: 3,
            retrieved_count: 3,
        });

        const result = await runPipeline({ ...DEFAULT_CONFIG, query: 'kinase', maxResults: 7 }, source);

        expect(source.calls).toEqual([{ query: 'kinase', maxResults: 7 }]);
        expect(result.response.success).toBe(true);
        expect(result.papers).toHaveLength(3);
        expect(result.filtered.map((p) => p.pubmed_id)).toEqual(['1']);
    });

    it('should return empty lists when retrieval failed', async () => {
        const source = new FakeSource({
            success: false,
            papers: [],
            error_message: 'Failed to fetch papers: boom',
            total_count: 3,
            retrieved_count: 0,
        });

        const result = await runPipeline({ ...DEFAULT_CONFIG, query: 'kinase' }, source);

        expect(result.response.error_message).toBe('Failed to fetch papers: boom');
        expect(result.papers).toEqual([]);
        expect(result.filtered).toEqual([]);
    });

    it('should require a query', async () => {
        const source = new FakeSource({
            success: true,
            papers: [],
            error_message: null,
            total_count: 0,
            retrieved_count: 0,
        });

        await expect(runPipeline(DEFAULT_CONFIG, source)).rejects.toThrow('A search query is required');
    });
});
