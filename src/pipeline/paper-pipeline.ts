import { AffiliationClassifier } from '../classifier/affiliation-classifier.js';
import { PubMedSource } from '../sources/pubmed.js';
import type { LiteratureSource, Paper, PharmaPapersConfig, RetrievalResponse } from '../types/index.js';
import { requestsPerSecondFor } from '../types/index.js';
import { getHttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { filterNonAcademicPapers } from '../exporters/csv-export.js';

export interface PipelineResult {
    response: RetrievalResponse;
    /** Every retrieved paper, with classified authors */
    papers: Paper[];
    /** Papers with at least one non-academic author */
    filtered: Paper[];
}

/**
 * Build the PubMed source, configuring the shared rate-limited client first.
 */
export function createSource(config: PharmaPapersConfig): PubMedSource {
    getHttpClient({
        timeout: config.timeoutMs,
        requestsPerSecond: requestsPerSecondFor(config.apiKey),
        maxRetries: config.maxRetries,
        toolName: config.toolName,
        email: config.email,
    });

    return new PubMedSource({
        apiKey: config.apiKey,
        email: config.email,
        toolName: config.toolName,
        batchSize: config.batchSize,
    });
}

/**
 * Classify every author, then keep papers with a non-academic author.
 */
export function processPapers(
    papers: readonly Paper[],
    classifier: AffiliationClassifier
): { papers: Paper[]; filtered: Paper[] } {
    const logger = getLogger();
    logger.info({ count: papers.length }, 'Classifying authors');

    const classified = papers.map((paper, i) => {
        if (i % 100 === 0) {
            logger.debug({ index: i + 1, total: papers.length, title: paper.title.slice(0, 50) }, 'Processing paper');
        }
        return classifier.classifyPaper(paper);
    });

    const filtered = filterNonAcademicPapers(classified);
    logger.info({ count: filtered.length }, 'Papers with non-academic authors');

    return { papers: classified, filtered };
}

/**
 * Full pipeline:
 *
 * 1. Search + fetch from PubMed
 * 2. Classify author affiliations
 * 3. Filter to papers with non-academic authors
 */
export async function runPipeline(
    config: PharmaPapersConfig,
    source: LiteratureSource = createSource(config),
    classifier: AffiliationClassifier = new AffiliationClassifier()
): Promise<PipelineResult> {
    if (!config.query) {
        throw new Error('A search query is required');
    }

    const logger = getLogger();
    logger.info({ query: config.query, maxResults: config.maxResults, source: source.name }, 'Starting search');

    const response = await source.searchAndFetch(config.query, config.maxResults);
    if (!response.success) {
        return { response, papers: [], filtered: [] };
    }

    logger.info({ retrieved: response.papers.length, maxResults: config.maxResults }, 'Retrieved papers');

    const { papers, filtered } = processPapers(response.papers, classifier);
    return { response, papers, filtered };
}
