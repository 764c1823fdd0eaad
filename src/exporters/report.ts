import type { AffiliationClassifier } from '../classifier/affiliation-classifier.js';
import type { Paper } from '../types/index.js';
import { getCompanyAffiliations, getNonAcademicAuthors } from '../utils/papers.js';
import { filterNonAcademicPapers } from './csv-export.js';

export interface PaperStatistics {
    totalPapers: number;
    papersWithNonAcademicAuthors: number;
    /** 0..1 */
    filterRate: number;
    companies: string[];
    uniqueNonAcademicAuthors: number;
}

const TOP_COMPANIES = 10;

export function getPaperStatistics(papers: readonly Paper[]): PaperStatistics {
    const filtered = filterNonAcademicPapers(papers);
    const companies = new Set<string>();
    const authorNames = new Set<string>();

    for (const paper of filtered) {
        for (const company of getCompanyAffiliations(paper)) {
            companies.add(company);
        }
        for (const author of getNonAcademicAuthors(paper)) {
            authorNames.add(`${author.first_name ?? ''} ${author.last_name}`.trim());
        }
    }

    return {
        totalPapers: papers.length,
        papersWithNonAcademicAuthors: filtered.length,
        filterRate: papers.length > 0 ? filtered.length / papers.length : 0,
        companies: [...companies],
        uniqueNonAcademicAuthors: authorNames.size,
    };
}

/**
 * Plain-text statistics block printed by `--stats`.
 * `papers` must already be classified.
 */
export function renderStatistics(papers: readonly Paper[], classifier: AffiliationClassifier): string {
    const stats = getPaperStatistics(papers);
    const rule = '='.repeat(50);
    const lines: string[] = [
        '',
        rule,
        'SEARCH AND CLASSIFICATION STATISTICS',
        rule,
        `Total papers retrieved: ${stats.totalPapers}`,
        `Papers with pharma/biotech authors: ${stats.papersWithNonAcademicAuthors}`,
        `Filter rate: ${(stats.filterRate * 100).toFixed(1)}%`,
        `Unique companies identified: ${stats.companies.length}`,
        `Unique non-academic authors: ${stats.uniqueNonAcademicAuthors}`,
    ];

    if (stats.companies.length > 0) {
        lines.push('', 'Top companies found:');
        const sorted = [...stats.companies].sort();
        sorted.slice(0, TOP_COMPANIES).forEach((company, i) => {
            lines.push(`  ${i + 1}. ${company}`);
        });
        if (sorted.length > TOP_COMPANIES) {
            lines.push(`  ... and ${sorted.length - TOP_COMPANIES} more`);
        }
    }

    const authors = papers.flatMap((paper) => paper.authors);
    if (authors.length > 0) {
        const authorStats = classifier.getStatistics(authors);
        lines.push(
            '',
            'Author classification:',
            `  Total authors: ${authorStats.totalAuthors}`,
            `  Non-academic authors: ${authorStats.nonAcademicAuthors}`,
            `  Authors with company affiliations: ${authorStats.authorsWithCompanies}`
        );
    }

    lines.push(rule);
    return lines.join('\n') + '\n';
}
