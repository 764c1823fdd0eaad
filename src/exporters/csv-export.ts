import { writeFileSync } from 'node:fs';
import type { Paper } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import {
    formatAuthorName,
    getCompanyAffiliations,
    getCorrespondingAuthorEmail,
    getNonAcademicAuthors,
} from '../utils/papers.js';

export const CSV_COLUMNS = [
    'PubmedID',
    'Title',
    'Publication Date',
    'Non-academic Author(s)',
    'Company Affiliation(s)',
    'Corresponding Author Email',
] as const;

/**
 * Papers with at least one non-academic author.
 */
export function filterNonAcademicPapers(papers: readonly Paper[]): Paper[] {
    return papers.filter((paper) => getNonAcademicAuthors(paper).length > 0);
}

/**
 * Serialize papers as CSV. Papers without a non-academic author are skipped.
 */
export function formatPapersCsv(papers: readonly Paper[]): string {
    let csv = CSV_COLUMNS.map(escapeCsvField).join(',') + '\n';

    for (const paper of filterNonAcademicPapers(papers)) {
        const authorNames = getNonAcademicAuthors(paper)
            .map(formatAuthorName)
            .filter((name) => name.length > 0);

        csv += [
            paper.pubmed_id,
            paper.title,
            paper.publication_date ?? '',
            authorNames.join('; '),
            getCompanyAffiliations(paper).join('; '),
            getCorrespondingAuthorEmail(paper) ?? '',
        ].map(escapeCsvField).join(',') + '\n';
    }

    return csv;
}

/**
 * Write the CSV to a file.
 */
export function savePapersCsv(papers: readonly Paper[], outputPath: string): void {
    writeFileSync(outputPath, formatPapersCsv(papers), 'utf-8');
    getLogger().info({ outputPath }, 'Export complete');
}

export function escapeCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}
