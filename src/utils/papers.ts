import type { Author, Paper } from '../types/index.js';

export function getNonAcademicAuthors(paper: Paper): Author[] {
    return paper.authors.filter((author) => author.is_non_academic);
}

/**
 * Unique company names across all authors, in first-seen order.
 */
export function getCompanyAffiliations(paper: Paper): string[] {
    const companies = new Set<string>();
    for (const author of paper.authors) {
        for (const company of author.company_affiliations) {
            companies.add(company);
        }
    }
    return [...companies];
}

/**
 * Email of the first author flagged as corresponding.
 * Nothing sets that flag yet, so this is null for parsed papers.
 */
export function getCorrespondingAuthorEmail(paper: Paper): string | null {
    return paper.authors.find((author) => author.is_corresponding && author.email)?.email ?? null;
}

/**
 * "First Last", or "Last Initials" when there is no first name.
 */
export function formatAuthorName(author: Author): string {
    const parts: string[] = [];
    if (author.first_name) parts.push(author.first_name);
    if (author.last_name) parts.push(author.last_name);
    if (author.initials && !author.first_name) parts.push(author.initials);
    return parts.join(' ');
}
