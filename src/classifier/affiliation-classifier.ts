import type { Author, Paper } from '../types/index.js';
import vocabularyData from './vocabulary.json' with { type: 'json' };

/**
 * Word lists driving the classifier. All entries are lowercase.
 */
export interface ClassifierVocabulary {
    academicKeywords: readonly string[];
    pharmaBiotechKeywords: readonly string[];
    companySuffixes: readonly string[];
    knownCompanies: readonly string[];
}

export const DEFAULT_VOCABULARY: ClassifierVocabulary = vocabularyData;

const ACADEMIC_PATTERNS: readonly RegExp[] = [
    /\b(dept|department)\s+of\b/,
    /\b(division|div)\s+of\b/,
    /\b(center|centre)\s+for\b/,
    /\b(school|college)\s+of\b/,
    /\buniversity\s+of\b/,
    /\b(research|medical)\s+(center|centre)\b/,
    /\b(teaching|university)\s+hospital\b/,
    /\bmedical\s+school\b/,
];

/** user@dept.example.edu, user@example.ac.uk */
const ACADEMIC_EMAIL = /\S+@\S+\.edu|\S+@\S+\.ac\.\w+/;

/**
 * One way of pulling a company name out of a lowercase affiliation.
 * Returns null to let the next strategy try.
 */
export type NameExtractionStrategy = (affiliation: string) => string | null;

export interface AuthorStatistics {
    totalAuthors: number;
    nonAcademicAuthors: number;
    authorsWithCompanies: number;
    uniqueCompanies: number;
    companies: string[];
}

/**
 * Heuristic academic / non-academic classifier for author affiliations.
 *
 * An affiliation is academic if it mentions an academic keyword, matches one
 * of the structural patterns, or carries an .edu / .ac.* email. Everything
 * else is non-academic, and only then are company names extracted. Missing
 * affiliations count as academic.
 */
export class AffiliationClassifier {
    private readonly vocabulary: ClassifierVocabulary;
    private readonly nameStrategies: readonly NameExtractionStrategy[];

    constructor(vocabulary: ClassifierVocabulary = DEFAULT_VOCABULARY) {
        this.vocabulary = vocabulary;
        this.nameStrategies = [
            suffixStrategy(vocabulary.companySuffixes),
            patternStrategy(/([^,;.]+?)\s+(?:inc\.?|corp\.?|ltd\.?|llc\.?|plc\.?)/),
            patternStrategy(/([^,;.]+?)\s+(?:pharmaceutical|pharma|biotech|biotechnology)/),
            patternStrategy(/([^,;.]+?)\s+(?:therapeutics|bioscience|life sciences)/),
        ];
    }

    /**
     * Classify one author. Returns a new Author; the input is not modified.
     */
    classifyAuthor(author: Author): Author {
        if (!author.affiliation) {
            return { ...author, is_non_academic: false, company_affiliations: [] };
        }

        const isNonAcademic = !this.isAcademicAffiliation(author.affiliation);

        return {
            ...author,
            is_non_academic: isNonAcademic,
            company_affiliations: isNonAcademic ? this.extractCompanies(author.affiliation) : [],
        };
    }

    classifyAuthors(authors: readonly Author[]): Author[] {
        return authors.map((author) => this.classifyAuthor(author));
    }

    classifyPaper(paper: Paper): Paper {
        return { ...paper, authors: this.classifyAuthors(paper.authors) };
    }

    isAcademicAffiliation(affiliation: string): boolean {
        const text = affiliation.toLowerCase();

        if (this.vocabulary.academicKeywords.some((keyword) => text.includes(keyword))) {
            return true;
        }

        if (ACADEMIC_EMAIL.test(text)) {
            return true;
        }

        return ACADEMIC_PATTERNS.some((pattern) => pattern.test(text));
    }

    /**
     * Known company names found in the text, title-cased, followed by one
     * heuristically extracted name when the text has a pharma/biotech term.
     */
    extractCompanies(affiliation: string): string[] {
        const text = affiliation.toLowerCase();
        const companies: string[] = [];

        for (const company of this.vocabulary.knownCompanies) {
            if (text.includes(company)) {
                companies.push(toTitleCase(company));
            }
        }

        if (this.vocabulary.pharmaBiotechKeywords.some((keyword) => text.includes(keyword))) {
            const name = this.extractCompanyName(text);
            if (name && !companies.some((company) => company.toLowerCase() === name)) {
                companies.push(toTitleCase(name));
            }
        }

        return companies;
    }

    /**
     * Run the extraction strategies in order; first hit wins.
     * @returns lowercase candidate name, or null
     */
    extractCompanyName(affiliation: string): string | null {
        const text = affiliation.toLowerCase();
        for (const strategy of this.nameStrategies) {
            const name = strategy(text);
            if (name) return name;
        }
        return null;
    }

    getStatistics(authors: readonly Author[]): AuthorStatistics {
        const companies = new Set<string>();
        for (const author of authors) {
            for (const company of author.company_affiliations) {
                companies.add(company);
            }
        }

        return {
            totalAuthors: authors.length,
            nonAcademicAuthors: authors.filter((a) => a.is_non_academic).length,
            authorsWithCompanies: authors.filter((a) => a.company_affiliations.length > 0).length,
            uniqueCompanies: companies.size,
            companies: [...companies],
        };
    }
}

// ─── Name extraction strategies ──────────────────────────

/**
 * Words before a legal-entity suffix: "acme therapeutics inc, boston" → "acme therapeutics".
 * Suffixes are tried in vocabulary order and must end on a word boundary.
 */
function suffixStrategy(suffixes: readonly string[]): NameExtractionStrategy {
    const patterns = suffixes.map((suffix) => ({
        suffix,
        pattern: new RegExp(`([^,;.]+?)\\s+${escapeRegExp(suffix)}(?![\\p{L}\\p{N}])`, 'u'),
    }));

    return (affiliation) => {
        for (const { suffix, pattern } of patterns) {
            if (!affiliation.includes(suffix)) continue;
            const name = cleanCandidate(affiliation.match(pattern)?.[1]);
            if (name) return name;
        }
        return null;
    };
}

function patternStrategy(pattern: RegExp): NameExtractionStrategy {
    return (affiliation) => cleanCandidate(affiliation.match(pattern)?.[1]);
}

/**
 * Trim surrounding non-word characters; reject anything of 3 chars or fewer.
 */
function cleanCandidate(raw: string | undefined): string | null {
    if (!raw) return null;
    const name = raw.trim().replace(/^[^\p{L}\p{N}_]+|[^\p{L}\p{N}_]+$/gu, '');
    return name.length > 3 ? name : null;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Capitalise the first letter of every run of letters.
 * "johnson & johnson" → "Johnson & Johnson", "car-t" → "Car-T"
 */
export function toTitleCase(value: string): string {
    return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
