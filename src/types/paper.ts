/**
 * Author of a paper, as parsed from a PubMed record.
 * The classification fields are filled in by the affiliation classifier.
 */
export interface Author {
    first_name: string | null;

    /** Empty string when the record has no LastName */
    last_name: string;

    initials: string | null;

    /** Raw affiliation text (first AffiliationInfo only) */
    affiliation: string | null;

    /** First email address found in the affiliation text */
    email: string | null;

    /** Never set by the parser; see DESIGN.md */
    is_corresponding: boolean;

    is_non_academic: boolean;

    company_affiliations: string[];
}

/**
 * Journal metadata for a paper.
 */
export interface Journal {
    title: string | null;
    issn: string | null;
    volume: string | null;
    issue: string | null;
    /** MedlinePgn page range, e.g. "101-9" */
    pages: string | null;
}

/**
 * Paper record normalized from a PubmedArticle element.
 */
export interface Paper {
    pubmed_id: string;

    title: string;

    /**
     * ISO date (YYYY-MM-DD). Month and day default to 1 when the source
     * only gives a year; null when there is no year at all.
     */
    publication_date: string | null;

    /** In the order the record lists them */
    authors: Author[];

    journal: Journal;

    abstract: string | null;

    /** DOI without any https://doi.org/ prefix */
    doi: string | null;

    /** PubMed Central id, always starting with "PMC" */
    pmc_id: string | null;
}

/**
 * Session handle issued by esearch when history retention is requested.
 */
export interface SessionHandle {
    webEnv: string;
    queryKey: string;
}

/**
 * Result of an esearch call.
 */
export interface SearchResult {
    query: string;

    /** Server-reported match count; may exceed ids.length */
    total_results: number;

    pubmed_ids: string[];

    session: SessionHandle | null;
}

/**
 * A search either succeeds or degrades to an empty result.
 * Callers must look at `ok` to tell "no matches" from "search failed".
 */
export type SearchOutcome =
    | { ok: true; result: SearchResult }
    | { ok: false; result: SearchResult; error: string };

/**
 * Summary of a search-and-fetch run.
 * `success === false` always comes with an empty paper list.
 */
export interface RetrievalResponse {
    success: boolean;
    papers: Paper[];
    error_message: string | null;
    /** Number of ids the fetch step attempted */
    total_count: number;
    retrieved_count: number;
}
