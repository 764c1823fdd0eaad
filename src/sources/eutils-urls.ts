import type { SessionHandle } from '../types/index.js';

export const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/**
 * Identification sent with every E-utilities call.
 */
export interface EutilsIdentity {
    tool: string;
    email?: string;
    apiKey?: string;
}

/**
 * Paging window for search and session fetches.
 */
export interface PageWindow {
    retmax: number;
    retstart: number;
}

/**
 * esearch URL: query → ids, with the result set kept on the server.
 */
export function buildSearchUrl(query: string, window: PageWindow, identity: EutilsIdentity): string {
    const params = new URLSearchParams({
        db: 'pubmed',
        term: query,
        retmax: String(window.retmax),
        retstart: String(window.retstart),
        usehistory: 'y',
        retmode: 'xml',
    });

    addIdentityParams(params, identity);
    return `${EUTILS_BASE}/esearch.fcgi?${params.toString()}`;
}

/**
 * efetch URL for one page of a stored result set.
 */
export function buildSessionFetchUrl(session: SessionHandle, window: PageWindow, identity: EutilsIdentity): string {
    const params = new URLSearchParams({
        db: 'pubmed',
        WebEnv: session.webEnv,
        query_key: session.queryKey,
        retmax: String(window.retmax),
        retstart: String(window.retstart),
        retmode: 'xml',
    });

    addIdentityParams(params, identity);
    return `${EUTILS_BASE}/efetch.fcgi?${params.toString()}`;
}

/**
 * efetch URL naming the ids directly; no session involved.
 */
export function buildIdFetchUrl(pubmedIds: readonly string[], identity: EutilsIdentity): string {
    const params = new URLSearchParams({
        db: 'pubmed',
        id: pubmedIds.join(','),
        retmode: 'xml',
    });

    addIdentityParams(params, identity);
    return `${EUTILS_BASE}/efetch.fcgi?${params.toString()}`;
}

function addIdentityParams(params: URLSearchParams, identity: EutilsIdentity): void {
    params.set('tool', identity.tool);
    if (identity.email) {
        params.set('email', identity.email);
    }
    if (identity.apiKey) {
        params.set('api_key', identity.apiKey);
    }
}
