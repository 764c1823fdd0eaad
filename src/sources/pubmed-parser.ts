import { XMLParser } from 'fast-xml-parser';
import type { Author, Journal, Paper, SearchResult } from '../types/index.js';
import { describeError } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { RetrievalError } from './errors.js';
import { extractEmail, parseMonth, stripDoiPrefix, toIsoDate } from './utils.js';

/**
 * Tags that may repeat under their parent. Forcing them to arrays keeps
 * single-author and multi-author records the same shape.
 */
const ARRAY_TAGS = new Set([
    'PubmedArticle',
    'Author',
    'AffiliationInfo',
    'AbstractText',
    'ELocationID',
    'OtherID',
    'ArticleId',
    'Id',
]);

/**
 * Free-text elements that may hold inline markup (<i>, <sup>, <sub>).
 * They are kept raw and flattened by `markupText`.
 */
const MARKUP_TAGS = ['ArticleTitle', 'AbstractText', 'Affiliation'];

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    htmlEntities: true,
    stopNodes: MARKUP_TAGS.map((tag) => `*.${tag}`),
    isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && ARRAY_TAGS.has(tagName),
});

/** Decodes entities left in raw stop-node content. */
const entityParser = new XMLParser({
    parseTagValue: false,
    trimValues: false,
    htmlEntities: true,
});

// ─── XML tree helpers ────────────────────────────────────

type XmlNode = { [key: string]: unknown };

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First element named `key` under `node`. */
function child(node: XmlNode | undefined, key: string): XmlNode | undefined {
    const value = node?.[key];
    const first = Array.isArray(value) ? value[0] : value;
    return isNode(first) ? first : undefined;
}

/** Every element named `key` under `node`. */
function children(node: XmlNode | undefined, key: string): unknown[] {
    const value = node?.[key];
    if (value === undefined) return [];
    return Array.isArray(value) ? value : [value];
}

/** Text content of an element, or null when it is empty or missing. */
function text(value: unknown): string | null {
    if (Array.isArray(value)) return text(value[0]);
    if (typeof value === 'string') return value.trim() || null;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (isNode(value)) return text(value['#text']);
    return null;
}

/**
 * Text of a raw markup element: inline tags dropped, their text kept,
 * entities decoded. "Effect of <i>E. coli</i>" → "Effect of E. coli"
 */
function markupText(value: unknown): string | null {
    const raw = text(value);
    if (!raw) return null;

    const plain = raw.replace(/<[^>]*>/g, '');
    if (!plain.includes('&')) return plain.trim() || null;

    const decoded: unknown = entityParser.parse(`<text>${plain}</text>`);
    const result = isNode(decoded) ? decoded['text'] : undefined;
    return typeof result === 'string' ? result.trim() || null : null;
}

function attr(value: unknown, name: string): string | null {
    return isNode(value) ? text(value[`@_${name}`]) : null;
}

function parseDocument(xml: string): unknown {
    return parser.parse(xml, true);
}

// ─── esearch ─────────────────────────────────────────────

/**
 * Parse an esearch response into a SearchResult.
 * @throws RetrievalError when the document is not a usable esearch result
 */
export function parseSearchXml(xml: string, query: string): SearchResult {
    let document: unknown;
    try {
        document = parseDocument(xml);
    } catch (error) {
        throw new RetrievalError(`Malformed esearch response: ${describeError(error)}`);
    }

    const root = isNode(document) ? child(document, 'eSearchResult') : undefined;
    if (!root) {
        throw new RetrievalError('esearch response has no eSearchResult element');
    }

    const serverError = text(root['ERROR']);
    if (serverError) {
        throw new RetrievalError(`esearch error: ${serverError}`);
    }

    const countText = text(root['Count']);
    const totalResults = countText && /^\d+$/.test(countText) ? parseInt(countText, 10) : 0;

    const pubmedIds = children(child(root, 'IdList'), 'Id')
        .map((id) => text(id))
        .filter((id): id is string => id !== null);

    const webEnv = text(root['WebEnv']);
    const queryKey = text(root['QueryKey']);

    return {
        query,
        total_results: totalResults,
        pubmed_ids: pubmedIds,
        session: webEnv && queryKey ? { webEnv, queryKey } : null,
    };
}

// ─── efetch ──────────────────────────────────────────────

/**
 * Parse an efetch PubmedArticleSet into papers.
 * Never throws: a malformed document gives [], a broken record is skipped.
 */
export function parsePapersXml(xml: string): Paper[] {
    const logger = getLogger();

    let document: unknown;
    try {
        document = parseDocument(xml);
    } catch (error) {
        logger.error({ error: describeError(error) }, 'XML parsing error');
        return [];
    }

    if (!isNode(document) || !('PubmedArticleSet' in document)) {
        logger.error('efetch response has no PubmedArticleSet element');
        return [];
    }

    // An empty <PubmedArticleSet/> parses to "", giving no articles
    const articleSet = child(document, 'PubmedArticleSet');

    const papers: Paper[] = [];
    for (const [index, article] of children(articleSet, 'PubmedArticle').entries()) {
        try {
            const paper = isNode(article) ? parseArticle(article) : null;
            if (paper) {
                papers.push(paper);
            } else {
                logger.warn({ index }, 'Dropping PubmedArticle without MedlineCitation/PMID');
            }
        } catch (error) {
            logger.error({ index, error: describeError(error) }, 'Error parsing single paper');
        }
    }

    return papers;
}

function parseArticle(articleElem: XmlNode): Paper | null {
    const citation = child(articleElem, 'MedlineCitation');
    const pubmedId = text(citation?.['PMID']);
    if (!citation || !pubmedId) return null;

    const article = child(citation, 'Article');
    const articleIds = children(child(child(articleElem, 'PubmedData'), 'ArticleIdList'), 'ArticleId');

    return {
        pubmed_id: pubmedId,
        title: markupText(article?.['ArticleTitle']) ?? '',
        publication_date: parsePublicationDate(citation, article),
        authors: parseAuthors(article),
        journal: parseJournal(article),
        abstract: parseAbstract(article),
        doi: parseDoi(article, articleIds),
        pmc_id: parsePmcId(citation, articleIds),
    };
}

function parseAbstract(article: XmlNode | undefined): string | null {
    for (const section of children(child(article, 'Abstract'), 'AbstractText')) {
        const value = markupText(section);
        if (value) return value;
    }
    return null;
}

/**
 * DateCompleted, then DateCreated, then the journal issue's PubDate.
 * Whichever is found first decides; a missing year there means no date.
 */
function parsePublicationDate(citation: XmlNode, article: XmlNode | undefined): string | null {
    const dateElem =
        child(citation, 'DateCompleted') ??
        child(citation, 'DateCreated') ??
        child(child(child(article, 'Journal'), 'JournalIssue'), 'PubDate');

    if (!dateElem) return null;

    let year: number | null = null;
    const yearText = text(dateElem['Year']);
    if (yearText && /^\d{4}$/.test(yearText)) {
        year = parseInt(yearText, 10);
    } else if (!yearText) {
        // "2019 Nov-Dec", "2020 Spring"
        const medlineDate = text(dateElem['MedlineDate'])?.match(/^(\d{4})/);
        if (medlineDate?.[1]) year = parseInt(medlineDate[1], 10);
    }
    if (year === null) return null;

    const monthText = text(dateElem['Month']);
    const month = monthText ? parseMonth(monthText) : 1;

    const dayText = text(dateElem['Day']);
    const day = dayText ? (/^\d{1,2}$/.test(dayText) ? parseInt(dayText, 10) : null) : 1;

    if (month === null || day === null) return null;
    return toIsoDate(year, month, day);
}

function parseJournal(article: XmlNode | undefined): Journal {
    const journal = child(article, 'Journal');
    const issue = child(journal, 'JournalIssue');

    return {
        title: text(journal?.['Title']),
        issn: text(journal?.['ISSN']),
        volume: text(issue?.['Volume']),
        issue: text(issue?.['Issue']),
        pages: text(child(article, 'Pagination')?.['MedlinePgn']),
    };
}

function parseAuthors(article: XmlNode | undefined): Author[] {
    const authors: Author[] = [];

    for (const authorElem of children(child(article, 'AuthorList'), 'Author')) {
        if (!isNode(authorElem)) continue;

        const affiliation = markupText(child(authorElem, 'AffiliationInfo')?.['Affiliation']);

        authors.push({
            first_name: text(authorElem['ForeName']),
            last_name: text(authorElem['LastName']) ?? '',
            initials: text(authorElem['Initials']),
            affiliation,
            email: extractEmail(affiliation),
            is_corresponding: false,
            is_non_academic: false,
            company_affiliations: [],
        });
    }

    return authors;
}

function parseDoi(article: XmlNode | undefined, articleIds: unknown[]): string | null {
    for (const location of children(article, 'ELocationID')) {
        if (attr(location, 'EIdType') === 'doi') {
            const doi = stripDoiPrefix(text(location));
            if (doi) return doi;
        }
    }

    for (const id of articleIds) {
        if (attr(id, 'IdType') === 'doi') {
            const doi = stripDoiPrefix(text(id));
            if (doi) return doi;
        }
    }

    return null;
}

function parsePmcId(citation: XmlNode, articleIds: unknown[]): string | null {
    for (const other of children(citation, 'OtherID')) {
        const value = text(other);
        if (attr(other, 'Source') === 'NLM' && value?.startsWith('PMC')) {
            return value;
        }
    }

    for (const id of articleIds) {
        const value = text(id);
        if (attr(id, 'IdType') === 'pmc' && value?.startsWith('PMC')) {
            return value;
        }
    }

    return null;
}
