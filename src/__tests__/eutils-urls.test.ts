import { describe, it, expect } from 'vitest';
import { buildIdFetchUrl, buildSearchUrl, buildSessionFetchUrl, EUTILS_BASE } from '../sources/eutils-urls.js';
import { extractEmail, parseMonth, stripDoiPrefix, toIsoDate } from '../sources/utils.js';

function paramsOf(url: string): Record<string, string> {
    return Object.fromEntries(new URL(url).searchParams.entries());
}

describe('E-utilities URLs', () => {
    it('should build an esearch URL with history enabled', () => {
        const url = buildSearchUrl('cancer AND 2023[dp]', { retmax: 100, retstart: 0 }, { tool: 'get-papers-list' });

        expect(url.startsWith(`${EUTILS_BASE}/esearch.fcgi?`)).toBe(true);
        expect(paramsOf(url)).toEqual({
            db: 'pubmed',
            term: 'cancer AND 2023[dp]',
            retmax: '100',
            retstart: '0',
            usehistory: 'y',
            retmode: 'xml',
            tool: 'get-papers-list',
        });
    });

    it('should add email and api_key only when provided', () => {
        const url = buildSearchUrl(
            'q',
            { retmax: 1, retstart: 0 },
            { tool: 't', email: 'dev@example.org', apiKey: 'test-key' }
        );
        const params = paramsOf(url);

        expect(params['email']).toBe('dev@example.org');
        expect(params['api_key']).toBe('test-key');
        expect(paramsOf(buildSearchUrl('q', { retmax: 1, retstart: 0 }, { tool: 't', email: '' }))).not.toHaveProperty(
            'email'
        );
    });

    it('should build a session efetch URL for one page', () => {
        const url = buildSessionFetchUrl(
            { webEnv: 'MCID_abc', queryKey: '1' },
            { retmax: 50, retstart: 200 },
            { tool: 't' }
        );

        expect(url.startsWith(`${EUTILS_BASE}/efetch.fcgi?`)).toBe(true);
        expect(paramsOf(url)).toEqual({
            db: 'pubmed',
            WebEnv: 'MCID_abc',
            query_key: '1',
            retmax: '50',
            retstart: '200',
            retmode: 'xml',
            tool: 't',
        });
    });

    it('should build an id efetch URL with comma-separated ids', () => {
        const params = paramsOf(buildIdFetchUrl(['1', '2', '3'], { tool: 't' }));

        expect(params['id']).toBe('1,2,3');
        expect(params).not.toHaveProperty('WebEnv');
        expect(params).not.toHaveProperty('retstart');
    });
});

describe('source utils', () => {
    it('should strip DOI URL prefixes', () => {
        expect(stripDoiPrefix('https://doi.org/10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('http://doi.org/10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('  ')).toBeNull();
        expect(stripDoiPrefix(null)).toBeNull();
    });

    it('should extract the first email from free text', () => {
        expect(extractEmail('Pfizer Inc, NY. Electronic address: jane@pfizer.com.')).toBe('jane@pfizer.com');
        expect(extractEmail('No address here')).toBeNull();
        expect(extractEmail(null)).toBeNull();
    });

    it('should parse numeric and named months', () => {
        expect(parseMonth('03')).toBe(3);
        expect(parseMonth('Mar')).toBe(3);
        expect(parseMonth('December')).toBe(12);
        expect(parseMonth('Spring')).toBeNull();
    });

    it('should format only real calendar dates', () => {
        expect(toIsoDate(2021, 3, 5)).toBe('2021-03-05');
        expect(toIsoDate(2024, 2, 29)).toBe('2024-02-29');
        expect(toIsoDate(2023, 2, 29)).toBeNull();
        expect(toIsoDate(2023, 13, 1)).toBeNull();
    });
});
