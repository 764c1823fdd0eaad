/**
 * Shared utilities for source parsing.
 */

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

const EMAIL_PATTERN = /[\w.-]+@[\w.-]+\.\w+/;

/**
 * First email-looking token in free text, or null.
 * "Pfizer Inc, NY. Electronic address: jane@pfizer.com." → "jane@pfizer.com"
 */
export function extractEmail(text: string | null | undefined): string | null {
    if (!text) return null;
    return text.match(EMAIL_PATTERN)?.[0] ?? null;
}

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Month number from "3", "03", "Mar" or "March". Null if unrecognised.
 */
export function parseMonth(value: string): number | null {
    const trimmed = value.trim();
    if (/^\d{1,2}$/.test(trimmed)) {
        return parseInt(trimmed, 10);
    }

    const index = MONTHS.indexOf(trimmed.slice(0, 3).toLowerCase());
    return index === -1 ? null : index + 1;
}

/**
 * Format a calendar date as YYYY-MM-DD.
 * Returns null for dates that don't exist (e.g. 2021-02-30).
 */
export function toIsoDate(year: number, month: number, day: number): string | null {
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
    if (year < 1 || year > 9999) return null;

    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }

    const pad = (n: number, width: number) => String(n).padStart(width, '0');
    return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}
