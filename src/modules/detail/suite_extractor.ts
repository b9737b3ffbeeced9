import * as cheerio from 'cheerio';
import { cleanText } from '../../utils/normalizer';

// Lines inside the address card that never carry unit info
const NOISE_MARKERS = ['united states', 'your real street address', 'your name'];

const UNIT_TOKEN = /\b(?:suite|ste|unit|apt)\b\.?\s*#?\s*[a-z0-9][a-z0-9-]*|#\s*[a-z0-9][a-z0-9-]*/i;

/**
 * Finds the unit token on one address line, e.g. "Ste 100 #MAILBOX" -> "Ste 100".
 */
export function extractUnitToken(line: string): string | undefined {
    const withoutPlaceholder = line.replace(/MAILBOX/g, ' ');
    const match = withoutPlaceholder.match(UNIT_TOKEN);
    return match ? cleanText(match[0]) : undefined;
}

/**
 * Reads the suite/unit from a location detail page. Only the first `.t-addr`
 * card is read: the footer carries the provider's own "Suite" address.
 */
export function extractSuite(html: string): string | undefined {
    const $ = cheerio.load(html);
    const card = $('.t-addr').first();
    if (card.length === 0) return undefined;

    card.find('br').replaceWith('\n');
    const lines = card.text().split(/\r?\n/).map(cleanText).filter(Boolean);

    for (const line of lines) {
        const lower = line.toLowerCase();
        if (NOISE_MARKERS.some((marker) => lower.includes(marker))) continue;

        const token = extractUnitToken(line);
        if (token) return token;
    }
    return undefined;
}

/** True when the site bounced us to its generic locations list or home page. */
export function isRedirectedAway(finalUrl: string, siteBaseUrl: string): boolean {
    const normalized = finalUrl.replace(/\/+$/, '');
    return normalized.includes('/locations') || normalized === siteBaseUrl.replace(/\/+$/, '');
}

/**
 * Absolute http(s) URLs are used as they are and root-relative paths are
 * resolved against the site. Anything else is not a fetchable detail page.
 */
export function resolveDetailUrl(value: string | undefined, siteBaseUrl: string): string | undefined {
    if (!value) return undefined;
    if (/^https?:\/\//i.test(value)) return value;
    if (!value.startsWith('/')) return undefined;
    return new URL(value, `${siteBaseUrl.replace(/\/+$/, '')}/`).href;
}
