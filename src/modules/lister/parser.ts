import * as cheerio from 'cheerio';
import { AddressRecord } from '../../types';
import { cleanText, deriveSourceId } from '../../utils/normalizer';

export interface ParsedAddressBlock {
    street: string;
    city: string;
    state: string;
    zip: string;
}

export interface ListingPage {
    listings: AddressRecord[];
    misses: number; // location blocks without a usable address
}

// "Airmont, NY 10901" or "New York, NY 10001-1234"
const CITY_STATE_ZIP = /^(.*),\s+([A-Z]{2})\s+(\d{5}(?:-\d{4})?)$/;

/**
 * First line is the street, last line is "City, ST 12345".
 */
export function parseAddressBlock(text: string): ParsedAddressBlock | null {
    const parts = text.split(/\r?\n/).map(cleanText).filter(Boolean);
    if (parts.length < 2) return null;

    const match = parts[parts.length - 1].match(CITY_STATE_ZIP);
    if (!match) return null;

    const street = parts[0];
    const city = match[1].trim();
    if (!street || !city) return null;

    return { street, city, state: match[2], zip: match[3] };
}

function absoluteUrl(href: string, baseUrl: string): string | undefined {
    try {
        return new URL(href, baseUrl).href;
    } catch {
        return undefined;
    }
}

export function parseListingPage(html: string, baseUrl: string): ListingPage {
    const $ = cheerio.load(html);
    const listings: AddressRecord[] = [];
    const seen = new Set<string>();
    let misses = 0;

    $('.theme-location-item').each((_, item) => {
        const addr = $(item).find('.t-addr').first();
        if (addr.length === 0) {
            misses++;
            return;
        }

        addr.find('br').replaceWith('\n');
        const block = parseAddressBlock(addr.text());
        if (!block) {
            misses++;
            return;
        }

        const href = $(item).find('a.theme-button[href]').first().attr('href');
        const detailUrl = href ? absoluteUrl(href, baseUrl) : undefined;
        const sourceId = deriveSourceId({ ...block, detailUrl });

        if (seen.has(sourceId)) return;
        seen.add(sourceId);
        listings.push({ sourceId, ...block, detailUrl });
    });

    return { listings, misses };
}
