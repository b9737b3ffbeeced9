import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { AddressSheet, CanonicalColumn, ColumnIndex, SheetRow } from '../../types';
import { InvalidInputError } from '../../utils/errors';
import { cleanText, deriveSourceId, normalizeSuite } from '../../utils/normalizer';

const SheetMatrixSchema = z.array(z.array(z.string()));

/**
 * Maps the headers this tool writes, and the usual variants found in
 * hand-made sheets, onto canonical columns. Anything else is carried
 * through untouched and returns undefined.
 */
export function canonicalHeader(header: string): CanonicalColumn | undefined {
    const slug = header.toLowerCase().trim().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');

    if (slug === 'source_id' || slug === 'id' || slug === 'listing_id') return 'source_id';
    if (slug === 'rdi' || slug === 'cmra') return slug;
    // "Address Line 2" and friends are not the street
    if (/(?:line_?2|address_?2)$/.test(slug)) return undefined;
    if (slug.includes('suite') || slug.includes('apart') || slug === 'unit' || slug === 'apt' || slug === 'secondary') return 'suite';
    if (slug.includes('url') || slug.includes('link')) return 'detail_url';
    if (slug.includes('street') || slug.includes('address')) return 'street';
    if (slug.includes('zip') || slug.includes('postal')) return 'zip';
    if (slug.includes('state')) return 'state';
    if (slug.includes('city') || slug.includes('town')) return 'city';
    return undefined;
}

/** The first header that maps to a canonical column owns it. */
export function indexColumns(headers: string[]): ColumnIndex {
    const columns: ColumnIndex = {};
    headers.forEach((header, idx) => {
        const key = canonicalHeader(header);
        if (key && columns[key] === undefined) {
            columns[key] = idx;
        }
    });
    return columns;
}

function toRow(cells: string[], columns: ColumnIndex): SheetRow {
    const cell = (key: CanonicalColumn): string => {
        const idx = columns[key];
        return idx === undefined ? '' : cleanText(cells[idx] ?? '');
    };

    const street = cell('street');
    const city = cell('city');
    const state = cell('state');
    const zip = cell('zip');
    const detailUrl = cell('detail_url') || undefined;
    const sourceId = cell('source_id') || deriveSourceId({ detailUrl, street, city, state, zip });

    return {
        record: { sourceId, street, city, state, zip, detailUrl, suite: normalizeSuite(cell('suite')) },
        cells,
    };
}

/**
 * Reads a basic, detailed, verified or hand-made address CSV, keeping its
 * own headers and cells. A UTF-8 BOM is ignored.
 */
export function readAddressSheet(filePath: string): AddressSheet {
    if (!fs.existsSync(filePath)) {
        throw new InvalidInputError(`Input file not found: ${filePath}`, { file: filePath });
    }

    const parsed: unknown = parse(fs.readFileSync(filePath, 'utf8'), {
        bom: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
    });
    const [headers = [], ...body] = SheetMatrixSchema.parse(parsed);

    if (headers.every((h) => h === '')) {
        throw new InvalidInputError(`Empty CSV or no header: ${filePath}`, { file: filePath });
    }

    const columns = indexColumns(headers);
    return {
        headers,
        columns,
        hasSuiteColumn: columns.suite !== undefined,
        rows: body.map((cells) => toRow(cells, columns)),
    };
}

/**
 * How many times each source id already appears in an output file. The
 * counts are the whole resume checkpoint: repeated ids resume one by one.
 */
export function loadResumeKeys(outputPath: string): Map<string, number> {
    const counts = new Map<string, number>();
    if (!fs.existsSync(outputPath) || fs.statSync(outputPath).size === 0) {
        return counts;
    }
    for (const { record } of readAddressSheet(outputPath).rows) {
        counts.set(record.sourceId, (counts.get(record.sourceId) ?? 0) + 1);
    }
    return counts;
}

/** Consumes one resumed occurrence of `sourceId`; false when none is left. */
export function takeResumed(done: Map<string, number>, sourceId: string): boolean {
    const left = done.get(sourceId) ?? 0;
    if (left === 0) return false;
    done.set(sourceId, left - 1);
    return true;
}
