import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { AddressRecord } from '../../types';

/** Layout of the Lister's own files. */
export const BASIC_HEADERS = ['Street Address', 'City', 'State Abbreviation', 'Zip Code', 'Detail Url', 'Source Id'];

export const SUITE_HEADER = 'Suite/Apartment';
export const RDI_HEADER = 'RDI';
export const CMRA_HEADER = 'CMRA';

export function basicRow(record: AddressRecord): string[] {
    return [record.street, record.city, record.state, record.zip, record.detailUrl ?? '', record.sourceId];
}

export type AddedColumn = 'suite' | 'rdi' | 'cmra';

export type AddedValues = Partial<Record<AddedColumn, string>>;

type Slot =
    | { kind: 'input'; header: string; index: number }
    | { kind: 'added'; header: string; key: AddedColumn; fallback?: number }; // fallback: input cell used when no value is given

/**
 * Output columns of a later stage: every input column in its place, plus the
 * columns that stage adds.
 */
export class SheetLayout {
    private constructor(private readonly slots: Slot[]) {}

    static fromHeaders(headers: string[]): SheetLayout {
        return new SheetLayout(headers.map((header, index) => ({ kind: 'input', header, index })));
    }

    get headers(): string[] {
        return this.slots.map((s) => s.header);
    }

    /** Adds columns right after the input column `anchor`, or at the end when there is none. */
    insertAfter(anchor: number | undefined, columns: Array<{ header: string; key: AddedColumn }>): SheetLayout {
        const added: Slot[] = columns.map((c) => ({ kind: 'added', header: c.header, key: c.key }));
        const at = this.slots.findIndex((s) => s.kind === 'input' && s.index === anchor);
        if (at === -1) return new SheetLayout([...this.slots, ...added]);
        return new SheetLayout([...this.slots.slice(0, at + 1), ...added, ...this.slots.slice(at + 1)]);
    }

    /** Lets a stage fill an existing input column, keeping its header, position and any value it is not given. */
    fill(index: number, key: AddedColumn): SheetLayout {
        return new SheetLayout(this.slots.map((s): Slot => (
            s.kind === 'input' && s.index === index ? { kind: 'added', header: s.header, key, fallback: index } : s
        )));
    }

    /** Drops input columns the stage rewrites elsewhere. */
    without(indexes: Array<number | undefined>): SheetLayout {
        return new SheetLayout(this.slots.filter((s) => s.kind !== 'input' || !indexes.includes(s.index)));
    }

    row(cells: string[], values: AddedValues): string[] {
        return this.slots.map((s) => {
            if (s.kind === 'input') return cells[s.index] ?? '';
            const value = values[s.key];
            if (value !== undefined) return value;
            return s.fallback !== undefined ? cells[s.fallback] ?? '' : '';
        });
    }
}

/**
 * Append-only CSV writer. Every call goes straight to disk so an interrupted
 * run leaves a file the next run can resume from.
 */
export class AddressCsvWriter {
    constructor(public readonly filePath: string, private headers: string[]) {}

    private needsHeader(): boolean {
        return !fs.existsSync(this.filePath) || fs.statSync(this.filePath).size === 0;
    }

    ensureHeader(): void {
        if (!this.needsHeader()) return;
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.appendFileSync(this.filePath, stringify([this.headers]), 'utf8');
    }

    append(rows: string[][]): void {
        if (rows.length === 0) return;
        this.ensureHeader();
        fs.appendFileSync(this.filePath, stringify(rows), 'utf8');
    }
}
