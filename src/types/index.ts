export type AddressRecord = {
    sourceId: string; // Listing identifier, stable across runs
    street: string;
    city: string;
    state: string;
    zip: string;
    detailUrl?: string;
};

export type EnrichedAddressRecord = AddressRecord & {
    suite?: string; // Absent when the detail page shows no unit
};

export enum Rdi {
    RESIDENTIAL = 'Residential',
    COMMERCIAL = 'Commercial',
    UNKNOWN = 'Unknown',
}

export enum Cmra {
    YES = 'Yes',
    NO = 'No',
    UNKNOWN = 'Unknown',
}

export type DeliveryClassification = {
    rdi: Rdi;
    cmra: Cmra;
};

export type VerifiedAddressRecord = (AddressRecord | EnrichedAddressRecord) & DeliveryClassification;

/** Columns the stages read, by meaning rather than by header text. */
export type CanonicalColumn = 'street' | 'suite' | 'city' | 'state' | 'zip' | 'detail_url' | 'source_id' | 'rdi' | 'cmra';

export type ColumnIndex = Partial<Record<CanonicalColumn, number>>;

export type SheetRow = {
    record: EnrichedAddressRecord;
    cells: string[]; // Original values, in header order
};

/** One CSV file: its own headers, where each canonical column sits, and the rows. */
export type AddressSheet = {
    headers: string[];
    columns: ColumnIndex;
    hasSuiteColumn: boolean;
    rows: SheetRow[];
};

export type StageName = 'list' | 'detail' | 'verify';

export enum FailureCategory {
    NETWORK = 'network',       // Transient errors that exhausted their retries
    HTTP = 'http',             // Non-retryable HTTP status
    PARSE_MISS = 'parse_miss', // Expected field or pattern absent
}

export type FailureCounts = Record<FailureCategory, number>;

export type StageSummary = {
    stage: StageName;
    input: string;
    output: string;
    total: number;
    processed: number;
    resumed: number;
    failures: FailureCounts;
    durationMs: number;
    pages?: number; // Lister only
};

export type BatchOutcome =
    | { ok: true; input: string; summary: StageSummary }
    | { ok: false; input: string; error: string };

export type BatchReport = {
    stage: StageName;
    outcomes: BatchOutcome[];
};
