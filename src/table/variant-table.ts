import { config } from '../config/index.js';
import { MalformedInputError, MissingInputError } from '../utils/errors.js';

export const COORDINATE_COLUMNS = ['#CHROM', 'POS', 'REF', 'ALT'] as const;

export const VALIDATION_COLUMNS = ['genome_build', 'g_hgvs', 't_hgvs', 'hgnc_id', 'symbol', 'p_hgvs_tlc'] as const;

export const ANNOTATION_COLUMNS = [
    'clinvar_uid',
    'classification',
    'review_status_text',
    'star_rating',
    'disease_name',
    'disease_mim',
] as const;

export const PATIENT_ID_COLUMN = 'Patient_ID';

export type CellValue = string | number | null;

export interface VariantCoordinates {
    readonly chrom: string;
    readonly pos: number;
    readonly ref: string;
    readonly alt: string;
}

export interface ValidationFields {
    g_hgvs: string | null;
    t_hgvs: string | null;
    hgnc_id: string | null;
    symbol: string | null;
    p_hgvs_tlc: string | null;
}

export interface AnnotationFields {
    clinvar_uid: string | null;
    classification: string | null;
    review_status_text: string | null;
    star_rating: number | null;
    disease_name: string | null;
    disease_mim: string | null;
}

export interface VariantRecord extends ValidationFields, AnnotationFields {
    readonly coordinates: VariantCoordinates;
    /** Cells of pass-through columns such as Patient_ID, keyed by header. */
    readonly extra: Readonly<Record<string, string | null>>;
    genome_build: string;
}

export function emptyValidationFields(): ValidationFields {
    return { g_hgvs: null, t_hgvs: null, hgnc_id: null, symbol: null, p_hgvs_tlc: null };
}

export function emptyAnnotationFields(): AnnotationFields {
    return {
        clinvar_uid: null,
        classification: null,
        review_status_text: null,
        star_rating: null,
        disease_name: null,
        disease_mim: null,
    };
}

export function createVariantRecord(
    coordinates: VariantCoordinates,
    extra: Record<string, string | null> = {},
    genomeBuild: string = config.variantValidator.genomeBuild
): VariantRecord {
    return {
        coordinates: Object.freeze({ ...coordinates }),
        extra: Object.freeze({ ...extra }),
        genome_build: genomeBuild,
        ...emptyValidationFields(),
        ...emptyAnnotationFields(),
    };
}

/** `{chrom}-{pos}-{ref}-{alt}`, the descriptor VariantValidator expects. */
export function variantDescriptor(coordinates: VariantCoordinates): string {
    return `${coordinates.chrom}-${coordinates.pos}-${coordinates.ref}-${coordinates.alt}`;
}

const ENRICHMENT_COLUMNS: ReadonlySet<string> = new Set<string>([...VALIDATION_COLUMNS, ...ANNOTATION_COLUMNS]);
const COORDINATE_SET: ReadonlySet<string> = new Set<string>(COORDINATE_COLUMNS);

/**
 * The working table for one pipeline run. Records are mutated in place by
 * the orchestrators; the header order of the input is kept for output.
 */
export class VariantTable {
    readonly records: VariantRecord[];
    readonly source: string;
    private readonly baseColumns: string[];
    private validated: boolean;
    private annotated: boolean;

    constructor(
        baseColumns: string[],
        records: VariantRecord[],
        options: { source?: string; validated?: boolean; annotated?: boolean } = {}
    ) {
        for (const column of COORDINATE_COLUMNS) {
            if (!baseColumns.includes(column)) {
                throw new MissingInputError(column, options.source ?? '<memory>');
            }
        }
        this.baseColumns = baseColumns.filter(column => !ENRICHMENT_COLUMNS.has(column));
        this.records = records;
        this.source = options.source ?? '<memory>';
        this.validated = options.validated ?? false;
        this.annotated = options.annotated ?? false;
    }

    /**
     * Builds a table from a header and raw string rows. Empty cells are read
     * as null; enrichment columns already present are parsed back into the
     * typed record fields.
     */
    static fromRows(header: string[], rows: string[][], source = '<memory>'): VariantTable {
        const columns = header.map(column => column.trim());
        for (const column of COORDINATE_COLUMNS) {
            if (!columns.includes(column)) {
                throw new MissingInputError(column, source);
            }
        }

        const index = new Map(columns.map((column, i) => [column, i] as const));
        const records = rows.map((row, rowIndex) => {
            // line 1 is the header
            const line = rowIndex + 2;
            const cell = (column: string): string | null => {
                const i = index.get(column);
                if (i === undefined) return null;
                const value = row[i];
                return value === undefined || value.trim() === '' ? null : value.trim();
            };

            const coordinates = {
                chrom: requiredCell(cell('#CHROM'), '#CHROM', source, line),
                pos: parsePosition(cell('POS'), source, line),
                ref: requiredCell(cell('REF'), 'REF', source, line),
                alt: requiredCell(cell('ALT'), 'ALT', source, line),
            };

            const extra: Record<string, string | null> = {};
            for (const column of columns) {
                if (!COORDINATE_SET.has(column) && !ENRICHMENT_COLUMNS.has(column)) {
                    extra[column] = cell(column);
                }
            }

            const record = createVariantRecord(coordinates, extra, cell('genome_build') ?? undefined);
            record.g_hgvs = cell('g_hgvs');
            record.t_hgvs = cell('t_hgvs');
            record.hgnc_id = cell('hgnc_id');
            record.symbol = cell('symbol');
            record.p_hgvs_tlc = cell('p_hgvs_tlc');
            record.clinvar_uid = cell('clinvar_uid');
            record.classification = cell('classification');
            record.review_status_text = cell('review_status_text');
            record.star_rating = parseStarRating(cell('star_rating'), source, line);
            record.disease_name = cell('disease_name');
            record.disease_mim = cell('disease_mim');
            return record;
        });

        return new VariantTable(columns, records, {
            source,
            validated: columns.includes('t_hgvs'),
            annotated: columns.includes('clinvar_uid'),
        });
    }

    get size(): number {
        return this.records.length;
    }

    get isValidated(): boolean {
        return this.validated;
    }

    get isAnnotated(): boolean {
        return this.annotated;
    }

    markValidated(): void {
        this.validated = true;
    }

    markAnnotated(): void {
        this.annotated = true;
    }

    get columns(): string[] {
        const columns = [...this.baseColumns];
        if (this.validated) columns.push(...VALIDATION_COLUMNS);
        if (this.annotated) columns.push(...ANNOTATION_COLUMNS);
        return columns;
    }

    hasColumn(column: string): boolean {
        return this.columns.includes(column);
    }

    patientIds(): string[] {
        if (!this.hasColumn(PATIENT_ID_COLUMN)) {
            throw new MissingInputError(PATIENT_ID_COLUMN, this.source);
        }
        const ids = new Set<string>();
        for (const record of this.records) {
            const id = record.extra[PATIENT_ID_COLUMN];
            if (id) ids.add(id);
        }
        return [...ids].sort();
    }

    /**
     * Rows whose Patient_ID is one of `patientIds`. No ids selects every row.
     * The returned table shares record objects with this one.
     */
    filterByPatient(patientIds: readonly string[]): VariantTable {
        if (!this.hasColumn(PATIENT_ID_COLUMN)) {
            throw new MissingInputError(PATIENT_ID_COLUMN, this.source);
        }
        const wanted = new Set(patientIds);
        const records = wanted.size === 0
            ? [...this.records]
            : this.records.filter(record => {
                const id = record.extra[PATIENT_ID_COLUMN];
                return id !== null && id !== undefined && wanted.has(id);
            });
        return new VariantTable(this.baseColumns, records, {
            source: this.source,
            validated: this.validated,
            annotated: this.annotated,
        });
    }

    toRows(): Record<string, CellValue>[] {
        const columns = this.columns;
        return this.records.map(record => {
            const row: Record<string, CellValue> = {};
            for (const column of columns) {
                row[column] = readCell(record, column);
            }
            return row;
        });
    }
}

export function readCell(record: VariantRecord, column: string): CellValue {
    switch (column) {
        case '#CHROM': return record.coordinates.chrom;
        case 'POS': return record.coordinates.pos;
        case 'REF': return record.coordinates.ref;
        case 'ALT': return record.coordinates.alt;
        case 'genome_build': return record.genome_build;
        case 'g_hgvs': return record.g_hgvs;
        case 't_hgvs': return record.t_hgvs;
        case 'hgnc_id': return record.hgnc_id;
        case 'symbol': return record.symbol;
        case 'p_hgvs_tlc': return record.p_hgvs_tlc;
        case 'clinvar_uid': return record.clinvar_uid;
        case 'classification': return record.classification;
        case 'review_status_text': return record.review_status_text;
        case 'star_rating': return record.star_rating;
        case 'disease_name': return record.disease_name;
        case 'disease_mim': return record.disease_mim;
        default: return record.extra[column] ?? null;
    }
}

function requiredCell(value: string | null, column: string, source: string, line: number): string {
    if (value === null) {
        throw new MalformedInputError(source, `empty ${column} value`, { line });
    }
    return value;
}

function parsePosition(value: string | null, source: string, line: number): number {
    const text = requiredCell(value, 'POS', source, line);
    if (!/^\d+$/.test(text)) {
        throw new MalformedInputError(source, `POS must be a positive integer, got "${text}"`, { line });
    }
    return parseInt(text, 10);
}

function parseStarRating(value: string | null, source: string, line: number): number | null {
    if (value === null) return null;
    // some spreadsheet exports write whole numbers as "4.0"
    const rating = Number(value);
    if (!Number.isInteger(rating) || rating < 0 || rating > 4) {
        throw new MalformedInputError(source, `star_rating must be 0-4, got "${value}"`, { line });
    }
    return rating;
}
