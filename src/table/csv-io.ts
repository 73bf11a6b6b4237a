import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { MalformedInputError, MissingFileError, describeError } from '../utils/errors.js';
import { CellValue, VariantTable } from './variant-table.js';

const CsvRowsSchema = z.array(z.array(z.string()));

export interface RawCsv {
    header: string[];
    rows: string[][];
}

/**
 * Parses CSV text into a header and string rows. Blank lines are skipped;
 * rows whose field count differs from the header are rejected.
 */
export function parseCsv(text: string, source = '<memory>'): RawCsv {
    let parsed: unknown;
    try {
        parsed = parse(text, { bom: true, skip_empty_lines: true });
    } catch (error) {
        throw new MalformedInputError(source, describeError(error), { cause: error });
    }

    const rows = CsvRowsSchema.safeParse(parsed);
    if (!rows.success) {
        throw new MalformedInputError(source, 'unexpected CSV structure');
    }

    const [header, ...body] = rows.data;
    if (!header || header.every(cell => cell.trim() === '')) {
        throw new MalformedInputError(source, 'no header row');
    }
    return { header: header.map(cell => cell.trim()), rows: body };
}

export function parseVariantCsv(text: string, source = '<memory>'): VariantTable {
    const { header, rows } = parseCsv(text, source);
    return VariantTable.fromRows(header, rows, source);
}

export function readCsvFile(filePath: string): RawCsv {
    return parseCsv(readText(filePath), filePath);
}

export function readVariantTable(filePath: string): VariantTable {
    return parseVariantCsv(readText(filePath), filePath);
}

export function formatCsv(columns: string[], rows: Record<string, CellValue>[], options: { header?: boolean } = {}): string {
    return stringify(rows, { header: options.header ?? true, columns });
}

export function writeVariantTable(table: VariantTable, filePath: string): void {
    fs.writeFileSync(filePath, formatCsv(table.columns, table.toRows()), 'utf-8');
}

function readText(filePath: string): string {
    if (!fs.existsSync(filePath)) {
        throw new MissingFileError(filePath);
    }
    try {
        return fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new MalformedInputError(filePath, describeError(error), { cause: error });
    }
}
