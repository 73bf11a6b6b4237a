import * as fs from 'fs';
import * as path from 'path';
import { config } from '../config/index.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { MissingFileError, MissingInputError, PipelineStage, ProcessError } from '../utils/errors.js';
import { COORDINATE_COLUMNS, CellValue, PATIENT_ID_COLUMN, VariantTable } from '../table/variant-table.js';
import { formatCsv, readCsvFile, readVariantTable, writeVariantTable } from '../table/csv-io.js';
import { StageResult, VariantPipeline } from '../pipeline/variant-pipeline.js';

export const SESSION_FILES = {
    input: 'input_data.csv',
    validated: 'validated_data.csv',
    annotated: 'anno_data.csv',
    filtered: 'filtered_data.csv',
    uploads: 'uploaded_files.txt',
} as const;

export type SessionFile = keyof typeof SESSION_FILES;

export type UploadResult =
    | { status: 'added'; fileName: string; patientId: string; rows: number }
    | { status: 'duplicate'; fileName: string };

export interface FilterResult {
    table: VariantTable;
    selectedIds: string[];
    appliedText: string;
    outputPath: string;
}

const DROPPED_UPLOAD_COLUMNS = [PATIENT_ID_COLUMN, 'ID'];

/**
 * Flat-file state for one review session: the combined upload, each stage's
 * output and the list of files uploaded so far. Nothing here outlives a
 * {@link refresh}.
 */
export class SessionWorkspace {
    readonly dataDir: string;
    private readonly log: Logger;

    constructor(dataDir: string = config.session.dataDir, options: { logger?: Logger } = {}) {
        this.dataDir = dataDir;
        this.log = options.logger ?? defaultLogger;
    }

    path(file: SessionFile): string {
        return path.join(this.dataDir, SESSION_FILES[file]);
    }

    uploadedFiles(): string[] {
        const file = this.path('uploads');
        if (!fs.existsSync(file)) return [];
        return fs.readFileSync(file, 'utf-8')
            .split(/\r?\n/)
            .map(line => line.trim())
            .filter(line => line !== '');
    }

    /**
     * Tags every row of an uploaded CSV with a Patient_ID taken from the file
     * name (without extension) and appends it to the session input. A file
     * name seen before in this session is not added twice.
     */
    addUpload(filePath: string, fileName: string = path.basename(filePath)): UploadResult {
        fs.mkdirSync(this.dataDir, { recursive: true });

        const uploaded = this.uploadedFiles();
        if (uploaded.includes(fileName)) {
            this.log.warn(`${fileName} already uploaded`);
            return { status: 'duplicate', fileName };
        }

        const { header, rows } = readCsvFile(filePath);
        for (const column of COORDINATE_COLUMNS) {
            if (!header.includes(column)) {
                throw new MissingInputError(column, fileName);
            }
        }

        for (const column of DROPPED_UPLOAD_COLUMNS) {
            if (header.includes(column)) {
                this.log.info(`${column} column exists in ${fileName}. Deleting column.`);
            }
        }

        const patientId = path.parse(fileName).name;
        const kept = header.filter(column => !DROPPED_UPLOAD_COLUMNS.includes(column));
        const columns = [PATIENT_ID_COLUMN, ...kept];
        const records = rows.map(row => {
            const record: Record<string, CellValue> = { [PATIENT_ID_COLUMN]: patientId };
            header.forEach((column, i) => {
                if (!DROPPED_UPLOAD_COLUMNS.includes(column)) {
                    record[column] = row[i] ?? null;
                }
            });
            return record;
        });

        const inputPath = this.path('input');
        if (fs.existsSync(inputPath)) {
            const existing = readCsvFile(inputPath).header;
            const ignored = columns.filter(column => !existing.includes(column));
            if (ignored.length > 0) {
                this.log.warn(`Columns not present in ${SESSION_FILES.input} were dropped from ${fileName}: ${ignored.join(', ')}`);
            }
            fs.appendFileSync(inputPath, formatCsv(existing, records, { header: false }), 'utf-8');
        } else {
            fs.writeFileSync(inputPath, formatCsv(columns, records), 'utf-8');
        }

        fs.writeFileSync(this.path('uploads'), [...uploaded, fileName].sort().join('\n'), 'utf-8');
        this.log.info(`${fileName} uploaded successfully`, { patient: patientId, rows: records.length });
        return { status: 'added', fileName, patientId, rows: records.length };
    }

    async validate(pipeline: VariantPipeline): Promise<StageResult> {
        return this.runStage('Validation', 'input', () =>
            pipeline.validateFile(this.path('input'), this.path('validated')));
    }

    async annotate(pipeline: VariantPipeline): Promise<StageResult> {
        return this.runStage('Annotation', 'validated', () =>
            pipeline.annotateFile(this.path('validated'), this.path('annotated')));
    }

    loadAnnotated(): VariantTable {
        const annotated = this.path('annotated');
        if (!fs.existsSync(annotated)) {
            throw new MissingFileError(SESSION_FILES.annotated);
        }
        const table = readVariantTable(annotated);
        this.log.info(`Loaded annotated data with ${table.size} rows`);
        return table;
    }

    patientIds(): string[] {
        return this.loadAnnotated().patientIds();
    }

    /**
     * Keeps the annotated rows of the selected patients (all rows when none
     * are selected) and writes them to the filtered output file.
     */
    filter(patientIds: readonly string[]): FilterResult {
        const table = this.loadAnnotated();
        const selectedIds = [...patientIds];
        const filtered = table.filterByPatient(selectedIds);

        let appliedText: string;
        if (selectedIds.length > 0) {
            appliedText = `Filtered by: ${selectedIds.join(', ')}`;
            this.log.info(`Filter applied to Patient_ID(s): ${selectedIds.join(', ')}`);
        } else {
            appliedText = 'No filter selected. Showing all rows.';
            this.log.info('No filter applied (no Patient_ID selected)');
        }

        const outputPath = this.path('filtered');
        writeVariantTable(filtered, outputPath);
        return { table: filtered, selectedIds, appliedText, outputPath };
    }

    /**
     * Deletes every file in the data directory. Returns how many were removed.
     */
    refresh(): number {
        fs.mkdirSync(this.dataDir, { recursive: true });
        let removed = 0;
        for (const entry of fs.readdirSync(this.dataDir)) {
            fs.rmSync(path.join(this.dataDir, entry), { recursive: true, force: true });
            removed++;
        }
        this.log.info('Data directory cleared', { dir: this.dataDir, removed });
        return removed;
    }

    private async runStage(
        stage: PipelineStage,
        input: SessionFile,
        run: () => Promise<StageResult>
    ): Promise<StageResult> {
        if (!fs.existsSync(this.path(input))) {
            const error = new MissingFileError(SESSION_FILES[input]);
            this.log.error(error.message);
            throw error;
        }
        try {
            return await run();
        } catch (error) {
            const wrapped = new ProcessError(stage, error);
            this.log.error(wrapped.message);
            throw wrapped;
        }
    }
}
