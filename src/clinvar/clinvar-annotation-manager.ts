import { EventEmitter } from 'events';
import { config } from '../config/index.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { FixedDelay, SleepFn, ClockFn } from '../utils/pacing.js';
import { MissingInputError, describeError } from '../utils/errors.js';
import { VariantTable, emptyAnnotationFields } from '../table/variant-table.js';
import { BatchProgress, BatchStatus, BatchSummary } from '../pipeline/batch.js';
import { ClinVarClient, ClinVarSummary, ExtractionOptions } from './clinvar-client.js';

export const HGVS_INPUT_COLUMN = 't_hgvs';

/** What the orchestrator needs from a ClinVar client. */
export interface ClassificationLookup {
    search(hgvs: string): Promise<string[]>;
    fetchRecord(uid: string): Promise<ClinVarSummary>;
}

export interface AnnotationManagerOptions extends ExtractionOptions {
    requestDelayMs?: number;
    logger?: Logger;
    sleep?: SleepFn;
    now?: ClockFn;
}

/**
 * Annotates validated variants with ClinVar classifications, one row at a
 * time with a fixed gap after every request.
 *
 * Annotation fields from an earlier run are cleared first. A row that fails
 * for any reason is logged and keeps whatever fields this run already wrote
 * (the UID is stored as soon as it is known); the batch carries on with the
 * next row.
 */
export class ClinVarAnnotationManager extends EventEmitter {
    private readonly client: ClassificationLookup;
    private readonly delay: FixedDelay;
    private readonly log: Logger;
    private readonly now: ClockFn;
    private readonly extraction: ExtractionOptions;
    private state: BatchStatus = 'not_started';

    constructor(client: ClassificationLookup, options: AnnotationManagerOptions = {}) {
        super();
        this.client = client;
        this.log = options.logger ?? defaultLogger;
        this.now = options.now ?? Date.now;
        this.delay = new FixedDelay({
            delayMs: options.requestDelayMs ?? config.clinvar.requestDelayMs,
            sleep: options.sleep,
        });
        this.extraction = {
            reviewStatusTable: options.reviewStatusTable,
            xrefSource: options.xrefSource ?? config.clinvar.diseaseXrefSource,
        };
    }

    get status(): BatchStatus {
        return this.state;
    }

    async annotate(table: VariantTable): Promise<BatchSummary> {
        if (!table.hasColumn(HGVS_INPUT_COLUMN)) {
            this.log.error(`Input is missing required column '${HGVS_INPUT_COLUMN}'`, { source: table.source });
            throw new MissingInputError(HGVS_INPUT_COLUMN, table.source);
        }

        const started = this.now();
        const total = table.size;
        const summary: BatchSummary = { total, succeeded: 0, failed: 0, skipped: 0, elapsedMs: 0 };

        this.state = 'running';
        this.log.info(`Annotating ${total} variants from ClinVar`, { source: table.source });
        this.emit('start', total);
        table.markAnnotated();
        for (const record of table.records) {
            Object.assign(record, emptyAnnotationFields());
        }

        for (const [rowIndex, record] of table.records.entries()) {
            const hgvs = record.t_hgvs;

            if (hgvs === null) {
                this.log.warn(`Row ${rowIndex} has no ${HGVS_INPUT_COLUMN} value, skipping ClinVar lookup`, { row: rowIndex });
                summary.skipped++;
            } else {
                try {
                    const uids = await this.delay.run(() => this.client.search(hgvs));

                    if (uids.length === 0) {
                        this.log.info(`No ClinVar UID found for ${hgvs}`, { row: rowIndex });
                        summary.skipped++;
                    } else {
                        // TODO: choose between several UIDs instead of taking the first
                        const uid = uids[0];
                        if (uids.length > 1) {
                            this.log.info(`Found ClinVar UIDs ${uids.join(', ')} for ${hgvs}, using ${uid}`, { row: rowIndex });
                        }
                        record.clinvar_uid = uid;

                        const summaryRecord = await this.delay.run(() => this.client.fetchRecord(uid));
                        const extracted = ClinVarClient.extractClassification(summaryRecord, this.extraction);
                        record.classification = extracted.classification;
                        record.review_status_text = extracted.review_status_text;
                        record.star_rating = extracted.star_rating;
                        record.disease_name = extracted.disease_name;
                        record.disease_mim = extracted.disease_mim;
                        summary.succeeded++;
                    }
                } catch (error) {
                    this.log.error(`Failed to annotate row ${rowIndex} (${hgvs}): ${describeError(error)}`, {
                        row: rowIndex,
                        t_hgvs: hgvs,
                    });
                    summary.failed++;
                }
            }

            this.emit('progress', {
                processed: rowIndex + 1,
                total,
                rowIndex,
                label: hgvs ?? '(no HGVS)',
            } satisfies BatchProgress);
        }

        summary.elapsedMs = this.now() - started;
        this.state = 'completed';
        this.log.info(
            `Annotation finished: ${summary.succeeded} annotated, ${summary.skipped} without ClinVar data, ${summary.failed} failed`,
            { total }
        );
        this.emit('complete', summary);
        return summary;
    }
}
