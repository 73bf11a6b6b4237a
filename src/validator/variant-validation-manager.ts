import { EventEmitter } from 'events';
import { config } from '../config/index.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { RequestPacer, SleepFn, ClockFn } from '../utils/pacing.js';
import { describeError } from '../utils/errors.js';
import {
    ValidationFields,
    VariantRecord,
    VariantTable,
    emptyValidationFields,
    variantDescriptor,
} from '../table/variant-table.js';
import { BatchProgress, BatchStatus, BatchSummary } from '../pipeline/batch.js';
import { NormalizationOutcome } from './variant-validator-client.js';

/** What the orchestrator needs from a normalization client. */
export interface VariantNormalizer {
    readonly genomeBuild: string;
    normalize(coordinates: VariantRecord['coordinates'], genomeBuild?: string): Promise<NormalizationOutcome>;
}

export interface ValidationManagerOptions {
    rateLimitPerSecond?: number;
    logger?: Logger;
    sleep?: SleepFn;
    now?: ClockFn;
}

const FIELD_ORDER: (keyof ValidationFields)[] = ['g_hgvs', 't_hgvs', 'hgnc_id', 'symbol', 'p_hgvs_tlc'];

/**
 * Runs every row of a table through VariantValidator, one request at a
 * time, writing the returned nomenclature back into the records.
 *
 * Rows the service cannot validate are logged and left empty. A transport
 * failure aborts the whole batch: the error is rethrown and the table keeps
 * whatever rows were written before it.
 *
 * Events: `start` (total), `progress` ({@link BatchProgress}),
 * `complete` ({@link BatchSummary}), `abort` (error).
 */
export class VariantValidationManager extends EventEmitter {
    private readonly client: VariantNormalizer;
    private readonly pacer: RequestPacer;
    private readonly log: Logger;
    private readonly now: ClockFn;
    private state: BatchStatus = 'not_started';

    constructor(client: VariantNormalizer, options: ValidationManagerOptions = {}) {
        super();
        this.client = client;
        this.log = options.logger ?? defaultLogger;
        this.now = options.now ?? Date.now;
        this.pacer = RequestPacer.perSecond(options.rateLimitPerSecond ?? config.variantValidator.rateLimitPerSecond, {
            sleep: options.sleep,
            now: options.now,
        });
    }

    get status(): BatchStatus {
        return this.state;
    }

    async validate(table: VariantTable): Promise<BatchSummary> {
        const started = this.now();
        const total = table.size;
        const summary: BatchSummary = { total, succeeded: 0, failed: 0, skipped: 0, elapsedMs: 0 };

        this.state = 'running';
        this.log.info(`Validating ${total} variants against VariantValidator`, { source: table.source });
        this.emit('start', total);

        table.markValidated();
        for (const record of table.records) {
            record.genome_build = this.client.genomeBuild;
        }

        for (const [rowIndex, record] of table.records.entries()) {
            const descriptor = variantDescriptor(record.coordinates);

            let outcome: NormalizationOutcome;
            try {
                outcome = await this.pacer.run(() => this.client.normalize(record.coordinates, record.genome_build));
            } catch (error) {
                this.state = 'aborted';
                this.log.error(`Validation aborted at row ${rowIndex}: ${describeError(error)}`, {
                    row: rowIndex,
                    variant: descriptor,
                });
                this.emit('abort', error);
                throw error;
            }

            if (outcome.ok) {
                this.applyOutcome(record, outcome.values, rowIndex);
                summary.succeeded++;
            } else {
                Object.assign(record, emptyValidationFields());
                summary.failed++;
                if (outcome.kind === 'ambiguous_transcripts') {
                    this.log.warn(
                        `Variant at row ${rowIndex} has ${outcome.transcriptCount === 0 ? 'no' : '>1'} MANE Select transcript returned, ` +
                        'expected only 1 MANE Select transcript, no further variant information will be gathered.',
                        { row: rowIndex, variant: descriptor, transcripts: outcome.transcriptCount }
                    );
                } else {
                    this.log.warn(`Variant at row ${rowIndex} could not be validated: ${outcome.reason}`, {
                        row: rowIndex,
                        variant: descriptor,
                        kind: outcome.kind,
                    });
                }
            }

            this.emit('progress', { processed: rowIndex + 1, total, rowIndex, label: descriptor } satisfies BatchProgress);
        }

        summary.elapsedMs = this.now() - started;
        this.state = 'completed';
        this.log.info(`Validation finished: ${summary.succeeded} validated, ${summary.failed} not validated`, {
            total,
        });
        this.emit('complete', summary);
        return summary;
    }

    private applyOutcome(record: VariantRecord, values: ValidationFields, rowIndex: number): void {
        for (const field of FIELD_ORDER) {
            const value = values[field];
            record[field] = value;
            if (value === null) {
                this.log.warn(`Variant at row ${rowIndex} has no associated ${field} value in VariantValidator.`, {
                    row: rowIndex,
                    variant: variantDescriptor(record.coordinates),
                });
            }
        }
    }
}
