import { EventEmitter } from 'events';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { PipelineStage } from '../utils/errors.js';
import { VariantTable } from '../table/variant-table.js';
import { readVariantTable, writeVariantTable } from '../table/csv-io.js';
import { VariantValidatorClient } from '../validator/variant-validator-client.js';
import {
    ValidationManagerOptions,
    VariantNormalizer,
    VariantValidationManager,
} from '../validator/variant-validation-manager.js';
import { ClinVarClient } from '../clinvar/clinvar-client.js';
import {
    AnnotationManagerOptions,
    ClassificationLookup,
    ClinVarAnnotationManager,
} from '../clinvar/clinvar-annotation-manager.js';
import { BatchProgress, BatchSummary } from './batch.js';

export interface StageResult {
    table: VariantTable;
    summary: BatchSummary;
    outputPath: string;
}

export interface StageEvent {
    stage: PipelineStage;
    total: number;
}

export interface StageProgressEvent extends BatchProgress {
    stage: PipelineStage;
}

export interface VariantPipelineOptions {
    normalizer?: VariantNormalizer;
    classifier?: ClassificationLookup;
    validation?: ValidationManagerOptions;
    annotation?: AnnotationManagerOptions;
    logger?: Logger;
}

/**
 * File-to-file stages: read a CSV, run one orchestrator over it, write the
 * enriched table. Orchestrator events are re-emitted as `stage-start`,
 * `stage-progress` and `stage-complete`.
 */
export class VariantPipeline extends EventEmitter {
    private readonly normalizer: VariantNormalizer;
    private readonly classifier: ClassificationLookup;
    private readonly validationOptions: ValidationManagerOptions;
    private readonly annotationOptions: AnnotationManagerOptions;
    private readonly log: Logger;

    constructor(options: VariantPipelineOptions = {}) {
        super();
        this.log = options.logger ?? defaultLogger;
        this.normalizer = options.normalizer ?? new VariantValidatorClient();
        this.classifier = options.classifier ?? new ClinVarClient({ logger: this.log });
        this.validationOptions = { logger: this.log, ...options.validation };
        this.annotationOptions = { logger: this.log, ...options.annotation };
    }

    async validateFile(inputPath: string, outputPath: string): Promise<StageResult> {
        this.log.info(`Reading in variants from ${inputPath}`);
        const table = readVariantTable(inputPath);

        const manager = new VariantValidationManager(this.normalizer, this.validationOptions);
        this.forward(manager, 'Validation');
        const summary = await manager.validate(table);

        writeVariantTable(table, outputPath);
        this.log.info(`Variant validation complete. Output saved to ${outputPath}.`);
        return { table, summary, outputPath };
    }

    async annotateFile(inputPath: string, outputPath: string): Promise<StageResult> {
        this.log.info(`Reading in validated variants from ${inputPath}`);
        const table = readVariantTable(inputPath);

        const manager = new ClinVarAnnotationManager(this.classifier, this.annotationOptions);
        this.forward(manager, 'Annotation');
        const summary = await manager.annotate(table);

        writeVariantTable(table, outputPath);
        this.log.info(`Variant annotation complete. Output saved to ${outputPath}.`);
        return { table, summary, outputPath };
    }

    private forward(manager: EventEmitter, stage: PipelineStage): void {
        manager.on('start', (total: number) => {
            this.emit('stage-start', { stage, total } satisfies StageEvent);
        });
        manager.on('progress', (progress: BatchProgress) => {
            this.emit('stage-progress', { stage, ...progress } satisfies StageProgressEvent);
        });
        manager.on('complete', (summary: BatchSummary) => {
            this.emit('stage-complete', { stage, summary });
        });
    }
}
