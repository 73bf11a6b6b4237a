export { VariantValidatorClient, parseGenomicVariant } from './validator/variant-validator-client.js';
export type { NormalizationOutcome, NormalizationFailureKind, VariantValidatorOptions } from './validator/variant-validator-client.js';
export { VariantValidationManager } from './validator/variant-validation-manager.js';
export type { VariantNormalizer, ValidationManagerOptions } from './validator/variant-validation-manager.js';
export { ClinVarClient } from './clinvar/clinvar-client.js';
export type { ClinVarSummary, ClassificationRecord, ClinVarClientOptions } from './clinvar/clinvar-client.js';
export { ClinVarAnnotationManager } from './clinvar/clinvar-annotation-manager.js';
export type { ClassificationLookup, AnnotationManagerOptions } from './clinvar/clinvar-annotation-manager.js';
export { deriveStarRating, DEFAULT_REVIEW_STATUS_STARS } from './clinvar/review-status.js';
export type { StarRating, ReviewStatusTable } from './clinvar/review-status.js';
export { VariantTable, createVariantRecord, variantDescriptor } from './table/variant-table.js';
export type { VariantRecord, VariantCoordinates } from './table/variant-table.js';
export { readVariantTable, writeVariantTable, parseVariantCsv } from './table/csv-io.js';
export { VariantPipeline } from './pipeline/variant-pipeline.js';
export type { BatchSummary, BatchStatus } from './pipeline/batch.js';
export { SessionWorkspace } from './session/session-workspace.js';
export { VariantMCPServer } from './mcp-server/server.js';
export { ProgressTracker, PipelineProgress } from './utils/progress.js';
export { RequestPacer, FixedDelay } from './utils/pacing.js';
export { Logger, logger } from './utils/logger.js';
export * from './utils/errors.js';
export { config } from './config/index.js';
