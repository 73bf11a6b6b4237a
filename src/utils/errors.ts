/**
 * Error taxonomy for the validation and annotation pipeline.
 *
 * Fatal conditions are thrown as subclasses of {@link PipelineError}.
 * Variants the services could not validate are not errors at all; they
 * come back as failed outcomes and are logged by the orchestrators.
 */

export type ExternalService = 'VariantValidator' | 'ClinVar';

export type PipelineStage = 'Validation' | 'Annotation';

export class PipelineError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Network failure, timeout or non-2xx status from an external service.
 */
export class TransportError extends PipelineError {
    readonly service: ExternalService;
    readonly url: string;
    readonly status?: number;

    constructor(service: ExternalService, url: string, detail: string, options?: { status?: number; cause?: unknown }) {
        super(`${service} request failed (${url}): ${detail}`, { cause: options?.cause });
        this.service = service;
        this.url = url;
        this.status = options?.status;
    }
}

export class MissingInputError extends PipelineError {
    readonly column: string;
    readonly source: string;

    constructor(column: string, source: string) {
        super(`${column} column is missing from ${source}`);
        this.column = column;
        this.source = source;
    }
}

export class MalformedInputError extends PipelineError {
    readonly source: string;
    readonly line?: number;

    constructor(source: string, detail: string, options?: { line?: number; cause?: unknown }) {
        const where = options?.line !== undefined ? `${source} (line ${options.line})` : source;
        super(`Failure reading: ${where}: ${detail}`, { cause: options?.cause });
        this.source = source;
        this.line = options?.line;
    }
}

export class MissingFileError extends PipelineError {
    readonly file: string;

    constructor(file: string) {
        super(`Could not find: ${file}`);
        this.file = file;
    }
}

/**
 * Wraps whatever stopped a stage so callers see which stage it was.
 */
export class ProcessError extends PipelineError {
    readonly stage: PipelineStage;

    constructor(stage: PipelineStage, cause: unknown) {
        super(`${stage} step has failed: ${describeError(cause)}`, { cause });
        this.stage = stage;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
