import { z } from 'zod';
import { config } from '../config/index.js';
import { TransportError, describeError } from '../utils/errors.js';
import { ValidationFields, VariantCoordinates, variantDescriptor } from '../table/variant-table.js';

export type FetchFn = typeof fetch;

export interface VariantValidatorOptions {
    baseUrl?: string;
    genomeBuild?: string;
    transcriptModel?: string;
    selectTranscripts?: string;
    checkOnly?: boolean;
    liftover?: boolean;
    timeoutMs?: number;
    fetch?: FetchFn;
}

const GeneInfoSchema = z.object({
    hgnc_id: z.string().nullish(),
    symbol: z.string().nullish(),
}).passthrough();

const TranscriptEntrySchema = z.object({
    t_hgvs: z.string().nullish(),
    p_hgvs_tlc: z.string().nullish(),
    gene_info: GeneInfoSchema.nullish(),
}).passthrough();

export const GenomicVariantSchema = z.object({
    g_hgvs: z.string().nullish(),
    genomic_variant_error: z.string().nullish(),
    hgvs_t_and_p: z.record(TranscriptEntrySchema).nullish(),
}).passthrough();

export type GenomicVariantPayload = z.infer<typeof GenomicVariantSchema>;

export type NormalizationFailureKind = 'service_error' | 'ambiguous_transcripts' | 'malformed_response';

export type NormalizationOutcome =
    | { ok: true; descriptor: string; transcriptId: string; values: ValidationFields }
    | { ok: false; descriptor: string; kind: NormalizationFailureKind; reason: string; transcriptCount?: number };

/**
 * Client for the VariantValidator LOVD endpoint. One MANE Select transcript
 * is expected per variant; anything else is reported as a failed outcome.
 * Network and HTTP failures throw {@link TransportError}.
 */
export class VariantValidatorClient {
    readonly genomeBuild: string;
    private readonly baseUrl: string;
    private readonly transcriptModel: string;
    private readonly selectTranscripts: string;
    private readonly checkOnly: boolean;
    private readonly liftover: boolean;
    private readonly timeoutMs: number;
    private readonly fetchFn: FetchFn;

    constructor(options: VariantValidatorOptions = {}) {
        const defaults = config.variantValidator;
        this.baseUrl = (options.baseUrl ?? defaults.baseUrl).replace(/\/+$/, '');
        this.genomeBuild = options.genomeBuild ?? defaults.genomeBuild;
        this.transcriptModel = options.transcriptModel ?? defaults.transcriptModel;
        this.selectTranscripts = options.selectTranscripts ?? defaults.selectTranscripts;
        this.checkOnly = options.checkOnly ?? defaults.checkOnly;
        this.liftover = options.liftover ?? defaults.liftover;
        this.timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
        this.fetchFn = options.fetch ?? fetch;
    }

    buildUrl(descriptor: string, genomeBuild: string = this.genomeBuild): string {
        const segments = [
            genomeBuild,
            descriptor,
            this.transcriptModel,
            this.selectTranscripts,
            flagSegment(this.checkOnly),
            flagSegment(this.liftover),
        ].map(encodeURIComponent);
        return `${this.baseUrl}/${segments.join('/')}?content-type=application%2Fjson`;
    }

    /**
     * Returns the decoded JSON body for one descriptor.
     */
    async fetchRaw(descriptor: string, genomeBuild?: string): Promise<unknown> {
        const url = this.buildUrl(descriptor, genomeBuild);

        let response: Response;
        try {
            response = await this.fetchFn(url, {
                headers: { accept: 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            throw new TransportError('VariantValidator', url, describeError(error), { cause: error });
        }

        if (response.status !== 200) {
            const body = await response.text().catch(() => '');
            throw new TransportError('VariantValidator', url, `unexpected status code ${response.status}: ${body}`, {
                status: response.status,
            });
        }

        try {
            return await response.json();
        } catch (error) {
            throw new TransportError('VariantValidator', url, `invalid JSON body: ${describeError(error)}`, {
                status: response.status,
                cause: error,
            });
        }
    }

    async normalize(coordinates: VariantCoordinates, genomeBuild?: string): Promise<NormalizationOutcome> {
        const descriptor = variantDescriptor(coordinates);
        const payload = await this.fetchRaw(descriptor, genomeBuild);
        return parseGenomicVariant(descriptor, payload);
    }
}

/**
 * Digs the per-variant object out of the response (it is keyed by the
 * descriptor twice) and turns it into an outcome.
 */
export function parseGenomicVariant(descriptor: string, payload: unknown): NormalizationOutcome {
    const inner = lookup(lookup(payload, descriptor), descriptor);
    if (inner === undefined) {
        return {
            ok: false,
            descriptor,
            kind: 'malformed_response',
            reason: `response has no entry for ${descriptor}`,
        };
    }

    const parsed = GenomicVariantSchema.safeParse(inner);
    if (!parsed.success) {
        return {
            ok: false,
            descriptor,
            kind: 'malformed_response',
            reason: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        };
    }

    const variant = parsed.data;
    if (variant.genomic_variant_error !== null && variant.genomic_variant_error !== undefined) {
        return { ok: false, descriptor, kind: 'service_error', reason: variant.genomic_variant_error };
    }

    const transcripts = Object.entries(variant.hgvs_t_and_p ?? {});
    if (transcripts.length !== 1) {
        return {
            ok: false,
            descriptor,
            kind: 'ambiguous_transcripts',
            reason: transcripts.length === 0
                ? 'no MANE Select transcript returned, expected exactly 1'
                : `>1 MANE Select transcript returned (${transcripts.length}), expected exactly 1`,
            transcriptCount: transcripts.length,
        };
    }

    const [[transcriptId, entry]] = transcripts;
    return {
        ok: true,
        descriptor,
        transcriptId,
        values: {
            g_hgvs: blankToNull(variant.g_hgvs),
            t_hgvs: blankToNull(entry.t_hgvs),
            hgnc_id: blankToNull(entry.gene_info?.hgnc_id),
            symbol: blankToNull(entry.gene_info?.symbol),
            p_hgvs_tlc: blankToNull(entry.p_hgvs_tlc),
        },
    };
}

function lookup(value: unknown, key: string): unknown {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return undefined;
    }
    return Object.prototype.hasOwnProperty.call(value, key)
        ? Object.getOwnPropertyDescriptor(value, key)?.value
        : undefined;
}

function blankToNull(value: string | null | undefined): string | null {
    return value === undefined || value === null || value.trim() === '' ? null : value;
}

// the LOVD endpoint spells its flags True and False
function flagSegment(value: boolean): string {
    return value ? 'True' : 'False';
}
