import { z } from 'zod';
import { config } from '../config/index.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { TransportError, describeError } from '../utils/errors.js';
import { DEFAULT_REVIEW_STATUS_STARS, ReviewStatusTable, StarRating, deriveStarRating } from './review-status.js';

export type FetchFn = typeof fetch;

export interface ClinVarClientOptions {
    baseUrl?: string;
    database?: string;
    timeoutMs?: number;
    apiKey?: string;
    tool?: string;
    email?: string;
    fetch?: FetchFn;
    logger?: Logger;
}

const ESearchResponseSchema = z.object({
    esearchresult: z.object({
        idlist: z.array(z.string()).optional(),
        ERROR: z.string().optional(),
    }).passthrough().optional(),
}).passthrough();

const TraitXrefSchema = z.object({
    db_source: z.string().nullish(),
    db_id: z.string().nullish(),
}).passthrough();

const TraitSchema = z.object({
    trait_name: z.string().nullish(),
    name: z.string().nullish(),
    trait_xrefs: z.array(TraitXrefSchema).nullish(),
}).passthrough();

const ClassificationSchema = z.object({
    description: z.string().nullish(),
    review_status: z.string().nullish(),
    last_evaluated: z.string().nullish(),
    trait_set: z.array(TraitSchema).nullish(),
}).passthrough();

export const ClinVarSummarySchema = z.object({
    uid: z.string().optional(),
    title: z.string().optional(),
    germline_classification: ClassificationSchema.nullish(),
    clinical_significance: ClassificationSchema.nullish(),
}).passthrough();

export type ClinVarSummary = z.infer<typeof ClinVarSummarySchema>;
export type ClinVarClassification = z.infer<typeof ClassificationSchema>;

const ESummaryResponseSchema = z.object({
    result: z.record(z.unknown()).optional(),
}).passthrough();

export interface ClassificationRecord {
    classification: string | null;
    review_status_text: string | null;
    star_rating: StarRating | null;
    disease_name: string | null;
    disease_mim: string | null;
}

export interface ExtractionOptions {
    reviewStatusTable?: ReviewStatusTable;
    /** Cross-reference authority whose id becomes disease_mim. */
    xrefSource?: string;
}

/**
 * NCBI E-utilities client for ClinVar. Lookups never throw: a failed
 * request is logged and comes back as an empty result, so a batch can move
 * on to the next variant.
 */
export class ClinVarClient {
    private readonly baseUrl: string;
    private readonly database: string;
    private readonly timeoutMs: number;
    private readonly apiKey?: string;
    private readonly tool?: string;
    private readonly email?: string;
    private readonly fetchFn: FetchFn;
    private readonly log: Logger;

    constructor(options: ClinVarClientOptions = {}) {
        const defaults = config.clinvar;
        this.baseUrl = (options.baseUrl ?? defaults.baseUrl).replace(/\/+$/, '');
        this.database = options.database ?? defaults.database;
        this.timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
        this.apiKey = options.apiKey ?? defaults.apiKey;
        this.tool = options.tool ?? defaults.tool;
        this.email = options.email ?? defaults.email;
        this.fetchFn = options.fetch ?? fetch;
        this.log = options.logger ?? defaultLogger;
    }

    /**
     * ClinVar UIDs matching an HGVS expression, in the order esearch returns
     * them. Empty when nothing matches or the request fails.
     */
    async search(hgvs: string): Promise<string[]> {
        const params = { db: this.database, term: hgvs, retmode: 'json' };
        try {
            const body = ESearchResponseSchema.parse(await this.getJson('esearch.fcgi', params));
            const result = body.esearchresult;
            if (result?.ERROR) {
                this.log.warn(`ClinVar search reported an error for ${hgvs}: ${result.ERROR}`, { term: hgvs });
            }
            return result?.idlist ?? [];
        } catch (error) {
            this.log.error(`Failed to search ClinVar for HGVS '${hgvs}': ${describeError(error)}`, {
                endpoint: `${this.baseUrl}/esearch.fcgi`,
                db: params.db,
                term: params.term,
            });
            return [];
        }
    }

    /**
     * The esummary document for one UID, or `{}` when the response has no
     * entry for it or the request fails.
     */
    async fetchRecord(uid: string): Promise<ClinVarSummary> {
        const params = { db: this.database, id: uid, retmode: 'json' };
        try {
            const body = ESummaryResponseSchema.parse(await this.getJson('esummary.fcgi', params));
            const entry = body.result?.[uid];
            if (entry === undefined) {
                this.log.warn(`ClinVar summary has no entry for UID ${uid}`, { uid });
                return {};
            }
            return ClinVarSummarySchema.parse(entry);
        } catch (error) {
            this.log.error(`Failed to fetch ClinVar summary for UID ${uid}: ${describeError(error)}`, {
                endpoint: `${this.baseUrl}/esummary.fcgi`,
                db: params.db,
                id: params.id,
            });
            return {};
        }
    }

    /**
     * Consensus call, review status, star rating and first linked disease.
     * `germline_classification` is read when it carries anything, the older
     * `clinical_significance` block otherwise.
     */
    static extractClassification(summary: ClinVarSummary, options: ExtractionOptions = {}): ClassificationRecord {
        const block = ClinVarClient.classificationBlock(summary);
        const reviewStatus = blankToNull(block?.review_status);
        const disease = ClinVarClient.extractDisease(block, options.xrefSource);

        return {
            classification: blankToNull(block?.description),
            review_status_text: reviewStatus,
            star_rating: deriveStarRating(reviewStatus, options.reviewStatusTable ?? DEFAULT_REVIEW_STATUS_STARS),
            disease_name: disease.disease_name,
            disease_mim: disease.disease_mim,
        };
    }

    /**
     * Name of the first trait, and the id of the first cross-reference on it
     * whose source matches `xrefSource` (case-insensitive). Later traits are
     * ignored.
     */
    static extractDisease(
        block: ClinVarClassification | null | undefined,
        xrefSource: string = config.clinvar.diseaseXrefSource
    ): { disease_name: string | null; disease_mim: string | null } {
        const firstTrait = block?.trait_set?.[0];
        if (!firstTrait) {
            return { disease_name: null, disease_mim: null };
        }

        const wanted = xrefSource.toLowerCase();
        const xref = (firstTrait.trait_xrefs ?? []).find(ref => ref.db_source?.toLowerCase() === wanted);

        return {
            disease_name: blankToNull(firstTrait.trait_name) ?? blankToNull(firstTrait.name),
            disease_mim: blankToNull(xref?.db_id),
        };
    }

    static classificationBlock(summary: ClinVarSummary): ClinVarClassification | null {
        const germline = summary.germline_classification;
        if (germline && !isEmptyClassification(germline)) {
            return germline;
        }
        return summary.clinical_significance ?? null;
    }

    private async getJson(endpoint: string, params: Record<string, string>): Promise<unknown> {
        const query = new URLSearchParams(params);
        if (this.tool) query.set('tool', this.tool);
        if (this.email) query.set('email', this.email);
        if (this.apiKey) query.set('api_key', this.apiKey);
        const url = `${this.baseUrl}/${endpoint}?${query.toString()}`;

        let response: Response;
        try {
            response = await this.fetchFn(url, {
                headers: { accept: 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            throw new TransportError('ClinVar', url, describeError(error), { cause: error });
        }

        if (!response.ok) {
            throw new TransportError('ClinVar', url, `unexpected status code ${response.status}`, {
                status: response.status,
            });
        }
        return response.json();
    }
}

function isEmptyClassification(block: ClinVarClassification): boolean {
    return blankToNull(block.description) === null
        && blankToNull(block.review_status) === null
        && (block.trait_set ?? []).length === 0;
}

function blankToNull(value: string | null | undefined): string | null {
    return value === undefined || value === null || value.trim() === '' ? null : value;
}
