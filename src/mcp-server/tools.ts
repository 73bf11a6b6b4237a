import { z } from 'zod';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { deriveStarRating } from '../clinvar/review-status.js';
import { SessionWorkspace } from '../session/session-workspace.js';
import { VariantPipeline } from '../pipeline/variant-pipeline.js';

export type TextContent = { type: 'text'; text: string };

export type ToolResult = { content: TextContent[]; isError?: boolean };

export const DEFAULT_ROW_LIMIT = 100;

export const FilterVariantsArgs = z.object({
    patient_ids: z.array(z.string()).optional(),
    limit: z.number().int().positive().optional(),
});

export const DeriveStarRatingArgs = z.object({
    review_status: z.string(),
});

export type ToolName = 'list_patients' | 'filter_variants' | 'run_pipeline' | 'derive_star_rating';

export type ToolDefinition = {
    name: ToolName;
    description: string;
    inputSchema: {
        type: 'object';
        properties: Record<string, object>;
        required?: string[];
    };
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [
    {
        name: 'list_patients',
        description: 'List the Patient_ID values present in the annotated session data',
        inputSchema: {
            type: 'object',
            properties: {},
        },
    },
    {
        name: 'filter_variants',
        description: `Return annotated variants for the selected patients.

Each row carries the input coordinates, VariantValidator nomenclature (g_hgvs, t_hgvs, p_hgvs_tlc, symbol)
and the ClinVar classification, review status, star rating (0-4) and first linked disease.
Empty values mean the service returned nothing for that variant.`,
        inputSchema: {
            type: 'object',
            properties: {
                patient_ids: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Patient_ID values to keep (default: all patients)',
                },
                limit: { type: 'number', description: `Maximum number of rows returned (default: ${DEFAULT_ROW_LIMIT})` },
            },
        },
    },
    {
        name: 'run_pipeline',
        description: 'Validate the uploaded variants with VariantValidator, then annotate them from ClinVar. Slow: requests are rate limited.',
        inputSchema: {
            type: 'object',
            properties: {},
        },
    },
    {
        name: 'derive_star_rating',
        description: 'Convert a ClinVar review status into its 0-4 star rating',
        inputSchema: {
            type: 'object',
            properties: {
                review_status: { type: 'string', description: 'e.g. "criteria provided, single submitter"' },
            },
            required: ['review_status'],
        },
    },
];

/**
 * Tool handlers behind the MCP server, kept apart from the transport.
 */
export class VariantTools {
    private readonly workspace: SessionWorkspace;
    private readonly createPipeline: () => VariantPipeline;
    private readonly log: Logger;

    constructor(
        workspace: SessionWorkspace,
        options: { createPipeline?: () => VariantPipeline; logger?: Logger } = {}
    ) {
        this.workspace = workspace;
        this.log = options.logger ?? defaultLogger;
        this.createPipeline = options.createPipeline ?? (() => new VariantPipeline({ logger: this.log }));
    }

    async call(name: string, args: unknown): Promise<ToolResult> {
        try {
            switch (name) {
                case 'list_patients':
                    return this.listPatients();
                case 'filter_variants':
                    return this.filterVariants(FilterVariantsArgs.parse(args ?? {}));
                case 'run_pipeline':
                    return await this.runPipeline();
                case 'derive_star_rating':
                    return this.deriveStarRating(DeriveStarRatingArgs.parse(args ?? {}));
                default:
                    throw new Error(`Unknown tool: ${name}`);
            }
        } catch (error) {
            this.log.error(`Tool ${name} failed: ${describeError(error)}`, { tool: name });
            return {
                content: [{ type: 'text', text: `Error executing tool ${name}: ${describeError(error)}` }],
                isError: true,
            };
        }
    }

    private listPatients(): ToolResult {
        const patientIds = this.workspace.patientIds();
        return json({ count: patientIds.length, patient_ids: patientIds });
    }

    private filterVariants(args: z.infer<typeof FilterVariantsArgs>): ToolResult {
        const result = this.workspace.filter(args.patient_ids ?? []);
        const limit = args.limit ?? DEFAULT_ROW_LIMIT;
        const rows = result.table.toRows();
        return json({
            filter: result.appliedText,
            count: rows.length,
            returned: Math.min(rows.length, limit),
            output_path: result.outputPath,
            variants: rows.slice(0, limit),
        });
    }

    private async runPipeline(): Promise<ToolResult> {
        const pipeline = this.createPipeline();
        const validation = await this.workspace.validate(pipeline);
        const annotation = await this.workspace.annotate(pipeline);
        return json({
            validation: { ...validation.summary, output_path: validation.outputPath },
            annotation: { ...annotation.summary, output_path: annotation.outputPath },
        });
    }

    private deriveStarRating(args: z.infer<typeof DeriveStarRatingArgs>): ToolResult {
        return json({
            review_status: args.review_status,
            star_rating: deriveStarRating(args.review_status),
        });
    }
}

function json(value: unknown): ToolResult {
    return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}
