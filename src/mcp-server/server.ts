import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { SessionWorkspace } from '../session/session-workspace.js';
import { VariantPipeline } from '../pipeline/variant-pipeline.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';
import { TOOL_DEFINITIONS, VariantTools } from './tools.js';

export interface VariantMCPServerOptions {
    /** stdout carries the protocol, so this logger should not write to the console. */
    logger?: Logger;
    createPipeline?: () => VariantPipeline;
}

export class VariantMCPServer {
    private server: Server;
    private tools: VariantTools;
    private log: Logger;

    constructor(workspace: SessionWorkspace, options: VariantMCPServerOptions = {}) {
        this.log = options.logger ?? defaultLogger;
        this.tools = new VariantTools(workspace, { logger: this.log, createPipeline: options.createPipeline });
        this.server = new Server(
            {
                name: 'pd-variant-annotator',
                version: '1.0.0',
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupHandlers();
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => {
            return { tools: TOOL_DEFINITIONS };
        });

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            return this.tools.call(name, args);
        });
    }

    async start(): Promise<void> {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        this.log.info('MCP server started on stdio');
        console.error('🧬 Variant annotation MCP server ready');
    }
}
