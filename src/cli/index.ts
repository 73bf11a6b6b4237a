#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'fs';
import { config } from '../config/index.js';
import { SessionWorkspace } from '../session/session-workspace.js';
import { StageResult, VariantPipeline } from '../pipeline/variant-pipeline.js';
import { PipelineProgress } from '../utils/progress.js';
import { PipelineStage, describeError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { deriveStarRating } from '../clinvar/review-status.js';
import { VariantTable } from '../table/variant-table.js';
import { formatCsv } from '../table/csv-io.js';
import { parseRowLimit } from './options.js';

const program = new Command();

program
    .name('pdvar')
    .description('Validate patient variant calls with VariantValidator and annotate them from ClinVar')
    .version('1.0.0')
    .option('-d, --data-dir <dir>', 'Session data directory', config.session.dataDir);

function workspace(): SessionWorkspace {
    const { dataDir } = program.opts<{ dataDir: string }>();
    return new SessionWorkspace(dataDir);
}

function fail(error: unknown): never {
    console.error(chalk.red('❌ Error:'), describeError(error));
    process.exit(1);
}

async function runStages(stages: PipelineStage[]): Promise<void> {
    const session = workspace();
    const pipeline = new VariantPipeline();
    const progress = new PipelineProgress().attach(pipeline);
    const results: [PipelineStage, StageResult][] = [];

    try {
        for (const stage of stages) {
            const result = stage === 'Validation'
                ? await session.validate(pipeline)
                : await session.annotate(pipeline);
            results.push([stage, result]);
        }
    } catch (error) {
        progress.fail(describeError(error));
        throw error;
    } finally {
        progress.stop();
    }

    for (const [stage, result] of results) {
        const { total, succeeded, skipped, failed } = result.summary;
        console.log(chalk.green(`✅ ${stage} complete: ${result.outputPath}`));
        console.log(chalk.gray(`   ${total} variants | ${succeeded} ok | ${skipped} skipped | ${failed} failed`));
    }
}

function printTable(table: VariantTable, limit?: number): void {
    const rows = limit !== undefined ? table.toRows().slice(0, limit) : table.toRows();
    process.stdout.write(formatCsv(table.columns, rows));
    console.log(chalk.gray(`Rows: ${table.size}${limit !== undefined && table.size > limit ? ` (showing ${limit})` : ''}`));
}

program
    .command('upload')
    .description('Add patient variant CSVs to the session (Patient_ID is taken from the file name)')
    .argument('<files...>', 'CSV files with #CHROM, POS, REF and ALT columns')
    .action((files: string[]) => {
        try {
            const session = workspace();
            for (const file of files) {
                if (!existsSync(file)) {
                    throw new Error(`File not found: ${file}`);
                }
                const result = session.addUpload(file);
                if (result.status === 'duplicate') {
                    console.log(chalk.yellow(`⚠ ${result.fileName} has already been uploaded`));
                } else {
                    console.log(chalk.green(`📁 Uploaded ${result.fileName}`) + chalk.gray(` (Patient_ID ${result.patientId}, ${result.rows} variants)`));
                }
            }
        } catch (error) {
            fail(error);
        }
    });

program
    .command('validate')
    .description('Validate the uploaded variants with VariantValidator')
    .action(async () => {
        try {
            await runStages(['Validation']);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('annotate')
    .description('Annotate validated variants from ClinVar')
    .action(async () => {
        try {
            await runStages(['Annotation']);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('run')
    .description('Validate, then annotate, the uploaded variants')
    .action(async () => {
        try {
            console.log(chalk.blue('🧬 Running validation and annotation...'));
            await runStages(['Validation', 'Annotation']);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('patients')
    .description('List the Patient_IDs in the annotated data')
    .action(() => {
        try {
            const ids = workspace().patientIds();
            if (ids.length === 0) {
                console.log(chalk.yellow('No patients found'));
            }
            for (const id of ids) {
                console.log(id);
            }
        } catch (error) {
            fail(error);
        }
    });

program
    .command('filter')
    .description('Show annotated variants for selected patients')
    .option('-p, --patient <ids...>', 'Patient_ID values to keep (default: all)')
    .option('-l, --limit <number>', 'Maximum rows to print', parseRowLimit)
    .action((options: { patient?: string[]; limit?: number }) => {
        try {
            const result = workspace().filter(options.patient ?? []);
            console.log(chalk.blue(result.appliedText));
            printTable(result.table, options.limit);
            console.log(chalk.gray(`Saved to ${result.outputPath}`));
        } catch (error) {
            fail(error);
        }
    });

program
    .command('star-rating')
    .description('Show the star rating for a ClinVar review status')
    .argument('<text...>', 'Review status text')
    .action((text: string[]) => {
        const rating = deriveStarRating(text.join(' '));
        console.log(rating === null ? chalk.yellow('unrecognised review status') : `${'★'.repeat(rating)}${'☆'.repeat(4 - rating)} (${rating})`);
    });

program
    .command('refresh')
    .description('Clear the session data directory')
    .action(() => {
        try {
            const removed = workspace().refresh();
            console.log(chalk.green(`🧹 Session cleared (${removed} files removed)`));
        } catch (error) {
            fail(error);
        }
    });

program
    .command('mcp-server')
    .description('Start MCP server for LLM integration')
    .action(async () => {
        try {
            const { VariantMCPServer } = await import('../mcp-server/server.js');
            const { dataDir } = program.opts<{ dataDir: string }>();
            const quiet = new Logger({ ...config.logging, console: false });
            const server = new VariantMCPServer(new SessionWorkspace(dataDir, { logger: quiet }), { logger: quiet });
            await server.start();
        } catch (error) {
            console.error(chalk.red('❌ Error starting MCP server:'), describeError(error));
            process.exit(1);
        }
    });

program.parseAsync(process.argv).catch(fail);
