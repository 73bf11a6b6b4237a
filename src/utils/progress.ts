import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { BatchSummary } from '../pipeline/batch.js';
import type { StageEvent, StageProgressEvent, VariantPipeline } from '../pipeline/variant-pipeline.js';

export interface ProgressConfig {
    title: string;
    total: number;
    showEta: boolean;
    showRate: boolean;
}

interface BarStats {
    startTime: number;
    title: string;
    rate: number;
}

export class ProgressTracker {
    private bars: Map<string, cliProgress.SingleBar> = new Map();
    private stats: Map<string, BarStats> = new Map();
    private multiBar: cliProgress.MultiBar;

    constructor() {
        this.multiBar = new cliProgress.MultiBar({
            clearOnComplete: false,
            hideCursor: true,
            barCompleteChar: '█',
            barIncompleteChar: '░',
        }, cliProgress.Presets.shades_grey);
    }

    createProgressBar(id: string, config: ProgressConfig): void {
        const bar = this.multiBar.create(config.total, 0, {
            status: config.title,
            rate: '0/s',
            item: '',
        }, {
            format: this.buildFormat(config),
        });

        this.bars.set(id, bar);
        this.stats.set(id, { startTime: Date.now(), title: config.title, rate: 0 });
    }

    private buildFormat(config: ProgressConfig): string {
        let format = ` ${chalk.cyan('{status}')} {bar} | {value}/{total}`;
        if (config.showRate) {
            format += ' | {rate}';
        }
        if (config.showEta) {
            format += ' | ETA: {eta}s';
        }
        return `${format} | ${chalk.gray('{item}')}`;
    }

    updateProgress(id: string, current: number, item?: string): void {
        const bar = this.bars.get(id);
        const stats = this.stats.get(id);
        if (!bar || !stats) {
            throw new Error(`Progress bar '${id}' not found`);
        }

        const elapsed = (Date.now() - stats.startTime) / 1000;
        stats.rate = elapsed > 0 ? current / elapsed : 0;

        bar.update(current, {
            status: stats.title,
            rate: `${stats.rate.toFixed(1)}/s`,
            item: item ?? '',
        });
    }

    completeProgress(id: string, message?: string): void {
        const bar = this.bars.get(id);
        const stats = this.stats.get(id);
        if (!bar || !stats) return;

        bar.update(bar.getTotal(), {
            status: message ?? `${stats.title} - Complete!`,
            item: '',
        });
    }

    failProgress(id: string, error: string): void {
        const bar = this.bars.get(id);
        const stats = this.stats.get(id);
        if (!bar || !stats) return;

        bar.update({ status: chalk.red(`${stats.title} - Failed: ${error}`) });
    }

    stop(): void {
        this.multiBar.stop();
    }
}

/**
 * One bar per pipeline stage, driven by the pipeline's stage events.
 */
export class PipelineProgress {
    private tracker = new ProgressTracker();
    private active = new Map<string, string>();

    attach(pipeline: VariantPipeline): this {
        pipeline.on('stage-start', (event: StageEvent) => {
            const id = `${event.stage}-${Date.now()}`;
            this.active.set(event.stage, id);
            this.tracker.createProgressBar(id, {
                title: event.stage === 'Validation' ? 'VariantValidator' : 'ClinVar',
                total: Math.max(event.total, 1),
                showEta: false,
                showRate: true,
            });
        });

        pipeline.on('stage-progress', (event: StageProgressEvent) => {
            const id = this.active.get(event.stage);
            if (id) this.tracker.updateProgress(id, event.processed, event.label);
        });

        pipeline.on('stage-complete', (event: { stage: string; summary: BatchSummary }) => {
            const id = this.active.get(event.stage);
            if (!id) return;
            const { succeeded, failed, skipped } = event.summary;
            this.tracker.completeProgress(id, chalk.green(`${event.stage} done: ${succeeded} ok, ${skipped} skipped, ${failed} failed`));
            this.active.delete(event.stage);
        });

        return this;
    }

    fail(error: string): void {
        for (const id of this.active.values()) {
            this.tracker.failProgress(id, error);
        }
        this.active.clear();
    }

    stop(): void {
        this.tracker.stop();
    }
}
