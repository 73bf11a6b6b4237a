export type BatchStatus = 'not_started' | 'running' | 'completed' | 'aborted';

export interface BatchSummary {
    total: number;
    succeeded: number;
    failed: number;
    skipped: number;
    elapsedMs: number;
}

export interface BatchProgress {
    processed: number;
    total: number;
    rowIndex: number;
    label: string;
}
