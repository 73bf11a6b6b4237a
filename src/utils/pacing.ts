export type SleepFn = (ms: number) => Promise<void>;
export type ClockFn = () => number;

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Keeps consecutive calls at least `minIntervalMs` apart, measured from the
 * start of one call to the start of the next.
 */
export class RequestPacer {
    private readonly minIntervalMs: number;
    private readonly now: ClockFn;
    private readonly sleepFn: SleepFn;

    constructor(options: { minIntervalMs: number; now?: ClockFn; sleep?: SleepFn }) {
        if (!(options.minIntervalMs >= 0)) {
            throw new RangeError(`minIntervalMs must be >= 0, got ${options.minIntervalMs}`);
        }
        this.minIntervalMs = options.minIntervalMs;
        this.now = options.now ?? Date.now;
        this.sleepFn = options.sleep ?? sleep;
    }

    static perSecond(rateLimit: number, overrides: { now?: ClockFn; sleep?: SleepFn } = {}): RequestPacer {
        if (!(rateLimit > 0)) {
            throw new RangeError(`rate limit must be > 0, got ${rateLimit}`);
        }
        return new RequestPacer({ minIntervalMs: 1000 / rateLimit, ...overrides });
    }

    /**
     * Runs the task, then sleeps whatever is left of the interval. A task
     * that throws is not paced: the error goes straight to the caller.
     */
    async run<T>(task: () => Promise<T>): Promise<T> {
        const started = this.now();
        const result = await task();
        const elapsed = this.now() - started;
        if (elapsed < this.minIntervalMs) {
            await this.sleepFn(this.minIntervalMs - elapsed);
        }
        return result;
    }
}

/**
 * Sleeps a fixed gap after every call, including calls that failed.
 */
export class FixedDelay {
    private readonly delayMs: number;
    private readonly sleepFn: SleepFn;

    constructor(options: { delayMs: number; sleep?: SleepFn }) {
        if (!(options.delayMs >= 0)) {
            throw new RangeError(`delayMs must be >= 0, got ${options.delayMs}`);
        }
        this.delayMs = options.delayMs;
        this.sleepFn = options.sleep ?? sleep;
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } finally {
            await this.sleepFn(this.delayMs);
        }
    }
}
