import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { config, LogLevelName } from '../config/index.js';

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface LoggerOptions {
    level?: LogLevelName;
    file?: string;
    fileLevel?: LogLevelName;
    maxBytes?: number;
    backupCount?: number;
    console?: boolean;
}

const LEVEL_RANK: Record<LogLevelName, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export class Logger {
    private readonly level: LogLevelName;
    private readonly fileLevel: LogLevelName;
    private readonly file?: string;
    private readonly maxBytes: number;
    private readonly backupCount: number;
    private readonly useConsole: boolean;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'warn';
        this.fileLevel = options.fileLevel ?? 'info';
        this.file = options.file;
        this.maxBytes = options.maxBytes ?? 500000;
        this.backupCount = options.backupCount ?? 2;
        this.useConsole = options.console ?? true;

        for (const level of [this.level, this.fileLevel]) {
            if (!(level in LEVEL_RANK)) {
                throw new RangeError(`level must be one of ${Object.keys(LEVEL_RANK).join(', ')}, got ${level}`);
            }
        }
        if (!Number.isInteger(this.maxBytes) || this.maxBytes <= 0) {
            throw new RangeError('maxBytes must be a positive integer');
        }
        if (!Number.isInteger(this.backupCount) || this.backupCount < 0) {
            throw new RangeError('backupCount must be a non-negative integer');
        }
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    log(level: LogLevelName, message: string, context?: LogContext): void {
        const line = formatLine(level, message, context);

        if (this.useConsole && LEVEL_RANK[level] >= LEVEL_RANK[this.level]) {
            switch (level) {
                case 'debug':
                    console.log(chalk.gray(line));
                    break;
                case 'info':
                    console.log(line);
                    break;
                case 'warn':
                    console.warn(chalk.yellow(line));
                    break;
                case 'error':
                    console.error(chalk.red(line));
                    break;
            }
        }

        if (this.file && LEVEL_RANK[level] >= LEVEL_RANK[this.fileLevel]) {
            this.writeToFile(`${line}\n`);
        }
    }

    private writeToFile(text: string): void {
        if (!this.file) return;
        fs.mkdirSync(path.dirname(this.file), { recursive: true });

        if (fs.existsSync(this.file)) {
            const size = fs.statSync(this.file).size;
            if (size > 0 && size + Buffer.byteLength(text) > this.maxBytes) {
                this.rotate(this.file);
            }
        }

        fs.appendFileSync(this.file, text, 'utf-8');
    }

    // pdvar.log -> pdvar.log.1 -> ... -> pdvar.log.<backupCount>
    private rotate(file: string): void {
        if (this.backupCount === 0) {
            fs.truncateSync(file, 0);
            return;
        }

        const oldest = `${file}.${this.backupCount}`;
        if (fs.existsSync(oldest)) {
            fs.unlinkSync(oldest);
        }
        for (let i = this.backupCount - 1; i >= 1; i--) {
            const source = `${file}.${i}`;
            if (fs.existsSync(source)) {
                fs.renameSync(source, `${file}.${i + 1}`);
            }
        }
        fs.renameSync(file, `${file}.1`);
    }
}

export function formatLine(level: LogLevelName, message: string, context?: LogContext, now: Date = new Date()): string {
    let line = `${now.toISOString()} [${level.toUpperCase()}] ${message}`;
    if (context) {
        for (const [key, value] of Object.entries(context)) {
            if (value === undefined) continue;
            line += ` ${key}=${formatValue(value)}`;
        }
    }
    return line;
}

function formatValue(value: string | number | boolean | null): string {
    if (typeof value === 'string' && /\s/.test(value)) {
        return JSON.stringify(value);
    }
    return String(value);
}

export const logger = new Logger({
    level: config.logging.level,
    fileLevel: config.logging.fileLevel,
    file: config.logging.file,
    maxBytes: config.logging.maxBytes,
    backupCount: config.logging.backupCount,
});
