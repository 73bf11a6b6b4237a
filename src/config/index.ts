import dotenv from 'dotenv';

dotenv.config();

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

interface Config {
    variantValidator: {
        baseUrl: string;
        genomeBuild: string;
        transcriptModel: string;
        selectTranscripts: string;
        checkOnly: boolean;
        liftover: boolean;
        rateLimitPerSecond: number;
        timeoutMs: number;
    };
    clinvar: {
        baseUrl: string;
        database: string;
        requestDelayMs: number;
        timeoutMs: number;
        apiKey?: string;
        tool: string;
        email?: string;
        diseaseXrefSource: string;
    };
    session: {
        dataDir: string;
    };
    logging: {
        level: LogLevelName;
        fileLevel: LogLevelName;
        file?: string;
        maxBytes: number;
        backupCount: number;
    };
}

function positiveNumber(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function nonNegativeInt(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = parseInt(value, 10);
    return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

const LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

function levelName(value: string | undefined, fallback: LogLevelName): LogLevelName {
    const wanted = value?.trim().toLowerCase();
    return LEVEL_NAMES.find(level => level === wanted) ?? fallback;
}

function optional(value: string | undefined): string | undefined {
    return value && value.trim() !== '' ? value.trim() : undefined;
}

// LOG_FILE=none turns the file sink off
const logFile = process.env.LOG_FILE || './logs/pdvar.log';

export const config: Config = {
    variantValidator: {
        baseUrl: process.env.VV_BASE_URL || 'https://rest.variantvalidator.org/LOVD/lovd',
        genomeBuild: process.env.GENOME_BUILD || 'GRCh38',
        transcriptModel: process.env.VV_TRANSCRIPT_MODEL || 'refseq',
        selectTranscripts: process.env.VV_SELECT_TRANSCRIPTS || 'mane_select',
        checkOnly: false,
        liftover: false,
        rateLimitPerSecond: positiveNumber(process.env.VV_RATE_LIMIT_PER_SECOND, 4),
        timeoutMs: positiveNumber(process.env.VV_TIMEOUT_MS, 30000),
    },
    clinvar: {
        baseUrl: process.env.EUTILS_BASE_URL || 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils',
        database: 'clinvar',
        requestDelayMs: positiveNumber(process.env.NCBI_REQUEST_DELAY_MS, 340),
        timeoutMs: positiveNumber(process.env.NCBI_TIMEOUT_MS, 30000),
        apiKey: optional(process.env.NCBI_API_KEY),
        tool: process.env.NCBI_TOOL || 'pd-variant-annotator',
        email: optional(process.env.NCBI_EMAIL),
        diseaseXrefSource: process.env.DISEASE_XREF_SOURCE || 'OMIM',
    },
    session: {
        dataDir: process.env.PDVAR_DATA_DIR || './data',
    },
    logging: {
        level: levelName(process.env.LOG_LEVEL, 'warn'),
        fileLevel: levelName(process.env.LOG_FILE_LEVEL, 'info'),
        file: logFile.toLowerCase() === 'none' ? undefined : logFile,
        maxBytes: positiveNumber(process.env.LOG_MAX_BYTES, 500000),
        backupCount: nonNegativeInt(process.env.LOG_BACKUP_COUNT, 2),
    },
};
