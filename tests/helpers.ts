import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { jest } from '@jest/globals';
import { Logger, LogContext } from '../src/utils/logger';
import { VariantCoordinates, VariantRecord, createVariantRecord } from '../src/table/variant-table';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export const LRRK2_G2019S: VariantCoordinates = { chrom: '12', pos: 40340400, ref: 'G', alt: 'A' };

export const createMockVariantRecord = (
  overrides: Partial<Omit<VariantRecord, 'coordinates' | 'extra'>> = {},
  coordinates: VariantCoordinates = LRRK2_G2019S,
  extra: Record<string, string | null> = {}
): VariantRecord => ({
  ...createVariantRecord(coordinates, extra),
  ...overrides,
});

export function loadFixture(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8'));
}

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function makeTempDir(prefix = 'pdvar-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export const noSleep = async (): Promise<void> => {};

export interface CapturedLine {
  level: string;
  message: string;
  context?: LogContext;
}

/**
 * A console-less logger that records every call.
 */
export function createRecordingLogger(): { logger: Logger; lines: CapturedLine[] } {
  const logger = new Logger({ console: false });
  const lines: CapturedLine[] = [];
  jest.spyOn(logger, 'log').mockImplementation((level, message, context) => {
    lines.push({ level, message, context });
  });
  return { logger, lines };
}

export function messagesAt(lines: CapturedLine[], level: string): string[] {
  return lines.filter(line => line.level === level).map(line => line.message);
}
