/**
 * Unit tests for the logger
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Logger, formatLine } from '../../src/utils/logger';
import { makeTempDir } from '../helpers';

const NOW = new Date('2025-01-02T03:04:05.000Z');

describe('formatLine', () => {
  it('renders timestamp, level and message', () => {
    expect(formatLine('info', 'Reading in variants', undefined, NOW))
      .toBe('2025-01-02T03:04:05.000Z [INFO] Reading in variants');
  });

  it('appends context as key=value pairs', () => {
    expect(formatLine('warn', 'Variant skipped', { row: 3, variant: '12-40340400-G-A', retry: false }, NOW))
      .toBe('2025-01-02T03:04:05.000Z [WARN] Variant skipped row=3 variant=12-40340400-G-A retry=false');
  });

  it('quotes values containing whitespace and drops undefined ones', () => {
    expect(formatLine('error', 'Lookup failed', { term: 'a b', uid: undefined, status: null }, NOW))
      .toBe('2025-01-02T03:04:05.000Z [ERROR] Lookup failed term="a b" status=null');
  });
});

describe('Logger', () => {
  describe('console sink', () => {
    let log: jest.Mock;
    let warn: jest.Mock;
    let error: jest.Mock;

    beforeEach(() => {
      log = jest.fn();
      warn = jest.fn();
      error = jest.fn();
      console.log = log;
      console.warn = warn;
      console.error = error;
    });

    it('drops messages below the console level', () => {
      const logger = new Logger({ level: 'warn' });

      logger.debug('debug detail');
      logger.info('progress');

      expect(log).not.toHaveBeenCalled();
    });

    it('routes warnings and errors to their console streams', () => {
      const logger = new Logger({ level: 'debug' });

      logger.info('loaded');
      logger.warn('careful');
      logger.error('failed');

      expect(log).toHaveBeenCalledTimes(1);
      expect(String(log.mock.calls[0][0])).toContain('[INFO] loaded');
      expect(String(warn.mock.calls[0][0])).toContain('[WARN] careful');
      expect(String(error.mock.calls[0][0])).toContain('[ERROR] failed');
    });

    it('stays quiet when the console is disabled', () => {
      const logger = new Logger({ level: 'debug', console: false });

      logger.error('failed');

      expect(error).not.toHaveBeenCalled();
    });
  });

  describe('file sink', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
      dir = makeTempDir();
      file = path.join(dir, 'logs', 'pdvar.log');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('creates the log directory and writes lines at or above the file level', () => {
      const logger = new Logger({ console: false, file, fileLevel: 'info' });

      logger.debug('not written');
      logger.info('written');

      const content = fs.readFileSync(file, 'utf-8');
      expect(content.split('\n')).toHaveLength(2);
      expect(content).toMatch(/ \[INFO\] written\n$/);
    });

    it('rotates into numbered backups before the file grows past maxBytes', () => {
      const logger = new Logger({ console: false, file, fileLevel: 'info', maxBytes: 100, backupCount: 2 });

      logger.info('a'.repeat(60));
      logger.info('b'.repeat(60));
      logger.info('c'.repeat(60));

      expect(fs.readFileSync(file, 'utf-8')).toContain('c'.repeat(60));
      expect(fs.readFileSync(`${file}.1`, 'utf-8')).toContain('b'.repeat(60));
      expect(fs.readFileSync(`${file}.2`, 'utf-8')).toContain('a'.repeat(60));
    });

    it('discards the oldest backup', () => {
      const logger = new Logger({ console: false, file, fileLevel: 'info', maxBytes: 100, backupCount: 2 });

      for (const letter of ['a', 'b', 'c', 'd']) {
        logger.info(letter.repeat(60));
      }

      expect(fs.readFileSync(`${file}.2`, 'utf-8')).toContain('b'.repeat(60));
      expect(fs.existsSync(`${file}.3`)).toBe(false);
    });

    it('truncates in place without backups', () => {
      const logger = new Logger({ console: false, file, fileLevel: 'info', maxBytes: 100, backupCount: 0 });

      logger.info('a'.repeat(60));
      logger.info('b'.repeat(60));

      const content = fs.readFileSync(file, 'utf-8');
      expect(content).not.toContain('a'.repeat(60));
      expect(content).toContain('b'.repeat(60));
      expect(fs.existsSync(`${file}.1`)).toBe(false);
    });
  });

  it('rejects invalid size settings', () => {
    expect(() => new Logger({ maxBytes: 0 })).toThrow(RangeError);
    expect(() => new Logger({ maxBytes: 10.5 })).toThrow(RangeError);
    expect(() => new Logger({ backupCount: -1 })).toThrow(RangeError);
  });
});
