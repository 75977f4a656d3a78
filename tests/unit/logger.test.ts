/**
 * Unit tests for the structured logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, isLogLevel } from '../../src/lib/logger.js';

function readEntries(file: string): Array<Record<string, unknown>> {
  return readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map(line => JSON.parse(line));
}

describe('Logger', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'movie-rank-logs-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should write ranking decisions to rankings.jsonl', () => {
    const logger = new Logger({ logDir: testDir, console: false });

    logger.logRankingDecision({
      matched_by: 'quantum',
      query: 'space',
      candidate_count: 3,
      selected_index: 2,
      movie_id: 3,
      iterations: 1,
      tunneled: false,
    });

    const [entry] = readEntries(join(testDir, 'rankings.jsonl'));
    expect(entry).toMatchObject({
      level: 'info',
      type: 'ranking_decision',
      matched_by: 'quantum',
      selected_index: 2,
      iterations: 1,
    });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should write general messages to general.jsonl', () => {
    const logger = new Logger({ logDir: testDir, console: false });

    logger.warn('first');
    logger.info('second', { candidates: 4 });

    const entries = readEntries(join(testDir, 'general.jsonl'));
    expect(entries.map(entry => entry.message)).toEqual(['first', 'second']);
    expect(entries[1].context).toEqual({ candidates: 4 });
  });

  it('should create the log directory when missing', () => {
    const nested = join(testDir, 'nested', 'logs');
    new Logger({ logDir: nested, console: false }).error('boom');

    expect(existsSync(join(nested, 'general.jsonl'))).toBe(true);
  });

  it('should write no files without a log directory', () => {
    new Logger({ console: false }).error('console only');

    expect(existsSync(join(testDir, 'general.jsonl'))).toBe(false);
  });

  it('should respect the console level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger({ consoleLevel: 'warn' });

    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should print debug entries at debug level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger({ consoleLevel: 'debug' }).debug('now visible');

    expect(log).toHaveBeenCalledTimes(1);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('fatal')).toBe(false);
  });
});
