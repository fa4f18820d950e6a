import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  Logger,
  formatForFile,
  getLogger,
  initLogger,
  shutdownLogger,
  type LogEntry,
} from '../src/logger.js';

describe('Logger', () => {
  const dirs: string[] = [];

  afterEach(async () => {
    await shutdownLogger();
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('forwards entries to onLog and keeps them in memory', () => {
    const seen: LogEntry[] = [];
    const logger = new Logger({ onLog: (entry) => seen.push(entry) });

    logger.info('commits', 'Read 3 commits', { queried: 4 });

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      level: 'info',
      category: 'commits',
      message: 'Read 3 commits',
      data: { queried: 4 },
    });
    expect(logger.allEntries).toEqual(seen);
    expect(logger.filePath).toBeNull();
  });

  it('drops entries below the minimum level', () => {
    const logger = new Logger({ level: 'warn' });
    logger.debug('x', 'debug');
    logger.info('x', 'info');
    logger.warn('x', 'warn');
    logger.error('x', 'error');
    expect(logger.allEntries.map((e) => e.message)).toEqual(['warn', 'error']);
  });

  it('appends formatted lines to a session file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'worklog-logs-'));
    dirs.push(dir);
    const logger = new Logger({ logDir: path.join(dir, 'logs') });

    logger.info('test', 'hello', { n: 1 });
    await logger.close();

    expect(logger.filePath).toMatch(/worklog-[\d-]+_[\d-]+\.log$/);
    const content = fs.readFileSync(logger.filePath ?? '', 'utf-8');
    expect(content).toContain('INFO  [test]     hello {"n":1}\n');
    expect(content).toContain('Log session ended');
  });

  it('formats a file line with padded level and category', () => {
    const line = formatForFile({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: 'warn',
      category: 'git',
      message: 'm',
    });
    expect(line).toBe('2026-01-01T00:00:00.000Z WARN  [git]      m');
  });

  it('hands out an in-memory logger until one is initialised', async () => {
    const fallback = getLogger();
    expect(fallback.filePath).toBeNull();
    expect(getLogger()).toBe(fallback);

    const seen: LogEntry[] = [];
    const logger = initLogger({ onLog: (entry) => seen.push(entry) });
    expect(getLogger()).toBe(logger);
    getLogger().warn('git', 'Skipping malformed log record');
    expect(seen.map((e) => e.message)).toContain('Skipping malformed log record');

    await shutdownLogger();
    expect(getLogger()).not.toBe(logger);
  });
});
