import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, existsSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { logEvent, logError } from '../../logger.js';

const ENV_KEYS = ['KEEPER_HOME', 'KEEPER_LOG', 'KEEPER_LOG_LEVEL', 'KEEPER_RUN_ID'] as const;

describe('logEvent', () => {
  let home: string;
  let saved: Partial<Record<(typeof ENV_KEYS)[number], string>>;

  const logPath = () => join(home, 'logs', 'run-test-run.jsonl');
  const readEntries = () =>
    readFileSync(logPath(), 'utf8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));

  beforeEach(() => {
    saved = {};
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    home = mkdtempSync(join(tmpdir(), 'keeper-log-'));
    process.env.KEEPER_HOME = home;
    process.env.KEEPER_RUN_ID = 'test-run';
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    rmSync(home, { recursive: true, force: true });
  });

  it('should not write info events when file logging is off', () => {
    logEvent('info', 'token:refreshed', { expiresInSeconds: 10 });
    expect(existsSync(logPath())).toBe(false);
  });

  it('should always write error events', () => {
    logEvent('error', 'store:write_failed', { path: '/tmp/x' });

    const [entry] = readEntries();
    expect(entry.level).toBe('error');
    expect(entry.event).toBe('store:write_failed');
    expect(entry.data).toEqual({ path: '/tmp/x' });
    expect(entry.pid).toBe(process.pid);
  });

  it('should write events when KEEPER_LOG is enabled', () => {
    process.env.KEEPER_LOG = 'true';
    logEvent('info', 'orchestrator:ensure', { state: 'valid' });

    const [entry] = readEntries();
    expect(entry.event).toBe('orchestrator:ensure');
  });

  it('should respect the level threshold', () => {
    process.env.KEEPER_LOG = '1';
    process.env.KEEPER_LOG_LEVEL = 'warn';
    logEvent('debug', 'too:chatty');
    logEvent('warn', 'kept');

    const entries = readEntries();
    expect(entries.map((e) => e.event)).toEqual(['kept']);
  });

  it('should record error context through logError', () => {
    logError('exchange', Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }), {
      endpoint: 'refresh',
    });

    const [entry] = readEntries();
    expect(entry.event).toBe('error:exchange');
    expect(entry.data.message).toBe('refused');
    expect(entry.data.code).toBe('ECONNREFUSED');
    expect(entry.data.extra).toEqual({ endpoint: 'refresh' });
  });

  it('should stringify non-Error values', () => {
    logError('misc', 'plain failure');

    const [entry] = readEntries();
    expect(entry.data.message).toBe('plain failure');
    expect(entry.data.code).toBeUndefined();
  });
});
