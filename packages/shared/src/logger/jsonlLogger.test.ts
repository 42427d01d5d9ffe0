import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from '../fs/path';
import { JsonlLogger } from './jsonlLogger';
import type { Logger } from './types';
import type { ScanStarted } from '../types/events';

function fakeLogger(): Logger {
  const logger: Logger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
}

const event1: ScanStarted = {
  schemaVersion: 1,
  timestamp: '2023-01-01T00:00:00.000Z',
  runId: 'run-1',
  type: 'ScanStarted',
  payload: { root: '/work', phase: 'before' },
};

describe('JsonlLogger', () => {
  let tmpDir: string;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  it('logs events to file in JSONL format and forwards them', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'buildprof-logger-test-'));
    const logPath = join(tmpDir, 'nested', 'events.jsonl');
    const inner = fakeLogger();
    const logger = new JsonlLogger(logPath, inner);

    await logger.log(event1);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content).toBe(JSON.stringify(event1) + '\n');
    expect(inner.log).toHaveBeenCalledWith(event1);
  });

  it('appends multiple events', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'buildprof-logger-test-'));
    const logPath = join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath, fakeLogger());

    const event2 = { ...event1, timestamp: '2023-01-01T00:00:01.000Z' };

    await logger.log(event1);
    await logger.log(event2);

    const content = await fs.readFile(logPath, 'utf8');
    const lines = content.trim().split('\n');
    expect(lines.length).toBe(2);
    expect(JSON.parse(lines[0])).toEqual(event1);
    expect(JSON.parse(lines[1])).toEqual(event2);
  });

  it('reports write failures through the inner logger instead of throwing', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'buildprof-logger-test-'));
    // A directory where the log file should be makes appendFile fail.
    const logPath = join(tmpDir, 'events.jsonl');
    await fs.mkdir(logPath);
    const inner = fakeLogger();
    const logger = new JsonlLogger(logPath, inner);

    await expect(logger.log(event1)).resolves.toBeUndefined();
    expect(inner.error).toHaveBeenCalledWith(
      expect.any(Error),
      `Failed to write to event log at ${logPath}`,
    );
  });

  it('delegates plain messages to the inner logger', () => {
    const inner = fakeLogger();
    const logger = new JsonlLogger('/unused/events.jsonl', inner);

    logger.info('i');
    logger.warn('w');
    logger.debug('d');

    expect(inner.info).toHaveBeenCalledWith('i');
    expect(inner.warn).toHaveBeenCalledWith('w');
    expect(inner.debug).toHaveBeenCalledWith('d');
  });

  it('creates children that share the file and scope the inner logger', () => {
    const inner = fakeLogger();
    const logger = new JsonlLogger('/unused/events.jsonl', inner);

    const child = logger.child({ phase: 'after' });

    expect(child).toBeInstanceOf(JsonlLogger);
    expect(inner.child).toHaveBeenCalledWith({ phase: 'after' });
  });
});
