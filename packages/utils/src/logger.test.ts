import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLogger, formatMessage, type LogEntry } from './logger.js';

const entry: LogEntry = {
  ts: '2026-03-01T10:00:00.000Z',
  level: 'WARN',
  component: 'relay',
  msg: 'Worker exited',
  code: 1,
  error: new Error('broken pipe'),
};

describe('formatMessage', () => {
  it('renders a text line with key=value extras', () => {
    expect(formatMessage(entry, false)).toBe(
      '2026-03-01T10:00:00.000Z [WARN] [relay] Worker exited code=1 error=broken pipe',
    );
  });

  it('renders one JSON object in json mode', () => {
    const line = formatMessage({ ...entry, error: 'broken pipe' }, true);
    expect(JSON.parse(line)).toEqual({
      ts: '2026-03-01T10:00:00.000Z',
      level: 'WARN',
      component: 'relay',
      msg: 'Worker exited',
      code: 1,
      error: 'broken pipe',
    });
  });
});

describe('createLogger', () => {
  let dir: string;
  const saved = { file: process.env.HOOKD_LOG_FILE, level: process.env.HOOKD_LOG_LEVEL };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookd-log-'));
  });

  afterEach(() => {
    if (saved.file === undefined) delete process.env.HOOKD_LOG_FILE;
    else process.env.HOOKD_LOG_FILE = saved.file;
    if (saved.level === undefined) delete process.env.HOOKD_LOG_LEVEL;
    else process.env.HOOKD_LOG_LEVEL = saved.level;
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('appends to HOOKD_LOG_FILE instead of the console', () => {
    const logFile = path.join(dir, 'nested', 'relay.log');
    process.env.HOOKD_LOG_FILE = logFile;
    process.env.HOOKD_LOG_LEVEL = 'INFO';
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('watchdog').info('Relay started', { pid: 555 });

    expect(consoleLog).not.toHaveBeenCalled();
    expect(fs.readFileSync(logFile, 'utf-8')).toMatch(/^\S+ \[INFO\] \[watchdog\] Relay started pid=555\n$/);
  });

  it('drops entries below HOOKD_LOG_LEVEL', () => {
    delete process.env.HOOKD_LOG_FILE;
    process.env.HOOKD_LOG_LEVEL = 'WARN';
    const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createLogger('scheduler');
    logger.info('ignored');
    logger.warn('kept');

    expect(consoleLog).not.toHaveBeenCalled();
    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(consoleError.mock.calls[0][0]).toMatch(/\[WARN\] \[scheduler\] kept$/);
  });
});
