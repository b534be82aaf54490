import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '@hookd/utils';
import { loadConfig, readEnvOverrides } from './load-config.js';

describe('loadConfig', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'hookd-config-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('returns defaults when there is no file and no env', () => {
    const config = loadConfig({ projectRoot: root, env: {} });
    expect(config.projectRoot).toBe(root);
    expect(config.relay.socketPath).toBe('/tmp/hookd-relay.sock');
    expect(config.relay.lockPath).toBe('/tmp/hookd-relay.sock.pid');
    expect(config.cli.command).toBe('claude-flow');
    expect(config.cli.workerEnabled).toBe(true);
    expect(config.scheduler.statePath).toBe(path.join(root, '.hookd', 'model-state.json'));
    expect(config.registry.repairLogPath).toBe(path.join(root, '.hookd', 'watchdog-repairs.jsonl'));
  });

  it('layers the config file over defaults and env over the file', () => {
    fs.mkdirSync(path.join(root, '.hookd'));
    fs.writeFileSync(
      path.join(root, '.hookd', 'config.json'),
      JSON.stringify({ relay: { socketPath: '/tmp/file.sock', requestTimeoutMs: 2000 }, cli: { command: 'file-cli' } }),
    );

    const config = loadConfig({
      projectRoot: root,
      env: { HOOKD_CLI: 'env-cli', HOOKD_WORKER: '0', HOOKD_CLI_ARGS: 'x  y' },
    });

    expect(config.relay.socketPath).toBe('/tmp/file.sock');
    expect(config.relay.lockPath).toBe('/tmp/file.sock.pid');
    expect(config.relay.requestTimeoutMs).toBe(2000);
    expect(config.cli.command).toBe('env-cli');
    expect(config.cli.workerEnabled).toBe(false);
    expect(config.cli.prefixArgs).toEqual(['x', 'y']);
  });

  it('derives the lock path from HOOKD_SOCKET', () => {
    const config = loadConfig({ projectRoot: root, env: { HOOKD_SOCKET: '/tmp/env.sock' } });
    expect(config.relay.socketPath).toBe('/tmp/env.sock');
    expect(config.relay.lockPath).toBe('/tmp/env.sock.pid');
  });

  it('keeps an explicit HOOKD_LOCK_FILE', () => {
    const config = loadConfig({
      projectRoot: root,
      env: { HOOKD_SOCKET: '/tmp/env.sock', HOOKD_LOCK_FILE: '/tmp/other.lock' },
    });
    expect(config.relay.lockPath).toBe('/tmp/other.lock');
  });

  it('rejects a non-integer timeout', () => {
    expect(() => loadConfig({ projectRoot: root, env: { HOOKD_REQUEST_TIMEOUT_MS: 'soon' } })).toThrow(ConfigError);
  });

  it('rejects a malformed config file', () => {
    fs.mkdirSync(path.join(root, '.hookd'));
    fs.writeFileSync(path.join(root, '.hookd', 'config.json'), '{not json');
    expect(() => loadConfig({ projectRoot: root, env: {} })).toThrow(ConfigError);
  });

  it('rejects values that fail validation', () => {
    fs.mkdirSync(path.join(root, '.hookd'));
    fs.writeFileSync(path.join(root, '.hookd', 'config.json'), JSON.stringify({ registry: { scanDepth: -1 } }));
    expect(() => loadConfig({ projectRoot: root, env: {} })).toThrow(/Invalid configuration/);
  });
});

describe('readEnvOverrides', () => {
  it('returns empty sections for an empty environment', () => {
    expect(readEnvOverrides({})).toEqual({ relay: {}, cli: {}, registry: {}, scheduler: {}, watchdog: {} });
  });

  it('parses scan depth and model state path', () => {
    const overrides = readEnvOverrides({ HOOKD_SCAN_DEPTH: '2', HOOKD_MODEL_STATE: '/tmp/m.json' });
    expect(overrides.registry).toEqual({ scanDepth: 2 });
    expect(overrides.scheduler).toEqual({ statePath: '/tmp/m.json' });
  });
});
