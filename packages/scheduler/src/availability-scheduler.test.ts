import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AvailabilityScheduler } from './availability-scheduler.js';

describe('AvailabilityScheduler', () => {
  let baseDir: string;
  let statePath: string;
  let clock: number;
  let scheduler: AvailabilityScheduler;

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookd-scheduler-'));
    statePath = path.join(baseDir, 'model-state.json');
    clock = 1_000;
    scheduler = new AvailabilityScheduler({ statePath, now: () => clock });
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  const readDoc = () => JSON.parse(fs.readFileSync(statePath, 'utf-8'));

  describe('initialize', () => {
    it('creates the document with default providers and chains', async () => {
      await scheduler.initialize();
      const doc = readDoc();
      expect(doc.models['gemini-flash']).toEqual({ available: true, blockedUntil: 0, fallback: 'gemini-pro' });
      expect(doc.fallbackChain.analyze).toEqual(['gemini-flash', 'sonnet', 'gemini-pro', 'opus']);
      expect(doc.fallbackChain.default).toEqual(['sonnet', 'opus']);
      expect(doc.stats).toEqual({ totalFallbacks: 0, lastFallback: null });
    });

    it('keeps an existing document', async () => {
      await scheduler.blockProvider('haiku', 5);
      await scheduler.initialize();
      expect(readDoc().models.haiku.available).toBe(false);
    });

    it('recreates an unreadable document', async () => {
      fs.writeFileSync(statePath, '{"models": 3}');
      const state = await scheduler.initialize();
      expect(state.models.sonnet.available).toBe(true);
      expect(readDoc().fallbackChain.code).toEqual(['sonnet', 'opus']);
    });
  });

  describe('getBestProvider', () => {
    it('returns the first provider in the chain', async () => {
      expect(await scheduler.getBestProvider('analyze')).toEqual({
        provider: 'gemini-flash',
        category: 'analyze',
        chain: ['gemini-flash', 'sonnet', 'gemini-pro', 'opus'],
        degraded: false,
      });
    });

    it('uses the default chain for an unknown category', async () => {
      const choice = await scheduler.getBestProvider('poetry');
      expect(choice.category).toBe('default');
      expect(choice.provider).toBe('sonnet');
    });

    it('does not treat inherited object keys as categories', async () => {
      const choice = await scheduler.getBestProvider('constructor');
      expect(choice.category).toBe('default');
    });

    it('skips a blocked provider until its block expires', async () => {
      await scheduler.blockProvider('gemini-flash', 1);
      expect((await scheduler.getBestProvider('analyze')).provider).toBe('sonnet');

      clock += 59;
      expect((await scheduler.getBestProvider('analyze')).provider).toBe('sonnet');

      clock += 2;
      expect((await scheduler.getBestProvider('analyze')).provider).toBe('gemini-flash');
      expect(readDoc().models['gemini-flash']).toEqual({ available: true, blockedUntil: 0, fallback: 'gemini-pro' });
    });

    it('returns the last provider as a degraded choice when all are blocked', async () => {
      await scheduler.blockProvider('sonnet', 10);
      await scheduler.blockProvider('opus', 10);
      expect(await scheduler.getBestProvider('code')).toEqual({
        provider: 'opus',
        category: 'code',
        chain: ['sonnet', 'opus'],
        degraded: true,
      });
    });
  });

  describe('blockProvider', () => {
    it('blocks for whole minutes and records stats', async () => {
      const result = await scheduler.blockProvider('gemini-flash', 1);
      expect(result).toEqual({ provider: 'gemini-flash', blocked: true, blockedUntil: 1_060, fallback: 'gemini-pro' });
      expect(readDoc().models['gemini-flash']).toEqual({ available: false, blockedUntil: 1_060, fallback: 'gemini-pro' });
      expect(readDoc().stats).toEqual({ totalFallbacks: 1, lastFallback: 'gemini-flash' });
    });

    it('reports the terminal provider when the configured fallback is blocked', async () => {
      await scheduler.blockProvider('gemini-pro', 30);
      const result = await scheduler.blockProvider('gemini-flash', 30);
      expect(result.fallback).toBe('opus');
    });

    it('defaults to the configured block duration', async () => {
      const result = await scheduler.blockProvider('haiku');
      expect(result.blockedUntil).toBe(1_000 + 60 * 60);
    });

    it('keeps a block another process wrote before its own write', async () => {
      await scheduler.initialize();
      let calls = 0;
      const racing = new AvailabilityScheduler({
        statePath,
        now: () => {
          calls += 1;
          if (calls === 2) {
            const doc = readDoc();
            doc.models.haiku = { available: false, blockedUntil: 9_999, fallback: 'sonnet' };
            fs.writeFileSync(statePath, JSON.stringify(doc));
          }
          return clock;
        },
      });

      await racing.blockProvider('gemini-flash', 1);

      expect(readDoc().models.haiku).toEqual({ available: false, blockedUntil: 9_999, fallback: 'sonnet' });
      expect(readDoc().models['gemini-flash']).toEqual({ available: false, blockedUntil: 1_060, fallback: 'gemini-pro' });
    });

    it('is a no-op for an unknown provider', async () => {
      const result = await scheduler.blockProvider('mystery-model', 5);
      expect(result).toEqual({ provider: 'mystery-model', blocked: false, blockedUntil: 0, fallback: 'opus' });
      expect(readDoc().stats.totalFallbacks).toBe(0);
      expect(readDoc().models['mystery-model']).toBeUndefined();
    });
  });

  describe('unblockProvider', () => {
    it('lifts a block immediately', async () => {
      await scheduler.blockProvider('sonnet', 60);
      expect(await scheduler.unblockProvider('sonnet')).toBe(true);
      expect((await scheduler.getBestProvider('code')).provider).toBe('sonnet');
    });

    it('returns false for an unknown provider', async () => {
      expect(await scheduler.unblockProvider('mystery-model')).toBe(false);
    });
  });

  describe('autoUnblock', () => {
    it('returns the providers whose block expired', async () => {
      await scheduler.blockProvider('haiku', 1);
      await scheduler.blockProvider('sonnet', 5);
      expect(await scheduler.autoUnblock(1_060)).toEqual(['haiku']);
      expect(await scheduler.autoUnblock(1_060)).toEqual([]);
    });
  });

  describe('detectRateLimit', () => {
    it('blocks the provider on a throttling response', async () => {
      expect(await scheduler.detectRateLimit('Error: 429 Too Many Requests', 'haiku')).toBe(true);
      expect(readDoc().models.haiku).toEqual({ available: false, blockedUntil: 4_600, fallback: 'sonnet' });
    });

    it('ignores normal output', async () => {
      await scheduler.initialize();
      expect(await scheduler.detectRateLimit('All 14290 checks passed', 'haiku')).toBe(false);
      expect(readDoc().models.haiku.available).toBe(true);
      expect((await scheduler.status()).stats.totalFallbacks).toBe(0);
    });

    it('does not block on a file path that mentions billing', async () => {
      expect(await scheduler.detectRateLimit('Reviewed src/billing/invoice.ts', 'haiku')).toBe(false);
      expect((await scheduler.status()).stats.totalFallbacks).toBe(0);
    });
  });

  describe('status and chain', () => {
    it('reports remaining block time', async () => {
      await scheduler.blockProvider('gemini-flash', 1);
      clock += 30;
      const status = await scheduler.status();
      expect(status.providers.find((p) => p.name === 'gemini-flash')).toEqual({
        name: 'gemini-flash',
        available: false,
        blockedUntil: 1_060,
        remainingSeconds: 30,
        fallback: 'gemini-pro',
      });
      expect(status.stats).toEqual({ totalFallbacks: 1, lastFallback: 'gemini-flash' });
    });

    it('unblocks expired providers before reporting', async () => {
      await scheduler.blockProvider('gemini-flash', 1);
      clock += 120;
      const status = await scheduler.status();
      expect(status.providers.find((p) => p.name === 'gemini-flash')?.available).toBe(true);
    });

    it('shows per-provider availability along a chain', async () => {
      await scheduler.blockProvider('haiku', 10);
      expect(await scheduler.chain('search')).toEqual({
        category: 'search',
        entries: [
          { provider: 'gemini-flash', known: true, available: true },
          { provider: 'haiku', known: true, available: false },
          { provider: 'sonnet', known: true, available: true },
        ],
      });
    });
  });

  describe('reset', () => {
    it('restores defaults and clears stats', async () => {
      await scheduler.blockProvider('sonnet', 10);
      const state = await scheduler.reset();
      expect(state.models.sonnet.available).toBe(true);
      expect(readDoc().stats).toEqual({ totalFallbacks: 0, lastFallback: null });
    });
  });
});
