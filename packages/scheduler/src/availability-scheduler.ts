import { DEFAULT_SCHEDULER_CONFIG, SchedulerStateSchema, type SchedulerState } from '@hookd/config';
import { JsonFileStore } from '@hookd/storage';
import { errorMessage, schedulerLog as log } from '@hookd/utils';
import { createDefaultState, loadDefaultProviders, type SchedulerDefaults } from './defaults.js';
import { matchRateLimit } from './rate-limit.js';

export interface AvailabilitySchedulerOptions {
  /** Path of the persisted scheduler document */
  statePath: string;
  /** Clock in whole seconds since epoch */
  now?: () => number;
  /** Block duration used by detectRateLimit (default: 60) */
  defaultBlockMinutes?: number;
  /** Provider table used on initialize/reset (default: bundled table) */
  defaults?: SchedulerDefaults;
}

export interface ProviderChoice {
  provider: string;
  /** Category whose chain was used ('default' for unknown categories) */
  category: string;
  chain: string[];
  /** True when every provider in the chain is blocked */
  degraded: boolean;
}

export interface BlockResult {
  provider: string;
  blocked: boolean;
  blockedUntil: number;
  fallback: string;
}

export interface ProviderStatus {
  name: string;
  available: boolean;
  blockedUntil: number;
  remainingSeconds: number;
  fallback: string;
}

export interface SchedulerStatus {
  providers: ProviderStatus[];
  stats: SchedulerState['stats'];
}

export interface ChainEntry {
  provider: string;
  known: boolean;
  available: boolean;
}

export interface ChainView {
  category: string;
  entries: ChainEntry[];
}

const systemClock = (): number => Math.floor(Date.now() / 1000);

/**
 * Re-enable every provider whose block has expired. Mutates `state`;
 * returns the names that were unblocked.
 */
export function unblockExpired(state: SchedulerState, now: number): string[] {
  const unblocked: string[] = [];
  for (const [name, record] of Object.entries(state.models)) {
    if (!record.available && record.blockedUntil > 0 && record.blockedUntil <= now) {
      record.available = true;
      record.blockedUntil = 0;
      unblocked.push(name);
    }
  }
  return unblocked;
}

export function resolveChain(state: SchedulerState, category: string): { category: string; chain: string[] } {
  if (Object.hasOwn(state.fallbackChain, category)) {
    return { category, chain: state.fallbackChain[category] };
  }
  return { category: 'default', chain: state.fallbackChain.default ?? [] };
}

function isAvailable(state: SchedulerState, provider: string): boolean {
  return Object.hasOwn(state.models, provider) && state.models[provider].available;
}

/**
 * Tracks rate-limited providers in a shared JSON document and picks the
 * best provider per task category. Blocks expire on the next read.
 *
 * Persistence failures are logged and the in-memory decision is still
 * returned; callers always get a provider name.
 */
export class AvailabilityScheduler {
  private store: JsonFileStore<SchedulerState>;
  private now: () => number;
  private defaults: SchedulerDefaults;
  readonly defaultBlockMinutes: number;

  constructor(options: AvailabilitySchedulerOptions) {
    this.store = new JsonFileStore({ filePath: options.statePath, schema: SchedulerStateSchema });
    this.now = options.now ?? systemClock;
    this.defaults = options.defaults ?? loadDefaultProviders();
    this.defaultBlockMinutes = options.defaultBlockMinutes ?? DEFAULT_SCHEDULER_CONFIG.defaultBlockMinutes;
  }

  get terminalProvider(): string {
    return this.defaults.terminalProvider;
  }

  get statePath(): string {
    return this.store.filePath;
  }

  /** Create the document if it is missing or unreadable. Idempotent. */
  async initialize(): Promise<SchedulerState> {
    const result = await this.store.load();
    if (result.status === 'ok') {
      return result.value;
    }
    if (result.status === 'invalid') {
      log.warn('Scheduler state unreadable, recreating defaults', { file: this.store.filePath, error: result.error });
    }
    const state = createDefaultState(this.defaults);
    await this.persist(state);
    return state;
  }

  async autoUnblock(now: number = this.now()): Promise<string[]> {
    const unblocked = unblockExpired(await this.initialize(), now);
    if (unblocked.length > 0) {
      log.info('Auto-unblocked providers', { providers: unblocked.join(',') });
      await this.commit((doc) => {
        unblockExpired(doc, now);
      });
    }
    return unblocked;
  }

  async getBestProvider(category: string): Promise<ProviderChoice> {
    const state = await this.loadFresh();
    const resolved = resolveChain(state, category);

    const provider = resolved.chain.find((name) => isAvailable(state, name));
    if (provider) {
      return { provider, category: resolved.category, chain: resolved.chain, degraded: false };
    }

    const last = resolved.chain[resolved.chain.length - 1] ?? this.terminalProvider;
    log.warn('All providers in chain are blocked, using last resort', {
      category: resolved.category,
      provider: last,
    });
    return { provider: last, category: resolved.category, chain: resolved.chain, degraded: true };
  }

  async blockProvider(name: string, minutes: number = this.defaultBlockMinutes): Promise<BlockResult> {
    await this.loadFresh();
    const blockedUntil = this.now() + Math.round(minutes * 60);
    const state = await this.commit((doc) => {
      if (!Object.hasOwn(doc.models, name)) return;
      doc.models[name].available = false;
      doc.models[name].blockedUntil = blockedUntil;
      doc.stats.totalFallbacks += 1;
      doc.stats.lastFallback = name;
    });

    if (!Object.hasOwn(state.models, name)) {
      log.warn('Block requested for unknown provider', { provider: name });
      return { provider: name, blocked: false, blockedUntil: 0, fallback: this.terminalProvider };
    }

    const record = state.models[name];
    const fallback = isAvailable(state, record.fallback) ? record.fallback : this.terminalProvider;
    log.info('Provider blocked', { provider: name, minutes, blockedUntil: record.blockedUntil, fallback });
    return { provider: name, blocked: true, blockedUntil: record.blockedUntil, fallback };
  }

  async unblockProvider(name: string): Promise<boolean> {
    await this.initialize();
    const state = await this.commit((doc) => {
      if (!Object.hasOwn(doc.models, name)) return;
      doc.models[name].available = true;
      doc.models[name].blockedUntil = 0;
    });
    if (!Object.hasOwn(state.models, name)) {
      return false;
    }
    log.info('Provider unblocked', { provider: name });
    return true;
  }

  /**
   * Classify upstream output; when it looks like throttling or quota
   * exhaustion, block `provider` for the default duration.
   */
  async detectRateLimit(text: string, provider: string): Promise<boolean> {
    const pattern = matchRateLimit(text);
    if (pattern === null) {
      return false;
    }
    log.info('Rate limit detected', { provider, pattern });
    await this.blockProvider(provider, this.defaultBlockMinutes);
    return true;
  }

  async reset(): Promise<SchedulerState> {
    try {
      await this.store.delete();
    } catch (err) {
      log.warn('Failed to delete scheduler state', { file: this.store.filePath, error: errorMessage(err) });
    }
    return this.initialize();
  }

  async status(): Promise<SchedulerStatus> {
    const state = await this.loadFresh();
    const now = this.now();
    const providers = Object.entries(state.models).map(([name, record]) => ({
      name,
      available: record.available,
      blockedUntil: record.blockedUntil,
      remainingSeconds: record.available ? 0 : Math.max(0, record.blockedUntil - now),
      fallback: record.fallback,
    }));
    return { providers, stats: { ...state.stats } };
  }

  async chain(category = 'default'): Promise<ChainView> {
    const state = await this.loadFresh();
    const resolved = resolveChain(state, category);
    return {
      category: resolved.category,
      entries: resolved.chain.map((provider) => ({
        provider,
        known: Object.hasOwn(state.models, provider),
        available: isAvailable(state, provider),
      })),
    };
  }

  /** Document with expired blocks already lifted */
  private async loadFresh(): Promise<SchedulerState> {
    const now = this.now();
    const state = await this.initialize();
    const unblocked = unblockExpired(state, now);
    if (unblocked.length === 0) {
      return state;
    }
    log.info('Auto-unblocked providers', { providers: unblocked.join(',') });
    return this.commit((doc) => {
      unblockExpired(doc, now);
    });
  }

  /**
   * Re-read the document, apply `change` and write it back, so a block
   * another process wrote since our last read is kept. When the write
   * fails the changed document is still returned.
   */
  private async commit(change: (state: SchedulerState) => void): Promise<SchedulerState> {
    const state = (await this.store.read()) ?? createDefaultState(this.defaults);
    change(state);
    await this.persist(state);
    return state;
  }

  private async persist(state: SchedulerState): Promise<void> {
    try {
      await this.store.write(state);
    } catch (err) {
      log.warn('Failed to persist scheduler state', { file: this.store.filePath, error: errorMessage(err) });
    }
  }
}
