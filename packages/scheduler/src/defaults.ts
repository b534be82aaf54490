import fs from 'node:fs';
import { z } from 'zod';
import type { SchedulerState } from '@hookd/config';

export const SchedulerDefaultsSchema = z
  .object({
    terminalProvider: z.string().min(1),
    /** provider -> configured fallback provider */
    providers: z.record(z.string().min(1)),
    /** task category -> ordered preference chain */
    chains: z.record(z.array(z.string().min(1)).min(1)),
  })
  .refine((d) => Object.hasOwn(d.chains, 'default'), { message: 'chains must include "default"' })
  .refine((d) => Object.hasOwn(d.providers, d.terminalProvider), {
    message: 'terminalProvider must be a known provider',
  });

export type SchedulerDefaults = z.infer<typeof SchedulerDefaultsSchema>;

const DEFAULTS_FILE = new URL('./default-providers.json', import.meta.url);

let cached: SchedulerDefaults | undefined;

/** Built-in provider table shipped with the package */
export function loadDefaultProviders(): SchedulerDefaults {
  if (!cached) {
    cached = SchedulerDefaultsSchema.parse(JSON.parse(fs.readFileSync(DEFAULTS_FILE, 'utf-8')));
  }
  return cached;
}

export function createDefaultState(defaults: SchedulerDefaults): SchedulerState {
  const models: SchedulerState['models'] = {};
  for (const [name, fallback] of Object.entries(defaults.providers)) {
    models[name] = { available: true, blockedUntil: 0, fallback };
  }

  const fallbackChain: SchedulerState['fallbackChain'] = {};
  for (const [category, chain] of Object.entries(defaults.chains)) {
    fallbackChain[category] = [...chain];
  }

  return {
    models,
    fallbackChain,
    stats: { totalFallbacks: 0, lastFallback: null },
  };
}
