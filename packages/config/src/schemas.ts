import { z } from 'zod';

// ---------------------------------------------------------------------------
// Runtime configuration
// ---------------------------------------------------------------------------

export const RelayConfigSchema = z.object({
  socketPath: z.string().min(1),
  lockPath: z.string().min(1),
  requestTimeoutMs: z.number().int().positive(),
  spawnTimeoutMs: z.number().int().positive(),
  bodyLimit: z.string().min(1),
});

export const CliConfigSchema = z.object({
  command: z.string().min(1),
  prefixArgs: z.array(z.string()),
  workerArgs: z.array(z.string()),
  workerEnabled: z.boolean(),
});

export const RegistryConfigSchema = z.object({
  scanDepth: z.number().int().nonnegative(),
  stateDirName: z.string().min(1),
  pidFileName: z.string().min(1),
  stateFileName: z.string().min(1),
  daemonPattern: z.string().min(1),
  auxiliaryPattern: z.string().min(1),
  maxAuxiliary: z.number().int().nonnegative(),
  terminateGraceMs: z.number().int().nonnegative(),
  repairLogPath: z.string().min(1),
});

export const SchedulerConfigSchema = z.object({
  statePath: z.string().min(1),
  defaultBlockMinutes: z.number().int().positive(),
});

export const WatchdogConfigSchema = z.object({
  readyTimeoutMs: z.number().int().positive(),
  stopTimeoutMs: z.number().int().positive(),
  pollIntervalMs: z.number().int().positive(),
});

export const HookdConfigSchema = z.object({
  projectRoot: z.string().min(1),
  relay: RelayConfigSchema,
  cli: CliConfigSchema,
  registry: RegistryConfigSchema,
  scheduler: SchedulerConfigSchema,
  watchdog: WatchdogConfigSchema,
});

/** Shape of .hookd/config.json: every section and key optional */
export const HookdConfigFileSchema = z
  .object({
    relay: RelayConfigSchema.partial(),
    cli: CliConfigSchema.partial(),
    registry: RegistryConfigSchema.partial(),
    scheduler: SchedulerConfigSchema.partial(),
    watchdog: WatchdogConfigSchema.partial(),
  })
  .partial()
  .strict();

export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type CliConfig = z.infer<typeof CliConfigSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type WatchdogConfig = z.infer<typeof WatchdogConfigSchema>;
export type HookdConfig = z.infer<typeof HookdConfigSchema>;
export type HookdConfigFile = z.infer<typeof HookdConfigFileSchema>;

// ---------------------------------------------------------------------------
// Persisted scheduler document
// ---------------------------------------------------------------------------

export const ProviderRecordSchema = z.object({
  available: z.boolean(),
  blockedUntil: z.number().int().nonnegative(),
  fallback: z.string(),
});

export const SchedulerStateSchema = z.object({
  models: z.record(ProviderRecordSchema),
  fallbackChain: z.record(z.array(z.string()).min(1)),
  stats: z.object({
    totalFallbacks: z.number().int().nonnegative(),
    lastFallback: z.string().nullable(),
  }),
});

export type ProviderRecord = z.infer<typeof ProviderRecordSchema>;
export type SchedulerState = z.infer<typeof SchedulerStateSchema>;

// ---------------------------------------------------------------------------
// Liveness status document (written by the supervised task, repaired by us)
// ---------------------------------------------------------------------------

const TimestampFieldSchema = z.union([z.string(), z.number(), z.null()]).optional();

export const LivenessStatusSchema = z
  .object({
    running: z.boolean().optional(),
    startedAt: TimestampFieldSchema,
    savedAt: TimestampFieldSchema,
  })
  .passthrough();

export type LivenessStatus = z.infer<typeof LivenessStatusSchema>;

// ---------------------------------------------------------------------------
// Relay wire formats
// ---------------------------------------------------------------------------

export const ExecuteRequestSchema = z.object(
  {
    args: z
      .array(z.string({ invalid_type_error: 'args must contain only strings' }), {
        required_error: 'args is required',
        invalid_type_error: 'args must be an array of strings',
      })
      .min(1, 'args must be a non-empty array of strings'),
  },
  { invalid_type_error: 'body must be a JSON object' },
);

export const ExecuteResultSchema = z.object({
  ok: z.boolean(),
  stdout: z.string(),
  stderr: z.string(),
});

/** One line from the persistent worker's stdout */
export const WorkerResponseSchema = z.object({
  _id: z.string().min(1),
  ok: z.boolean().optional(),
  stdout: z.string().optional(),
  stderr: z.string().optional(),
});

export const HealthResponseSchema = z.object({
  ok: z.literal(true),
  pid: z.number().int(),
});

export const MetricsResponseSchema = z.object({
  totalCalls: z.number(),
  successCalls: z.number(),
  errorCalls: z.number(),
  totalLatencyMs: z.number(),
  persistentHits: z.number(),
  spawnFallbacks: z.number(),
  avgLatencyMs: z.number(),
  uptime: z.number(),
  persistentCliActive: z.boolean(),
  pendingRequests: z.number(),
  pid: z.number(),
  memoryMB: z.number(),
  startedAt: z.string(),
});

export type ExecuteRequest = z.infer<typeof ExecuteRequestSchema>;
export type ExecuteResult = z.infer<typeof ExecuteResultSchema>;
export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type MetricsResponse = z.infer<typeof MetricsResponseSchema>;
