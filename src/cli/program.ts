/**
 * hookd command-line interface
 *
 * Commands are built against a CliContext so tests can drive them with
 * captured output, a fake process table and a fixed clock.
 */

import fs from 'node:fs';
import { Argument, Command, InvalidArgumentError } from 'commander';
import { findProjectRoot, loadConfig, type HookdConfig } from '@hookd/config';
import {
  installShutdownHandlers,
  RelayClient,
  RelayServer,
  runOneShot,
  WatchdogController,
  type OneShotRunner,
  type StartResult,
  type StopResult,
  type WatchdogStatus,
} from '@hookd/daemon';
import type { ProcessTable, ReconcileReport } from '@hookd/resiliency';
import { AvailabilityScheduler, type ChainView, type SchedulerStatus } from '@hookd/scheduler';
import { errorMessage, RelayNotRunningError } from '@hookd/utils';

export const VERSION = '0.3.0';

export interface CliContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  setExitCode: (code: number) => void;
  /** Used by the foreground relay's shutdown handlers */
  exit: (code: number) => void;
  readStdin: () => Promise<string>;
  processTable?: ProcessTable;
  runOneShot?: OneShotRunner;
  /** Scheduler clock, whole seconds since epoch */
  clock?: () => number;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function processContext(): CliContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    exit: (code) => process.exit(code),
    readStdin: readProcessStdin,
  };
}

function parseMinutes(value: string): number {
  const minutes = Number(value);
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new InvalidArgumentError('minutes must be a positive number');
  }
  return minutes;
}

function formatPid(pid: number | null): string {
  return pid === null ? '' : ` (pid ${pid})`;
}

export function formatReconcile(report: ReconcileReport): string {
  return (
    `Reconcile: ${report.repairs} repair(s) ` +
    `[stale-pid ${report.stalePidFiles}, zombie-state ${report.zombieStates}, ` +
    `orphans ${report.orphansTerminated}, duplicates ${report.duplicatesTerminated}], ` +
    `${report.errors} error(s)`
  );
}

function formatStart(result: StartResult): string {
  return `Relay ${result.status}${formatPid(result.pid)}`;
}

function formatStop(result: StopResult): string {
  return `Relay ${result.status}${formatPid(result.pid)}`;
}

export function formatWatchdogStatus(status: WatchdogStatus): string[] {
  const { relay, records, repairLog } = status;
  const lines: string[] = [];

  if (relay.running) {
    lines.push(`Relay: running${formatPid(relay.pid)}, ${relay.healthy ? 'healthy' : 'not answering'}`);
  } else {
    lines.push('Relay: not running');
  }
  if (relay.metrics) {
    const m = relay.metrics;
    lines.push(
      `  calls ${m.totalCalls} (ok ${m.successCalls}, failed ${m.errorCalls}), avg ${m.avgLatencyMs}ms, ` +
        `persistent ${m.persistentHits}, fallback ${m.spawnFallbacks}, up ${m.uptime}s`,
    );
  }

  lines.push(`Liveness records: ${records.length}`);
  for (const record of records) {
    const pid = record.pid === null ? 'none' : `${record.pid} ${record.pidAlive ? 'alive' : 'dead'}`;
    const running = record.running === null ? 'unknown' : String(record.running);
    lines.push(`  ${record.dir}  pid ${pid}  running ${running}`);
  }

  lines.push(
    repairLog.path === null
      ? 'Repair log: disabled'
      : `Repair log: ${repairLog.path} (${repairLog.entries} entries, ${repairLog.bytes} bytes)`,
  );
  return lines;
}

export function formatSchedulerStatus(status: SchedulerStatus): string[] {
  const width = Math.max(0, ...status.providers.map((p) => p.name.length));
  const lines = status.providers.map((p) => {
    const state = p.available ? 'available' : `blocked ${p.remainingSeconds}s`;
    return `${p.name.padEnd(width)}  ${state}  -> ${p.fallback}`;
  });
  const last = status.stats.lastFallback;
  lines.push(`Fallbacks: ${status.stats.totalFallbacks}${last ? ` (last: ${last})` : ''}`);
  return lines;
}

export function formatChain(view: ChainView): string {
  const entries = view.entries.map((entry) => {
    if (entry.available) return entry.provider;
    return `${entry.provider} (${entry.known ? 'blocked' : 'unknown'})`;
  });
  return `${view.category}: ${entries.join(' -> ')}`;
}

export function createProgram(ctx: CliContext = processContext()): Command {
  const program = new Command();

  const println = (line: string) => ctx.stdout(`${line}\n`);
  const printJson = (value: unknown) => ctx.stdout(`${JSON.stringify(value, null, 2)}\n`);

  const config = (): HookdConfig => loadConfig({ projectRoot: findProjectRoot(ctx.cwd), env: ctx.env });

  const scheduler = (): AvailabilityScheduler => {
    const { scheduler: settings } = config();
    return new AvailabilityScheduler({
      statePath: settings.statePath,
      defaultBlockMinutes: settings.defaultBlockMinutes,
      now: ctx.clock,
    });
  };

  // Failures become a message on stderr and exit code 1
  const run =
    <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (err) {
        ctx.stderr(`hookd: ${errorMessage(err)}\n`);
        ctx.setExitCode(1);
      }
    };

  program
    .name('hookd')
    .description('Local relay, watchdog and provider scheduler for a hook-driven CLI tool')
    .version(VERSION)
    .enablePositionalOptions()
    .configureOutput({ writeOut: ctx.stdout, writeErr: ctx.stderr });

  program
    .command('relay')
    .description('Run the relay server in the foreground')
    .option('--tag <tag>', 'marker on the command line for process searches')
    .action(
      run(async () => {
        const { relay, cli } = config();
        const server = new RelayServer({
          relay,
          cli,
          processTable: ctx.processTable,
          runOneShot: ctx.runOneShot,
        });
        const outcome = await server.start();
        if (outcome.status === 'denied') {
          ctx.stderr(`Relay already running${formatPid(outcome.ownerPid)}\n`);
          return;
        }
        installShutdownHandlers(server, { exit: ctx.exit });
      }),
    );

  program
    .command('watchdog')
    .description('Reconcile liveness records and manage the relay')
    .addArgument(new Argument('<action>', 'what to do').choices(['check', 'start', 'stop', 'restart', 'status']))
    .option('--json', 'print machine-readable output')
    .action(
      run(async (action: string, options: { json?: boolean }) => {
        const controller = new WatchdogController({ config: config(), processTable: ctx.processTable });

        switch (action) {
          case 'check': {
            const report = await controller.check();
            if (options.json) printJson(report);
            else println(formatReconcile(report));
            break;
          }
          case 'start': {
            const result = await controller.start();
            if (options.json) printJson(result);
            else {
              println(formatReconcile(result.reconcile));
              println(formatStart(result));
            }
            if (result.status === 'failed') ctx.setExitCode(1);
            break;
          }
          case 'stop': {
            const result = await controller.stop();
            if (options.json) printJson(result);
            else println(formatStop(result));
            break;
          }
          case 'restart': {
            const result = await controller.restart();
            if (options.json) printJson(result);
            else {
              println(formatStop(result.stop));
              println(formatStart(result.start));
            }
            if (result.start.status === 'failed') ctx.setExitCode(1);
            break;
          }
          case 'status': {
            const status = await controller.status();
            if (options.json) printJson(status);
            else formatWatchdogStatus(status).forEach(println);
            break;
          }
        }
      }),
    );

  program
    .command('exec')
    .description('Relay one tool call through the running relay')
    .argument('<args...>', 'arguments for the tool')
    .passThroughOptions()
    .allowUnknownOption()
    .action(
      run(async (args: string[]) => {
        const { relay, cli } = config();
        const client = new RelayClient({
          socketPath: relay.socketPath,
          timeoutMs: relay.requestTimeoutMs + relay.spawnTimeoutMs,
        });

        let result: { ok: boolean; stdout: string; stderr: string };
        try {
          result = await client.execute(args);
        } catch (err) {
          if (!(err instanceof RelayNotRunningError)) throw err;
          const oneShot = ctx.runOneShot ?? runOneShot;
          result = await oneShot(cli.command, [...cli.prefixArgs, ...args], { timeoutMs: relay.spawnTimeoutMs });
        }

        if (result.stdout) ctx.stdout(result.stdout);
        if (result.stderr) ctx.stderr(result.stderr);
        ctx.setExitCode(result.ok ? 0 : 1);
      }),
    );

  const model = program.command('model').description('Provider availability and fallback chains');

  model
    .command('get')
    .description('Print the best available provider for a task category')
    .argument('<category>')
    .action(
      run(async (category: string) => {
        const choice = await scheduler().getBestProvider(category);
        println(choice.provider);
        if (choice.degraded) {
          ctx.stderr(`warning: every provider for ${choice.category} is blocked, using ${choice.provider}\n`);
        }
      }),
    );

  model
    .command('block')
    .description('Mark a provider rate-limited')
    .argument('<name>')
    .argument('[minutes]', 'block duration in minutes', parseMinutes)
    .action(
      run(async (name: string, minutes: number | undefined) => {
        const result = await scheduler().blockProvider(name, minutes);
        if (!result.blocked) {
          ctx.stderr(`Unknown provider: ${name}\n`);
          ctx.setExitCode(1);
          return;
        }
        println(`Blocked ${name} until ${new Date(result.blockedUntil * 1000).toISOString()}, fallback ${result.fallback}`);
      }),
    );

  model
    .command('unblock')
    .description('Make a provider available again')
    .argument('<name>')
    .action(
      run(async (name: string) => {
        if (await scheduler().unblockProvider(name)) {
          println(`Unblocked ${name}`);
        } else {
          ctx.stderr(`Unknown provider: ${name}\n`);
          ctx.setExitCode(1);
        }
      }),
    );

  model
    .command('status')
    .description('Show every provider and the fallback counters')
    .option('--json', 'print machine-readable output')
    .action(
      run(async (options: { json?: boolean }) => {
        const status = await scheduler().status();
        if (options.json) printJson(status);
        else formatSchedulerStatus(status).forEach(println);
      }),
    );

  model
    .command('chain')
    .description('Show the fallback chain for a category')
    .argument('[category]', 'task category', 'default')
    .option('--json', 'print machine-readable output')
    .action(
      run(async (category: string, options: { json?: boolean }) => {
        const view = await scheduler().chain(category);
        if (options.json) printJson(view);
        else println(formatChain(view));
      }),
    );

  model
    .command('reset')
    .description('Restore the default provider table')
    .action(
      run(async () => {
        await scheduler().reset();
        println('Scheduler state reset');
      }),
    );

  model
    .command('detect')
    .description('Block a provider when its output shows a rate limit (exit 0 when detected)')
    .argument('<provider>')
    .argument('[file]', 'output to classify (default: stdin)')
    .action(
      run(async (provider: string, file: string | undefined) => {
        const text = file ? await fs.promises.readFile(file, 'utf-8') : await ctx.readStdin();
        if (await scheduler().detectRateLimit(text, provider)) {
          println(`Rate limit detected, blocked ${provider}`);
        } else {
          println('No rate limit detected');
          ctx.setExitCode(1);
        }
      }),
    );

  return program;
}
