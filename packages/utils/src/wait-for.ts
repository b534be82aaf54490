/**
 * Bounded polling for readiness conditions (socket appears, process exits).
 */

export interface WaitForOptions {
  /** Give up after this many milliseconds */
  timeoutMs: number;
  /** Delay between checks (default: 50ms) */
  intervalMs?: number;
}

const DEFAULT_INTERVAL_MS = 50;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll `condition` until it returns true or the timeout elapses.
 * Resolves true when the condition was met, false on timeout.
 * A throwing condition counts as "not yet".
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  options: WaitForOptions
): Promise<boolean> {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    let met = false;
    try {
      met = await condition();
    } catch {
      met = false;
    }
    if (met) return true;

    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await sleep(Math.min(intervalMs, remaining));
  }
}
