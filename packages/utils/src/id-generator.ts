/**
 * Correlation ID generator for worker requests.
 *
 * Format: <prefix>-<timestamp-base36>-<counter-base36>
 * Example: "r1k3f-lxyz5g8-0001"
 *
 * The counter never resets within a process, so IDs stay unique even when
 * the wall clock goes backwards.
 */

export class IdGenerator {
  private counter = 0;
  private readonly prefix: string;

  constructor(prefix?: string) {
    this.prefix = prefix ?? `r${process.pid.toString(36)}`;
  }

  next(): string {
    const ts = Date.now().toString(36);
    const seq = (this.counter++).toString(36).padStart(4, '0');
    return `${this.prefix}-${ts}-${seq}`;
  }
}
