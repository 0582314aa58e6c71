export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Spaces generator calls evenly: with N calls per minute, each caller gets a
 * slot at least 60000/N ms after the previous one. 0 disables the limit.
 */
export class RateLimiter {
  private nextSlot = 0;
  private readonly intervalMs: number;

  constructor(
    callsPerMinute: number,
    private readonly clock: () => number = Date.now,
    private readonly wait: Sleep = sleep,
  ) {
    this.intervalMs = callsPerMinute > 0 ? 60_000 / callsPerMinute : 0;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (this.intervalMs === 0) return;
    const now = this.clock();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    if (slot > now) await this.wait(slot - now, signal);
  }
}

const JITTER_RATIO = 0.2;

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped,
 * plus up to 20% jitter.
 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number, random: () => number = Math.random): number {
  const exponential = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
  return Math.round(exponential + exponential * JITTER_RATIO * random());
}
