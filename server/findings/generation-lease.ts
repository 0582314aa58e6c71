import { StoreClosedError } from '../errors.js';

/**
 * Per-hash generation leases shared by every process that writes findings.
 * Whoever holds the lease for a hash is the only caller allowed to invoke the
 * generator for it; everyone else waits for the stored result. A lease that
 * outlives `ttlMs` (its holder crashed) can be taken over.
 */
export interface GenerationLeases {
  /** True when `owner` now holds the lease for `hash`. */
  acquire(hash: string, owner: string, now: Date, ttlMs: number): Promise<boolean>;
  release(hash: string, owner: string): Promise<void>;
  close(): Promise<void>;
}

interface HeldLease {
  owner: string;
  expiresAt: number;
}

export class MemoryGenerationLeases implements GenerationLeases {
  private leases = new Map<string, HeldLease>();
  private closed = false;

  async acquire(hash: string, owner: string, now: Date, ttlMs: number): Promise<boolean> {
    this.ensureOpen();
    const held = this.leases.get(hash);
    if (held && held.owner !== owner && held.expiresAt > now.getTime()) return false;
    this.leases.set(hash, { owner, expiresAt: now.getTime() + ttlMs });
    return true;
  }

  async release(hash: string, owner: string): Promise<void> {
    this.ensureOpen();
    if (this.leases.get(hash)?.owner === owner) this.leases.delete(hash);
  }

  /** Current holder, if any. */
  holder(hash: string): string | undefined {
    return this.leases.get(hash)?.owner;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) throw new StoreClosedError('MemoryGenerationLeases');
  }
}
