import { and, eq, lt, or } from 'drizzle-orm';
import { generationLeases } from '../../shared/schema.js';
import type { Database } from '../db.js';
import { StoreClosedError } from '../errors.js';
import type { GenerationLeases } from './generation-lease.js';

/**
 * Generation leases in PostgreSQL. Acquiring is one upsert that only takes
 * over the row when it has expired or already belongs to the caller, so two
 * processes racing for one hash cannot both win.
 */
export class DatabaseGenerationLeases implements GenerationLeases {
  private closed = false;

  constructor(private readonly db: Database) {}

  async acquire(hash: string, owner: string, now: Date, ttlMs: number): Promise<boolean> {
    this.ensureOpen();
    const expiresAt = new Date(now.getTime() + ttlMs);
    const [row] = await this.db
      .insert(generationLeases)
      .values({ combinationHash: hash, owner, acquiredAt: now, expiresAt })
      .onConflictDoUpdate({
        target: generationLeases.combinationHash,
        set: { owner, acquiredAt: now, expiresAt },
        setWhere: or(lt(generationLeases.expiresAt, now), eq(generationLeases.owner, owner)),
      })
      .returning({ owner: generationLeases.owner });
    return row?.owner === owner;
  }

  async release(hash: string, owner: string): Promise<void> {
    this.ensureOpen();
    await this.db
      .delete(generationLeases)
      .where(and(eq(generationLeases.combinationHash, hash), eq(generationLeases.owner, owner)));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) throw new StoreClosedError('DatabaseGenerationLeases');
  }
}
