import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from '../shared/schema.js';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  pool: pg.Pool;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Open a pooled connection. The caller owns the handle and must close it.
 */
export function createDatabase(connectionString: string, poolMax = 10): DatabaseHandle {
  const pool = new pg.Pool({
    connectionString,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
    max: poolMax,
  });
  pool.on('error', (error) => {
    console.error('❌ [Database] Idle client error:', error.message);
  });

  const db = drizzle(pool, { schema });

  return {
    db,
    pool,
    async healthCheck() {
      try {
        const client = await pool.connect();
        try {
          await client.query('SELECT 1');
        } finally {
          client.release();
        }
        return true;
      } catch (error) {
        console.error('❌ [Database] Health check failed:', error instanceof Error ? error.message : error);
        return false;
      }
    },
    async close() {
      await pool.end();
    },
  };
}
