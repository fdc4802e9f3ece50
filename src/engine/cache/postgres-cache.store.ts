import { OnModuleDestroy } from '@nestjs/common';
import { Pool } from 'pg';
import type { CacheStore } from './cache-store';

/**
 * sticking with a raw pg pool here - no TypeORM.
 * entries are opaque blobs read and written whole, one upsert per save,
 * so there is nothing for an ORM to do.
 */

const CACHE_ENTRIES_DDL = `
CREATE TABLE IF NOT EXISTS cache_entries (
  key varchar(512) PRIMARY KEY,
  data bytea NOT NULL,
  size_bytes integer NOT NULL DEFAULT 0,
  created_at timestamptz NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at timestamptz NOT NULL DEFAULT CURRENT_TIMESTAMP
)`;

/**
 * Cache entries in the cache_entries table. A save is a single INSERT .. ON CONFLICT
 * statement, so readers see either the previous blob or the new one.
 */
export class PostgresCacheStore implements CacheStore, OnModuleDestroy {
  private pool: Pool | null = null;
  private ready: Promise<void> | null = null;

  constructor(private readonly connectionString: string) {}

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({ connectionString: this.connectionString });
    }
    return this.pool;
  }

  /** Table is normally created by TypeORM synchronize; CLI runs have no ORM. */
  private ensureTable(): Promise<void> {
    if (!this.ready) {
      this.ready = this.getPool()
        .query(CACHE_ENTRIES_DDL)
        .then(() => undefined)
        .catch((err: unknown) => {
          this.ready = null;
          throw err;
        });
    }
    return this.ready;
  }

  async get(key: string): Promise<Buffer | null> {
    await this.ensureTable();
    const result = await this.getPool().query<{ data: Buffer }>(
      `SELECT data FROM cache_entries WHERE key = $1`,
      [key],
    );
    return result.rows[0]?.data ?? null;
  }

  async put(key: string, data: Buffer): Promise<void> {
    await this.ensureTable();
    await this.getPool().query(
      `INSERT INTO cache_entries (key, data, size_bytes, created_at, updated_at)
       VALUES ($1, $2, $3, NOW(), NOW())
       ON CONFLICT (key) DO UPDATE SET
         data = EXCLUDED.data,
         size_bytes = EXCLUDED.size_bytes,
         updated_at = NOW()`,
      [key, data, data.length],
    );
  }

  async onModuleDestroy(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
