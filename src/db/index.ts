import { Pool, QueryResultRow } from 'pg';
import { config } from '../config';
import { logger } from '../telemetry';

export type SqlResult = {
  rows: QueryResultRow[];
  rowCount: number | null;
};

/** The slice of `pg` the repositories use; `Pool` and `PoolClient` both satisfy it. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

export const ensureSchema = async (pool: SqlClient) => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS monitored_nodes (
      id UUID PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      host TEXT NOT NULL,
      port INTEGER NOT NULL DEFAULT 6767,
      enabled BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      last_seen TIMESTAMPTZ,
      UNIQUE (host, port)
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS vram_snapshots (
      id UUID PRIMARY KEY,
      node_id UUID NOT NULL REFERENCES monitored_nodes(id) ON DELETE CASCADE,
      timestamp TIMESTAMPTZ NOT NULL,
      total_bytes BIGINT NOT NULL DEFAULT 0,
      used_bytes BIGINT NOT NULL DEFAULT 0,
      free_bytes BIGINT NOT NULL DEFAULT 0,
      reserved_bytes BIGINT NOT NULL DEFAULT 0,
      used_percent DOUBLE PRECISION NOT NULL DEFAULT 0,
      allocated_blocks BIGINT NOT NULL DEFAULT 0,
      utilized_blocks BIGINT NOT NULL DEFAULT 0,
      free_blocks BIGINT NOT NULL DEFAULT 0,
      atomic_allocations_bytes BIGINT NOT NULL DEFAULT 0,
      fragmentation_ratio DOUBLE PRECISION NOT NULL DEFAULT 0,
      num_processes INTEGER NOT NULL DEFAULT 0,
      num_threads INTEGER NOT NULL DEFAULT 0,
      num_blocks INTEGER NOT NULL DEFAULT 0,
      kv_cache_utilization DOUBLE PRECISION NOT NULL DEFAULT 0,
      memory_utilization DOUBLE PRECISION NOT NULL DEFAULT 0,
      memory_fragmentation DOUBLE PRECISION NOT NULL DEFAULT 0,
      vllm_metrics TEXT
    )
  `);
  await pool.query(
    `CREATE INDEX IF NOT EXISTS idx_vram_snapshots_node_ts ON vram_snapshots(node_id, timestamp)`,
  );
  await pool.query(
    `CREATE INDEX IF NOT EXISTS idx_vram_snapshots_ts ON vram_snapshots(timestamp)`,
  );
  await pool.query(`
    CREATE TABLE IF NOT EXISTS snapshot_processes (
      id BIGSERIAL PRIMARY KEY,
      snapshot_id UUID NOT NULL REFERENCES vram_snapshots(id) ON DELETE CASCADE,
      pid BIGINT NOT NULL,
      name TEXT NOT NULL,
      used_bytes BIGINT NOT NULL DEFAULT 0,
      reserved_bytes BIGINT NOT NULL DEFAULT 0
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS snapshot_threads (
      id BIGSERIAL PRIMARY KEY,
      snapshot_id UUID NOT NULL REFERENCES vram_snapshots(id) ON DELETE CASCADE,
      thread_id BIGINT NOT NULL,
      allocated_bytes BIGINT NOT NULL DEFAULT 0,
      state TEXT NOT NULL
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS snapshot_blocks (
      id BIGSERIAL PRIMARY KEY,
      snapshot_id UUID NOT NULL REFERENCES vram_snapshots(id) ON DELETE CASCADE,
      block_id BIGINT NOT NULL,
      size BIGINT NOT NULL DEFAULT 0,
      block_type TEXT NOT NULL,
      allocated BOOLEAN NOT NULL DEFAULT FALSE,
      utilized BOOLEAN NOT NULL DEFAULT FALSE
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS snapshot_profiler_metrics (
      id BIGSERIAL PRIMARY KEY,
      snapshot_id UUID NOT NULL REFERENCES vram_snapshots(id) ON DELETE CASCADE,
      pid BIGINT NOT NULL,
      available BOOLEAN NOT NULL DEFAULT FALSE,
      atomic_operations BIGINT,
      threads_per_block INTEGER,
      blocks_per_sm INTEGER,
      shared_memory_usage BIGINT,
      occupancy DOUBLE PRECISION
    )
  `);
  for (const table of ['snapshot_processes', 'snapshot_threads', 'snapshot_blocks', 'snapshot_profiler_metrics']) {
    await pool.query(`CREATE INDEX IF NOT EXISTS idx_${table}_snapshot ON ${table}(snapshot_id)`);
  }
};

/** Multi-row `INSERT` for child tables; a no-op for an empty batch. */
export const insertRows = async (
  client: SqlClient,
  table: string,
  columns: readonly string[],
  rows: unknown[][],
) => {
  if (!rows.length) return;
  const values = rows
    .map(
      (_, rowIndex) =>
        `(${columns.map((_, colIndex) => `$${rowIndex * columns.length + colIndex + 1}`).join(', ')})`,
    )
    .join(', ');
  await client.query(`INSERT INTO ${table} (${columns.join(', ')}) VALUES ${values}`, rows.flat());
};

export const createPool = () => {
  logger.info('Connecting to PostgreSQL...');
  return new Pool({
    connectionString: config.databaseUrl,
    max: 10,
    idleTimeoutMillis: 30000,
  });
};

export const toNumber = (value: unknown): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
};

export const toNullableNumber = (value: unknown): number | null =>
  value === null || value === undefined ? null : toNumber(value);

export const toDate = (value: unknown): Date => (value instanceof Date ? value : new Date(String(value)));
