import { QueryResultRow } from 'pg';
import { SqlPool, insertRows, toDate, toNullableNumber, toNumber } from '../db';
import { StoreError, describeError } from '../errors';
import { logger } from '../telemetry';
import {
  BlockSample,
  ProcessHistoryRow,
  ProcessSample,
  ProfilerSample,
  SnapshotAggregate,
  SnapshotCommit,
  SnapshotDetail,
  SnapshotRange,
  SnapshotRecord,
  ThreadSample,
} from './types';

export type SnapshotPage = SnapshotRange & {
  limit: number;
  offset: number;
};

/** Write and read side of the snapshot time series. */
export interface SnapshotStore {
  commit(snapshot: SnapshotCommit): Promise<void>;
  listRange(range: SnapshotRange): Promise<SnapshotRecord[]>;
  listPage(page: SnapshotPage): Promise<SnapshotRecord[]>;
  latest(nodeId?: string): Promise<SnapshotRecord | null>;
  getDetail(snapshotId: string): Promise<SnapshotDetail | null>;
  listProcessHistory(since: Date, nodeId?: string): Promise<ProcessHistoryRow[]>;
  aggregate(range: SnapshotRange): Promise<SnapshotAggregate>;
  purgeOlderThan(cutoff: Date): Promise<number>;
}

const SNAPSHOT_COLUMNS = [
  'id',
  'node_id',
  'timestamp',
  'total_bytes',
  'used_bytes',
  'free_bytes',
  'reserved_bytes',
  'used_percent',
  'allocated_blocks',
  'utilized_blocks',
  'free_blocks',
  'atomic_allocations_bytes',
  'fragmentation_ratio',
  'num_processes',
  'num_threads',
  'num_blocks',
  'kv_cache_utilization',
  'memory_utilization',
  'memory_fragmentation',
  'vllm_metrics',
] as const;

const PROCESS_COLUMNS = ['snapshot_id', 'pid', 'name', 'used_bytes', 'reserved_bytes'] as const;
const THREAD_COLUMNS = ['snapshot_id', 'thread_id', 'allocated_bytes', 'state'] as const;
const BLOCK_COLUMNS = ['snapshot_id', 'block_id', 'size', 'block_type', 'allocated', 'utilized'] as const;
const PROFILER_COLUMNS = [
  'snapshot_id',
  'pid',
  'available',
  'atomic_operations',
  'threads_per_block',
  'blocks_per_sm',
  'shared_memory_usage',
  'occupancy',
] as const;

const RANGE_FILTER = `($1::timestamptz IS NULL OR timestamp >= $1)
  AND ($2::timestamptz IS NULL OR timestamp <= $2)
  AND ($3::uuid IS NULL OR node_id = $3)`;

const rangeParams = (range: SnapshotRange) => [range.start ?? null, range.end ?? null, range.nodeId ?? null];

export const mapSnapshotRow = (row: QueryResultRow): SnapshotRecord => ({
  id: row.id,
  nodeId: row.node_id,
  timestamp: toDate(row.timestamp),
  totalBytes: toNumber(row.total_bytes),
  usedBytes: toNumber(row.used_bytes),
  freeBytes: toNumber(row.free_bytes),
  reservedBytes: toNumber(row.reserved_bytes),
  usedPercent: toNumber(row.used_percent),
  allocatedBlocks: toNumber(row.allocated_blocks),
  utilizedBlocks: toNumber(row.utilized_blocks),
  freeBlocks: toNumber(row.free_blocks),
  atomicAllocationsBytes: toNumber(row.atomic_allocations_bytes),
  fragmentationRatio: toNumber(row.fragmentation_ratio),
  numProcesses: toNumber(row.num_processes),
  numThreads: toNumber(row.num_threads),
  numBlocks: toNumber(row.num_blocks),
  kvCacheUtilization: toNumber(row.kv_cache_utilization),
  memoryUtilization: toNumber(row.memory_utilization),
  memoryFragmentation: toNumber(row.memory_fragmentation),
  vllmMetrics: row.vllm_metrics ?? null,
});

const mapProcessRow = (row: QueryResultRow): ProcessSample => ({
  pid: toNumber(row.pid),
  name: row.name,
  usedBytes: toNumber(row.used_bytes),
  reservedBytes: toNumber(row.reserved_bytes),
});

const mapThreadRow = (row: QueryResultRow): ThreadSample => ({
  threadId: toNumber(row.thread_id),
  allocatedBytes: toNumber(row.allocated_bytes),
  state: row.state,
});

const mapBlockRow = (row: QueryResultRow): BlockSample => ({
  blockId: toNumber(row.block_id),
  size: toNumber(row.size),
  type: row.block_type,
  allocated: Boolean(row.allocated),
  utilized: Boolean(row.utilized),
});

const mapProfilerRow = (row: QueryResultRow): ProfilerSample => ({
  pid: toNumber(row.pid),
  available: Boolean(row.available),
  atomicOperations: toNullableNumber(row.atomic_operations),
  threadsPerBlock: toNullableNumber(row.threads_per_block),
  blocksPerSm: toNullableNumber(row.blocks_per_sm),
  sharedMemoryUsage: toNullableNumber(row.shared_memory_usage),
  occupancy: toNullableNumber(row.occupancy),
});

export class PgSnapshotStore implements SnapshotStore {
  constructor(
    private pool: SqlPool,
    private clock: () => Date = () => new Date(),
  ) {}

  /**
   * Snapshot, children and the owning node's `last_seen` land in one
   * transaction; nothing is visible to readers if any statement fails.
   */
  async commit(snapshot: SnapshotCommit): Promise<void> {
    const { raw, derived } = snapshot;
    const client = await this.pool.connect().catch((err: unknown) => {
      throw new StoreError(`Could not acquire a connection: ${describeError(err)}`, { cause: err });
    });
    try {
      await client.query('BEGIN');
      const touched = await client.query(`UPDATE monitored_nodes SET last_seen = $2 WHERE id = $1`, [
        snapshot.nodeId,
        this.clock(),
      ]);
      if (!touched.rowCount) {
        throw new StoreError(`Node ${snapshot.nodeId} no longer exists`);
      }
      await insertRows(client, 'vram_snapshots', SNAPSHOT_COLUMNS, [
        [
          snapshot.id,
          snapshot.nodeId,
          snapshot.timestamp,
          raw.totalBytes,
          raw.usedBytes,
          raw.freeBytes,
          raw.reservedBytes,
          raw.usedPercent,
          raw.allocatedBlocks,
          raw.utilizedBlocks,
          raw.freeBlocks,
          raw.atomicAllocationsBytes,
          raw.fragmentationRatio,
          raw.processes.length,
          raw.threads.length,
          raw.blocks.length,
          derived.kvCacheUtilization,
          derived.memoryUtilization,
          derived.fragmentation,
          raw.vllmMetrics,
        ],
      ]);
      await insertRows(
        client,
        'snapshot_processes',
        PROCESS_COLUMNS,
        raw.processes.map((proc) => [snapshot.id, proc.pid, proc.name, proc.usedBytes, proc.reservedBytes]),
      );
      await insertRows(
        client,
        'snapshot_threads',
        THREAD_COLUMNS,
        raw.threads.map((thread) => [snapshot.id, thread.threadId, thread.allocatedBytes, thread.state]),
      );
      await insertRows(
        client,
        'snapshot_blocks',
        BLOCK_COLUMNS,
        raw.blocks.map((block) => [
          snapshot.id,
          block.blockId,
          block.size,
          block.type,
          block.allocated,
          block.utilized,
        ]),
      );
      await insertRows(
        client,
        'snapshot_profiler_metrics',
        PROFILER_COLUMNS,
        raw.profilerMetrics.map((metric) => [
          snapshot.id,
          metric.pid,
          metric.available,
          metric.atomicOperations,
          metric.threadsPerBlock,
          metric.blocksPerSm,
          metric.sharedMemoryUsage,
          metric.occupancy,
        ]),
      );
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        logger.warn({ err: rollbackErr, nodeId: snapshot.nodeId }, 'Snapshot rollback failed');
      });
      if (err instanceof StoreError) throw err;
      throw new StoreError(`Snapshot commit failed: ${describeError(err)}`, { cause: err });
    } finally {
      client.release();
    }
  }

  async listRange(range: SnapshotRange): Promise<SnapshotRecord[]> {
    const { rows } = await this.pool.query(
      `SELECT * FROM vram_snapshots WHERE ${RANGE_FILTER} ORDER BY timestamp ASC`,
      rangeParams(range),
    );
    return rows.map(mapSnapshotRow);
  }

  async listPage(page: SnapshotPage): Promise<SnapshotRecord[]> {
    const { rows } = await this.pool.query(
      `SELECT * FROM vram_snapshots WHERE ${RANGE_FILTER} ORDER BY timestamp DESC LIMIT $4 OFFSET $5`,
      [...rangeParams(page), page.limit, page.offset],
    );
    return rows.map(mapSnapshotRow);
  }

  async latest(nodeId?: string): Promise<SnapshotRecord | null> {
    const { rows } = await this.pool.query(
      `SELECT * FROM vram_snapshots WHERE ($1::uuid IS NULL OR node_id = $1) ORDER BY timestamp DESC LIMIT 1`,
      [nodeId ?? null],
    );
    return rows[0] ? mapSnapshotRow(rows[0]) : null;
  }

  async getDetail(snapshotId: string): Promise<SnapshotDetail | null> {
    const { rows } = await this.pool.query(`SELECT * FROM vram_snapshots WHERE id = $1`, [snapshotId]);
    if (!rows[0]) return null;
    const [processes, threads, blocks, profiler] = await Promise.all(
      ['snapshot_processes', 'snapshot_threads', 'snapshot_blocks', 'snapshot_profiler_metrics'].map(
        (table) => this.pool.query(`SELECT * FROM ${table} WHERE snapshot_id = $1 ORDER BY id ASC`, [snapshotId]),
      ),
    );
    return {
      ...mapSnapshotRow(rows[0]),
      processes: processes.rows.map(mapProcessRow),
      threads: threads.rows.map(mapThreadRow),
      blocks: blocks.rows.map(mapBlockRow),
      profilerMetrics: profiler.rows.map(mapProfilerRow),
    };
  }

  async listProcessHistory(since: Date, nodeId?: string): Promise<ProcessHistoryRow[]> {
    const { rows } = await this.pool.query(
      `SELECT p.pid, p.name, p.used_bytes, p.reserved_bytes, s.timestamp
       FROM snapshot_processes p JOIN vram_snapshots s ON s.id = p.snapshot_id
       WHERE s.timestamp >= $1 AND ($2::uuid IS NULL OR s.node_id = $2)
       ORDER BY s.timestamp ASC, p.id ASC`,
      [since, nodeId ?? null],
    );
    return rows.map((row) => ({ ...mapProcessRow(row), timestamp: toDate(row.timestamp) }));
  }

  async aggregate(range: SnapshotRange): Promise<SnapshotAggregate> {
    const { rows } = await this.pool.query(
      `SELECT COUNT(*) AS total_snapshots,
              MIN(timestamp) AS time_range_start,
              MAX(timestamp) AS time_range_end,
              AVG(used_bytes)::float8 AS avg_used_bytes,
              MIN(used_bytes) AS min_used_bytes,
              MAX(used_bytes) AS max_used_bytes,
              AVG(used_percent) AS avg_used_percent,
              MIN(used_percent) AS min_used_percent,
              MAX(used_percent) AS max_used_percent,
              AVG(fragmentation_ratio) AS avg_fragmentation,
              MIN(fragmentation_ratio) AS min_fragmentation,
              MAX(fragmentation_ratio) AS max_fragmentation
       FROM vram_snapshots WHERE ${RANGE_FILTER}`,
      rangeParams(range),
    );
    const row: QueryResultRow = rows[0] ?? {};
    return {
      totalSnapshots: toNumber(row.total_snapshots),
      timeRangeStart: row.time_range_start ? toDate(row.time_range_start) : null,
      timeRangeEnd: row.time_range_end ? toDate(row.time_range_end) : null,
      avgUsedBytes: toNumber(row.avg_used_bytes),
      minUsedBytes: toNumber(row.min_used_bytes),
      maxUsedBytes: toNumber(row.max_used_bytes),
      avgUsedPercent: toNumber(row.avg_used_percent),
      minUsedPercent: toNumber(row.min_used_percent),
      maxUsedPercent: toNumber(row.max_used_percent),
      avgFragmentation: toNumber(row.avg_fragmentation),
      minFragmentation: toNumber(row.min_fragmentation),
      maxFragmentation: toNumber(row.max_fragmentation),
    };
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    const result = await this.pool.query(`DELETE FROM vram_snapshots WHERE timestamp < $1`, [cutoff]);
    return result.rowCount ?? 0;
  }
}
