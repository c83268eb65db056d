import config from '../config';
import { NoDataError, NotFoundError, UnknownMetricError } from '../errors';
import { SnapshotStore } from '../snapshots/store';
import { SnapshotDetail, SnapshotAggregate, SnapshotRecord } from '../snapshots/types';

export type TimeseriesPoint = {
  timestamp: Date;
  value: number;
};

export type ProcessHistoryPoint = {
  timestamp: Date;
  usedBytes: number;
  reservedBytes: number;
};

export type ProcessTimeline = {
  pid: number;
  name: string;
  history: ProcessHistoryPoint[];
};

export type SnapshotListOptions = {
  limit?: number;
  offset?: number;
  start?: Date;
  end?: Date;
  nodeId?: string;
};

export const DEFAULT_SNAPSHOT_PAGE = 100;

export const SUPPORTED_METRICS = {
  used_bytes: (s) => s.usedBytes,
  total_bytes: (s) => s.totalBytes,
  free_bytes: (s) => s.freeBytes,
  reserved_bytes: (s) => s.reservedBytes,
  used_percent: (s) => s.usedPercent,
  fragmentation_ratio: (s) => s.fragmentationRatio,
  num_processes: (s) => s.numProcesses,
  num_threads: (s) => s.numThreads,
  num_blocks: (s) => s.numBlocks,
  allocated_blocks: (s) => s.allocatedBlocks,
  utilized_blocks: (s) => s.utilizedBlocks,
  free_blocks: (s) => s.freeBlocks,
  atomic_allocations_bytes: (s) => s.atomicAllocationsBytes,
  kv_cache_utilization: (s) => s.kvCacheUtilization,
  memory_utilization: (s) => s.memoryUtilization,
  memory_fragmentation: (s) => s.memoryFragmentation,
} satisfies Record<string, (snapshot: SnapshotRecord) => number>;

export type MetricName = keyof typeof SUPPORTED_METRICS;

export const METRIC_NAMES = Object.keys(SUPPORTED_METRICS);

export const isMetricName = (value: string): value is MetricName =>
  Object.prototype.hasOwnProperty.call(SUPPORTED_METRICS, value);

/**
 * Greedy forward down-sampling over points already in ascending order: keep
 * a point iff it is at least `intervalSeconds` after the last kept one.
 */
export const downsample = (points: TimeseriesPoint[], intervalSeconds?: number): TimeseriesPoint[] => {
  if (!intervalSeconds || intervalSeconds <= 0 || points.length <= 1) return points;
  const spacingMs = intervalSeconds * 1000;
  const kept: TimeseriesPoint[] = [];
  let lastKept: number | null = null;
  for (const point of points) {
    const ts = point.timestamp.getTime();
    if (lastKept === null || ts - lastKept >= spacingMs) {
      kept.push(point);
      lastKept = ts;
    }
  }
  return kept;
};

export class TimeseriesService {
  constructor(
    private store: SnapshotStore,
    private maxPage = config.queryLimits.maxSnapshotPage,
  ) {}

  async range(
    metric: string,
    start: Date,
    end: Date,
    options: { nodeId?: string; interval?: number } = {},
  ): Promise<TimeseriesPoint[]> {
    if (!isMetricName(metric)) {
      throw new UnknownMetricError(metric, METRIC_NAMES);
    }
    const extract = SUPPORTED_METRICS[metric];
    const snapshots = await this.store.listRange({ start, end, nodeId: options.nodeId });
    const points = snapshots.map((snapshot) => ({ timestamp: snapshot.timestamp, value: extract(snapshot) }));
    return downsample(points, options.interval);
  }

  async summary(start?: Date, end?: Date, nodeId?: string): Promise<SnapshotAggregate> {
    const aggregate = await this.store.aggregate({ start, end, nodeId });
    if (!aggregate.totalSnapshots) {
      throw new NoDataError();
    }
    return aggregate;
  }

  async latest(nodeId?: string): Promise<SnapshotRecord> {
    const snapshot = await this.store.latest(nodeId);
    if (!snapshot) {
      throw new NoDataError('No snapshots available');
    }
    return snapshot;
  }

  /** Processes seen since `start`, grouped by pid; the first name seen wins. */
  async processHistory(start: Date, nodeId?: string): Promise<ProcessTimeline[]> {
    const rows = await this.store.listProcessHistory(start, nodeId);
    const byPid = new Map<number, ProcessTimeline>();
    for (const row of rows) {
      let timeline = byPid.get(row.pid);
      if (!timeline) {
        timeline = { pid: row.pid, name: row.name, history: [] };
        byPid.set(row.pid, timeline);
      }
      timeline.history.push({
        timestamp: row.timestamp,
        usedBytes: row.usedBytes,
        reservedBytes: row.reservedBytes,
      });
    }
    return Array.from(byPid.values());
  }

  listSnapshots(options: SnapshotListOptions = {}): Promise<SnapshotRecord[]> {
    const limit = Math.min(Math.max(options.limit ?? DEFAULT_SNAPSHOT_PAGE, 1), this.maxPage);
    return this.store.listPage({
      limit,
      offset: Math.max(options.offset ?? 0, 0),
      start: options.start,
      end: options.end,
      nodeId: options.nodeId,
    });
  }

  async snapshotDetail(id: string): Promise<SnapshotDetail> {
    const detail = await this.store.getDetail(id);
    if (!detail) {
      throw new NotFoundError('Snapshot', id);
    }
    return detail;
  }

  purge(olderThanDays: number, now = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - olderThanDays * 24 * 60 * 60 * 1000);
    return this.store.purgeOlderThan(cutoff);
  }
}
