import { WorkerStatus } from '../collector/worker';
import { NodeRecord } from '../nodes/repository';
import { SnapshotAggregate, SnapshotDetail, SnapshotRecord } from '../snapshots/types';
import { ProcessTimeline, TimeseriesPoint } from '../timeseries';

// Response bodies use the same snake_case keys as the node payload.

const iso = (value: Date | null) => (value ? value.toISOString() : null);

export const serializeNode = (node: NodeRecord) => ({
  id: node.id,
  name: node.name,
  host: node.host,
  port: node.port,
  enabled: node.enabled,
  created_at: iso(node.createdAt),
  last_seen: iso(node.lastSeen),
});

export const serializeSnapshot = (snapshot: SnapshotRecord) => ({
  id: snapshot.id,
  node_id: snapshot.nodeId,
  timestamp: snapshot.timestamp.toISOString(),
  total_bytes: snapshot.totalBytes,
  used_bytes: snapshot.usedBytes,
  free_bytes: snapshot.freeBytes,
  reserved_bytes: snapshot.reservedBytes,
  used_percent: snapshot.usedPercent,
  allocated_blocks: snapshot.allocatedBlocks,
  utilized_blocks: snapshot.utilizedBlocks,
  free_blocks: snapshot.freeBlocks,
  atomic_allocations_bytes: snapshot.atomicAllocationsBytes,
  fragmentation_ratio: snapshot.fragmentationRatio,
  num_processes: snapshot.numProcesses,
  num_threads: snapshot.numThreads,
  num_blocks: snapshot.numBlocks,
  kv_cache_utilization: snapshot.kvCacheUtilization,
  memory_utilization: snapshot.memoryUtilization,
  memory_fragmentation: snapshot.memoryFragmentation,
  vllm_metrics: snapshot.vllmMetrics,
});

export const serializeSnapshotDetail = (detail: SnapshotDetail) => ({
  ...serializeSnapshot(detail),
  processes: detail.processes.map((proc) => ({
    pid: proc.pid,
    name: proc.name,
    used_bytes: proc.usedBytes,
    reserved_bytes: proc.reservedBytes,
  })),
  threads: detail.threads.map((thread) => ({
    thread_id: thread.threadId,
    allocated_bytes: thread.allocatedBytes,
    state: thread.state,
  })),
  blocks: detail.blocks.map((block) => ({
    block_id: block.blockId,
    size: block.size,
    type: block.type,
    allocated: block.allocated,
    utilized: block.utilized,
  })),
  nsight_metrics: Object.fromEntries(
    detail.profilerMetrics.map((metric) => [
      String(metric.pid),
      {
        available: metric.available,
        atomic_operations: metric.atomicOperations,
        threads_per_block: metric.threadsPerBlock,
        blocks_per_sm: metric.blocksPerSm,
        shared_memory_usage: metric.sharedMemoryUsage,
        occupancy: metric.occupancy,
      },
    ]),
  ),
});

export const serializeAggregate = (aggregate: SnapshotAggregate) => ({
  total_snapshots: aggregate.totalSnapshots,
  time_range_start: iso(aggregate.timeRangeStart),
  time_range_end: iso(aggregate.timeRangeEnd),
  avg_used_bytes: aggregate.avgUsedBytes,
  min_used_bytes: aggregate.minUsedBytes,
  max_used_bytes: aggregate.maxUsedBytes,
  avg_used_percent: aggregate.avgUsedPercent,
  min_used_percent: aggregate.minUsedPercent,
  max_used_percent: aggregate.maxUsedPercent,
  avg_fragmentation: aggregate.avgFragmentation,
  min_fragmentation: aggregate.minFragmentation,
  max_fragmentation: aggregate.maxFragmentation,
});

export const serializePoint = (point: TimeseriesPoint) => ({
  timestamp: point.timestamp.toISOString(),
  value: point.value,
});

export const serializeProcessTimeline = (timeline: ProcessTimeline) => ({
  pid: timeline.pid,
  name: timeline.name,
  history: timeline.history.map((point) => ({
    timestamp: point.timestamp.toISOString(),
    used_bytes: point.usedBytes,
    reserved_bytes: point.reservedBytes,
  })),
});

export const serializeWorker = (status: WorkerStatus) => ({
  node_id: status.nodeId,
  name: status.name,
  host: status.host,
  port: status.port,
  state: status.state,
  cycle_count: status.cycleCount,
  snapshot_count: status.snapshotCount,
  error_count: status.errorCount,
  last_delay_seconds: status.lastDelaySeconds,
  last_error: status.lastError,
  last_success_at: status.lastSuccessAt,
});
