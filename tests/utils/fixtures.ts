import { RawSnapshot } from '../../src/snapshots/types';

/** A `/vram` body the way a node reports it. */
export const vramPayload = (overrides: Record<string, unknown> = {}) => ({
  total_bytes: 1000,
  used_bytes: 250,
  free_bytes: 750,
  reserved_bytes: 300,
  used_percent: 25,
  allocated_blocks: 4,
  utilized_blocks: 1,
  free_blocks: 3,
  atomic_allocations_bytes: 64,
  fragmentation_ratio: 0.2,
  processes: [{ pid: 4242, name: 'trainer', used_bytes: 200, reserved_bytes: 256 }],
  threads: [{ thread_id: 1, allocated_bytes: 128, state: 'running' }],
  blocks: [
    { block_id: 0, size: 256, type: 'kv_cache', allocated: true, utilized: true },
    { block_id: 1, size: 256, type: 'kv_cache', allocated: true, utilized: false },
  ],
  nsight_metrics: {
    '4242': {
      available: true,
      atomic_operations: 10,
      threads_per_block: 256,
      blocks_per_sm: 4,
      shared_memory_usage: 2048,
      occupancy: 0.75,
    },
  },
  vllm_metrics: 'kv_cache_usage 0.25',
  ...overrides,
});

export const rawSnapshot = (overrides: Partial<RawSnapshot> = {}): RawSnapshot => ({
  totalBytes: 1000,
  usedBytes: 250,
  freeBytes: 750,
  reservedBytes: 300,
  usedPercent: 25,
  allocatedBlocks: 4,
  utilizedBlocks: 1,
  freeBlocks: 3,
  atomicAllocationsBytes: 64,
  fragmentationRatio: 0.2,
  processes: [{ pid: 4242, name: 'trainer', usedBytes: 200, reservedBytes: 256 }],
  threads: [{ threadId: 1, allocatedBytes: 128, state: 'running' }],
  blocks: [{ blockId: 0, size: 256, type: 'kv_cache', allocated: true, utilized: true }],
  profilerMetrics: [],
  vllmMetrics: '',
  ...overrides,
});
