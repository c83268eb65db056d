import { z } from 'zod';
import { ProfilerSample, RawSnapshot } from './types';

// Upstream data is trusted as-is: anything missing or of the wrong type falls
// back to zero/empty rather than rejecting the sample.
const num = z.number().finite().catch(0);
const nullableNum = z.number().finite().nullable().catch(null);
const text = (fallback: string) => z.string().catch(fallback);
const flag = z.boolean().catch(false);

const processSchema = z.object({
  pid: num,
  name: text('unknown'),
  used_bytes: num,
  reserved_bytes: num,
});

const threadSchema = z.object({
  thread_id: num,
  allocated_bytes: num,
  state: text('unknown'),
});

const blockSchema = z.object({
  block_id: num,
  size: num,
  type: text('unknown'),
  allocated: flag,
  utilized: flag,
});

const profilerSchema = z.object({
  available: flag,
  atomic_operations: nullableNum,
  threads_per_block: nullableNum,
  blocks_per_sm: nullableNum,
  shared_memory_usage: nullableNum,
  occupancy: nullableNum,
});

// Entries that are not objects are dropped; a non-array becomes [].
const listOf = <Output>(item: z.ZodType<Output, z.ZodTypeDef, unknown>) =>
  z
    .array(z.unknown())
    .catch([])
    .transform((entries) =>
      entries.flatMap((entry): Output[] => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      }),
    );

export const vramPayloadSchema = z.object({
  total_bytes: num,
  used_bytes: num,
  free_bytes: num,
  reserved_bytes: num,
  used_percent: num,
  allocated_blocks: num,
  utilized_blocks: num,
  free_blocks: num,
  atomic_allocations_bytes: num,
  fragmentation_ratio: num,
  processes: listOf(processSchema),
  threads: listOf(threadSchema),
  blocks: listOf(blockSchema),
  nsight_metrics: z.record(z.unknown()).catch({}),
  vllm_metrics: text(''),
});

export type VramPayload = z.infer<typeof vramPayloadSchema>;

const toProfilerSamples = (metrics: Record<string, unknown>): ProfilerSample[] =>
  Object.entries(metrics).flatMap(([pidKey, value]) => {
    const pid = Number(pidKey);
    if (!Number.isInteger(pid) || typeof value !== 'object' || value === null || Array.isArray(value)) {
      return [];
    }
    const parsed = profilerSchema.parse(value);
    return [
      {
        pid,
        available: parsed.available,
        atomicOperations: parsed.atomic_operations,
        threadsPerBlock: parsed.threads_per_block,
        blocksPerSm: parsed.blocks_per_sm,
        sharedMemoryUsage: parsed.shared_memory_usage,
        occupancy: parsed.occupancy,
      },
    ];
  });

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Normalize an upstream `/vram` body. Returns `null` when the body is not a
 * JSON object at all; every field inside an object is optional.
 */
export const normalizeVramPayload = (body: unknown): RawSnapshot | null => {
  if (!isPlainObject(body)) return null;
  const payload = vramPayloadSchema.parse(body);
  return {
    totalBytes: payload.total_bytes,
    usedBytes: payload.used_bytes,
    freeBytes: payload.free_bytes,
    reservedBytes: payload.reserved_bytes,
    usedPercent: payload.used_percent,
    allocatedBlocks: payload.allocated_blocks,
    utilizedBlocks: payload.utilized_blocks,
    freeBlocks: payload.free_blocks,
    atomicAllocationsBytes: payload.atomic_allocations_bytes,
    fragmentationRatio: payload.fragmentation_ratio,
    processes: payload.processes.map((proc) => ({
      pid: proc.pid,
      name: proc.name,
      usedBytes: proc.used_bytes,
      reservedBytes: proc.reserved_bytes,
    })),
    threads: payload.threads.map((thread) => ({
      threadId: thread.thread_id,
      allocatedBytes: thread.allocated_bytes,
      state: thread.state,
    })),
    blocks: payload.blocks.map((block) => ({
      blockId: block.block_id,
      size: block.size,
      type: block.type,
      allocated: block.allocated,
      utilized: block.utilized,
    })),
    profilerMetrics: toProfilerSamples(payload.nsight_metrics),
    vllmMetrics: payload.vllm_metrics,
  };
};
