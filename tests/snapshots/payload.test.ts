import { normalizeVramPayload } from '../../src/snapshots/payload';
import { vramPayload } from '../utils/fixtures';

describe('normalizeVramPayload', () => {
  it('maps a full payload to camelCase', () => {
    const raw = normalizeVramPayload(vramPayload());
    expect(raw).toMatchObject({
      totalBytes: 1000,
      usedBytes: 250,
      usedPercent: 25,
      allocatedBlocks: 4,
      utilizedBlocks: 1,
      fragmentationRatio: 0.2,
      vllmMetrics: 'kv_cache_usage 0.25',
    });
    expect(raw?.processes).toEqual([{ pid: 4242, name: 'trainer', usedBytes: 200, reservedBytes: 256 }]);
    expect(raw?.blocks).toHaveLength(2);
    expect(raw?.profilerMetrics).toEqual([
      {
        pid: 4242,
        available: true,
        atomicOperations: 10,
        threadsPerBlock: 256,
        blocksPerSm: 4,
        sharedMemoryUsage: 2048,
        occupancy: 0.75,
      },
    ]);
  });

  it('fills missing fields with defaults', () => {
    const raw = normalizeVramPayload({ used_bytes: 5, processes: [{ pid: 7 }] });
    expect(raw).toEqual({
      totalBytes: 0,
      usedBytes: 5,
      freeBytes: 0,
      reservedBytes: 0,
      usedPercent: 0,
      allocatedBlocks: 0,
      utilizedBlocks: 0,
      freeBlocks: 0,
      atomicAllocationsBytes: 0,
      fragmentationRatio: 0,
      processes: [{ pid: 7, name: 'unknown', usedBytes: 0, reservedBytes: 0 }],
      threads: [],
      blocks: [],
      profilerMetrics: [],
      vllmMetrics: '',
    });
  });

  it('drops malformed list entries and profiler keys', () => {
    const raw = normalizeVramPayload({
      threads: 'not-a-list',
      blocks: [null, { block_id: 3, size: 16, type: 'weights', allocated: 'yes', utilized: true }],
      nsight_metrics: { abc: { available: true }, '12': 'oops', '13': { available: true, occupancy: 'n/a' } },
    });
    expect(raw?.threads).toEqual([]);
    expect(raw?.blocks).toEqual([{ blockId: 3, size: 16, type: 'weights', allocated: false, utilized: true }]);
    expect(raw?.profilerMetrics).toEqual([
      {
        pid: 13,
        available: true,
        atomicOperations: null,
        threadsPerBlock: null,
        blocksPerSm: null,
        sharedMemoryUsage: null,
        occupancy: null,
      },
    ]);
  });

  it('rejects bodies that are not objects', () => {
    expect(normalizeVramPayload(null)).toBeNull();
    expect(normalizeVramPayload([1, 2])).toBeNull();
    expect(normalizeVramPayload('{"used_bytes": 1}')).toBeNull();
  });
});
