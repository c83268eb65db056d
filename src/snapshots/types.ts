export type ProcessSample = {
  pid: number;
  name: string;
  usedBytes: number;
  reservedBytes: number;
};

export type ThreadSample = {
  threadId: number;
  allocatedBytes: number;
  state: string;
};

export type BlockSample = {
  blockId: number;
  size: number;
  type: string;
  allocated: boolean;
  utilized: boolean;
};

export type ProfilerSample = {
  pid: number;
  available: boolean;
  atomicOperations: number | null;
  threadsPerBlock: number | null;
  blocksPerSm: number | null;
  sharedMemoryUsage: number | null;
  occupancy: number | null;
};

/** One normalized sample as reported by a node, before derivation. */
export type RawSnapshot = {
  totalBytes: number;
  usedBytes: number;
  freeBytes: number;
  reservedBytes: number;
  usedPercent: number;
  allocatedBlocks: number;
  utilizedBlocks: number;
  freeBlocks: number;
  atomicAllocationsBytes: number;
  fragmentationRatio: number;
  processes: ProcessSample[];
  threads: ThreadSample[];
  blocks: BlockSample[];
  profilerMetrics: ProfilerSample[];
  vllmMetrics: string;
};

export type DerivedMetrics = {
  kvCacheUtilization: number;
  memoryUtilization: number;
  fragmentation: number;
};

export type SnapshotRecord = {
  id: string;
  nodeId: string;
  timestamp: Date;
  totalBytes: number;
  usedBytes: number;
  freeBytes: number;
  reservedBytes: number;
  usedPercent: number;
  allocatedBlocks: number;
  utilizedBlocks: number;
  freeBlocks: number;
  atomicAllocationsBytes: number;
  fragmentationRatio: number;
  numProcesses: number;
  numThreads: number;
  numBlocks: number;
  kvCacheUtilization: number;
  memoryUtilization: number;
  memoryFragmentation: number;
  vllmMetrics: string | null;
};

export type SnapshotDetail = SnapshotRecord & {
  processes: ProcessSample[];
  threads: ThreadSample[];
  blocks: BlockSample[];
  profilerMetrics: ProfilerSample[];
};

/** What the store receives: the row to write plus its children. */
export type SnapshotCommit = {
  id: string;
  nodeId: string;
  timestamp: Date;
  raw: RawSnapshot;
  derived: DerivedMetrics;
};

export type ProcessHistoryRow = {
  pid: number;
  name: string;
  usedBytes: number;
  reservedBytes: number;
  timestamp: Date;
};

export type SnapshotAggregate = {
  totalSnapshots: number;
  timeRangeStart: Date | null;
  timeRangeEnd: Date | null;
  avgUsedBytes: number;
  minUsedBytes: number;
  maxUsedBytes: number;
  avgUsedPercent: number;
  minUsedPercent: number;
  maxUsedPercent: number;
  avgFragmentation: number;
  minFragmentation: number;
  maxFragmentation: number;
};

export type SnapshotRange = {
  start?: Date;
  end?: Date;
  nodeId?: string;
};
