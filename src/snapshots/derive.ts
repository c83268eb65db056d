import { DerivedMetrics, RawSnapshot } from './types';

type DeriveInput = Pick<
  RawSnapshot,
  'allocatedBlocks' | 'utilizedBlocks' | 'totalBytes' | 'usedBytes' | 'fragmentationRatio'
>;

const percentOf = (part: number, whole: number) => (whole > 0 ? (part / whole) * 100 : 0);

/**
 * Ratios computed for every stored snapshot. Both the polling workers and
 * `POST /api/snapshots` go through this function.
 */
export const deriveMetrics = (raw: DeriveInput): DerivedMetrics => ({
  kvCacheUtilization: percentOf(raw.utilizedBlocks, raw.allocatedBlocks),
  memoryUtilization: percentOf(raw.usedBytes, raw.totalBytes),
  fragmentation: raw.fragmentationRatio,
});
