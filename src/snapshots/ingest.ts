import crypto from 'crypto';
import { logger, metrics, telemetryBus } from '../telemetry';
import { deriveMetrics } from './derive';
import { SnapshotStore } from './store';
import { RawSnapshot, SnapshotCommit } from './types';

/**
 * Derive + commit. The polling workers and the HTTP submission route both
 * call `ingest`, so a snapshot is stored the same way whichever side sent it.
 */
export class SnapshotIngestor {
  constructor(
    private store: SnapshotStore,
    private clock: () => Date = () => new Date(),
  ) {}

  async ingest(nodeId: string, raw: RawSnapshot, timestamp?: Date): Promise<SnapshotCommit> {
    const snapshot: SnapshotCommit = {
      id: crypto.randomUUID(),
      nodeId,
      timestamp: timestamp ?? this.clock(),
      raw,
      derived: deriveMetrics(raw),
    };
    try {
      await this.store.commit(snapshot);
    } catch (err) {
      metrics.incrementCounter('store_errors');
      throw err;
    }
    metrics.incrementCounter('snapshots_committed');
    telemetryBus.publish({
      type: 'snapshot.committed',
      payload: { nodeId, snapshotId: snapshot.id, timestamp: snapshot.timestamp.toISOString() },
    });
    logger.debug({ nodeId, snapshotId: snapshot.id }, 'Snapshot committed');
    return snapshot;
  }
}
