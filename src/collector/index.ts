import { CollectorConfig } from '../config';
import { SnapshotIngestor } from '../snapshots/ingest';
import { SnapshotFetcher, SnapshotSource } from './fetcher';
import { CollectorSupervisor, WorkerFactory } from './supervisor';
import { NodeWorker } from './worker';

export { HttpNodeRegistry, RegistryReconciler } from './registry';

export const createWorkerFactory = (
  ingestor: SnapshotIngestor,
  settings: CollectorConfig,
  source: SnapshotSource = new SnapshotFetcher({
    timeoutMs: settings.fetchTimeoutMs,
    metricsPath: settings.metricsPath,
  }),
): WorkerFactory => {
  return (node) =>
    new NodeWorker(node, source, ingestor, {
      intervalSeconds: settings.intervalSeconds,
      errorThreshold: settings.errorThreshold,
      maxBackoffSeconds: settings.maxBackoffSeconds,
      stopGraceMs: settings.stopGraceMs,
    });
};

export const createSupervisor = (ingestor: SnapshotIngestor, settings: CollectorConfig, source?: SnapshotSource) =>
  new CollectorSupervisor(createWorkerFactory(ingestor, settings, source), { stopGraceMs: settings.stopGraceMs });
