import { DEFAULT_COLLECTOR_CONFIG } from '../config';
import { describeError } from '../errors';
import { NodeRecord } from '../nodes/repository';
import { SnapshotIngestor } from '../snapshots/ingest';
import { logger, metrics } from '../telemetry';
import { SnapshotSource } from './fetcher';

export type WorkerState = 'idle' | 'running' | 'stopping' | 'stopped';

export type WorkerNode = Pick<NodeRecord, 'id' | 'name' | 'host' | 'port'>;

export type BackoffPolicy = {
  intervalSeconds: number;
  errorThreshold: number;
  maxBackoffSeconds: number;
};

export type NodeWorkerOptions = Partial<BackoffPolicy> & {
  stopGraceMs?: number;
};

export type CycleOutcome = 'committed' | 'fetch_failed' | 'commit_failed';

export type WorkerStatus = {
  nodeId: string;
  name: string;
  host: string;
  port: number;
  state: WorkerState;
  cycleCount: number;
  snapshotCount: number;
  errorCount: number;
  lastDelaySeconds: number | null;
  lastError: string | null;
  lastSuccessAt: string | null;
};

/** What the supervisor needs from a worker; `NodeWorker` is the real one. */
export interface CollectorWorker {
  readonly node: WorkerNode;
  readonly state: WorkerState;
  start(): void;
  stop(graceMs?: number): Promise<boolean>;
  status(): WorkerStatus;
}

/**
 * Seconds to sleep after a cycle: the base interval, doubled (capped) once
 * consecutive errors pass the threshold.
 */
export const nextDelaySeconds = (
  errorCount: number,
  policy: BackoffPolicy = DEFAULT_COLLECTOR_CONFIG,
): number =>
  errorCount > policy.errorThreshold
    ? Math.min(policy.maxBackoffSeconds, policy.intervalSeconds * 2)
    : policy.intervalSeconds;

/**
 * Poll loop for one node: fetch → derive → commit → sleep.
 *
 * idle --start()--> running --stop()--> stopping --(loop settles or grace expires)--> stopped
 *
 * Per-cycle failures are logged and counted; the loop never exits on error.
 */
export class NodeWorker implements CollectorWorker {
  private currentState: WorkerState = 'idle';
  private loop?: Promise<void>;
  private abort = new AbortController();
  private wake?: () => void;
  private policy: BackoffPolicy;
  private stopGraceMs: number;

  cycleCount = 0;
  snapshotCount = 0;
  errorCount = 0;
  lastDelaySeconds: number | null = null;
  lastError: string | null = null;
  lastSuccessAt: Date | null = null;

  constructor(
    readonly node: WorkerNode,
    private source: SnapshotSource,
    private ingestor: SnapshotIngestor,
    options: NodeWorkerOptions = {},
  ) {
    this.policy = {
      intervalSeconds: options.intervalSeconds ?? DEFAULT_COLLECTOR_CONFIG.intervalSeconds,
      errorThreshold: options.errorThreshold ?? DEFAULT_COLLECTOR_CONFIG.errorThreshold,
      maxBackoffSeconds: options.maxBackoffSeconds ?? DEFAULT_COLLECTOR_CONFIG.maxBackoffSeconds,
    };
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_COLLECTOR_CONFIG.stopGraceMs;
  }

  get state(): WorkerState {
    return this.currentState;
  }

  start() {
    if (this.currentState !== 'idle') return;
    this.currentState = 'running';
    logger.info(
      { nodeId: this.node.id, node: this.node.name, intervalSeconds: this.policy.intervalSeconds },
      'Collector started',
    );
    this.loop = this.run();
  }

  /**
   * Resolves `true` if the loop settled within the grace period, `false` if
   * the in-flight cycle was abandoned (it may still commit afterwards).
   */
  async stop(graceMs = this.stopGraceMs): Promise<boolean> {
    if (this.currentState === 'idle') {
      this.currentState = 'stopped';
      return true;
    }
    if (this.currentState === 'stopped') return true;
    this.currentState = 'stopping';
    this.abort.abort();
    this.wake?.();
    let timer: NodeJS.Timeout | undefined;
    const settled = await Promise.race([
      (this.loop ?? Promise.resolve()).then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), graceMs);
      }),
    ]);
    clearTimeout(timer);
    this.currentState = 'stopped';
    if (!settled) {
      logger.warn({ nodeId: this.node.id, node: this.node.name, graceMs }, 'Collector abandoned in-flight cycle');
    }
    logger.info(
      { nodeId: this.node.id, node: this.node.name, snapshots: this.snapshotCount },
      'Collector stopped',
    );
    return settled;
  }

  /** One fetch → derive → commit pass; never throws. */
  async runCycle(): Promise<CycleOutcome> {
    this.cycleCount += 1;
    let outcome: CycleOutcome;
    try {
      const raw = await this.source.fetch(this.node, this.abort.signal);
      try {
        await this.ingestor.ingest(this.node.id, raw);
        this.snapshotCount += 1;
        this.errorCount = 0;
        this.lastError = null;
        this.lastSuccessAt = new Date();
        outcome = 'committed';
        logger.debug(
          { nodeId: this.node.id, snapshot: this.snapshotCount, usedPercent: raw.usedPercent },
          'Snapshot collected',
        );
      } catch (err) {
        this.recordFailure(err, 'Snapshot commit failed');
        outcome = 'commit_failed';
      }
    } catch (err) {
      metrics.incrementCounter('fetch_errors');
      this.recordFailure(err, 'Snapshot fetch failed');
      outcome = 'fetch_failed';
    }
    this.lastDelaySeconds = nextDelaySeconds(this.errorCount, this.policy);
    return outcome;
  }

  status(): WorkerStatus {
    return {
      nodeId: this.node.id,
      name: this.node.name,
      host: this.node.host,
      port: this.node.port,
      state: this.currentState,
      cycleCount: this.cycleCount,
      snapshotCount: this.snapshotCount,
      errorCount: this.errorCount,
      lastDelaySeconds: this.lastDelaySeconds,
      lastError: this.lastError,
      lastSuccessAt: this.lastSuccessAt ? this.lastSuccessAt.toISOString() : null,
    };
  }

  private recordFailure(err: unknown, message: string) {
    this.errorCount += 1;
    this.lastError = describeError(err);
    if (!this.isRunning()) return;
    logger.warn({ nodeId: this.node.id, node: this.node.name, errorCount: this.errorCount, err }, message);
  }

  private isRunning() {
    return this.currentState === 'running';
  }

  private async run() {
    while (this.isRunning()) {
      await this.runCycle();
      if (!this.isRunning()) break;
      await this.sleep((this.lastDelaySeconds ?? this.policy.intervalSeconds) * 1000);
    }
  }

  private sleep(ms: number) {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }
}
