import { DEFAULT_COLLECTOR_CONFIG } from '../config';
import { NodeRecord, NodeRegistry } from '../nodes/repository';
import { logger, metrics, telemetryBus } from '../telemetry';
import { Mutex } from './mutex';
import { CollectorWorker, WorkerNode, WorkerStatus } from './worker';

export type WorkerFactory = (node: WorkerNode) => CollectorWorker;

export type SupervisorOptions = {
  stopGraceMs?: number;
};

export type ReconcileResult = {
  started: string[];
  stopped: string[];
  restarted: string[];
};

type DesiredNode = WorkerNode & Partial<Pick<NodeRecord, 'enabled'>>;

const sameAddress = (a: WorkerNode, b: WorkerNode) => a.host === b.host && a.port === b.port;

/**
 * Owns one worker per enabled node. Every structural change (start, stop,
 * restart, reconcile) runs under a single lock; worker loops never take it.
 */
export class CollectorSupervisor {
  private workers = new Map<string, CollectorWorker>();
  private lock = new Mutex();
  private stopGraceMs: number;

  constructor(
    private createWorker: WorkerFactory,
    options: SupervisorOptions = {},
  ) {
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_COLLECTOR_CONFIG.stopGraceMs;
  }

  /** Start a worker for every enabled node the registry knows about. */
  async init(registry: NodeRegistry) {
    const nodes = await registry.listEnabled();
    for (const node of nodes) {
      await this.start(node);
    }
    if (nodes.length) {
      logger.info({ workers: this.size }, 'Collectors initialized');
    }
  }

  get size() {
    return this.workers.size;
  }

  has(nodeId: string) {
    return this.workers.has(nodeId);
  }

  nodeIds(): string[] {
    return Array.from(this.workers.keys());
  }

  list(): WorkerStatus[] {
    return Array.from(this.workers.values(), (worker) => worker.status());
  }

  /** Idempotent: returns false when a worker already exists for the node. */
  start(node: WorkerNode): Promise<boolean> {
    return this.lock.runExclusive(() => this.startLocked(node));
  }

  stop(nodeId: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.stopLocked(nodeId));
  }

  /** Stop then start as one structural change, e.g. after an address change. */
  restart(node: WorkerNode): Promise<void> {
    return this.lock.runExclusive(async () => {
      await this.stopLocked(node.id);
      await this.startLocked(node);
    });
  }

  /**
   * Bring the worker set in line with `desired`: stop workers whose node is
   * gone or disabled, restart those whose address moved, start the new ones.
   */
  reconcile(desired: DesiredNode[]): Promise<ReconcileResult> {
    return this.lock.runExclusive(async () => {
      const wanted = new Map<string, DesiredNode>();
      for (const node of desired) {
        if (node.enabled === false) continue;
        wanted.set(node.id, node);
      }
      const result: ReconcileResult = { started: [], stopped: [], restarted: [] };
      for (const [nodeId, worker] of Array.from(this.workers.entries())) {
        const next = wanted.get(nodeId);
        if (!next) {
          await this.stopLocked(nodeId);
          result.stopped.push(nodeId);
        } else if (!sameAddress(worker.node, next)) {
          await this.stopLocked(nodeId);
          await this.startLocked(next);
          result.restarted.push(nodeId);
        }
      }
      for (const node of wanted.values()) {
        if (await this.startLocked(node)) {
          result.started.push(node.id);
        }
      }
      return result;
    });
  }

  stopAll(): Promise<void> {
    return this.lock.runExclusive(async () => {
      await Promise.all(Array.from(this.workers.keys(), (nodeId) => this.stopLocked(nodeId)));
      logger.info('Stopped all collectors');
    });
  }

  private async startLocked(node: WorkerNode): Promise<boolean> {
    if (this.workers.has(node.id)) {
      logger.debug({ nodeId: node.id, node: node.name }, 'Collector already running');
      return false;
    }
    const worker = this.createWorker(node);
    this.workers.set(node.id, worker);
    worker.start();
    metrics.setGauge('collector_workers', this.workers.size);
    telemetryBus.publish({
      type: 'collector.worker.started',
      payload: { nodeId: node.id, address: `${node.host}:${node.port}` },
    });
    return true;
  }

  private async stopLocked(nodeId: string): Promise<boolean> {
    const worker = this.workers.get(nodeId);
    if (!worker) return false;
    const settled = await worker.stop(this.stopGraceMs);
    this.workers.delete(nodeId);
    metrics.setGauge('collector_workers', this.workers.size);
    telemetryBus.publish({ type: 'collector.worker.stopped', payload: { nodeId, settled } });
    return true;
  }
}
