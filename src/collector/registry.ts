import { Dispatcher, fetch } from 'undici';
import { z } from 'zod';
import { DEFAULT_COLLECTOR_CONFIG } from '../config';
import { FetchError, describeError } from '../errors';
import { DEFAULT_NODE_PORT, NodeRecord, NodeRegistry } from '../nodes/repository';
import { logger } from '../telemetry';
import { CollectorSupervisor, ReconcileResult } from './supervisor';

const remoteNodeSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  host: z.string(),
  port: z.number().int().default(DEFAULT_NODE_PORT),
  enabled: z.boolean().default(true),
  created_at: z.coerce.date().optional(),
  last_seen: z.coerce.date().nullable().optional(),
});

// Accepts a bare array as well as this service's own `{ nodes: [...] }` listing.
const remoteNodeListSchema = z.union([
  z.array(remoteNodeSchema),
  z.object({ nodes: z.array(remoteNodeSchema) }).transform((listing) => listing.nodes),
]);

function sanitizeBase(url: string) {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

/** Node list served by another instance's `GET /api/nodes`. */
export class HttpNodeRegistry implements NodeRegistry {
  private baseUrl: string;

  constructor(
    apiUrl: string,
    private options: { timeoutMs?: number; dispatcher?: Dispatcher } = {},
  ) {
    this.baseUrl = sanitizeBase(apiUrl);
  }

  async listEnabled(): Promise<NodeRecord[]> {
    const url = `${this.baseUrl}/nodes`;
    let body: unknown;
    try {
      const resp = await fetch(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_COLLECTOR_CONFIG.fetchTimeoutMs),
        dispatcher: this.options.dispatcher,
      });
      if (!resp.ok) {
        throw new FetchError(url, `HTTP ${resp.status}`, { status: resp.status });
      }
      body = await resp.json();
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(url, describeError(err), { cause: err });
    }
    const parsed = remoteNodeListSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(url, `unexpected node list: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data
      .filter((node) => node.enabled)
      .map((node) => ({
        id: node.id,
        name: node.name,
        host: node.host,
        port: node.port,
        enabled: node.enabled,
        createdAt: node.created_at ?? new Date(),
        lastSeen: node.last_seen ?? null,
      }));
  }
}

/**
 * Periodically reconciles the supervisor against a registry. A registry that
 * cannot be read leaves the current worker set untouched.
 */
export class RegistryReconciler {
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<ReconcileResult | null>;

  constructor(
    private registry: NodeRegistry,
    private supervisor: CollectorSupervisor,
    private intervalMs = DEFAULT_COLLECTOR_CONFIG.reconcileIntervalMs,
  ) {}

  start() {
    if (this.timer) return;
    const run = () => {
      this.syncOnce().catch((err) => logger.error({ err }, 'Collector sync error'));
    };
    this.timer = setInterval(run, this.intervalMs);
    run();
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Waits for a sync that is already running instead of starting a second one. */
  syncOnce(): Promise<ReconcileResult | null> {
    if (!this.inFlight) {
      this.inFlight = this.sync().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async sync(): Promise<ReconcileResult | null> {
    let nodes: NodeRecord[];
    try {
      nodes = await this.registry.listEnabled();
    } catch (err) {
      logger.warn({ err, workers: this.supervisor.size }, 'Node registry unavailable; keeping current collectors');
      return null;
    }
    const result = await this.supervisor.reconcile(nodes);
    if (result.started.length || result.stopped.length || result.restarted.length) {
      logger.info(result, 'Collectors reconciled');
    }
    if (!this.supervisor.size) {
      logger.info('No enabled nodes found. Waiting...');
    }
    return result;
  }
}
