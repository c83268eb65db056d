import { Dispatcher, fetch } from 'undici';
import { DEFAULT_COLLECTOR_CONFIG } from '../config';
import { FetchError, describeError } from '../errors';
import { normalizeVramPayload } from '../snapshots/payload';
import { RawSnapshot } from '../snapshots/types';

export type NodeEndpoint = {
  host: string;
  port: number;
};

export type FetcherOptions = {
  timeoutMs?: number;
  metricsPath?: string;
  dispatcher?: Dispatcher;
};

/** Anything a worker can pull a raw snapshot from. */
export interface SnapshotSource {
  fetch(node: NodeEndpoint, signal?: AbortSignal): Promise<RawSnapshot>;
}

export const buildMetricsUrl = (node: NodeEndpoint, metricsPath = DEFAULT_COLLECTOR_CONFIG.metricsPath) =>
  `http://${node.host}:${node.port}${metricsPath.startsWith('/') ? metricsPath : `/${metricsPath}`}`;

export class SnapshotFetcher implements SnapshotSource {
  private timeoutMs: number;
  private metricsPath: string;
  private dispatcher?: Dispatcher;

  constructor(options: FetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COLLECTOR_CONFIG.fetchTimeoutMs;
    this.metricsPath = options.metricsPath ?? DEFAULT_COLLECTOR_CONFIG.metricsPath;
    this.dispatcher = options.dispatcher;
  }

  urlFor(node: NodeEndpoint) {
    return buildMetricsUrl(node, this.metricsPath);
  }

  /**
   * One GET with its own timeout. Every failure mode (network, status,
   * timeout, abort, body) surfaces as `FetchError`.
   */
  async fetch(node: NodeEndpoint, signal?: AbortSignal): Promise<RawSnapshot> {
    const url = this.urlFor(node);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    try {
      let text: string;
      try {
        const resp = await fetch(url, {
          method: 'GET',
          headers: { accept: 'application/json' },
          signal: controller.signal,
          dispatcher: this.dispatcher,
        });
        text = await resp.text();
        if (!resp.ok) {
          throw new FetchError(url, `HTTP ${resp.status}`, { status: resp.status });
        }
      } catch (err) {
        if (err instanceof FetchError) throw err;
        if (controller.signal.aborted) {
          const reason = signal?.aborted ? 'aborted' : `timed out after ${this.timeoutMs}ms`;
          throw new FetchError(url, reason, { cause: err });
        }
        throw new FetchError(url, describeError(err), { cause: err });
      }
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch (err) {
        throw new FetchError(url, 'malformed JSON payload', { cause: err });
      }
      const raw = normalizeVramPayload(body);
      if (!raw) {
        throw new FetchError(url, 'payload is not a JSON object');
      }
      return raw;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
