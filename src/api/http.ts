import Fastify, { FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { z, ZodError } from 'zod';
import { CollectorSupervisor } from '../collector/supervisor';
import { SqlClient } from '../db';
import { CollectorError } from '../errors';
import { NodeService } from '../nodes/service';
import { SnapshotIngestor } from '../snapshots/ingest';
import { normalizeVramPayload } from '../snapshots/payload';
import { logger, metrics } from '../telemetry';
import { METRIC_NAMES, TimeseriesService } from '../timeseries';
import {
  serializeAggregate,
  serializeNode,
  serializePoint,
  serializeProcessTimeline,
  serializeSnapshot,
  serializeSnapshotDetail,
  serializeWorker,
} from './serialize';

export type ApiDeps = {
  pool: SqlClient;
  nodes: NodeService;
  timeseries: TimeseriesService;
  ingestor: SnapshotIngestor;
  supervisor: CollectorSupervisor;
  clock?: () => Date;
};

const idParamsSchema = z.object({ id: z.string().uuid() });
const nodeFilter = z.string().uuid().optional();

const durationQuery = z.object({
  duration: z.coerce.number().int().positive().default(3600),
  node_id: nodeFilter,
});

const timeseriesQuery = durationQuery.extend({
  interval: z.coerce.number().positive().optional(),
});

const statsQuery = z.object({
  duration: z.coerce.number().int().positive().optional(),
  node_id: nodeFilter,
});

const snapshotListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
  start_time: z.coerce.date().optional(),
  end_time: z.coerce.date().optional(),
  node_id: nodeFilter,
});

const latestQuery = z.object({ node_id: nodeFilter });

const purgeQuery = z.object({
  older_than_days: z.coerce.number().positive().default(30),
});

const submissionSchema = z
  .object({
    node_id: z.string().uuid(),
    timestamp: z.coerce.date().optional(),
  })
  .passthrough();

const ENDPOINTS = [
  'GET /api/health',
  'GET|POST /api/nodes',
  'GET|PUT|DELETE /api/nodes/:id',
  'GET|POST|DELETE /api/snapshots',
  'GET /api/snapshots/latest',
  'GET /api/snapshots/:id',
  'GET /api/timeseries/:metric',
  'GET /api/stats',
  'GET /api/processes',
  'GET /api/collector/workers',
];

export const buildServer = ({ pool, nodes, timeseries, ingestor, supervisor, clock }: ApiDeps) => {
  const app = Fastify({ logger });
  const now = clock ?? (() => new Date());
  const since = (seconds: number) => new Date(now().getTime() - seconds * 1000);

  app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: false,
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'Invalid request', issues: error.issues });
    }
    if (error instanceof CollectorError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      }
      return reply.code(error.statusCode).send({ error: error.message, code: error.code });
    }
    if (error.statusCode && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ error: 'Internal server error' });
  });

  app.get('/api', async () => ({
    name: 'vram-collector',
    description: 'Multi-node GPU memory collector and time-series API',
    endpoints: ENDPOINTS,
    supported_metrics: METRIC_NAMES,
  }));

  app.get('/api/health', async () => {
    const { rows } = await pool.query('SELECT NOW() AS now');
    return {
      status: 'ok',
      db: rows[0]?.now ?? null,
      workers: supervisor.size,
      metrics: metrics.snapshot(),
    };
  });

  app.get('/api/nodes', async () => {
    const list = await nodes.list();
    return { nodes: list.map(serializeNode) };
  });

  app.post('/api/nodes', async (request, reply) => {
    const node = await nodes.register(request.body ?? {});
    reply.code(201);
    return serializeNode(node);
  });

  app.get('/api/nodes/:id', async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return serializeNode(await nodes.get(id));
  });

  app.put('/api/nodes/:id', async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return serializeNode(await nodes.update(id, request.body ?? {}));
  });

  app.delete('/api/nodes/:id', async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    const removed = await nodes.remove(id);
    return { status: 'deleted', id: removed.id };
  });

  app.post('/api/snapshots', async (request, reply) => {
    const raw = normalizeVramPayload(request.body);
    if (!raw) {
      reply.code(400);
      return { error: 'Snapshot payload must be a JSON object' };
    }
    const body = submissionSchema.parse(request.body);
    await nodes.get(body.node_id);
    const committed = await ingestor.ingest(body.node_id, raw, body.timestamp);
    reply.code(201);
    return {
      id: committed.id,
      node_id: committed.nodeId,
      timestamp: committed.timestamp.toISOString(),
      kv_cache_utilization: committed.derived.kvCacheUtilization,
      memory_utilization: committed.derived.memoryUtilization,
      memory_fragmentation: committed.derived.fragmentation,
    };
  });

  app.get('/api/snapshots', async (request) => {
    const query = snapshotListQuery.parse(request.query);
    const page = await timeseries.listSnapshots({
      limit: query.limit,
      offset: query.offset,
      start: query.start_time,
      end: query.end_time,
      nodeId: query.node_id,
    });
    return { snapshots: page.map(serializeSnapshot), limit: query.limit, offset: query.offset };
  });

  app.get('/api/snapshots/latest', async (request) => {
    const query = latestQuery.parse(request.query);
    return serializeSnapshot(await timeseries.latest(query.node_id));
  });

  app.get('/api/snapshots/:id', async (request) => {
    const { id } = idParamsSchema.parse(request.params);
    return serializeSnapshotDetail(await timeseries.snapshotDetail(id));
  });

  app.delete('/api/snapshots', async (request) => {
    const query = purgeQuery.parse(request.query);
    const deleted = await timeseries.purge(query.older_than_days, now());
    request.log.info({ deleted, olderThanDays: query.older_than_days }, 'Snapshots purged');
    return { deleted, older_than_days: query.older_than_days };
  });

  app.get('/api/timeseries/:metric', async (request) => {
    const { metric } = z.object({ metric: z.string() }).parse(request.params);
    const query = timeseriesQuery.parse(request.query);
    const end = now();
    const start = since(query.duration);
    const points = await timeseries.range(metric, start, end, {
      nodeId: query.node_id,
      interval: query.interval,
    });
    return {
      metric,
      node_id: query.node_id ?? null,
      start_time: start.toISOString(),
      end_time: end.toISOString(),
      interval: query.interval ?? null,
      points: points.map(serializePoint),
    };
  });

  app.get('/api/stats', async (request) => {
    const query = statsQuery.parse(request.query);
    const start = query.duration ? since(query.duration) : undefined;
    const aggregate = await timeseries.summary(start, undefined, query.node_id);
    return { ...serializeAggregate(aggregate), node_id: query.node_id ?? null };
  });

  app.get('/api/processes', async (request) => {
    const query = durationQuery.parse(request.query);
    const timelines = await timeseries.processHistory(since(query.duration), query.node_id);
    return { processes: timelines.map(serializeProcessTimeline) };
  });

  app.get('/api/collector/workers', async () => {
    const workers = supervisor.list();
    return { count: workers.length, workers: workers.map(serializeWorker) };
  });

  return app;
};
