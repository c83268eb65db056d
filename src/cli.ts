#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import config from './config';
import { HttpNodeRegistry, RegistryReconciler, createSupervisor } from './collector';
import { CollectorSupervisor } from './collector/supervisor';
import { SqlPool, createPool, ensureSchema } from './db';
import { describeError, NotFoundError } from './errors';
import { NodeRepository } from './nodes/repository';
import { SnapshotIngestor } from './snapshots/ingest';
import { PgSnapshotStore } from './snapshots/store';
import { logger } from './telemetry';
import { TimeseriesService } from './timeseries';

type CollectOptions = {
  apiUrl: string;
  interval?: number;
  singleNode?: boolean;
  nodeId?: string;
  host?: string;
  port?: number;
};

const positiveNumber = (value: string) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive number');
  }
  return parsed;
};

const positiveInt = (value: string) => {
  const parsed = positiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('must be an integer');
  }
  return parsed;
};

const waitForSignal = () =>
  new Promise<NodeJS.Signals>((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });

const startSingleNode = async (pool: SqlPool, supervisor: CollectorSupervisor, options: CollectOptions) => {
  if (!options.nodeId) {
    throw new InvalidArgumentError('--single-node requires --node-id');
  }
  const node = await new NodeRepository(pool).get(options.nodeId);
  if (!node) {
    throw new NotFoundError('Node', options.nodeId);
  }
  await supervisor.start({
    ...node,
    host: options.host ?? node.host,
    port: options.port ?? node.port,
  });
};

const collect = async (options: CollectOptions) => {
  const settings = {
    ...config.collector,
    intervalSeconds: options.interval ?? config.collector.intervalSeconds,
  };
  const pool = createPool();
  await ensureSchema(pool);
  const ingestor = new SnapshotIngestor(new PgSnapshotStore(pool));
  const supervisor = createSupervisor(ingestor, settings);
  let reconciler: RegistryReconciler | undefined;

  try {
    if (options.singleNode) {
      await startSingleNode(pool, supervisor, options);
    } else {
      logger.info({ apiUrl: options.apiUrl }, 'Starting multi-node collector');
      reconciler = new RegistryReconciler(
        new HttpNodeRegistry(options.apiUrl, { timeoutMs: settings.fetchTimeoutMs }),
        supervisor,
        settings.reconcileIntervalMs,
      );
      reconciler.start();
    }
    const signal = await waitForSignal();
    logger.info({ signal }, 'Stopping collector');
  } finally {
    reconciler?.stop();
    await supervisor.stopAll();
    await pool.end();
  }
};

const purge = async (olderThanDays: number) => {
  const pool = createPool();
  try {
    const deleted = await new TimeseriesService(new PgSnapshotStore(pool)).purge(olderThanDays);
    console.log(`Deleted ${deleted} snapshots older than ${olderThanDays} days`);
  } finally {
    await pool.end();
  }
};

const program = new Command();
program.name('vram-collector').description('GPU memory collector');

program
  .command('collect')
  .description('Poll every enabled node and store its snapshots')
  .option('--api-url <url>', 'node registry API base URL', config.registry.apiUrl)
  .option('--interval <seconds>', 'seconds between polls of one node', positiveNumber)
  .option('--single-node', 'collect from one stored node instead of the registry')
  .option('--node-id <id>', 'node to collect from with --single-node')
  .option('--host <host>', 'override the node host with --single-node')
  .option('--port <port>', 'override the node port with --single-node', positiveInt)
  .action(async (options: CollectOptions) => {
    try {
      await collect(options);
    } catch (err) {
      console.error('Collector failed:', describeError(err));
      process.exit(1);
    }
  });

program
  .command('purge')
  .description('Delete snapshots older than the given age')
  .option('--older-than-days <days>', 'age cutoff in days', positiveNumber, 30)
  .action(async (options: { olderThanDays: number }) => {
    try {
      await purge(options.olderThanDays);
    } catch (err) {
      console.error('Purge failed:', describeError(err));
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(describeError(err));
  process.exit(1);
});
