import config from './config';
import { buildServer } from './api/http';
import { createSupervisor } from './collector';
import { createPool, ensureSchema } from './db';
import { NodeRepository } from './nodes/repository';
import { NodeService } from './nodes/service';
import { SnapshotIngestor } from './snapshots/ingest';
import { PgSnapshotStore } from './snapshots/store';
import { logger } from './telemetry';
import { TimeseriesService } from './timeseries';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const bootstrap = async () => {
  const pool = createPool();
  await ensureSchema(pool);

  const repo = new NodeRepository(pool);
  const store = new PgSnapshotStore(pool);
  const ingestor = new SnapshotIngestor(store);
  const supervisor = createSupervisor(ingestor, config.collector);
  const nodes = new NodeService(repo, supervisor);
  const timeseries = new TimeseriesService(store);

  await supervisor.init(repo);

  const server = buildServer({ pool, nodes, timeseries, ingestor, supervisor });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    await supervisor.stopAll();
    await server.close();
    await pool.end();
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }

  await server.listen({ port: config.port, host: config.host });
  logger.info(`VRAM collector listening on port ${config.port}`);
};

bootstrap().catch((err) => {
  logger.error({ err }, 'Failed to start VRAM collector');
  process.exit(1);
});
