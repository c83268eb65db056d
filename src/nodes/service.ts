import { z } from 'zod';
import { Mutex } from '../collector/mutex';
import { CollectorSupervisor } from '../collector/supervisor';
import { ConfigError, NotFoundError } from '../errors';
import { logger, telemetryBus } from '../telemetry';
import { DEFAULT_NODE_PORT, NodeRecord, NodeRepository } from './repository';

const hostSchema = z.string().trim().min(1, 'host is required');
const portSchema = z.number().int().min(1).max(65535);

export const nodeRegistrationSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  host: hostSchema,
  port: portSchema.default(DEFAULT_NODE_PORT),
  enabled: z.boolean().default(true),
});

export const nodeUpdateSchema = z
  .object({
    name: z.string().trim().min(1),
    host: hostSchema,
    port: portSchema,
    enabled: z.boolean(),
  })
  .partial();

const firstIssue = (error: z.ZodError) => {
  const issue = error.issues[0];
  if (!issue) return 'invalid node';
  return issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
};

/**
 * Node CRUD that keeps the supervisor in step: a node that is enabled has a
 * worker, one that is disabled or deleted does not. Writes run one at a time
 * so the worker change always follows the row it was derived from.
 */
export class NodeService {
  private writes = new Mutex();

  constructor(
    private repo: NodeRepository,
    private supervisor: CollectorSupervisor,
  ) {}

  list(): Promise<NodeRecord[]> {
    return this.repo.list();
  }

  async get(id: string): Promise<NodeRecord> {
    const node = await this.repo.get(id);
    if (!node) throw new NotFoundError('Node', id);
    return node;
  }

  async register(input: unknown): Promise<NodeRecord> {
    const parsed = nodeRegistrationSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigError(firstIssue(parsed.error));
    }
    const node = await this.writes.runExclusive(async () => {
      const created = await this.repo.create(parsed.data);
      if (created.enabled) {
        await this.supervisor.start(created);
      }
      return created;
    });
    telemetryBus.publish({ type: 'node.registered', payload: { nodeId: node.id, name: node.name } });
    logger.info({ nodeId: node.id, node: node.name, host: node.host, port: node.port }, 'Node registered');
    return node;
  }

  async update(id: string, input: unknown): Promise<NodeRecord> {
    const parsed = nodeUpdateSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigError(firstIssue(parsed.error));
    }
    const changes = parsed.data;
    const updated = await this.writes.runExclusive(async () => {
      const current = await this.get(id);
      const next = await this.repo.update(id, changes);
      if (!next) throw new NotFoundError('Node', id);

      if (current.enabled !== next.enabled) {
        if (next.enabled) {
          await this.supervisor.start(next);
        } else {
          await this.supervisor.stop(id);
        }
      } else if (next.enabled && (current.host !== next.host || current.port !== next.port)) {
        await this.supervisor.restart(next);
      }
      return next;
    });
    logger.info({ nodeId: id, node: updated.name, enabled: updated.enabled }, 'Node updated');
    return updated;
  }

  /** Stops the node's worker first so no cycle commits against a deleted row. */
  async remove(id: string): Promise<NodeRecord> {
    const removed = await this.writes.runExclusive(async () => {
      await this.get(id);
      await this.supervisor.stop(id);
      const row = await this.repo.remove(id);
      if (!row) throw new NotFoundError('Node', id);
      return row;
    });
    telemetryBus.publish({ type: 'node.removed', payload: { nodeId: removed.id, name: removed.name } });
    logger.info({ nodeId: removed.id, node: removed.name }, 'Node deleted');
    return removed;
  }
}
