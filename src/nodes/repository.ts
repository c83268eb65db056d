import crypto from 'crypto';
import { QueryResultRow } from 'pg';
import { SqlClient, toDate, toNumber } from '../db';
import { ConfigError } from '../errors';

export const DEFAULT_NODE_PORT = 6767;

export type NodeRecord = {
  id: string;
  name: string;
  host: string;
  port: number;
  enabled: boolean;
  createdAt: Date;
  lastSeen: Date | null;
};

export type NodeRegistration = {
  name: string;
  host: string;
  port?: number;
  enabled?: boolean;
};

export type NodePatch = Partial<Pick<NodeRecord, 'name' | 'host' | 'port' | 'enabled'>>;

/** Source of the authoritative set of nodes that should be polled. */
export interface NodeRegistry {
  listEnabled(): Promise<NodeRecord[]>;
}

const UNIQUE_VIOLATION = '23505';

const isUniqueViolation = (err: unknown) =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;

export const mapNodeRow = (row: QueryResultRow): NodeRecord => ({
  id: row.id,
  name: row.name,
  host: row.host,
  port: toNumber(row.port),
  enabled: Boolean(row.enabled),
  createdAt: toDate(row.created_at),
  lastSeen: row.last_seen ? toDate(row.last_seen) : null,
});

export class NodeRepository implements NodeRegistry {
  constructor(private pool: SqlClient) {}

  async list(): Promise<NodeRecord[]> {
    const { rows } = await this.pool.query(`SELECT * FROM monitored_nodes ORDER BY name ASC`);
    return rows.map(mapNodeRow);
  }

  async listEnabled(): Promise<NodeRecord[]> {
    const { rows } = await this.pool.query(
      `SELECT * FROM monitored_nodes WHERE enabled = TRUE ORDER BY name ASC`,
    );
    return rows.map(mapNodeRow);
  }

  async get(id: string): Promise<NodeRecord | null> {
    const { rows } = await this.pool.query(`SELECT * FROM monitored_nodes WHERE id = $1`, [id]);
    return rows[0] ? mapNodeRow(rows[0]) : null;
  }

  async create(input: NodeRegistration): Promise<NodeRecord> {
    const port = input.port ?? DEFAULT_NODE_PORT;
    await this.assertUnique({ name: input.name, host: input.host, port });
    try {
      const { rows } = await this.pool.query(
        `INSERT INTO monitored_nodes (id, name, host, port, enabled) VALUES ($1, $2, $3, $4, $5) RETURNING *`,
        [crypto.randomUUID(), input.name, input.host, port, input.enabled ?? true],
      );
      return mapNodeRow(rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConfigError(`Node ${input.name} (${input.host}:${port}) already exists`);
      }
      throw err;
    }
  }

  async update(id: string, patch: NodePatch): Promise<NodeRecord | null> {
    const current = await this.get(id);
    if (!current) return null;
    const next = { ...current, ...patch };
    await this.assertUnique(next, id);
    try {
      const { rows } = await this.pool.query(
        `UPDATE monitored_nodes SET name = $2, host = $3, port = $4, enabled = $5 WHERE id = $1 RETURNING *`,
        [id, next.name, next.host, next.port, next.enabled],
      );
      return rows[0] ? mapNodeRow(rows[0]) : null;
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConfigError(`Node ${next.name} (${next.host}:${next.port}) already exists`);
      }
      throw err;
    }
  }

  /** Deletes the node; snapshots and their children go with it (FK cascade). */
  async remove(id: string): Promise<NodeRecord | null> {
    const { rows } = await this.pool.query(`DELETE FROM monitored_nodes WHERE id = $1 RETURNING *`, [id]);
    return rows[0] ? mapNodeRow(rows[0]) : null;
  }

  private async assertUnique(node: Pick<NodeRecord, 'name' | 'host' | 'port'>, exceptId?: string) {
    const byAddress = await this.pool.query(
      `SELECT id FROM monitored_nodes WHERE host = $1 AND port = $2`,
      [node.host, node.port],
    );
    if (byAddress.rows.some((row) => row.id !== exceptId)) {
      throw new ConfigError(`Node ${node.host}:${node.port} already exists`);
    }
    const byName = await this.pool.query(`SELECT id FROM monitored_nodes WHERE name = $1`, [node.name]);
    if (byName.rows.some((row) => row.id !== exceptId)) {
      throw new ConfigError(`Node with name '${node.name}' already exists`);
    }
  }
}
