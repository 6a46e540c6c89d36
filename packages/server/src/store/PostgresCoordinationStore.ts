import { Pool, PoolConfig } from 'pg';
import type { VersionStamp } from '@clusterprops/core';
import type { ICoordinationStore, UpdateTransform, VersionedData } from './ICoordinationStore';
import { BadVersionError, NoNodeError, NodeExistsError } from './errors';
import { runAtomicUpdate } from './atomicUpdate';
import { logger as defaultLogger, type Logger } from '../utils/logger';

export interface PostgresCoordinationStoreOptions {
  tableName?: string;
  logger?: Logger;
}

const DEFAULT_TABLE_NAME = 'clusterprops_nodes';
const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const UNIQUE_VIOLATION = '23505';

interface NodeRow {
  payload: string;
  node_version: number | string;
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}

function validateTableName(name: string): void {
  if (!TABLE_NAME_REGEX.test(name)) {
    throw new Error(
      `Invalid table name "${name}". Table name must start with a letter or underscore and contain only alphanumeric characters and underscores.`
    );
  }
}

/**
 * Coordination store on a single Postgres table.
 *
 * One row per node: path, payload (base64, so any bytes survive the TEXT
 * column) and version. Conditional writes compare the version in the
 * UPDATE's WHERE clause, so a stale writer matches no row.
 */
export class PostgresCoordinationStore implements ICoordinationStore {
  private pool: Pool;
  private tableName: string;
  private readonly logger: Logger;

  constructor(configOrPool: PoolConfig | Pool, options?: PostgresCoordinationStoreOptions) {
    if ('query' in configOrPool) {
      this.pool = configOrPool;
    } else {
      this.pool = new Pool(configOrPool);
    }

    const tableName = options?.tableName ?? DEFAULT_TABLE_NAME;
    validateTableName(tableName);
    this.tableName = tableName;
    this.logger = options?.logger ?? defaultLogger.child({ component: 'PostgresCoordinationStore' });
  }

  async initialize(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(`
        CREATE TABLE IF NOT EXISTS ${this.tableName} (
          node_path TEXT PRIMARY KEY,
          payload TEXT NOT NULL,
          node_version INTEGER NOT NULL
        );
      `);
    } finally {
      client.release();
    }
    this.logger.info({ table: this.tableName }, 'Coordination store table ready');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async exists(path: string): Promise<boolean> {
    const res = await this.pool.query<{ node_path: string }>(
      `SELECT node_path FROM ${this.tableName} WHERE node_path = $1`,
      [path]
    );
    return res.rows.length > 0;
  }

  async read(path: string): Promise<VersionedData> {
    const res = await this.pool.query<NodeRow>(
      `SELECT payload, node_version FROM ${this.tableName} WHERE node_path = $1`,
      [path]
    );
    if (res.rows.length === 0) throw new NoNodeError(path);

    const row = res.rows[0];
    return {
      data: new Uint8Array(Buffer.from(row.payload, 'base64')),
      version: Number(row.node_version),
    };
  }

  async conditionalWrite(path: string, data: Uint8Array, expectedVersion: VersionStamp): Promise<VersionStamp> {
    const res = await this.pool.query<{ node_version: number | string }>(
      `UPDATE ${this.tableName}
       SET payload = $2, node_version = node_version + 1
       WHERE node_path = $1 AND node_version = $3
       RETURNING node_version`,
      [path, Buffer.from(data).toString('base64'), expectedVersion]
    );

    if (res.rows.length === 0) {
      if (await this.exists(path)) throw new BadVersionError(path, expectedVersion);
      throw new NoNodeError(path);
    }
    return Number(res.rows[0].node_version);
  }

  async create(path: string, data: Uint8Array): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO ${this.tableName} (node_path, payload, node_version) VALUES ($1, $2, 0)`,
        [path, Buffer.from(data).toString('base64')]
      );
    } catch (err) {
      // The primary key decides which of two racing creates wins
      if (isUniqueViolation(err)) throw new NodeExistsError(path);
      throw err;
    }
  }

  async atomicUpdate(path: string, transform: UpdateTransform): Promise<void> {
    await runAtomicUpdate(this, path, transform, this.logger);
  }
}
