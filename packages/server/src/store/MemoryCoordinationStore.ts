import type { VersionStamp } from '@clusterprops/core';
import type { ICoordinationStore, UpdateTransform, VersionedData } from './ICoordinationStore';
import { BadVersionError, NoNodeError, NodeExistsError } from './errors';
import { runAtomicUpdate } from './atomicUpdate';
import { logger as defaultLogger, type Logger } from '../utils/logger';

interface StoredNode {
  data: Uint8Array;
  version: VersionStamp;
}

export interface MemoryStoreStats {
  exists: number;
  read: number;
  conditionalWrite: number;
  create: number;
  atomicUpdate: number;
  /** Successful creates and conditional writes */
  writes: number;
}

const emptyStats = (): MemoryStoreStats => ({
  exists: 0,
  read: 0,
  conditionalWrite: 0,
  create: 0,
  atomicUpdate: 0,
  writes: 0,
});

/**
 * In-memory implementation of ICoordinationStore.
 * Useful for development, testing, and single-process deployments.
 * Versions start at 0 on create and grow by 1 per write.
 *
 * Note: Data is lost when the process exits.
 */
export class MemoryCoordinationStore implements ICoordinationStore {
  private nodes = new Map<string, StoredNode>();
  private stats = emptyStats();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger.child({ component: 'MemoryCoordinationStore' });
  }

  async exists(path: string): Promise<boolean> {
    this.stats.exists++;
    return this.nodes.has(path);
  }

  async read(path: string): Promise<VersionedData> {
    this.stats.read++;
    const node = this.nodes.get(path);
    if (!node) throw new NoNodeError(path);
    return { data: new Uint8Array(node.data), version: node.version };
  }

  async conditionalWrite(path: string, data: Uint8Array, expectedVersion: VersionStamp): Promise<VersionStamp> {
    this.stats.conditionalWrite++;
    const node = this.nodes.get(path);
    if (!node) throw new NoNodeError(path);
    if (node.version !== expectedVersion) throw new BadVersionError(path, expectedVersion);

    const version = node.version + 1;
    this.nodes.set(path, { data: new Uint8Array(data), version });
    this.stats.writes++;
    return version;
  }

  async create(path: string, data: Uint8Array): Promise<void> {
    this.stats.create++;
    if (this.nodes.has(path)) throw new NodeExistsError(path);
    this.nodes.set(path, { data: new Uint8Array(data), version: 0 });
    this.stats.writes++;
  }

  async atomicUpdate(path: string, transform: UpdateTransform): Promise<void> {
    this.stats.atomicUpdate++;
    await runAtomicUpdate(this, path, transform, this.logger);
  }

  /**
   * Test and development hook, not part of ICoordinationStore: removes a node
   * the way another process deleting it would. Returns false when there was
   * nothing to remove.
   */
  async delete(path: string): Promise<boolean> {
    return this.nodes.delete(path);
  }

  /**
   * Test and development hook: paths of every stored node, in creation order.
   */
  listPaths(): string[] {
    return Array.from(this.nodes.keys());
  }

  getStats(): MemoryStoreStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  async close(): Promise<void> {
    this.nodes.clear();
    this.logger.debug('Memory coordination store cleared and closed');
  }
}
