/**
 * ClusterProperties - reads and updates the shared cluster properties document
 *
 * The document lives at one node of a versioned coordination store. Updates
 * take no lock: every attempt reads the latest version, decides, and writes
 * conditioned on that version. A writer that loses the race re-reads and
 * decides again, so concurrent updates are never lost.
 *
 * Every call goes to the store; nothing is cached here. Callers that can
 * live with eventually-consistent reads should use a watched, cached view
 * of the document instead.
 */

import {
  DocumentDecodeError,
  decodeDocument,
  encodeDocument,
  getByPath,
  mergeDocuments,
  type PropertyDocument,
  type PropertyValue,
} from '@clusterprops/core';
import type { ICoordinationStore, VersionedData } from './store/ICoordinationStore';
import { NoNodeError, isConcurrencyConflict } from './store/errors';
import { DEFAULT_KNOWN_PROPERTIES } from './config/known-properties';
import {
  ClusterPropertiesIOError,
  DeadlineExceededError,
  PropertyValidationError,
  RetriesExhaustedError,
} from './errors';
import { logger as defaultLogger, type Logger } from './utils/logger';

export const DEFAULT_DOCUMENT_PATH = '/clusterprops.json';

export interface ClusterPropertiesOptions {
  /** Node holding the document. Default: /clusterprops.json */
  documentPath?: string;
  /** Names accepted by setProperty. Default: DEFAULT_KNOWN_PROPERTIES */
  knownProperties?: Iterable<string>;
  /** Give up a single-key update after this many conflicting attempts. Default: unbounded */
  maxAttempts?: number;
  /** Give up a single-key update once this much time has passed. Default: unbounded */
  deadlineMs?: number;
  logger?: Logger;
  /** Millisecond clock for the deadline. Default: Date.now */
  clock?: () => number;
}

export class ClusterProperties {
  private readonly store: ICoordinationStore;
  private readonly path: string;
  private readonly knownProperties: ReadonlySet<string>;
  private readonly maxAttempts?: number;
  private readonly deadlineMs?: number;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(store: ICoordinationStore, options: ClusterPropertiesOptions = {}) {
    if (options.maxAttempts !== undefined && !(Number.isInteger(options.maxAttempts) && options.maxAttempts > 0)) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    if (options.deadlineMs !== undefined && !(options.deadlineMs > 0)) {
      throw new RangeError(`deadlineMs must be positive, got ${options.deadlineMs}`);
    }

    this.store = store;
    this.path = options.documentPath ?? DEFAULT_DOCUMENT_PATH;
    this.knownProperties = new Set(options.knownProperties ?? DEFAULT_KNOWN_PROPERTIES);
    this.maxAttempts = options.maxAttempts;
    this.deadlineMs = options.deadlineMs;
    this.logger = options.logger ?? defaultLogger.child({ component: 'ClusterProperties' });
    this.clock = options.clock ?? (() => Date.now());
  }

  get documentPath(): string {
    return this.path;
  }

  isKnownProperty(name: string): boolean {
    return this.knownProperties.has(name);
  }

  /**
   * Reads one property, returning `defaultValue` when it is not set.
   *
   * @param key - property name, or a `/`-separated path into nested values
   * @throws ClusterPropertiesIOError if the store read fails
   */
  getProperty(key: string): Promise<PropertyValue | undefined>;
  getProperty(key: string, defaultValue: PropertyValue): Promise<PropertyValue>;
  async getProperty(key: string, defaultValue?: PropertyValue): Promise<PropertyValue | undefined> {
    const value = getByPath(await this.getProperties(), key);
    if (value === undefined || value === null) return defaultValue;
    return value;
  }

  /**
   * Reads the whole document. A missing document reads as `{}`.
   *
   * @throws ClusterPropertiesIOError if the store read fails
   * @throws DocumentDecodeError if the stored payload is not a JSON object
   */
  async getProperties(): Promise<PropertyDocument> {
    let stored: VersionedData;
    try {
      stored = await this.store.read(this.path);
    } catch (err) {
      if (err instanceof NoNodeError) return {};
      throw new ClusterPropertiesIOError('Error reading cluster properties', this.path, err);
    }
    return decodeDocument(stored.data);
  }

  /**
   * Deep-merges `properties` into the stored document. Nested objects merge,
   * other values overwrite, `null` removes a key. Nothing is written when the
   * merge leaves the document unchanged. Version conflicts are retried by the
   * store's atomic update.
   *
   * @throws ClusterPropertiesIOError if the store fails
   * @throws DocumentDecodeError if the stored payload is not a JSON object
   */
  async setProperties(properties: PropertyDocument): Promise<void> {
    let changed = false;
    const transform = (current: Uint8Array | null): Uint8Array | null => {
      if (current === null) {
        changed = true;
        return encodeDocument(properties);
      }
      const result = mergeDocuments(decodeDocument(current), properties);
      changed = result.changed;
      return result.changed ? encodeDocument(result.merged) : null;
    };

    try {
      await this.store.atomicUpdate(this.path, transform);
    } catch (err) {
      if (err instanceof DocumentDecodeError) throw err;
      throw new ClusterPropertiesIOError('Error setting cluster properties', this.path, err);
    }

    this.logger.debug({ path: this.path, keys: Object.keys(properties), changed }, 'Cluster properties merged');
  }

  /**
   * Sets a single known property, or removes it when `value` is null.
   * Writes only when the stored value differs.
   *
   * @throws PropertyValidationError before touching the store if `name` is not known
   * @throws ClusterPropertiesIOError if the store fails
   * @throws RetriesExhaustedError / DeadlineExceededError when a configured bound is hit
   */
  async setProperty(name: string, value: string | null): Promise<void> {
    if (!this.knownProperties.has(name)) {
      throw new PropertyValidationError(name);
    }

    const startedAt = this.clock();

    for (let attempt = 1; ; attempt++) {
      if (this.maxAttempts !== undefined && attempt > this.maxAttempts) {
        this.logger.warn({ path: this.path, name, attempts: this.maxAttempts }, 'Cluster property update gave up');
        throw new RetriesExhaustedError(this.path, this.maxAttempts);
      }
      if (this.deadlineMs !== undefined && this.clock() - startedAt >= this.deadlineMs) {
        this.logger.warn({ path: this.path, name, deadlineMs: this.deadlineMs }, 'Cluster property update timed out');
        throw new DeadlineExceededError(this.path, this.deadlineMs);
      }

      try {
        const outcome = await this.trySetProperty(name, value);
        this.logger.debug({ path: this.path, name, outcome, attempt }, 'Cluster property update finished');
        return;
      } catch (err) {
        if (isConcurrencyConflict(err)) {
          this.logger.debug({ path: this.path, name, attempt, reason: err.name }, 'Cluster property update raced, retrying');
          continue;
        }
        if (err instanceof DocumentDecodeError) throw err;
        throw new ClusterPropertiesIOError('Error setting cluster property', this.path, err);
      }
    }
  }

  /**
   * Removes a single known property.
   */
  async deleteProperty(name: string): Promise<void> {
    await this.setProperty(name, null);
  }

  /**
   * One read-decide-write pass. Conflicts surface as store errors for the caller to retry.
   */
  private async trySetProperty(name: string, value: string | null): Promise<'written' | 'created' | 'unchanged'> {
    if (!(await this.store.exists(this.path))) {
      // Nothing stored, so nothing to delete
      if (value === null) return 'unchanged';
      await this.store.create(this.path, encodeDocument({ [name]: value }));
      return 'created';
    }

    const { data, version } = await this.store.read(this.path);
    const properties = decodeDocument(data);
    const current = Object.prototype.hasOwnProperty.call(properties, name) ? properties[name] : undefined;

    if (value === null) {
      if (current === undefined || current === null) return 'unchanged';
      delete properties[name];
    } else {
      if (current === value) return 'unchanged';
      properties[name] = value;
    }

    await this.store.conditionalWrite(this.path, encodeDocument(properties), version);
    return 'written';
  }
}
