import type { VersionStamp } from '@clusterprops/core';

export interface VersionedData {
  data: Uint8Array;
  version: VersionStamp;
}

/**
 * Receives the current bytes of a node (null when absent) and returns the
 * bytes to store, or null when no change is needed.
 */
export type UpdateTransform = (current: Uint8Array | null) => Uint8Array | null;

/**
 * Versioned coordination store over a hierarchical key space.
 *
 * Adapters report the conflict conditions with the error types from
 * `./errors`; anything else they throw is a transport failure.
 */
export interface ICoordinationStore {
  /**
   * Whether a node exists at `path`.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Reads the node's bytes and current version.
   * Rejects with NoNodeError when absent.
   */
  read(path: string): Promise<VersionedData>;

  /**
   * Replaces the node's bytes if its version still equals `expectedVersion`.
   * Rejects with BadVersionError on mismatch and NoNodeError when absent.
   * @returns the new version
   */
  conditionalWrite(path: string, data: Uint8Array, expectedVersion: VersionStamp): Promise<VersionStamp>;

  /**
   * Creates the node at version 0.
   * Rejects with NodeExistsError when another writer created it first.
   */
  create(path: string, data: Uint8Array): Promise<void>;

  /**
   * Applies `transform` to the current bytes and stores a non-null result,
   * retrying internally on version conflicts. Errors thrown by `transform`
   * propagate unchanged.
   */
  atomicUpdate(path: string, transform: UpdateTransform): Promise<void>;

  /**
   * Release the underlying connection.
   */
  close(): Promise<void>;
}
