/**
 * Failure conditions every coordination store adapter reports with a
 * distinct type. Anything else an adapter throws is a transport failure.
 */
export class CoordinationStoreError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'CoordinationStoreError';
    this.path = path;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * The node does not exist
 */
export class NoNodeError extends CoordinationStoreError {
  constructor(path: string) {
    super(`No node for ${path}`, path);
    this.name = 'NoNodeError';
  }
}

/**
 * A conditional write named a version other than the stored one
 */
export class BadVersionError extends CoordinationStoreError {
  public readonly expectedVersion: number;

  constructor(path: string, expectedVersion: number) {
    super(`Bad version for ${path}: expected ${expectedVersion}`, path);
    this.name = 'BadVersionError';
    this.expectedVersion = expectedVersion;
  }
}

/**
 * A create raced with another writer
 */
export class NodeExistsError extends CoordinationStoreError {
  constructor(path: string) {
    super(`Node already exists for ${path}`, path);
    this.name = 'NodeExistsError';
  }
}

/**
 * Version conflicts and create/delete races: the caller should re-read
 * and try again.
 */
export function isConcurrencyConflict(err: unknown): err is CoordinationStoreError {
  return err instanceof BadVersionError || err instanceof NodeExistsError || err instanceof NoNodeError;
}
