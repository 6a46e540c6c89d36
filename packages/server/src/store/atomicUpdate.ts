import type { ICoordinationStore, UpdateTransform } from './ICoordinationStore';
import { NoNodeError, isConcurrencyConflict } from './errors';
import { logger as defaultLogger, type Logger } from '../utils/logger';

type CasOperations = Pick<ICoordinationStore, 'read' | 'conditionalWrite' | 'create'>;

/**
 * Read-transform-write loop over the store's CAS primitives.
 * An absent node is created, a present one is written conditioned on the
 * version that was read; a lost race starts over with a fresh read.
 */
export async function runAtomicUpdate(
  store: CasOperations,
  path: string,
  transform: UpdateTransform,
  log: Logger = defaultLogger
): Promise<void> {
  for (let attempt = 1; ; attempt++) {
    let current: Uint8Array | null = null;
    let version: number | undefined;

    try {
      const read = await store.read(path);
      current = read.data;
      version = read.version;
    } catch (err) {
      if (!(err instanceof NoNodeError)) throw err;
    }

    const next = transform(current);
    if (next === null) return;

    try {
      if (version === undefined) {
        await store.create(path, next);
      } else {
        await store.conditionalWrite(path, next, version);
      }
      return;
    } catch (err) {
      if (!isConcurrencyConflict(err)) throw err;
      log.debug({ path, attempt, reason: err.name }, 'Atomic update conflict, retrying');
    }
  }
}
