export type { ICoordinationStore, VersionedData, UpdateTransform } from './ICoordinationStore';
export {
  CoordinationStoreError,
  NoNodeError,
  BadVersionError,
  NodeExistsError,
  isConcurrencyConflict,
} from './errors';
export { runAtomicUpdate } from './atomicUpdate';
export { MemoryCoordinationStore, type MemoryStoreStats } from './MemoryCoordinationStore';
export { PostgresCoordinationStore, type PostgresCoordinationStoreOptions } from './PostgresCoordinationStore';
