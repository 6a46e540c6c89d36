import { ScheduledDisruption, type ScheduledDisruptionConfig } from './ScheduledDisruption';

export type GcFunction = () => void;

/**
 * The runtime's collector hook, exposed when node runs with --expose-gc.
 */
export function resolveRuntimeGc(): GcFunction | undefined {
  const gc: unknown = Reflect.get(globalThis, 'gc');
  if (typeof gc !== 'function') return undefined;
  return () => {
    gc();
  };
}

export interface GarbageCollectionDisruptionConfig extends Omit<ScheduledDisruptionConfig, 'name'> {
  name?: string;
  /** Collector to call. Default: the runtime's global gc, if exposed */
  gc?: GcFunction;
}

/**
 * Forces a full garbage collection pass on schedule.
 */
export class GarbageCollectionDisruption extends ScheduledDisruption {
  private readonly gc?: GcFunction;

  constructor(config: GarbageCollectionDisruptionConfig) {
    super({ ...config, name: config.name ?? 'gc' });
    this.gc = config.gc ?? resolveRuntimeGc();
  }

  protected runDisruption(): void {
    if (!this.gc) {
      this.logger.warn('Garbage collection is not exposed, start node with --expose-gc');
      return;
    }
    this.logger.info('Running System GC');
    this.gc();
  }
}
