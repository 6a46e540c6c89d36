export {
  ScheduledDisruption,
  type ScheduledDisruptionConfig,
  type DisruptionSlotGuard,
  type DisruptionState,
  type DisruptionStats,
} from './ScheduledDisruption';
export {
  GarbageCollectionDisruption,
  resolveRuntimeGc,
  type GarbageCollectionDisruptionConfig,
  type GcFunction,
} from './GarbageCollectionDisruption';
export { CoordinationSlotGuard, type CoordinationSlotGuardOptions } from './CoordinationSlotGuard';
