export * from './ClusterProperties';
export * from './ClusterPropertiesFactory';
export * from './errors';
export * from './store';
export * from './disruption';
export * from './config';
export * from './utils/logger';
export { TimerRegistry } from './utils/TimerRegistry';
