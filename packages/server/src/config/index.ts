/**
 * Configuration exports
 */

export { validateEnv, parseEnv, type EnvConfig } from './env-schema';
export { DEFAULT_KNOWN_PROPERTIES, buildKnownProperties } from './known-properties';
