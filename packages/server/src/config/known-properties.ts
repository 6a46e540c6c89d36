/**
 * Property names accepted by single-key updates when the embedding system
 * does not supply its own set. Bulk updates are not restricted.
 */
export const DEFAULT_KNOWN_PROPERTIES: readonly string[] = [
  'urlScheme',
  'environment',
  'maxShards',
  'maxShardsPerNode',
  'autoAddReplicas',
  'backupLocation',
  'defaultShardPreferences',
  'samplePercentage',
];

/**
 * Known-property set with `extra` names added to the defaults.
 */
export function buildKnownProperties(extra: Iterable<string> = []): ReadonlySet<string> {
  return new Set([...DEFAULT_KNOWN_PROPERTIES, ...extra]);
}
