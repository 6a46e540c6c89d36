import { randomUUID } from 'crypto';
import type { Pool } from 'pg';
import type { EnvConfig } from './config/env-schema';
import { buildKnownProperties } from './config/known-properties';
import { ClusterProperties } from './ClusterProperties';
import type { ICoordinationStore } from './store/ICoordinationStore';
import { MemoryCoordinationStore } from './store/MemoryCoordinationStore';
import { PostgresCoordinationStore } from './store/PostgresCoordinationStore';
import { CoordinationSlotGuard } from './disruption/CoordinationSlotGuard';
import { GarbageCollectionDisruption, type GcFunction } from './disruption/GarbageCollectionDisruption';
import { TimerRegistry } from './utils/TimerRegistry';
import { logger } from './utils/logger';

export interface ClusterPropertiesRuntime {
  nodeId: string;
  store: ICoordinationStore;
  client: ClusterProperties;
  /** Present when a GC schedule is configured; already started */
  disruption?: GarbageCollectionDisruption;
  shutdown(): Promise<void>;
}

export interface ClusterPropertiesRuntimeOptions {
  /** Use this pool instead of connecting to DATABASE_URL. The runtime ends it on shutdown or failed startup */
  pool?: Pool;
  timers?: TimerRegistry;
  gc?: GcFunction;
}

async function openStore(config: EnvConfig, options: ClusterPropertiesRuntimeOptions, nodeId: string): Promise<ICoordinationStore> {
  if (!options.pool && !config.DATABASE_URL) {
    logger.warn({ nodeId }, 'DATABASE_URL not set, cluster properties are kept in memory');
    return new MemoryCoordinationStore();
  }

  const postgres = new PostgresCoordinationStore(
    options.pool ?? { connectionString: config.DATABASE_URL },
    { tableName: config.CLUSTERPROPS_TABLE }
  );
  try {
    await postgres.initialize();
  } catch (err) {
    await postgres.close();
    throw err;
  }
  return postgres;
}

/**
 * Wires store, client and scheduled GC from validated environment config.
 * Postgres backs the store when DATABASE_URL (or a pool) is given; otherwise
 * the store is in-memory and only coordinates within this process.
 * If startup fails after the store is open, the store is closed before the error propagates.
 */
export async function createClusterPropertiesRuntime(
  config: EnvConfig,
  options: ClusterPropertiesRuntimeOptions = {}
): Promise<ClusterPropertiesRuntime> {
  if (config.LOG_LEVEL) {
    logger.level = config.LOG_LEVEL;
  }

  const nodeId = config.NODE_ID ?? `node-${randomUUID().substring(0, 8)}`;
  const timers = options.timers ?? new TimerRegistry();
  const store = await openStore(config, options, nodeId);

  let client: ClusterProperties;
  let disruption: GarbageCollectionDisruption | undefined;
  try {
    client = new ClusterProperties(store, {
      documentPath: config.CLUSTERPROPS_DOCUMENT_PATH,
      knownProperties: buildKnownProperties(config.CLUSTERPROPS_KNOWN_PROPERTIES),
      maxAttempts: config.CLUSTERPROPS_MAX_ATTEMPTS,
      deadlineMs: config.CLUSTERPROPS_DEADLINE_MS,
    });

    if (config.CLUSTERPROPS_GC_CRON) {
      disruption = new GarbageCollectionDisruption({
        cronExpression: config.CLUSTERPROPS_GC_CRON,
        slotGuard: new CoordinationSlotGuard(store, {
          claimPath: `${config.CLUSTERPROPS_DISRUPTION_PATH}/gc`,
          nodeId,
        }),
        timers,
        gc: options.gc,
      });
      disruption.start();
    }
  } catch (err) {
    logger.error({ err, nodeId }, 'Cluster properties runtime failed to start');
    await store.close();
    throw err;
  }

  logger.info({ nodeId, documentPath: client.documentPath, gcCron: config.CLUSTERPROPS_GC_CRON }, 'Cluster properties runtime ready');

  return {
    nodeId,
    store,
    client,
    disruption,
    async shutdown() {
      if (disruption) {
        await disruption.cancel();
      }
      timers.clear();
      await store.close();
      logger.info({ nodeId }, 'Cluster properties runtime stopped');
    },
  };
}
