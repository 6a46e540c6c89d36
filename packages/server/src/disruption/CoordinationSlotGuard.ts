import { DocumentDecodeError, decodeDocument, encodeDocument } from '@clusterprops/core';
import type { ICoordinationStore, VersionedData } from '../store/ICoordinationStore';
import { BadVersionError, NoNodeError, NodeExistsError } from '../store/errors';
import type { DisruptionSlotGuard } from './ScheduledDisruption';

export interface CoordinationSlotGuardOptions {
  /** Node holding the latest claim, e.g. /disruptions/gc */
  claimPath: string;
  /** Recorded in the claim node */
  nodeId: string;
  clock?: () => number;
}

/**
 * Claims scheduled ticks through one node per disruption holding
 * `{ tick, nodeId, acquiredAt }`. A node takes a tick by moving the stored
 * tick forward with a version-conditioned write; whoever loses the write
 * re-reads and finds the tick already taken.
 */
export class CoordinationSlotGuard implements DisruptionSlotGuard {
  private readonly store: ICoordinationStore;
  readonly claimPath: string;
  private readonly nodeId: string;
  private readonly clock: () => number;

  constructor(store: ICoordinationStore, options: CoordinationSlotGuardOptions) {
    this.store = store;
    this.claimPath = options.claimPath.replace(/(.)\/+$/, '$1');
    this.nodeId = options.nodeId;
    this.clock = options.clock ?? (() => Date.now());
  }

  async tryAcquireSlot(tick: number): Promise<boolean> {
    const claim = encodeDocument({ tick, nodeId: this.nodeId, acquiredAt: this.clock() });

    for (;;) {
      const current = await this.readClaim();

      if (!current) {
        try {
          await this.store.create(this.claimPath, claim);
          return true;
        } catch (err) {
          if (err instanceof NodeExistsError) continue;
          throw err;
        }
      }

      if (claimedTick(current) >= tick) return false;

      try {
        await this.store.conditionalWrite(this.claimPath, claim, current.version);
        return true;
      } catch (err) {
        if (err instanceof BadVersionError || err instanceof NoNodeError) continue;
        throw err;
      }
    }
  }

  private async readClaim(): Promise<VersionedData | undefined> {
    try {
      return await this.store.read(this.claimPath);
    } catch (err) {
      if (err instanceof NoNodeError) return undefined;
      throw err;
    }
  }
}

// A claim without a readable tick can be taken over by any tick
function claimedTick(claim: VersionedData): number {
  try {
    const { tick } = decodeDocument(claim.data);
    return typeof tick === 'number' ? tick : Number.NEGATIVE_INFINITY;
  } catch (err) {
    if (err instanceof DocumentDecodeError) return Number.NEGATIVE_INFINITY;
    throw err;
  }
}
