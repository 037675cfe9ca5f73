import type { CanonicalSnapshot, NodeActivity } from '../types.js';

export interface PartitionActivity {
  readonly classicalActive: boolean;
  readonly quantumActive: boolean;
}

export interface LastKnownGoodSeed {
  partitions?: PartitionActivity;
  nodes?: NodeActivity;
}

/**
 * Most recent confirmed value of each sub-source. Job state and node state
 * are held apart so a failure of one never touches the other.
 */
export class LastKnownGood {
  private partitionActivity: PartitionActivity | null;
  private nodeActivity: Record<string, boolean>;

  constructor(seed: LastKnownGoodSeed = {}) {
    this.partitionActivity = seed.partitions ? { ...seed.partitions } : null;
    this.nodeActivity = { ...(seed.nodes ?? {}) };
  }

  get partitions(): PartitionActivity | null {
    return this.partitionActivity;
  }

  get nodes(): NodeActivity {
    return { ...this.nodeActivity };
  }

  recordPartitions(activity: PartitionActivity): void {
    this.partitionActivity = {
      classicalActive: activity.classicalActive,
      quantumActive: activity.quantumActive
    };
  }

  /** Merges fresh entries; nodes absent from `fresh` keep their last value. */
  recordNodes(fresh: NodeActivity): void {
    this.nodeActivity = { ...this.nodeActivity, ...fresh };
  }

  /**
   * Fills whatever the fresh snapshot could not confirm from the stored
   * values. Sources with no confirmed value yet read as inactive.
   */
  resolve(fresh: {
    partitions: PartitionActivity | null;
    nodes: NodeActivity | null;
  }): CanonicalSnapshot {
    const partitions = fresh.partitions ?? this.partitionActivity ?? { classicalActive: false, quantumActive: false };
    const nodeActive = { ...this.nodeActivity, ...(fresh.nodes ?? {}) };
    return {
      classicalActive: partitions.classicalActive,
      quantumActive: partitions.quantumActive,
      nodeActive
    };
  }

  clear(): void {
    this.partitionActivity = null;
    this.nodeActivity = {};
  }
}
