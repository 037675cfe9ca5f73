import type { CanonicalSnapshot, Job, NodeState, NodeStateToken } from '../types.js';

const ACTIVE_STATES: ReadonlySet<NodeStateToken> = new Set(['allocated', 'mixed']);
const INACTIVE_STATES: ReadonlySet<NodeStateToken> = new Set(['idle', 'down']);

export function aggregate(
  jobs: readonly Job[],
  nodeStates: readonly NodeState[],
  quantumPartition: string
): CanonicalSnapshot {
  let classicalActive = false;
  let quantumActive = false;
  for (const job of jobs) {
    if (job.partition === quantumPartition) {
      quantumActive = true;
    } else {
      classicalActive = true;
    }
  }

  // sinfo -N repeats a node per partition; any active row wins
  const nodeActive: Record<string, boolean> = {};
  for (const node of nodeStates) {
    if (ACTIVE_STATES.has(node.state)) {
      nodeActive[node.nodeId] = true;
    } else if (INACTIVE_STATES.has(node.state) && nodeActive[node.nodeId] === undefined) {
      nodeActive[node.nodeId] = false;
    }
  }

  return { classicalActive, quantumActive, nodeActive };
}

export interface RunningJobs {
  classical: string[];
  quantum: string[];
}

/** Running jobs per class, as `name(id)`. */
export function describeJobs(jobs: readonly Job[], quantumPartition: string): RunningJobs {
  const running: RunningJobs = { classical: [], quantum: [] };
  for (const job of jobs) {
    const label = `${job.name}(${job.id})`;
    if (job.partition === quantumPartition) {
      running.quantum.push(label);
    } else {
      running.classical.push(label);
    }
  }
  return running;
}
