import type { QueryFailureKind } from '../types.js';

export interface FailureLogDecision {
  log: boolean;
  /** Consecutive failures of this class, including the current one. */
  repeats: number;
  changedClass: boolean;
}

export interface RecoveryDecision {
  log: boolean;
  failures: number;
}

const DEFAULT_REPEAT_EVERY = 20;

/**
 * Decides which query failures reach the log: every new failure class,
 * and every `repeatEvery`-th repeat of the current one.
 */
export class FailureLogThrottle {
  private lastKind: QueryFailureKind | null = null;
  private repeats = 0;
  private totalFailures = 0;

  constructor(private readonly repeatEvery = DEFAULT_REPEAT_EVERY) {
    if (!Number.isInteger(repeatEvery) || repeatEvery < 1) {
      throw new RangeError('repeatEvery must be a positive integer');
    }
  }

  recordFailure(kind: QueryFailureKind): FailureLogDecision {
    this.totalFailures += 1;
    if (kind !== this.lastKind) {
      this.lastKind = kind;
      this.repeats = 1;
      return { log: true, repeats: 1, changedClass: true };
    }
    this.repeats += 1;
    return {
      log: this.repeats % this.repeatEvery === 0,
      repeats: this.repeats,
      changedClass: false
    };
  }

  recordSuccess(): RecoveryDecision {
    const failures = this.totalFailures;
    this.lastKind = null;
    this.repeats = 0;
    this.totalFailures = 0;
    return { log: failures > 0, failures };
  }
}
