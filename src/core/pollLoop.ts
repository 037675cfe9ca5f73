import { setTimeout as delay } from 'node:timers/promises';

import type { MonitorMetrics } from '../monitoring/metrics.js';
import type {
  CanonicalSnapshot,
  DisplayDirectives,
  Job,
  NodeActivity,
  NodeState,
  QueryFailureKind,
  QueryResult
} from '../types.js';
import { createLogger, type Logger } from '../utils/telemetry.js';
import { aggregate, describeJobs } from './aggregator.js';
import { LastKnownGood, type PartitionActivity } from './lastKnownGood.js';
import { mapDisplay } from './mapper.js';

export type PollPhase = 'idle' | 'polling' | 'rendering' | 'stopped';

export interface JobSource {
  fetch(signal?: AbortSignal): Promise<QueryResult<Job[]>>;
}

export interface NodeSource {
  fetch(signal?: AbortSignal): Promise<QueryResult<NodeState[]>>;
}

export interface RenderTarget {
  apply(directives: DisplayDirectives): Promise<{ failed: string[] }>;
  shutdown(): Promise<void>;
}

export type SourceStatus = 'fresh' | 'stale' | 'disabled' | QueryFailureKind;

export interface TickReport {
  tick: number;
  snapshot: CanonicalSnapshot;
  directives: DisplayDirectives;
  jobs: SourceStatus;
  nodes: SourceStatus;
  rendered: boolean;
  failedTargets: string[];
}

export type AbortableSleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PollLoopOptions {
  intervalMs: number;
  quantumPartition: string;
  jobs?: JobSource;
  nodes?: NodeSource;
  display: RenderTarget;
  lastKnownGood?: LastKnownGood;
  metrics?: MonitorMetrics;
  logger?: Logger;
  sleep?: AbortableSleep;
  now?: () => number;
}

const abortableDelay: AbortableSleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

/**
 * Single-threaded poll → aggregate → map → render cycle. Ticks never
 * overlap: a slow tick pushes the next one back.
 */
export class PollLoop {
  readonly lastKnownGood: LastKnownGood;
  private readonly logger: Logger;
  private readonly sleep: AbortableSleep;
  private readonly now: () => number;
  private readonly abortController = new AbortController();
  private currentPhase: PollPhase = 'idle';
  private ticks = 0;
  private running = false;
  private shutDown = false;
  private runningJobs: string | null = null;

  constructor(private readonly options: PollLoopOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError('intervalMs must be positive');
    }
    this.lastKnownGood = options.lastKnownGood ?? new LastKnownGood();
    this.logger = options.logger ?? createLogger('poll-loop');
    this.sleep = options.sleep ?? abortableDelay;
    this.now = options.now ?? Date.now;
  }

  get phase(): PollPhase {
    return this.currentPhase;
  }

  get stopRequested(): boolean {
    return this.abortController.signal.aborted;
  }

  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Poll loop is already running');
    }
    this.running = true;
    this.logger.info({ intervalMs: this.options.intervalMs }, 'Poll loop started');
    try {
      while (!this.stopRequested) {
        const started = this.now();
        try {
          await this.runOnce();
        } catch (error) {
          this.currentPhase = 'idle';
          this.logger.error({ err: error }, 'Tick failed');
        }
        if (this.stopRequested) {
          break;
        }
        const wait = Math.max(0, this.options.intervalMs - (this.now() - started));
        await this.sleep(wait, this.abortController.signal);
      }
    } finally {
      this.running = false;
      this.currentPhase = 'stopped';
      this.logger.info({ ticks: this.ticks }, 'Poll loop stopped');
    }
  }

  async runOnce(): Promise<TickReport> {
    const started = this.now();
    const signal = this.abortController.signal;
    const tick = this.ticks + 1;

    this.currentPhase = 'polling';
    const jobs = await this.poll('jobs', this.options.jobs, signal);
    const nodes = await this.poll('nodes', this.options.nodes, signal);

    if (jobs.value) {
      this.logRunningJobs(jobs.value);
    }

    const aggregated = aggregate(jobs.value ?? [], nodes.value ?? [], this.options.quantumPartition);
    const freshPartitions: PartitionActivity | null = jobs.value
      ? { classicalActive: aggregated.classicalActive, quantumActive: aggregated.quantumActive }
      : null;
    // an empty node listing confirms nothing
    const freshNodes: NodeActivity | null =
      nodes.value && nodes.value.length > 0 ? aggregated.nodeActive : null;
    const nodeStatus: SourceStatus = nodes.status === 'fresh' && !freshNodes ? 'stale' : nodes.status;

    const snapshot = this.lastKnownGood.resolve({ partitions: freshPartitions, nodes: freshNodes });
    const directives = mapDisplay(snapshot);

    let rendered = false;
    let failedTargets: string[] = [];
    if (!signal.aborted) {
      this.currentPhase = 'rendering';
      const report = await this.options.display.apply(directives);
      failedTargets = report.failed;
      rendered = true;
    }

    if (freshPartitions) {
      this.lastKnownGood.recordPartitions(freshPartitions);
    }
    if (freshNodes) {
      this.lastKnownGood.recordNodes(freshNodes);
    }

    this.ticks = tick;
    this.currentPhase = 'idle';
    this.options.metrics?.recordTick((this.now() - started) / 1000);
    if (rendered) {
      this.options.metrics?.recordDirectives(directives);
    }
    this.logger.debug(
      { tick, jobs: jobs.status, nodes: nodeStatus, classical: snapshot.classicalActive, quantum: snapshot.quantumActive },
      'Tick complete'
    );
    return { tick, snapshot, directives, jobs: jobs.status, nodes: nodeStatus, rendered, failedTargets };
  }

  /** Ends the wait between ticks and aborts in-flight queries. */
  stop(reason = 'stop requested'): void {
    if (this.stopRequested) {
      return;
    }
    this.logger.info({ reason }, 'Stopping poll loop');
    this.abortController.abort();
  }

  /** Drives every output off; safe to call more than once. */
  async shutdown(): Promise<void> {
    if (this.shutDown) {
      return;
    }
    this.shutDown = true;
    this.stop('shutdown');
    try {
      await this.options.display.shutdown();
    } finally {
      this.lastKnownGood.clear();
      this.currentPhase = 'stopped';
    }
  }

  private logRunningJobs(jobs: readonly Job[]): void {
    const running = describeJobs(jobs, this.options.quantumPartition);
    const key = JSON.stringify(running);
    if (key === this.runningJobs) {
      return;
    }
    this.runningJobs = key;
    this.logger.info(running, `Running jobs: ${jobs.length}`);
  }

  private async poll<T>(
    source: 'jobs' | 'nodes',
    query: { fetch(signal?: AbortSignal): Promise<QueryResult<T>> } | undefined,
    signal: AbortSignal
  ): Promise<{ status: SourceStatus; value: T | null }> {
    if (!query) {
      return { status: 'disabled', value: null };
    }
    if (signal.aborted) {
      return { status: 'aborted', value: null };
    }
    const result = await query.fetch(signal);
    if (result.ok) {
      this.options.metrics?.recordQuerySuccess(source);
      return { status: 'fresh', value: result.value };
    }
    if (result.kind !== 'aborted') {
      this.options.metrics?.recordQueryFailure(source, result.kind);
    }
    return { status: result.kind, value: null };
  }
}
