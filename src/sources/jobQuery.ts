import { TransientQueryFailure } from '../errors.js';
import type { Job, QueryResult } from '../types.js';
import { runCommand, type CommandOutcome, type CommandRunner } from '../utils/command.js';
import { FailureLogThrottle } from '../utils/failureThrottle.js';
import { createLogger, type Logger } from '../utils/telemetry.js';
import { outcomeToFailure } from './outcome.js';

export interface LocalJobQueryOptions {
  container: string;
  dockerCommand: string;
  slurmUser?: string;
  timeoutMs: number;
  runner?: CommandRunner;
  logger?: Logger;
  throttle?: FailureLogThrottle;
}

const SQUEUE_FORMAT = '%i|%P|%j';

/**
 * Lists running jobs inside the monitored container. A successful empty
 * listing is a real answer (nothing running), not a failure.
 */
export class LocalJobQuery {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly throttle: FailureLogThrottle;

  constructor(private readonly options: LocalJobQueryOptions) {
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? createLogger('job-query');
    this.throttle = options.throttle ?? new FailureLogThrottle();
  }

  buildCommand(): { command: string; args: string[] } {
    const squeue = ['squeue'];
    if (this.options.slurmUser) {
      squeue.push('-u', this.options.slurmUser);
    }
    squeue.push('-t', 'RUNNING', '-h', '-o', `'${SQUEUE_FORMAT}'`);
    return {
      command: this.options.dockerCommand,
      args: ['exec', this.options.container, 'bash', '-c', squeue.join(' ')]
    };
  }

  async fetch(signal?: AbortSignal): Promise<QueryResult<Job[]>> {
    const { command, args } = this.buildCommand();
    let outcome: CommandOutcome;
    try {
      outcome = await this.runner({ command, args, timeoutMs: this.options.timeoutMs, signal });
    } catch (error) {
      outcome = { status: 'spawn-error', error: error instanceof Error ? error : new Error(String(error)) };
    }

    try {
      const stdout = expectSuccess(outcome);
      const jobs = parseJobListing(stdout);
      const recovery = this.throttle.recordSuccess();
      if (recovery.log) {
        this.logger.info({ failures: recovery.failures }, 'Job query recovered');
      }
      this.logger.debug({ jobs: jobs.length }, 'Job query succeeded');
      return { ok: true, value: jobs };
    } catch (error) {
      if (!(error instanceof TransientQueryFailure)) {
        throw error;
      }
      this.reportFailure(error);
      return { ok: false, kind: error.kind };
    }
  }

  private reportFailure(failure: TransientQueryFailure): void {
    if (failure.kind === 'aborted') {
      this.logger.debug('Job query aborted');
      return;
    }
    const decision = this.throttle.recordFailure(failure.kind);
    if (!decision.log) {
      return;
    }
    const context = { kind: failure.kind, repeats: decision.repeats, exitCode: failure.exitCode, stderr: failure.stderr };
    this.logger.warn(
      context,
      decision.changedClass ? failure.message : `${failure.message} (repeated ${decision.repeats} times)`
    );
  }
}

function expectSuccess(outcome: CommandOutcome): string {
  const failure = outcomeToFailure('jobs', outcome);
  if (failure) {
    throw failure;
  }
  return outcome.status === 'exited' ? outcome.stdout : '';
}

export function parseJobListing(stdout: string): Job[] {
  const jobs: Job[] = [];
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    const parts = trimmed.split('|');
    if (parts.length < 3) {
      throw new TransientQueryFailure('jobs', 'parse', `Malformed squeue row: ${trimmed}`);
    }
    const [id, partition, ...nameParts] = parts;
    if (!id.trim() || !partition.trim()) {
      throw new TransientQueryFailure('jobs', 'parse', `Malformed squeue row: ${trimmed}`);
    }
    jobs.push({ id: id.trim(), partition: partition.trim(), name: nameParts.join('|').trim() });
  }
  return jobs;
}
