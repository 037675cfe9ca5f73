import { TransientQueryFailure } from '../errors.js';
import type { NodeState, NodeStateToken, QueryResult } from '../types.js';
import { runCommand, type CommandOutcome, type CommandRunner } from '../utils/command.js';
import { FailureLogThrottle } from '../utils/failureThrottle.js';
import { createLogger, type Logger } from '../utils/telemetry.js';
import { outcomeToFailure } from './outcome.js';

export interface RemoteNodeQueryOptions {
  host: string;
  user: string;
  container: string;
  dockerCommand: string;
  connectTimeoutSec: number;
  timeoutMs: number;
  runner?: CommandRunner;
  logger?: Logger;
  throttle?: FailureLogThrottle;
}

const STATE_FLAGS = /[*~#!%$@^+-]+$/;

/**
 * Reads per-node allocation state from the primary host over a batch-mode
 * ssh channel. Host keys are accepted without prompting: the channel only
 * runs on the private cluster network.
 */
export class RemoteNodeQuery {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly throttle: FailureLogThrottle;

  constructor(private readonly options: RemoteNodeQueryOptions) {
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? createLogger('node-query');
    this.throttle = options.throttle ?? new FailureLogThrottle();
  }

  buildCommand(): { command: string; args: string[] } {
    const { host, user, container, dockerCommand, connectTimeoutSec } = this.options;
    const remote = `${dockerCommand} exec ${container} sinfo -N -h -o '%N %T'`;
    return {
      command: 'ssh',
      args: [
        '-o',
        'BatchMode=yes',
        '-o',
        `ConnectTimeout=${connectTimeoutSec}`,
        '-o',
        'StrictHostKeyChecking=no',
        '-o',
        'UserKnownHostsFile=/dev/null',
        '-o',
        'LogLevel=ERROR',
        `${user}@${host}`,
        remote
      ]
    };
  }

  async fetch(signal?: AbortSignal): Promise<QueryResult<NodeState[]>> {
    const { command, args } = this.buildCommand();
    let outcome: CommandOutcome;
    try {
      outcome = await this.runner({ command, args, timeoutMs: this.options.timeoutMs, signal });
    } catch (error) {
      outcome = { status: 'spawn-error', error: error instanceof Error ? error : new Error(String(error)) };
    }

    const failure = outcomeToFailure('nodes', outcome);
    if (failure) {
      this.reportFailure(failure);
      return { ok: false, kind: failure.kind };
    }

    const stdout = outcome.status === 'exited' ? outcome.stdout : '';
    let nodes: NodeState[];
    try {
      nodes = parseNodeListing(stdout);
    } catch (error) {
      if (!(error instanceof TransientQueryFailure)) {
        throw error;
      }
      this.reportFailure(error);
      return { ok: false, kind: error.kind };
    }

    const recovery = this.throttle.recordSuccess();
    if (recovery.log) {
      this.logger.info({ failures: recovery.failures }, 'Node query recovered');
    }
    this.logger.debug({ nodes: nodes.map((node) => `${node.nodeId}:${node.state}`) }, 'Node query succeeded');
    return { ok: true, value: nodes };
  }

  private reportFailure(failure: TransientQueryFailure): void {
    if (failure.kind === 'aborted') {
      this.logger.debug('Node query aborted');
      return;
    }
    const decision = this.throttle.recordFailure(failure.kind);
    if (!decision.log) {
      return;
    }
    const context = {
      kind: failure.kind,
      repeats: decision.repeats,
      host: this.options.host,
      exitCode: failure.exitCode,
      stderr: failure.stderr
    };
    if (decision.changedClass) {
      this.logger.warn(context, failure.message);
    } else {
      this.logger.warn(context, `${failure.message} (repeated ${decision.repeats} times)`);
    }
  }
}

export function normaliseNodeState(raw: string): NodeStateToken {
  const state = raw.toLowerCase().replace(STATE_FLAGS, '');
  if (
    state.includes('down') ||
    state.includes('drain') ||
    state.includes('fail') ||
    state.includes('maint')
  ) {
    return 'down';
  }
  if (state.includes('idle')) {
    return 'idle';
  }
  if (state.includes('mix')) {
    return 'mixed';
  }
  if (state.includes('alloc') || state.includes('completing')) {
    return 'allocated';
  }
  return 'unknown';
}

export function parseNodeListing(stdout: string): NodeState[] {
  const nodes: NodeState[] = [];
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    const parts = trimmed.split(/\s+/);
    if (parts.length < 2) {
      throw new TransientQueryFailure('nodes', 'parse', `Malformed sinfo row: ${trimmed}`);
    }
    nodes.push({ nodeId: parts[0].toLowerCase(), state: normaliseNodeState(parts[1]) });
  }
  return nodes;
}
