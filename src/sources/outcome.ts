import { TransientQueryFailure } from '../errors.js';
import type { QuerySource } from '../types.js';
import type { CommandOutcome } from '../utils/command.js';

const STDERR_PREVIEW = 500;

/** Maps a command outcome to a failure, or null when the command exited 0. */
export function outcomeToFailure(source: QuerySource, outcome: CommandOutcome): TransientQueryFailure | null {
  switch (outcome.status) {
    case 'exited':
      if (outcome.exitCode === 0) {
        return null;
      }
      return new TransientQueryFailure(source, 'exit', `${source} query exited with code ${outcome.exitCode}`, {
        exitCode: outcome.exitCode,
        stderr: outcome.stderr.trim().slice(0, STDERR_PREVIEW)
      });
    case 'timeout':
      return new TransientQueryFailure(source, 'timeout', `${source} query timed out`, {
        stderr: outcome.stderr.trim().slice(0, STDERR_PREVIEW)
      });
    case 'aborted':
      return new TransientQueryFailure(source, 'aborted', `${source} query aborted`);
    case 'spawn-error':
      return new TransientQueryFailure(source, 'spawn', `${source} query could not start: ${outcome.error.message}`, {
        cause: outcome.error
      });
  }
}
