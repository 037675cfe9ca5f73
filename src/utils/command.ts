import { spawn } from 'node:child_process';

export interface CommandRequest {
  command: string;
  args: readonly string[];
  timeoutMs: number;
  signal?: AbortSignal;
}

export type CommandOutcome =
  | { status: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { status: 'timeout'; stdout: string; stderr: string }
  | { status: 'aborted' }
  | { status: 'spawn-error'; error: Error };

/** Executes a command and always settles; it never rejects. */
export type CommandRunner = (request: CommandRequest) => Promise<CommandOutcome>;

const MAX_OUTPUT_CHARS = 1024 * 1024;

export const runCommand: CommandRunner = (request) =>
  new Promise((resolve) => {
    if (request.signal?.aborted) {
      resolve({ status: 'aborted' });
      return;
    }

    const child = spawn(request.command, [...request.args], {
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (outcome: CommandOutcome) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    const onAbort = () => {
      child.kill('SIGKILL');
      finish({ status: 'aborted' });
    };

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      finish({ status: 'timeout', stdout, stderr });
    }, request.timeoutMs);

    request.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: string) => {
      if (stdout.length < MAX_OUTPUT_CHARS) {
        stdout += chunk;
      }
    });

    child.stderr.on('data', (chunk: string) => {
      if (stderr.length < MAX_OUTPUT_CHARS) {
        stderr += chunk;
      }
    });

    child.on('error', (error) => {
      finish({ status: 'spawn-error', error });
    });

    child.on('close', (code, signal) => {
      finish({ status: 'exited', exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
    });
  });
