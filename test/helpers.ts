import pino from 'pino';
import { vi, type Mock } from 'vitest';

import type { DisplayTarget } from '../src/display/display.js';
import type { DisplayDirectives } from '../src/types.js';
import type { CommandOutcome, CommandRunner } from '../src/utils/command.js';
import type { Logger } from '../src/utils/telemetry.js';

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export function captureLogger(): { logger: Logger; lines: () => LogLine[] } {
  const raw: string[] = [];
  const logger = pino({ level: 'debug' }, { write: (chunk: string) => raw.push(chunk) });
  return {
    logger,
    lines: () => raw.map((chunk): LogLine => JSON.parse(chunk))
  };
}

export const WARN = 40;
export const INFO = 30;

export function exited(stdout: string, exitCode = 0, stderr = ''): CommandOutcome {
  return { status: 'exited', exitCode, stdout, stderr };
}

/** Runner that replays the given outcomes, repeating the last one. */
export function scriptedRunner(...outcomes: CommandOutcome[]): Mock<CommandRunner> {
  let calls = 0;
  return vi.fn<CommandRunner>(async () => {
    const outcome = outcomes[Math.min(calls, outcomes.length - 1)];
    calls += 1;
    return outcome;
  });
}

export class RecordingTarget implements DisplayTarget {
  readonly applied: DisplayDirectives[] = [];
  shutdowns = 0;

  constructor(readonly name = 'recording') {}

  async apply(directives: DisplayDirectives): Promise<void> {
    this.applied.push(directives);
  }

  async shutdown(): Promise<void> {
    this.shutdowns += 1;
  }

  get last(): DisplayDirectives | undefined {
    return this.applied[this.applied.length - 1];
  }
}
