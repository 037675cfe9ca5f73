import type { QueryFailureKind, QuerySource } from './types.js';

export interface TransientQueryFailureOptions {
  exitCode?: number | null;
  stderr?: string;
  cause?: unknown;
}

export class TransientQueryFailure extends Error {
  public readonly exitCode?: number | null;
  public readonly stderr?: string;

  constructor(
    public readonly source: QuerySource,
    public readonly kind: QueryFailureKind,
    message: string,
    options: TransientQueryFailureOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransientQueryFailure';
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

export class ConfigurationFailure extends Error {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationFailure';
    this.issues = issues;
  }
}

export class HardwareClaimFailure extends Error {
  constructor(
    public readonly device: string,
    message: string,
    public readonly pin?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'HardwareClaimFailure';
  }
}

export const EXIT_CODES = {
  ok: 0,
  unexpected: 1,
  configuration: 2,
  hardware: 3
} as const;

/** Maps an error escaping startup or the loop to the process exit code. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationFailure) {
    return EXIT_CODES.configuration;
  }
  if (error instanceof HardwareClaimFailure) {
    return EXIT_CODES.hardware;
  }
  return EXIT_CODES.unexpected;
}
