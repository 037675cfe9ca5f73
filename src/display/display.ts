import type { DisplayDirectives } from '../types.js';
import { createLogger, type Logger } from '../utils/telemetry.js';

export interface DisplayTarget {
  readonly name: string;
  apply(directives: DisplayDirectives): Promise<void>;
  /** Drives every owned output off and releases the device. */
  shutdown(): Promise<void>;
}

export interface DisplayApplyReport {
  failed: string[];
}

/** Fans directives out to every enabled target; one failing target never blocks the rest. */
export class Display {
  private closed = false;
  private readonly logger: Logger;

  constructor(
    private readonly targets: readonly DisplayTarget[],
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('display');
  }

  async apply(directives: DisplayDirectives): Promise<DisplayApplyReport> {
    const failed: string[] = [];
    for (const target of this.targets) {
      try {
        await target.apply(directives);
      } catch (error) {
        failed.push(target.name);
        this.logger.error({ err: error, target: target.name }, 'Display target failed to render');
      }
    }
    return { failed };
  }

  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const target of this.targets) {
      try {
        await target.shutdown();
      } catch (error) {
        this.logger.error({ err: error, target: target.name }, 'Display target failed to shut down');
      }
    }
  }
}
