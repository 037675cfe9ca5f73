import type { Rgb } from '../types.js';
import { createLogger, type Logger } from '../utils/telemetry.js';
import type { GpioChip, OutputLine } from './gpio.js';
import { BufferedPixelStrip } from './pixelStrip.js';

export interface SimulatedWrite {
  pin: number;
  on: boolean;
}

/** Records what would have been written; performs no I/O. */
export class SimulatedGpioChip implements GpioChip {
  readonly label = 'simulated-gpio';
  readonly writes: SimulatedWrite[] = [];
  private readonly states = new Map<number, boolean>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('simulated-gpio');
  }

  state(pin: number): boolean | undefined {
    return this.states.get(pin);
  }

  claimedPins(): number[] {
    return [...this.states.keys()];
  }

  async claimOutput(pin: number): Promise<OutputLine> {
    this.states.set(pin, false);
    return {
      pin,
      write: async (on: boolean) => {
        this.record(pin, on);
      },
      release: async () => {
        this.record(pin, false);
        this.states.delete(pin);
      }
    };
  }

  async close(): Promise<void> {
    for (const pin of [...this.states.keys()]) {
      this.record(pin, false);
    }
    this.states.clear();
  }

  private record(pin: number, on: boolean): void {
    this.writes.push({ pin, on });
    this.states.set(pin, on);
    this.logger.debug({ simulated: true, pin, on }, 'GPIO write');
  }
}

export class SimulatedPixelStrip extends BufferedPixelStrip {
  shows = 0;
  closed = false;
  private lastShown: readonly Rgb[] = [];

  async show(): Promise<void> {
    this.shows += 1;
    this.lastShown = [...this.frame];
  }

  /** Frame as of the most recent `show()`. */
  shown(): readonly Rgb[] {
    return this.lastShown;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
