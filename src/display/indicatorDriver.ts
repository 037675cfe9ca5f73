import type { GpioChip, OutputLine } from '../hardware/gpio.js';
import type { DisplayDirectives } from '../types.js';
import { createLogger, type Logger } from '../utils/telemetry.js';
import type { DisplayTarget } from './display.js';

export interface IndicatorPins {
  /** Classical partition activity. */
  a: number;
  /** Quantum partition activity. */
  b: number;
}

/** Two discrete lights; both lines are written on every apply. */
export class IndicatorDriver implements DisplayTarget {
  readonly name = 'indicators';
  private state: { a: boolean; b: boolean } = { a: false, b: false };

  private constructor(
    private readonly lineA: OutputLine,
    private readonly lineB: OutputLine,
    private readonly logger: Logger
  ) {}

  static async claim(chip: GpioChip, pins: IndicatorPins, logger?: Logger): Promise<IndicatorDriver> {
    const lineA = await chip.claimOutput(pins.a);
    let lineB: OutputLine;
    try {
      lineB = await chip.claimOutput(pins.b);
    } catch (error) {
      await lineA.release();
      throw error;
    }
    const driver = new IndicatorDriver(lineA, lineB, logger ?? createLogger('indicators'));
    driver.logger.info({ pins, chip: chip.label }, 'Indicator outputs claimed');
    return driver;
  }

  async apply(directives: DisplayDirectives): Promise<void> {
    const next = { a: directives.indicatorA, b: directives.indicatorB };
    await this.lineA.write(next.a);
    await this.lineB.write(next.b);
    if (next.a !== this.state.a || next.b !== this.state.b) {
      const active = [next.a ? 'CLASSICAL' : null, next.b ? 'QUANTUM' : null].filter(Boolean);
      this.logger.info({ indicatorA: next.a, indicatorB: next.b }, `Indicators: ${active.join(' + ') || 'IDLE'}`);
    }
    this.state = next;
  }

  async shutdown(): Promise<void> {
    try {
      await this.lineA.write(false);
      await this.lineB.write(false);
    } finally {
      this.state = { a: false, b: false };
      await Promise.all([this.lineA.release(), this.lineB.release()]);
    }
  }
}
