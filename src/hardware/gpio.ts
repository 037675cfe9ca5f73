import { access, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import { HardwareClaimFailure } from '../errors.js';

export interface OutputLine {
  readonly pin: number;
  write(on: boolean): Promise<void>;
  release(): Promise<void>;
}

/** Capability to claim binary outputs; one chip per process. */
export interface GpioChip {
  readonly label: string;
  claimOutput(pin: number): Promise<OutputLine>;
  close(): Promise<void>;
}

export interface SysfsGpioChipOptions {
  /** Root of the GPIO sysfs class directory. */
  root?: string;
  /** Added to BCM numbers to obtain the kernel line number. */
  base?: number;
  exportWaitMs?: number;
}

const DEFAULT_ROOT = '/sys/class/gpio';
const EXPORT_POLL_MS = 25;

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const code = (error as { code?: unknown }).code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

class SysfsOutputLine implements OutputLine {
  private released = false;

  constructor(
    public readonly pin: number,
    private readonly line: number,
    private readonly root: string,
    private readonly onRelease: (pin: number) => void
  ) {}

  private get valuePath(): string {
    return path.join(this.root, `gpio${this.line}`, 'value');
  }

  async write(on: boolean): Promise<void> {
    if (this.released) {
      throw new Error(`GPIO ${this.pin} already released`);
    }
    await writeFile(this.valuePath, on ? '1' : '0');
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    this.onRelease(this.pin);
    try {
      await writeFile(this.valuePath, '0');
    } finally {
      await writeFile(path.join(this.root, 'unexport'), String(this.line));
    }
  }
}

/** Drives lines through the kernel GPIO sysfs interface. */
export class SysfsGpioChip implements GpioChip {
  readonly label = 'sysfs-gpio';
  private readonly root: string;
  private readonly base: number;
  private readonly exportWaitMs: number;
  private readonly lines = new Map<number, OutputLine>();

  constructor(options: SysfsGpioChipOptions = {}) {
    this.root = options.root ?? DEFAULT_ROOT;
    this.base = options.base ?? 0;
    this.exportWaitMs = options.exportWaitMs ?? 1000;
  }

  async claimOutput(pin: number): Promise<OutputLine> {
    if (this.lines.has(pin)) {
      throw new HardwareClaimFailure(this.label, `GPIO ${pin} is already claimed by this process`, pin);
    }
    try {
      await access(this.root);
    } catch (error) {
      throw new HardwareClaimFailure(this.label, `GPIO device absent: ${this.root} is not available`, pin, error);
    }

    const line = this.base + pin;
    try {
      await writeFile(path.join(this.root, 'export'), String(line));
    } catch (error) {
      const message =
        errorCode(error) === 'EBUSY'
          ? `GPIO ${pin} is already claimed by another process`
          : `Unable to export GPIO ${pin}`;
      throw new HardwareClaimFailure(this.label, message, pin, error);
    }

    const direction = path.join(this.root, `gpio${line}`, 'direction');
    await this.waitForExport(direction, pin);
    try {
      // "low" selects output and drives it off in one write
      await writeFile(direction, 'low');
    } catch (error) {
      throw new HardwareClaimFailure(this.label, `Unable to configure GPIO ${pin} as output`, pin, error);
    }

    const output = new SysfsOutputLine(pin, line, this.root, (released) => this.lines.delete(released));
    this.lines.set(pin, output);
    return output;
  }

  async close(): Promise<void> {
    const pending = [...this.lines.values()];
    const results = await Promise.allSettled(pending.map((line) => line.release()));
    const failed = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failed) {
      throw failed.reason;
    }
  }

  private async waitForExport(direction: string, pin: number): Promise<void> {
    const deadline = Date.now() + this.exportWaitMs;
    for (;;) {
      try {
        await access(direction);
        return;
      } catch (error) {
        if (Date.now() >= deadline) {
          throw new HardwareClaimFailure(this.label, `GPIO ${pin} did not appear after export`, pin, error);
        }
        await delay(EXPORT_POLL_MS);
      }
    }
  }
}
