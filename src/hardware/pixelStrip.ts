import { spawn, type ChildProcess } from 'node:child_process';

import { HardwareClaimFailure } from '../errors.js';
import type { Rgb } from '../types.js';

/** Addressable pixel device; `show()` latches the buffered frame. */
export interface PixelStrip {
  readonly width: number;
  readonly height: number;
  fill(color: Rgb): void;
  set(index: number, color: Rgb): void;
  show(): Promise<void>;
  close(): Promise<void>;
}

export const OFF: Rgb = [0, 0, 0];

export abstract class BufferedPixelStrip implements PixelStrip {
  protected readonly frame: Rgb[];

  constructor(
    public readonly width: number,
    public readonly height: number
  ) {
    this.frame = Array.from({ length: width * height }, () => OFF);
  }

  fill(color: Rgb): void {
    this.frame.fill(color);
  }

  set(index: number, color: Rgb): void {
    if (index < 0 || index >= this.frame.length) {
      throw new RangeError(`Pixel ${index} outside 0..${this.frame.length - 1}`);
    }
    this.frame[index] = color;
  }

  pixels(): readonly Rgb[] {
    return [...this.frame];
  }

  abstract show(): Promise<void>;
  abstract close(): Promise<void>;
}

export interface CommandPixelStripOptions {
  command: string;
  args?: readonly string[];
  width: number;
  height: number;
  startupTimeoutMs?: number;
  /** Grace period after closing stdin before the helper is signalled. */
  closeTimeoutMs?: number;
}

/**
 * Hands frames to a helper process that owns the pixel device, one JSON
 * line per frame on its stdin.
 */
export class CommandPixelStrip extends BufferedPixelStrip {
  private exited: boolean;
  private failure: Error | null = null;
  private readonly exit: Promise<void>;

  private constructor(
    private readonly child: ChildProcess,
    width: number,
    height: number,
    private readonly closeTimeoutMs: number
  ) {
    super(width, height);
    this.exited = child.exitCode !== null || child.signalCode !== null;
    this.exit = this.exited
      ? Promise.resolve()
      : new Promise((resolve) => {
          child.once('exit', () => {
            this.exited = true;
            resolve();
          });
        });
    // a helper that dies or closes its stdin turns the next write into EPIPE
    child.stdin?.on('error', (error) => {
      this.failure = error;
    });
    child.on('error', (error) => {
      this.failure = error;
    });
  }

  static async open(options: CommandPixelStripOptions): Promise<CommandPixelStrip> {
    const child = spawn(options.command, [...(options.args ?? [])], {
      stdio: ['pipe', 'ignore', 'inherit']
    });
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        reject(new HardwareClaimFailure('pixel-matrix', `Matrix helper ${options.command} did not start`));
      }, options.startupTimeoutMs ?? 5000);
      child.once('spawn', () => {
        clearTimeout(timer);
        resolve();
      });
      child.once('error', (error) => {
        clearTimeout(timer);
        reject(
          new HardwareClaimFailure('pixel-matrix', `Matrix helper ${options.command} failed: ${error.message}`, undefined, error)
        );
      });
    });
    return new CommandPixelStrip(child, options.width, options.height, options.closeTimeoutMs ?? 1000);
  }

  get running(): boolean {
    return !this.exited && this.failure === null && this.child.stdin?.destroyed !== true;
  }

  async show(): Promise<void> {
    const stdin = this.child.stdin;
    if (this.failure) {
      throw new Error(`Matrix helper failed: ${this.failure.message}`);
    }
    if (!stdin || stdin.destroyed || this.exited) {
      throw new Error('Matrix helper is not running');
    }
    const line = `${JSON.stringify({ pixels: this.frame })}\n`;
    await new Promise<void>((resolve, reject) => {
      stdin.write(line, (error) => (error ? reject(error) : resolve()));
    });
  }

  /** Ends the helper: stdin EOF, then SIGTERM, then SIGKILL. */
  async close(): Promise<void> {
    if (this.exited) {
      return;
    }
    const stdin = this.child.stdin;
    if (stdin && !stdin.destroyed) {
      stdin.end();
    }
    const term = setTimeout(() => this.child.kill('SIGTERM'), this.closeTimeoutMs);
    const kill = setTimeout(() => this.child.kill('SIGKILL'), this.closeTimeoutMs * 2);
    try {
      await this.exit;
    } finally {
      clearTimeout(term);
      clearTimeout(kill);
    }
  }
}
