import { setTimeout as delay } from 'node:timers/promises';

import type { GpioChip, OutputLine } from '../hardware/gpio.js';
import type { DisplayDirectives } from '../types.js';
import { createLogger, type Logger } from '../utils/telemetry.js';
import type { DisplayTarget } from './display.js';

export interface SelfTestTiming {
  onStepMs: number;
  offStepMs: number;
}

export const DEFAULT_SELF_TEST_TIMING: SelfTestTiming = { onStepMs: 300, offStepMs: 200 };

type Sleep = (ms: number) => Promise<unknown>;

/** One light per configured node, in configuration order. */
export class NodePanelDriver implements DisplayTarget {
  readonly name = 'node-panel';
  private readonly current = new Map<string, boolean>();

  private constructor(
    private readonly lines: ReadonlyMap<string, OutputLine>,
    private readonly logger: Logger,
    private readonly sleep: Sleep
  ) {
    for (const node of lines.keys()) {
      this.current.set(node, false);
    }
  }

  static async claim(
    chip: GpioChip,
    nodePins: ReadonlyMap<string, number>,
    options: { logger?: Logger; sleep?: Sleep } = {}
  ): Promise<NodePanelDriver> {
    const logger = options.logger ?? createLogger('node-panel');
    const lines = new Map<string, OutputLine>();
    try {
      for (const [node, pin] of nodePins) {
        lines.set(node, await chip.claimOutput(pin));
      }
    } catch (error) {
      await releaseAll([...lines.values()], logger);
      throw error;
    }
    logger.info({ nodes: [...nodePins.keys()], chip: chip.label }, 'Node outputs claimed');
    return new NodePanelDriver(lines, logger, options.sleep ?? delay);
  }

  get nodes(): string[] {
    return [...this.lines.keys()];
  }

  isOn(node: string): boolean {
    return this.current.get(node) ?? false;
  }

  async apply(directives: DisplayDirectives): Promise<void> {
    const changes: string[] = [];
    for (const [node, line] of this.lines) {
      const next = directives.nodeLights[node] ?? false;
      if (this.current.get(node) === next) {
        continue;
      }
      await line.write(next);
      this.current.set(node, next);
      changes.push(`${node.toUpperCase()}(${next ? 'ON' : 'OFF'})`);
    }
    if (changes.length > 0) {
      this.logger.info({ changes }, `Node lights: ${changes.join(', ')}`);
    }
    const active = this.nodes.filter((node) => this.isOn(node));
    this.logger.debug({ active }, active.length ? `Active: ${active.join(', ')}` : 'All nodes idle');
  }

  /** Lights every output in order, then turns them off in reverse order. */
  async selfTest(timing: SelfTestTiming = DEFAULT_SELF_TEST_TIMING): Promise<void> {
    this.logger.info('Running node light self-test');
    for (const [node, line] of this.lines) {
      this.logger.info(`  ${node.toUpperCase()} ON`);
      await line.write(true);
      this.current.set(node, true);
      await this.sleep(timing.onStepMs);
    }
    for (const [node, line] of [...this.lines].reverse()) {
      await line.write(false);
      this.current.set(node, false);
      await this.sleep(timing.offStepMs);
    }
    this.logger.info('Self-test complete');
  }

  async shutdown(): Promise<void> {
    const lines = [...this.lines];
    try {
      for (const [node, line] of lines) {
        await line.write(false);
        this.current.set(node, false);
      }
    } finally {
      await releaseAll(
        lines.map(([, line]) => line),
        this.logger
      );
      this.logger.info('Node lights released');
    }
  }
}

async function releaseAll(lines: readonly OutputLine[], logger: Logger): Promise<void> {
  const results = await Promise.allSettled(lines.map((line) => line.release()));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      logger.error({ err: result.reason, pin: lines[index].pin }, 'Failed to release node output');
    }
  });
}
