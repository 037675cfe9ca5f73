import type { Server } from 'node:http';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { JobMonitorConfig, MatrixConfig, NodeMonitorConfig, SharedConfig } from './config.js';
import { Display, type DisplayTarget } from './display/display.js';
import { IndicatorDriver } from './display/indicatorDriver.js';
import { MatrixDriver } from './display/matrixDriver.js';
import { NodePanelDriver, type SelfTestTiming } from './display/nodePanelDriver.js';
import { ConfigurationFailure } from './errors.js';
import { SysfsGpioChip, type GpioChip } from './hardware/gpio.js';
import { CommandPixelStrip, type PixelStrip } from './hardware/pixelStrip.js';
import { SimulatedGpioChip, SimulatedPixelStrip } from './hardware/simulated.js';
import { PollLoop, type AbortableSleep } from './core/pollLoop.js';
import { startMetricsServer, stopMetricsServer, type MonitorMetrics } from './monitoring/metrics.js';
import { LocalJobQuery } from './sources/jobQuery.js';
import { RemoteNodeQuery } from './sources/nodeQuery.js';
import type { CommandRunner } from './utils/command.js';
import { createLogger, type Logger } from './utils/telemetry.js';

const logger = createLogger('monitor');

/** Seams for tests: every field replaces one real collaborator. */
export interface MonitorDependencies {
  chip?: GpioChip;
  strip?: PixelStrip;
  runner?: CommandRunner;
  metrics?: MonitorMetrics;
  sleep?: AbortableSleep;
  panelSleep?: (ms: number) => Promise<unknown>;
}

export class Monitor {
  constructor(
    readonly loop: PollLoop,
    private readonly chip: GpioChip,
    readonly nodePanel?: NodePanelDriver
  ) {}

  async selfTest(timing?: SelfTestTiming): Promise<void> {
    if (!this.nodePanel) {
      throw new Error('This monitor has no node lights to test');
    }
    await this.nodePanel.selfTest(timing);
  }

  /** Drives every output off, then releases the GPIO chip. */
  async close(): Promise<void> {
    try {
      await this.loop.shutdown();
    } finally {
      await this.chip.close();
    }
  }
}

export function createGpioChip(config: SharedConfig): GpioChip {
  if (config.simulate) {
    logger.warn('Simulated hardware: no GPIO line will be touched');
    return new SimulatedGpioChip();
  }
  return new SysfsGpioChip({ base: config.gpioBase });
}

export async function openPixelStrip(matrix: MatrixConfig, simulate: boolean): Promise<PixelStrip> {
  if (simulate) {
    return new SimulatedPixelStrip(matrix.width, matrix.height);
  }
  const [command, ...args] = matrix.command ?? [];
  if (!command) {
    throw new ConfigurationFailure(['--matrix-command is required to drive a real matrix']);
  }
  return CommandPixelStrip.open({
    command,
    args,
    width: matrix.width,
    height: matrix.height,
    startupTimeoutMs: DEFAULT_CONFIG.matrix.startupTimeoutMs
  });
}

async function abandon(targets: readonly DisplayTarget[], chip: GpioChip, log: Logger): Promise<void> {
  await new Display(targets, log).shutdown();
  try {
    await chip.close();
  } catch (error) {
    log.error({ err: error }, 'Failed to close GPIO chip after a failed start');
  }
}

export async function createJobMonitor(config: JobMonitorConfig, deps: MonitorDependencies = {}): Promise<Monitor> {
  const chip = deps.chip ?? createGpioChip(config);
  const targets: DisplayTarget[] = [];
  try {
    targets.push(await IndicatorDriver.claim(chip, config.indicatorPins));
    const strip = config.matrix.enabled ? deps.strip ?? (await openPixelStrip(config.matrix, config.simulate)) : null;
    targets.push(
      new MatrixDriver(strip, {
        enabled: config.matrix.enabled,
        brightness: config.matrix.brightness,
        layout: config.matrix.layout
      })
    );
  } catch (error) {
    await abandon(targets, chip, logger);
    throw error;
  }

  const jobs = new LocalJobQuery({
    container: config.container,
    dockerCommand: config.dockerCommand,
    slurmUser: config.slurmUser,
    timeoutMs: config.queryTimeoutMs,
    runner: deps.runner
  });
  const loop = new PollLoop({
    intervalMs: config.intervalMs,
    quantumPartition: config.quantumPartition,
    jobs,
    display: new Display(targets),
    metrics: deps.metrics,
    sleep: deps.sleep,
    logger: createLogger('poll-loop')
  });
  logger.info(
    { container: config.container, quantumPartition: config.quantumPartition, intervalMs: config.intervalMs },
    'Job monitor ready'
  );
  return new Monitor(loop, chip);
}

export async function createNodeMonitor(config: NodeMonitorConfig, deps: MonitorDependencies = {}): Promise<Monitor> {
  const chip = deps.chip ?? createGpioChip(config);
  let panel: NodePanelDriver;
  try {
    panel = await NodePanelDriver.claim(chip, config.nodePins, { sleep: deps.panelSleep });
  } catch (error) {
    await abandon([], chip, logger);
    throw error;
  }

  const nodes = new RemoteNodeQuery({
    host: config.host,
    user: config.user,
    container: config.container,
    dockerCommand: config.dockerCommand,
    connectTimeoutSec: config.connectTimeoutSec,
    timeoutMs: config.remoteTimeoutMs,
    runner: deps.runner
  });
  const loop = new PollLoop({
    intervalMs: config.intervalMs,
    // no job source on this host; partitions never become active
    quantumPartition: DEFAULT_CONFIG.jobs.quantumPartition,
    nodes,
    display: new Display([panel]),
    metrics: deps.metrics,
    sleep: deps.sleep,
    logger: createLogger('poll-loop')
  });
  logger.info(
    { target: `${config.user}@${config.host}`, nodes: [...config.nodePins.keys()], intervalMs: config.intervalMs },
    'Node monitor ready'
  );
  return new Monitor(loop, chip, panel);
}

export interface ServeOptions {
  metrics?: MonitorMetrics;
  metricsPort?: number;
  /** Runs before the loop, with signal handling already installed. */
  prelude?: () => Promise<void>;
  loop?: boolean;
}

/**
 * Runs a monitor until SIGINT/SIGTERM stops its loop, then drives every
 * output off. Resolves after a signal; rejects only on a fatal error.
 */
export async function serve(monitor: Monitor, options: ServeOptions = {}): Promise<void> {
  const onSignal = (signal: NodeJS.Signals) => monitor.loop.stop(signal);
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  let server: Server | undefined;
  try {
    if (options.metrics && options.metricsPort !== undefined) {
      server = await startMetricsServer(options.metrics, options.metricsPort);
    }
    await options.prelude?.();
    if (options.loop !== false && !monitor.loop.stopRequested) {
      await monitor.loop.run();
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    try {
      await monitor.close();
    } finally {
      if (server) {
        await stopMetricsServer(server);
      }
    }
  }
}
