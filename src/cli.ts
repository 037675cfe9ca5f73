#!/usr/bin/env node
// first, so LOG_LEVEL from .env reaches loggers created at import time
import 'dotenv/config';

import { Command, CommanderError, Option } from 'commander';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { buildJobMonitorConfig, buildNodeMonitorConfig } from './config.js';
import { ConfigurationFailure, EXIT_CODES, exitCodeFor } from './errors.js';
import { MonitorMetrics } from './monitoring/metrics.js';
import { createJobMonitor, createNodeMonitor, serve } from './monitors.js';
import { createLogger, setLogLevel } from './utils/telemetry.js';

const logger = createLogger('cli');

function addSharedOptions(command: Command): Command {
  return command
    .option('-v, --verbose', 'debug logging')
    .option('--simulate', 'use the simulated hardware backend (no physical I/O)')
    .option('--gpio-base <n>', 'offset added to BCM pin numbers for sysfs line numbers', String(DEFAULT_CONFIG.gpio.base))
    .option('--metrics-port <port>', 'serve Prometheus metrics on this port');
}

/** Options typed on the command line, as opposed to defaults or environment. */
function explicitOptions(command: Command): Set<string> {
  const explicit = new Set<string>();
  for (const key of Object.keys(command.opts())) {
    if (command.getOptionValueSource(key) === 'cli') {
      explicit.add(key);
    }
  }
  return explicit;
}

function applyVerbosity(command: Command): void {
  if (command.opts().verbose === true) {
    setLogLevel('debug');
  }
}

async function runJobMonitor(command: Command): Promise<void> {
  applyVerbosity(command);
  const config = buildJobMonitorConfig(command.opts(), explicitOptions(command));
  const metrics = config.metricsPort !== undefined ? new MonitorMetrics('jobs') : undefined;
  const monitor = await createJobMonitor(config, { metrics });
  await serve(monitor, { metrics, metricsPort: config.metricsPort });
}

async function runNodeMonitor(command: Command): Promise<void> {
  applyVerbosity(command);
  const config = await buildNodeMonitorConfig(command.opts());
  const metrics = config.metricsPort !== undefined ? new MonitorMetrics('nodes') : undefined;
  const monitor = await createNodeMonitor(config, { metrics });
  const selfTest = config.selfTestOnly || config.startupTest;
  await serve(monitor, {
    metrics,
    metricsPort: config.metricsPort,
    prelude: selfTest ? () => monitor.selfTest() : undefined,
    loop: !config.selfTestOnly
  });
}

const program = new Command();
program
  .name('cluster-lights')
  .description('Show scheduler activity of the cluster on status lights')
  .exitOverride()
  .showHelpAfterError();

addSharedOptions(
  program
    .command('jobs')
    .description('Partition indicators and text matrix, from the local job queue')
    .addOption(
      new Option('-c, --container <name>', 'container that runs the scheduler client')
        .env('CLUSTER_LIGHTS_CONTAINER')
        .default(DEFAULT_CONFIG.jobs.container)
    )
    .addOption(
      new Option('--docker-cmd <cmd>', 'container runtime')
        .choices(['docker', 'podman'])
        .env('CLUSTER_LIGHTS_DOCKER_CMD')
        .default(DEFAULT_CONFIG.jobs.dockerCommand)
    )
    .option('-s, --slurm-user <user>', 'only count jobs of this user')
    .option('--quantum-partition <name>', 'partition that marks quantum work', DEFAULT_CONFIG.jobs.quantumPartition)
    .option('--indicator-pins <a,b>', 'BCM pins of the classical and quantum indicators', DEFAULT_CONFIG.jobs.indicatorPins)
    .option('--matrix-brightness <0..1>', 'matrix brightness', String(DEFAULT_CONFIG.jobs.matrixBrightness))
    .option('--no-matrix', 'never write to the pixel matrix')
    .addOption(
      new Option('--matrix-command <cmd>', 'helper process that owns the pixel device').env('CLUSTER_LIGHTS_MATRIX_CMD')
    )
    .option('--matrix-layout <layout>', 'row-major, serpentine-rows or serpentine-columns', DEFAULT_CONFIG.jobs.matrixLayout)
    .option('-i, --interval <sec>', 'poll interval', String(DEFAULT_CONFIG.jobs.intervalSeconds))
    .option('--query-timeout <sec>', 'job query timeout', String(DEFAULT_CONFIG.jobs.queryTimeoutSeconds))
).action(async (_options: unknown, command: Command) => {
  await runJobMonitor(command);
});

addSharedOptions(
  program
    .command('nodes')
    .description('Per-node light panel, from the remote node listing')
    .addOption(
      new Option('--host <host>', 'primary host running the scheduler controller')
        .env('CLUSTER_LIGHTS_REMOTE_HOST')
        .default(DEFAULT_CONFIG.nodes.host)
    )
    .addOption(
      new Option('-u, --user <user>', 'ssh user on the primary host')
        .env('CLUSTER_LIGHTS_REMOTE_USER')
        .default(DEFAULT_CONFIG.nodes.user)
    )
    .option('--container <name>', 'container on the primary host', DEFAULT_CONFIG.nodes.container)
    .addOption(
      new Option('--docker-cmd <cmd>', 'remote container runtime')
        .choices(['docker', 'podman'])
        .default(DEFAULT_CONFIG.nodes.dockerCommand)
    )
    .option('--node-pins <list>', 'node=pin pairs, in panel order', DEFAULT_CONFIG.nodes.nodePins)
    .option('--connect-timeout <sec>', 'ssh connect timeout', String(DEFAULT_CONFIG.nodes.connectTimeoutSeconds))
    .option('--remote-timeout <sec>', 'overall remote command timeout', String(DEFAULT_CONFIG.nodes.remoteTimeoutSeconds))
    .option('-t, --test', 'run the light self-test and exit')
    .option('--no-startup-test', 'skip the self-test before monitoring')
    .option('-i, --interval <sec>', 'poll interval', String(DEFAULT_CONFIG.nodes.intervalSeconds))
).action(async (_options: unknown, command: Command) => {
  await runNodeMonitor(command);
});

void program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.configuration;
    return;
  }
  if (error instanceof ConfigurationFailure) {
    for (const issue of error.issues) {
      logger.error(issue);
    }
  } else {
    logger.error({ err: error }, 'Cluster lights stopped on a fatal error');
  }
  process.exitCode = exitCodeFor(error);
});
