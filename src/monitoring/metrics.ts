import { createServer, type Server } from 'node:http';

import { Counter, Gauge, Histogram, Registry } from 'prom-client';

import type { DisplayDirectives, QueryFailureKind, QuerySource } from '../types.js';
import { createLogger } from '../utils/telemetry.js';

const logger = createLogger('metrics');

export class MonitorMetrics {
  readonly registry = new Registry();
  private readonly ticks: Counter<string>;
  private readonly tickDuration: Histogram<string>;
  private readonly queryFailures: Counter<'source' | 'kind'>;
  private readonly lastSuccess: Gauge<'source'>;
  private readonly outputState: Gauge<'output'>;

  constructor(private readonly role: 'jobs' | 'nodes') {
    this.registry.setDefaultLabels({ role });
    this.ticks = new Counter({
      name: 'cluster_lights_ticks_total',
      help: 'Poll loop ticks completed.',
      registers: [this.registry]
    });
    this.tickDuration = new Histogram({
      name: 'cluster_lights_tick_duration_seconds',
      help: 'Wall time of one poll/render tick.',
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
      registers: [this.registry]
    });
    this.queryFailures = new Counter({
      name: 'cluster_lights_query_failures_total',
      help: 'State queries that failed, by source and failure class.',
      labelNames: ['source', 'kind'],
      registers: [this.registry]
    });
    this.lastSuccess = new Gauge({
      name: 'cluster_lights_query_last_success_timestamp_seconds',
      help: 'Unix time of the last successful query per source.',
      labelNames: ['source'],
      registers: [this.registry]
    });
    this.outputState = new Gauge({
      name: 'cluster_lights_output_state',
      help: 'Last rendered state of each output (1 = on).',
      labelNames: ['output'],
      registers: [this.registry]
    });
  }

  recordTick(durationSeconds: number): void {
    this.ticks.inc();
    this.tickDuration.observe(durationSeconds);
  }

  recordQuerySuccess(source: QuerySource, at: Date = new Date()): void {
    this.lastSuccess.set({ source }, at.getTime() / 1000);
  }

  recordQueryFailure(source: QuerySource, kind: QueryFailureKind): void {
    this.queryFailures.inc({ source, kind });
  }

  /** Records only the outputs this role drives. */
  recordDirectives(directives: DisplayDirectives): void {
    if (this.role === 'jobs') {
      this.outputState.set({ output: 'indicator_a' }, directives.indicatorA ? 1 : 0);
      this.outputState.set({ output: 'indicator_b' }, directives.indicatorB ? 1 : 0);
      return;
    }
    for (const [node, on] of Object.entries(directives.nodeLights)) {
      this.outputState.set({ output: `node_${node}` }, on ? 1 : 0);
    }
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}

export function startMetricsServer(metrics: MonitorMetrics, port: number): Promise<Server> {
  const server = createServer((req, res) => {
    if (!req.url?.startsWith('/metrics')) {
      res.statusCode = 404;
      res.end();
      return;
    }
    metrics
      .render()
      .then((body) => {
        res.setHeader('Content-Type', metrics.registry.contentType);
        res.end(body);
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to render metrics');
        res.statusCode = 500;
        res.end();
      });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      logger.info({ port }, 'Metrics server listening');
      resolve(server);
    });
  });
}

export function stopMetricsServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
