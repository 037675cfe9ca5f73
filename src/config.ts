import { lookup } from 'node:dns/promises';
import { isIPv4 } from 'node:net';

import { z } from 'zod';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { MATRIX_LAYOUTS, type MatrixLayout } from './display/layout.js';
import type { IndicatorPins } from './display/indicatorDriver.js';
import { ConfigurationFailure } from './errors.js';

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const HOSTNAME_PATTERN = /^(?=.{1,253}$)[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?)*$/;
const NODE_ID_PATTERN = /^[a-z0-9]+$/;
const MAX_PIN = 53;

const name = (label: string) =>
  z.string().trim().regex(NAME_PATTERN, `${label} may only contain letters, digits, '_', '.' and '-'`);
const seconds = z.coerce.number().finite().positive();
const runtime = z.enum(['docker', 'podman']);
const layout = z.enum(MATRIX_LAYOUTS);

const sharedSchema = z.object({
  verbose: z.boolean().default(false),
  simulate: z.boolean().default(false),
  gpioBase: z.coerce.number().int().min(0).default(DEFAULT_CONFIG.gpio.base),
  metricsPort: z.coerce.number().int().min(1).max(65535).optional()
});

const jobOptionsSchema = sharedSchema.extend({
  container: name('container').default(DEFAULT_CONFIG.jobs.container),
  dockerCmd: runtime.default(DEFAULT_CONFIG.jobs.dockerCommand),
  slurmUser: name('slurm user').optional(),
  quantumPartition: name('quantum partition').default(DEFAULT_CONFIG.jobs.quantumPartition),
  indicatorPins: collecting(parseIndicatorPins).default(DEFAULT_CONFIG.jobs.indicatorPins),
  matrix: z.boolean().default(true),
  matrixBrightness: z.coerce.number().min(0).max(1).default(DEFAULT_CONFIG.jobs.matrixBrightness),
  matrixCommand: z.string().trim().min(1).optional(),
  matrixLayout: layout.default(DEFAULT_CONFIG.jobs.matrixLayout),
  interval: seconds.default(DEFAULT_CONFIG.jobs.intervalSeconds),
  queryTimeout: seconds.default(DEFAULT_CONFIG.jobs.queryTimeoutSeconds)
});

const nodeOptionsSchema = sharedSchema.extend({
  host: z
    .string()
    .trim()
    .refine((value) => isIPv4(value) || HOSTNAME_PATTERN.test(value), 'host must be a host name or IPv4 address')
    .default(DEFAULT_CONFIG.nodes.host),
  user: name('user').default(DEFAULT_CONFIG.nodes.user),
  container: name('container').default(DEFAULT_CONFIG.nodes.container),
  dockerCmd: runtime.default(DEFAULT_CONFIG.nodes.dockerCommand),
  nodePins: collecting(parseNodePins).default(DEFAULT_CONFIG.nodes.nodePins),
  connectTimeout: seconds.default(DEFAULT_CONFIG.nodes.connectTimeoutSeconds),
  remoteTimeout: seconds.default(DEFAULT_CONFIG.nodes.remoteTimeoutSeconds),
  test: z.boolean().default(false),
  startupTest: z.boolean().default(true),
  interval: seconds.default(DEFAULT_CONFIG.nodes.intervalSeconds)
});

export interface SharedConfig {
  readonly verbose: boolean;
  readonly simulate: boolean;
  readonly gpioBase: number;
  readonly metricsPort?: number;
}

export interface MatrixConfig {
  readonly enabled: boolean;
  readonly brightness: number;
  readonly layout: MatrixLayout;
  /** argv of the helper process that owns the pixel device. */
  readonly command?: readonly string[];
  readonly width: number;
  readonly height: number;
}

export interface JobMonitorConfig extends SharedConfig {
  readonly role: 'jobs';
  readonly container: string;
  readonly dockerCommand: string;
  readonly slurmUser?: string;
  readonly quantumPartition: string;
  readonly indicatorPins: IndicatorPins;
  readonly matrix: MatrixConfig;
  readonly intervalMs: number;
  readonly queryTimeoutMs: number;
}

export interface NodeMonitorConfig extends SharedConfig {
  readonly role: 'nodes';
  readonly host: string;
  readonly user: string;
  readonly container: string;
  readonly dockerCommand: string;
  readonly nodePins: ReadonlyMap<string, number>;
  readonly connectTimeoutSec: number;
  readonly remoteTimeoutMs: number;
  readonly selfTestOnly: boolean;
  readonly startupTest: boolean;
  readonly intervalMs: number;
}

export type HostResolver = (host: string) => Promise<unknown>;

export interface NodeConfigContext {
  resolveHost?: HostResolver;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const flag = issue.path.map((segment) => String(segment)).join('.');
    return flag ? `${toFlag(flag)}: ${issue.message}` : issue.message;
  });
}

function toFlag(optionName: string): string {
  return `--${optionName.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;
}

function parsePin(raw: string, issues: string[]): number | null {
  const trimmed = raw.trim();
  const pin = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || pin > MAX_PIN) {
    issues.push(`pin must be an integer between 0 and ${MAX_PIN}, got '${trimmed}'`);
    return null;
  }
  return pin;
}

export function parseIndicatorPins(raw: string, issues: string[]): IndicatorPins | null {
  const parts = raw.split(',');
  if (parts.length !== 2) {
    issues.push(`expected two pins 'a,b', got '${raw}'`);
    return null;
  }
  const a = parsePin(parts[0], issues);
  const b = parsePin(parts[1], issues);
  if (a === null || b === null) {
    return null;
  }
  if (a === b) {
    issues.push(`pin ${a} is used twice`);
    return null;
  }
  return { a, b };
}

/** Parses `id=pin,id=pin,…`, keeping the listed order. */
export function parseNodePins(raw: string, issues: string[]): Map<string, number> | null {
  const pins = new Map<string, number>();
  const used = new Set<number>();
  const before = issues.length;
  const entries = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
  if (entries.length === 0) {
    issues.push('at least one node=pin entry is required');
    return null;
  }
  for (const entry of entries) {
    const [id, pinText, ...rest] = entry.split('=');
    if (pinText === undefined || rest.length > 0) {
      issues.push(`expected node=pin, got '${entry}'`);
      continue;
    }
    const nodeId = id.trim();
    if (!NODE_ID_PATTERN.test(nodeId)) {
      issues.push(`node id '${nodeId}' must be lowercase alphanumeric`);
      continue;
    }
    if (pins.has(nodeId)) {
      issues.push(`node '${nodeId}' is listed twice`);
      continue;
    }
    const pin = parsePin(pinText, issues);
    if (pin === null) {
      continue;
    }
    if (used.has(pin)) {
      issues.push(`pin ${pin} is used twice`);
      continue;
    }
    used.add(pin);
    pins.set(nodeId, pin);
  }
  return issues.length === before ? pins : null;
}

/** Runs a collecting parser inside a zod schema, one zod issue per problem. */
function collecting<T>(parse: (raw: string, issues: string[]) => T | null) {
  return z.string().transform((raw, ctx): T => {
    const issues: string[] = [];
    const value = parse(raw, issues);
    for (const message of issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
    return value ?? z.NEVER;
  });
}

function splitCommand(command: string): string[] {
  return command.split(/\s+/).filter(Boolean);
}

export function buildJobMonitorConfig(raw: unknown, explicit: ReadonlySet<string> = new Set()): JobMonitorConfig {
  const parsed = jobOptionsSchema.safeParse(raw);
  const issues = parsed.success ? [] : formatIssues(parsed.error);

  if (parsed.success) {
    const options = parsed.data;
    if (!options.matrix) {
      for (const flag of ['matrixBrightness', 'matrixCommand', 'matrixLayout']) {
        if (explicit.has(flag)) {
          issues.push(`${toFlag(flag)} cannot be combined with --no-matrix`);
        }
      }
    } else if (!options.simulate && !options.matrixCommand) {
      issues.push('--matrix-command is required to drive a real matrix (or pass --no-matrix / --simulate)');
    }
  }

  if (!parsed.success || issues.length > 0) {
    throw new ConfigurationFailure(issues);
  }

  const options = parsed.data;
  return Object.freeze({
    role: 'jobs',
    verbose: options.verbose,
    simulate: options.simulate,
    gpioBase: options.gpioBase,
    metricsPort: options.metricsPort,
    container: options.container,
    dockerCommand: options.dockerCmd,
    slurmUser: options.slurmUser,
    quantumPartition: options.quantumPartition,
    indicatorPins: Object.freeze(options.indicatorPins),
    matrix: Object.freeze({
      enabled: options.matrix,
      brightness: options.matrixBrightness,
      layout: options.matrixLayout,
      command: options.matrixCommand ? splitCommand(options.matrixCommand) : undefined,
      width: DEFAULT_CONFIG.matrix.width,
      height: DEFAULT_CONFIG.matrix.height
    }),
    intervalMs: Math.round(options.interval * 1000),
    queryTimeoutMs: Math.round(options.queryTimeout * 1000)
  });
}

export async function buildNodeMonitorConfig(raw: unknown, context: NodeConfigContext = {}): Promise<NodeMonitorConfig> {
  const parsed = nodeOptionsSchema.safeParse(raw);
  const issues = parsed.success ? [] : formatIssues(parsed.error);

  if (parsed.success) {
    const options = parsed.data;
    if (options.test && !options.startupTest) {
      issues.push('--test cannot be combined with --no-startup-test');
    }
    // the self-test never contacts the host
    if (!options.test) {
      const resolveHost = context.resolveHost ?? lookup;
      try {
        await resolveHost(options.host);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        issues.push(`--host: cannot resolve '${options.host}' (${reason})`);
      }
    }
  }

  if (!parsed.success || issues.length > 0) {
    throw new ConfigurationFailure(issues);
  }

  const options = parsed.data;
  return Object.freeze({
    role: 'nodes',
    verbose: options.verbose,
    simulate: options.simulate,
    gpioBase: options.gpioBase,
    metricsPort: options.metricsPort,
    host: options.host,
    user: options.user,
    container: options.container,
    dockerCommand: options.dockerCmd,
    nodePins: options.nodePins,
    connectTimeoutSec: Math.max(1, Math.ceil(options.connectTimeout)),
    remoteTimeoutMs: Math.round(options.remoteTimeout * 1000),
    selfTestOnly: options.test,
    startupTest: options.startupTest,
    intervalMs: Math.round(options.interval * 1000)
  });
}
