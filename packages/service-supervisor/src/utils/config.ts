import * as fs from 'fs';
import { ConfigError } from '../errors.js';
import type { LaunchSpec, MonitorPolicy, SupervisorConfig } from '../types.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;

export const DEFAULT_SUPERVISOR_CONFIG: SupervisorConfig = {
  healthPath: '/health',
  statsPath: '/v2/stats',
  probeTimeoutMs: 2000,
  healthPollIntervalMs: 250,
  startupTimeoutMs: 30000,
  restartGraceMs: 500,
  monitorIntervalMs: 5000,
  failureThreshold: 3,
  monitorPolicy: 'report',
  statusIntervalMs: 2000,
  statsIntervalMs: 30000,
  killProcessTree: true,
  autoStart: true,
};

const MONITOR_POLICIES: readonly MonitorPolicy[] = ['report', 'respawn'];

type Env = Record<string, string | undefined>;

/**
 * Overlays `SUPERVISOR_*` variables on the defaults. Unset variables keep
 * their default; malformed ones throw.
 */
export function loadConfigFromEnv(env: Env = process.env, base: SupervisorConfig = DEFAULT_SUPERVISOR_CONFIG): SupervisorConfig {
  const config: SupervisorConfig = { ...base };

  if (env.SUPERVISOR_BASE_URL) config.baseUrl = env.SUPERVISOR_BASE_URL;
  if (env.SUPERVISOR_HEALTH_PATH) config.healthPath = env.SUPERVISOR_HEALTH_PATH;
  if (env.SUPERVISOR_STATS_PATH) config.statsPath = env.SUPERVISOR_STATS_PATH;

  config.probeTimeoutMs = readInteger(env, 'SUPERVISOR_PROBE_TIMEOUT_MS', config.probeTimeoutMs);
  config.healthPollIntervalMs = readInteger(env, 'SUPERVISOR_HEALTH_POLL_INTERVAL_MS', config.healthPollIntervalMs);
  config.startupTimeoutMs = readInteger(env, 'SUPERVISOR_STARTUP_TIMEOUT_MS', config.startupTimeoutMs);
  config.restartGraceMs = readInteger(env, 'SUPERVISOR_RESTART_GRACE_MS', config.restartGraceMs);
  config.monitorIntervalMs = readInteger(env, 'SUPERVISOR_MONITOR_INTERVAL_MS', config.monitorIntervalMs);
  config.failureThreshold = readInteger(env, 'SUPERVISOR_FAILURE_THRESHOLD', config.failureThreshold);
  config.statusIntervalMs = readInteger(env, 'SUPERVISOR_STATUS_INTERVAL_MS', config.statusIntervalMs);
  config.statsIntervalMs = readInteger(env, 'SUPERVISOR_STATS_INTERVAL_MS', config.statsIntervalMs);
  config.killProcessTree = readBoolean(env, 'SUPERVISOR_KILL_PROCESS_TREE', config.killProcessTree);
  config.autoStart = readBoolean(env, 'SUPERVISOR_AUTO_START', config.autoStart);

  const policy = env.SUPERVISOR_MONITOR_POLICY;
  if (policy) {
    config.monitorPolicy = parseMonitorPolicy(policy);
  }

  return config;
}

export function parseMonitorPolicy(value: string): MonitorPolicy {
  const policy = MONITOR_POLICIES.find(candidate => candidate === value);
  if (!policy) {
    throw new ConfigError(`Monitor policy must be one of: ${MONITOR_POLICIES.join(', ')}`);
  }
  return policy;
}

export function validateConfig(config: SupervisorConfig): void {
  if (config.baseUrl !== undefined && !isHttpUrl(config.baseUrl)) {
    throw new ConfigError(`Base URL must be an http(s) URL: ${config.baseUrl}`);
  }

  if (!config.healthPath.startsWith('/') || !config.statsPath.startsWith('/')) {
    throw new ConfigError('Health and stats paths must start with "/"');
  }

  const positive: Array<[keyof SupervisorConfig, number]> = [
    ['probeTimeoutMs', config.probeTimeoutMs],
    ['healthPollIntervalMs', config.healthPollIntervalMs],
    ['startupTimeoutMs', config.startupTimeoutMs],
    ['monitorIntervalMs', config.monitorIntervalMs],
    ['failureThreshold', config.failureThreshold],
    ['statusIntervalMs', config.statusIntervalMs],
    ['statsIntervalMs', config.statsIntervalMs],
  ];

  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${name} must be a positive integer`);
    }
  }

  if (!Number.isInteger(config.restartGraceMs) || config.restartGraceMs < 0) {
    throw new ConfigError('restartGraceMs must be a non-negative integer');
  }

  if (config.monitorInitialDelayMs !== undefined && (!Number.isInteger(config.monitorInitialDelayMs) || config.monitorInitialDelayMs < 0)) {
    throw new ConfigError('monitorInitialDelayMs must be a non-negative integer');
  }

  if (!MONITOR_POLICIES.includes(config.monitorPolicy)) {
    throw new ConfigError(`Monitor policy must be one of: ${MONITOR_POLICIES.join(', ')}`);
  }
}

export function validateLaunchSpec(spec: LaunchSpec): void {
  if (!spec.command || spec.command.trim().length === 0) {
    throw new ConfigError('Launch command is required');
  }

  if (spec.port !== undefined && (!Number.isInteger(spec.port) || spec.port < 1 || spec.port > 65535)) {
    throw new ConfigError('Port must be between 1 and 65535');
  }

  if (spec.host !== undefined && spec.host.trim().length === 0) {
    throw new ConfigError('Host must not be empty');
  }
}

/**
 * Accepts an already-parsed JSON value and checks it has the launch spec
 * shape.
 */
export function parseLaunchSpec(value: unknown): LaunchSpec {
  if (!isRecord(value)) {
    throw new ConfigError('Launch spec must be a JSON object');
  }

  const { command, args, env, workingDir, host, port } = value;

  if (typeof command !== 'string') {
    throw new ConfigError('Launch spec "command" must be a string');
  }

  const spec: LaunchSpec = { command };

  if (args !== undefined) {
    if (!Array.isArray(args) || !args.every((arg): arg is string => typeof arg === 'string')) {
      throw new ConfigError('Launch spec "args" must be an array of strings');
    }
    spec.args = args;
  }

  if (env !== undefined) {
    if (!isRecord(env)) {
      throw new ConfigError('Launch spec "env" must be an object');
    }
    const entries: Record<string, string> = {};
    for (const [key, entry] of Object.entries(env)) {
      if (typeof entry !== 'string') {
        throw new ConfigError(`Launch spec env "${key}" must be a string`);
      }
      entries[key] = entry;
    }
    spec.env = entries;
  }

  if (workingDir !== undefined) {
    if (typeof workingDir !== 'string') {
      throw new ConfigError('Launch spec "workingDir" must be a string');
    }
    spec.workingDir = workingDir;
  }

  if (host !== undefined) {
    if (typeof host !== 'string') {
      throw new ConfigError('Launch spec "host" must be a string');
    }
    spec.host = host;
  }

  if (port !== undefined) {
    if (typeof port !== 'number') {
      throw new ConfigError('Launch spec "port" must be a number');
    }
    spec.port = port;
  }

  validateLaunchSpec(spec);
  return spec;
}

export function loadLaunchSpecFile(filePath: string): LaunchSpec {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read launch spec ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Launch spec ${filePath} is not valid JSON`);
  }

  return parseLaunchSpec(parsed);
}

/**
 * Where the probe finds the backend: the configured URL, else the launch
 * spec's bind address. A wildcard bind is probed on loopback.
 */
export function resolveBaseUrl(config: Pick<SupervisorConfig, 'baseUrl'>, spec?: Pick<LaunchSpec, 'host' | 'port'>): string {
  if (config.baseUrl) {
    return config.baseUrl;
  }

  const host = !spec?.host || spec.host === '0.0.0.0' ? DEFAULT_HOST : spec.host;
  return `http://${host}:${spec?.port ?? DEFAULT_PORT}`;
}

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  switch (raw.toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
