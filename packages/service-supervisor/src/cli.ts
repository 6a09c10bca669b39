#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';

import { ServiceManager } from './services/ServiceManager.js';
import { HealthProbe } from './services/HealthProbe.js';
import { LoggerService } from './services/LoggerService.js';
import { formatError } from './errors.js';
import {
  loadConfigFromEnv,
  loadLaunchSpecFile,
  parseMonitorPolicy,
  resolveBaseUrl,
  validateConfig,
} from './utils/config.js';
import { formatState } from './utils/state.js';
import type { LaunchSpec, StatusSink, SupervisorConfig } from './types.js';

dotenv.config();

interface RunOptions {
  config?: string;
  command?: string;
  arg: string[];
  cwd?: string;
  host?: string;
  port?: string;
  env: string[];
  forwardEnv: string[];
  policy?: string;
  autoStart: boolean;
}

interface ProbeOptions {
  url?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port)) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

/**
 * Launch spec from the JSON file (if any), overridden by flags, then by
 * `SUPERVISOR_*` variables for anything still unset.
 */
function buildLaunchSpec(options: RunOptions): LaunchSpec {
  const base: LaunchSpec = options.config
    ? loadLaunchSpecFile(options.config)
    : { command: process.env.SUPERVISOR_COMMAND ?? '' };

  const env: Record<string, string> = { ...base.env };

  for (const pair of options.env) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new Error(`Expected KEY=VALUE, got "${pair}"`);
    }
    env[pair.slice(0, index)] = pair.slice(index + 1);
  }

  // Credentials held by the shell are forwarded by name, never by value on the command line
  for (const name of options.forwardEnv) {
    const value = process.env[name];
    if (value !== undefined) {
      env[name] = value;
    }
  }

  const port = options.port ?? process.env.SUPERVISOR_PORT;

  return {
    ...base,
    command: options.command ?? base.command,
    args: options.arg.length > 0 ? options.arg : base.args,
    workingDir: options.cwd ?? base.workingDir ?? process.env.SUPERVISOR_WORKING_DIR,
    host: options.host ?? base.host ?? process.env.SUPERVISOR_HOST,
    port: port !== undefined ? parsePort(port) : base.port,
    env,
  };
}

function createConsoleSink(): StatusSink {
  return {
    onStatusChange(state, labels) {
      const color = state.kind === 'running' ? chalk.green : state.kind === 'error' ? chalk.red : chalk.yellow;
      console.log(color(`${labels.status}`) + chalk.gray(` [${labels.action}] ${formatState(state)}`));
    },
    onItemCount(_count, label) {
      console.log(chalk.cyan(label));
    },
  };
}

async function runCommand(options: RunOptions): Promise<void> {
  const config: SupervisorConfig = loadConfigFromEnv();
  if (options.policy) {
    config.monitorPolicy = parseMonitorPolicy(options.policy);
  }
  config.autoStart = config.autoStart && options.autoStart;
  validateConfig(config);

  const manager = new ServiceManager({
    launchSpec: buildLaunchSpec(options),
    config,
    logger: new LoggerService(),
    sink: createConsoleSink(),
  });

  manager.supervisor.on('service-ready', () => console.log(chalk.green('● service-ready')));
  manager.supervisor.on('service-error', (reason) => {
    console.log(chalk.red(`● service-error: ${reason}`));
    for (const entry of manager.getRecentOutput()) {
      console.log(chalk.gray(`  ${entry.source}| ${entry.message}`));
    }
  });
  manager.supervisor.on('service-restarting', () => console.log(chalk.yellow('● service-restarting')));

  let exiting = false;
  const shutdown = (signal: string): void => {
    if (exiting) {
      return;
    }
    exiting = true;
    console.log(chalk.gray(`Received ${signal}, stopping service...`));
    manager.shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(chalk.red(`Shutdown failed: ${formatError(error)}`));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  manager.startBackground();

  try {
    await manager.launch();
  } catch (error) {
    // The shell keeps running; the failure is already in the published state
    console.error(chalk.red(`Startup failed: ${formatError(error)}`));
  }
}

function probeFor(options: ProbeOptions): HealthProbe {
  const config = loadConfigFromEnv();
  const port = process.env.SUPERVISOR_PORT;
  const baseUrl = options.url ?? resolveBaseUrl(config, {
    host: process.env.SUPERVISOR_HOST,
    port: port !== undefined ? parsePort(port) : undefined,
  });

  return new HealthProbe({
    baseUrl,
    healthPath: config.healthPath,
    statsPath: config.statsPath,
    timeoutMs: config.probeTimeoutMs,
  });
}

const program = new Command();

program
  .name('service-supervisor')
  .description('Start, health-check and supervise a backend service process');

program
  .command('run')
  .description('Start the backend and supervise it until interrupted')
  .option('-c, --config <file>', 'JSON launch spec')
  .option('--command <path>', 'Executable to launch')
  .option('--arg <value>', 'Argument for the executable (repeatable)', collect, [])
  .option('--cwd <dir>', 'Working directory for the backend')
  .option('--host <host>', 'Bind address of the backend')
  .option('--port <port>', 'Bind port of the backend')
  .option('--env <KEY=VALUE>', 'Environment variable for the backend (repeatable)', collect, [])
  .option('--forward-env <NAME>', 'Forward a variable from this environment (repeatable)', collect, [])
  .option('--policy <policy>', 'Monitor policy on process exit: report | respawn')
  .option('--no-auto-start', 'Do not start the backend on launch')
  .action(async (options: RunOptions) => {
    await runCommand(options);
  });

program
  .command('probe')
  .description('Run one health probe against the backend')
  .option('--url <baseUrl>', 'Backend base URL')
  .action(async (options: ProbeOptions) => {
    const health = await probeFor(options).checkOnce();
    if (!health) {
      console.error(chalk.red('Service not available'));
      process.exitCode = 1;
      return;
    }
    console.log(JSON.stringify(health));
  });

program
  .command('stats')
  .description('Print the backend item count')
  .option('--url <baseUrl>', 'Backend base URL')
  .action(async (options: ProbeOptions) => {
    const stats = await probeFor(options).fetchStats();
    console.log(stats ? `Items: ${stats.total}` : 'Items: -');
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(formatError(error)));
  process.exit(1);
});
