import { spawn, type ChildProcess } from 'child_process';
import psTree from 'ps-tree';
import { promisify } from 'util';
import * as path from 'path';
import * as fs from 'fs';
import { SpawnError, formatError } from '../errors.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { IProcessHandle } from '../interfaces/IProcessHandle.js';
import type { ExitInfo, LaunchSpec } from '../types.js';

const psTreeAsync = promisify(psTree);

export interface ProcessHandleOptions {
  logger: ILogger;
  sourceId: string;
  killProcessTree?: boolean;
  // Upper bound on waiting for the OS to confirm exit after a kill
  killTimeoutMs?: number;
}

/**
 * Owns exactly one spawned OS process.
 */
export class ProcessHandle implements IProcessHandle {
  private constructor(
    private readonly child: ChildProcess,
    readonly pid: number,
    private readonly exited: Promise<ExitInfo>,
    private readonly options: ProcessHandleOptions
  ) {}

  static async spawn(spec: LaunchSpec, options: ProcessHandleOptions): Promise<ProcessHandle> {
    const { logger, sourceId } = options;
    const args = spec.args ?? [];
    const cwd = resolveWorkingDirectory(spec.workingDir);
    const command = resolveExecutable(spec.command, cwd);

    logger.addLog(sourceId, 'info', `Starting process: ${command} ${args.join(' ')}`);
    logger.addLog(sourceId, 'debug', `Working directory: ${cwd}`);

    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd,
        env: { ...process.env, ...spec.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (error) {
      throw new SpawnError(`Failed to spawn ${command}: ${formatError(error)}`, { cause: error });
    }

    const exited = new Promise<ExitInfo>((resolve) => {
      child.once('exit', (code, signal) => {
        logger.addLog(sourceId, 'info', `Process exited with code ${code}, signal ${signal}`);
        resolve({ code, signal });
      });
    });

    pipeOutput(child, logger, sourceId);
    await waitForSpawn(child, command);

    child.on('error', (error) => {
      logger.addLog(sourceId, 'error', `Process error: ${error.message}`);
    });

    if (child.pid === undefined) {
      throw new SpawnError('Failed to start process - no PID assigned');
    }

    logger.addLog(sourceId, 'info', `Process started with PID: ${child.pid}`);
    return new ProcessHandle(child, child.pid, exited, options);
  }

  isAlive(): boolean {
    return this.child.exitCode === null && this.child.signalCode === null;
  }

  waitForExit(): Promise<ExitInfo> {
    return this.exited;
  }

  /**
   * Kills the process (and its descendants when enabled) and resolves once
   * the exit has been observed or the kill timeout has passed.
   */
  async terminate(): Promise<ExitInfo> {
    const { logger, sourceId } = this.options;

    if (!this.isAlive()) {
      return this.exited;
    }

    logger.addLog(sourceId, 'info', `Stopping process with PID: ${this.pid}`);

    if (this.options.killProcessTree) {
      if (process.platform === 'win32') {
        await this.killWindowsTree();
      } else {
        await this.killDescendants();
      }
    }

    if (this.isAlive() && !this.child.kill('SIGKILL')) {
      logger.addLog(sourceId, 'warn', `Kill signal could not be delivered to PID ${this.pid}`);
    }

    return this.waitWithTimeout(this.options.killTimeoutMs ?? 5000);
  }

  private async waitWithTimeout(timeoutMs: number): Promise<ExitInfo> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs);
    });

    try {
      const result = await Promise.race([this.exited, timedOut]);
      if (result === null) {
        this.options.logger.addLog(
          this.options.sourceId,
          'error',
          `Process ${this.pid} did not exit within ${timeoutMs}ms of being killed`
        );
        return { code: null, signal: null };
      }
      return result;
    } finally {
      clearTimeout(timer);
    }
  }

  private async killDescendants(): Promise<void> {
    const { logger, sourceId } = this.options;

    try {
      const children = await psTreeAsync(this.pid);

      for (const child of children) {
        try {
          process.kill(parseInt(child.PID, 10), 'SIGKILL');
        } catch (error) {
          logger.addLog(sourceId, 'debug', `Could not kill child process ${child.PID}: ${formatError(error)}`);
        }
      }
    } catch (error) {
      logger.addLog(sourceId, 'warn', `Failed to list child processes of ${this.pid}: ${formatError(error)}`);
    }
  }

  private async killWindowsTree(): Promise<void> {
    const taskkill = spawn('taskkill', ['/pid', this.pid.toString(), '/t', '/f'], {
      stdio: 'ignore',
      windowsHide: true,
    });

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(resolve, 3000);
      taskkill.on('close', () => {
        clearTimeout(timeout);
        resolve();
      });
      taskkill.on('error', (error) => {
        this.options.logger.addLog(this.options.sourceId, 'warn', `taskkill failed: ${error.message}`);
        clearTimeout(timeout);
        resolve();
      });
    });
  }
}

function waitForSpawn(child: ChildProcess, command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: NodeJS.ErrnoException): void => {
      child.off('spawn', onSpawn);
      const reason = error.code === 'ENOENT'
        ? `Executable not found: ${command}`
        : `Failed to spawn ${command}: ${error.message}`;
      reject(new SpawnError(reason, { cause: error }));
    };

    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function pipeOutput(child: ChildProcess, logger: ILogger, sourceId: string): void {
  const forward = (data: Buffer, origin: 'stdout' | 'stderr'): void => {
    for (const line of data.toString().split('\n')) {
      const trimmed = line.trim();
      if (trimmed) {
        logger.addLog(sourceId, origin === 'stderr' ? 'warn' : 'info', trimmed, origin);
      }
    }
  };

  child.stdout?.on('data', (data: Buffer) => forward(data, 'stdout'));
  child.stderr?.on('data', (data: Buffer) => forward(data, 'stderr'));
}

export function resolveWorkingDirectory(workingDir?: string): string {
  if (!workingDir) {
    return process.cwd();
  }

  const resolved = path.resolve(workingDir);

  if (!fs.existsSync(resolved)) {
    throw new SpawnError(`Working directory does not exist: ${resolved}`);
  }

  if (!fs.statSync(resolved).isDirectory()) {
    throw new SpawnError(`Working directory is not a directory: ${resolved}`);
  }

  return resolved;
}

/**
 * Path-like commands are checked up front; bare names are left to PATH lookup.
 */
export function resolveExecutable(command: string, cwd: string): string {
  if (!command.trim()) {
    throw new SpawnError('Command is required');
  }

  const isPathLike = path.isAbsolute(command) || command.includes('/') || command.includes('\\');
  if (!isPathLike) {
    return command;
  }

  const resolved = path.resolve(cwd, command);
  if (!fs.existsSync(resolved)) {
    throw new SpawnError(`Executable not found: ${resolved}`);
  }

  return resolved;
}
