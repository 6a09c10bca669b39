import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { RestartAlreadyInProgress, SpawnError, formatError, type SupervisorErrorCode } from '../errors.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { IProcessHandle, ProcessLauncher } from '../interfaces/IProcessHandle.js';
import type { LaunchSpec, ServiceState } from '../types.js';
import { formatState, statesEqual } from '../utils/state.js';
import { ProcessHandle } from './ProcessHandle.js';
import { RestartGuard, type RestartLease } from './RestartGuard.js';

export interface SupervisorEventMap {
  'state-changed': (state: ServiceState, previous: ServiceState) => void;
  'service-ready': () => void;
  'service-error': (reason: string) => void;
  'service-restarting': () => void;
}

export interface ServiceSupervisorOptions {
  logger: ILogger;
  id?: string;
  restartGraceMs?: number;
  killProcessTree?: boolean;
  launcher?: ProcessLauncher;
}

export interface ServiceSupervisor {
  on<K extends keyof SupervisorEventMap>(event: K, listener: SupervisorEventMap[K]): this;
  once<K extends keyof SupervisorEventMap>(event: K, listener: SupervisorEventMap[K]): this;
  off<K extends keyof SupervisorEventMap>(event: K, listener: SupervisorEventMap[K]): this;
}

/**
 * Owns the one backend process and the status cell describing it.
 *
 * Every mutation of the process handle runs through a serial queue, so a
 * `stop` issued while a `start` is spawning waits for the spawn to finish.
 * Status is replaced wholesale on each transition and read as a copy.
 */
export class ServiceSupervisor extends EventEmitter {
  readonly id: string;
  private handle: IProcessHandle | null = null;
  private state: ServiceState = { kind: 'stopped' };
  private shouldRestart = true;
  // Bumped by every stop request; a restart compares it across its grace sleep
  private stopGeneration = 0;
  private readonly restartGuard = new RestartGuard();
  private queue: Promise<void> = Promise.resolve();
  private readonly launcher: ProcessLauncher;
  private readonly logger: ILogger;

  constructor(private readonly options: ServiceSupervisorOptions) {
    super();
    this.id = options.id ?? uuidv4();
    this.logger = options.logger;
    this.launcher = options.launcher ?? ((spec) => ProcessHandle.spawn(spec, {
      logger: this.logger,
      sourceId: this.id,
      killProcessTree: options.killProcessTree ?? true,
    }));
  }

  async start(spec: LaunchSpec): Promise<void> {
    return this.exclusive(() => this.startLocked(spec));
  }

  async stop(): Promise<void> {
    this.shouldRestart = false;
    this.stopGeneration++;
    return this.exclusive(() => this.stopLocked());
  }

  /**
   * Stop, pause for the grace interval, start again. Pass a lease obtained
   * from `tryAcquireRestart` to keep the exclusive right beyond the restart
   * itself; without one the restart acquires and releases its own.
   *
   * A `stop()` issued while the restart is stopping or sleeping cancels the
   * start; the restart then resolves with the supervisor `stopped`.
   */
  async restart(spec: LaunchSpec, lease?: RestartLease): Promise<void> {
    if (lease) {
      if (!this.restartGuard.holds(lease)) {
        throw new RestartAlreadyInProgress();
      }
      return this.performRestart(spec);
    }

    return this.restartGuard.runExclusive(() => this.performRestart(spec));
  }

  tryAcquireRestart(): RestartLease | null {
    return this.restartGuard.tryAcquire();
  }

  isRestartInProgress(): boolean {
    return this.restartGuard.inProgress;
  }

  markRunning(): void {
    this.setState({ kind: 'running' });
  }

  markError(reason: string, code?: SupervisorErrorCode): void {
    this.setState({ kind: 'error', reason, code });
  }

  isRunning(): boolean {
    return this.handle?.isAlive() ?? false;
  }

  getStatus(): ServiceState {
    return { ...this.state };
  }

  getPid(): number | undefined {
    return this.handle?.pid;
  }

  shouldAutoRestart(): boolean {
    return this.shouldRestart;
  }

  /**
   * Forced stop for shell exit; resolves once the child's exit is confirmed.
   */
  async shutdown(): Promise<void> {
    this.logger.addLog(this.id, 'info', 'Supervisor shutting down');
    await this.stop();
    this.removeAllListeners();
  }

  private async performRestart(spec: LaunchSpec): Promise<void> {
    this.logger.addLog(this.id, 'info', 'Restarting service...');
    this.setState({ kind: 'restarting' });

    const stopping = this.stop();
    const generation = this.stopGeneration;
    await stopping;
    await new Promise(resolve => setTimeout(resolve, this.options.restartGraceMs ?? 500));

    if (this.stopGeneration !== generation) {
      this.logger.addLog(this.id, 'info', 'Restart cancelled by stop request');
      return;
    }

    await this.start(spec);
  }

  private async startLocked(spec: LaunchSpec): Promise<void> {
    this.shouldRestart = true;
    this.setState({ kind: 'starting' });

    if (this.handle) {
      this.logger.addLog(this.id, 'warn', `Replacing owned process (PID: ${this.handle.pid})`);
      await this.terminateOwned(this.handle);
    }

    try {
      this.handle = await this.launcher(spec);
    } catch (error) {
      const spawnError = error instanceof SpawnError
        ? error
        : new SpawnError(formatError(error), { cause: error });

      this.logger.addLog(this.id, 'error', `Failed to spawn service: ${spawnError.message}`);
      this.setState({ kind: 'error', reason: spawnError.message, code: spawnError.code });
      throw spawnError;
    }
  }

  private async stopLocked(): Promise<void> {
    // The last queued operation decides the intent
    this.shouldRestart = false;

    if (this.handle) {
      await this.terminateOwned(this.handle);
    }
    this.setState({ kind: 'stopped' });
  }

  private async terminateOwned(handle: IProcessHandle): Promise<void> {
    this.logger.addLog(this.id, 'info', `Stopping service (PID: ${handle.pid})...`);

    try {
      await handle.terminate();
      this.logger.addLog(this.id, 'info', 'Service stopped');
    } catch (error) {
      this.logger.addLog(this.id, 'error', `Failed to stop process ${handle.pid}: ${formatError(error)}`);
    } finally {
      this.handle = null;
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private setState(next: ServiceState): void {
    const previous = this.state;
    if (statesEqual(previous, next)) {
      return;
    }

    this.state = next;
    this.logger.addLog(this.id, 'debug', `State ${formatState(previous)} -> ${formatState(next)}`);
    this.emit('state-changed', { ...next }, previous);

    switch (next.kind) {
      case 'running':
        this.emit('service-ready');
        break;
      case 'error':
        this.emit('service-error', next.reason);
        break;
      case 'restarting':
        this.emit('service-restarting');
        break;
    }
  }
}
