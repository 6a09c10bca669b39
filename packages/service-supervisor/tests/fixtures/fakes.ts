import { HealthTimeout, SpawnError } from '../../src/errors.js';
import type { IHealthProbe } from '../../src/interfaces/IHealthProbe.js';
import type { IProcessHandle, ProcessLauncher } from '../../src/interfaces/IProcessHandle.js';
import { LoggerService } from '../../src/services/LoggerService.js';
import type { ExitInfo, HealthResponse, LaunchSpec, StatsSnapshot } from '../../src/types.js';

export const HEALTHY: HealthResponse = { status: 'ok', version: '1.2.3' };

export function silentLogger(): LoggerService {
  return new LoggerService({ console: false });
}

/**
 * A child that stays alive until killed.
 */
export function idleChildSpec(env?: Record<string, string>): LaunchSpec {
  return {
    command: process.execPath,
    args: ['-e', 'setInterval(() => {}, 1000)'],
    env,
  };
}

export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

export async function waitFor(predicate: () => boolean, timeoutMs = 3000, intervalMs = 10): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
}

/**
 * Probe whose `checkOnce` answers follow a script; once the script runs
 * out every check fails.
 */
export class ScriptedProbe implements IHealthProbe {
  checks = 0;
  waits = 0;
  statsCalls = 0;
  waitOutcome: 'healthy' | 'timeout' = 'healthy';
  stats: StatsSnapshot | null = { total: 7 };

  constructor(private readonly script: boolean[] = []) {}

  push(...outcomes: boolean[]): void {
    this.script.push(...outcomes);
  }

  async checkOnce(): Promise<HealthResponse | null> {
    this.checks++;
    return this.script.shift() ? HEALTHY : null;
  }

  async waitUntilHealthy(deadlineMs: number): Promise<HealthResponse> {
    this.waits++;
    if (this.waitOutcome === 'timeout') {
      throw new HealthTimeout(deadlineMs);
    }
    return HEALTHY;
  }

  async fetchStats(): Promise<StatsSnapshot | null> {
    this.statsCalls++;
    return this.stats;
  }
}

let nextFakePid = 40000;

export class FakeProcessHandle implements IProcessHandle {
  readonly pid = nextFakePid++;
  private exit: ExitInfo | null = null;
  private readonly waiters: Array<(info: ExitInfo) => void> = [];

  isAlive(): boolean {
    return this.exit === null;
  }

  /** Simulates the process dying on its own. */
  crash(code = 1): void {
    this.finish({ code, signal: null });
  }

  async terminate(): Promise<ExitInfo> {
    this.finish({ code: null, signal: 'SIGKILL' });
    return this.waitForExit();
  }

  waitForExit(): Promise<ExitInfo> {
    const exit = this.exit;
    if (exit) {
      return Promise.resolve(exit);
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  private finish(info: ExitInfo): void {
    if (this.exit) {
      return;
    }
    this.exit = info;
    for (const resolve of this.waiters.splice(0)) {
      resolve(info);
    }
  }
}

/**
 * Launcher handing out fake handles. Set `failNext` to make the next
 * launch fail the way a missing executable does.
 */
export class FakeLauncher {
  readonly handles: FakeProcessHandle[] = [];
  failNext = false;

  readonly launch: ProcessLauncher = async (spec) => {
    if (this.failNext) {
      this.failNext = false;
      throw new SpawnError(`Executable not found: ${spec.command}`);
    }
    const handle = new FakeProcessHandle();
    this.handles.push(handle);
    return handle;
  };

  get latest(): FakeProcessHandle | undefined {
    return this.handles[this.handles.length - 1];
  }

  aliveCount(): number {
    return this.handles.filter(handle => handle.isAlive()).length;
  }
}
