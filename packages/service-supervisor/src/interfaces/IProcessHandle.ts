import type { ExitInfo, LaunchSpec } from '../types.js';

export interface IProcessHandle {
  readonly pid: number;
  isAlive(): boolean;
  terminate(): Promise<ExitInfo>;
  waitForExit(): Promise<ExitInfo>;
}

export type ProcessLauncher = (spec: LaunchSpec) => Promise<IProcessHandle>;
