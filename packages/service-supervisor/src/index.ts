export { ServiceManager } from './services/ServiceManager.js';
export type { ServiceManagerOptions } from './services/ServiceManager.js';
export { ServiceSupervisor } from './services/ServiceSupervisor.js';
export type { ServiceSupervisorOptions, SupervisorEventMap } from './services/ServiceSupervisor.js';
export { HealthProbe, parseHealth, parseStats } from './services/HealthProbe.js';
export type { HealthProbeOptions } from './services/HealthProbe.js';
export { MonitorLoop } from './services/MonitorLoop.js';
export type { MonitorLoopOptions, TickOutcome } from './services/MonitorLoop.js';
export { StatusPublisher } from './services/StatusPublisher.js';
export type { StatusPublisherOptions } from './services/StatusPublisher.js';
export { ProcessHandle } from './services/ProcessHandle.js';
export type { ProcessHandleOptions } from './services/ProcessHandle.js';
export { RestartGuard } from './services/RestartGuard.js';
export type { RestartLease } from './services/RestartGuard.js';
export { LoggerService } from './services/LoggerService.js';
export type { LoggerOptions } from './services/LoggerService.js';

export * from './errors.js';
export * from './utils/config.js';
export { formatState, itemCountLabel, statesEqual, trayLabels } from './utils/state.js';

export type { ILogger, LogQuery } from './interfaces/ILogger.js';
export type { IHealthProbe } from './interfaces/IHealthProbe.js';
export type { IProcessHandle, ProcessLauncher } from './interfaces/IProcessHandle.js';
export type * from './types.js';

import { ServiceManager, type ServiceManagerOptions } from './services/ServiceManager.js';

/**
 * Create a service manager for one backend process.
 * This is the main entry point for using the supervisor as a library.
 */
export function createServiceManager(options: ServiceManagerOptions): ServiceManager {
  return new ServiceManager(options);
}
