import type { ServiceState, TrayLabels } from '../types.js';

export function statesEqual(a: ServiceState, b: ServiceState): boolean {
  if (a.kind === 'error' && b.kind === 'error') {
    return a.reason === b.reason && a.code === b.code;
  }
  return a.kind === b.kind;
}

export function formatState(state: ServiceState): string {
  return state.kind === 'error' ? `error (${state.reason})` : state.kind;
}

const STATUS_LABELS: Record<ServiceState['kind'], string> = {
  starting: 'Status: Starting',
  running: 'Status: Running',
  stopped: 'Status: Stopped',
  restarting: 'Status: Restarting',
  error: 'Status: Error',
};

export function trayLabels(state: ServiceState): TrayLabels {
  const action = state.kind === 'stopped' || state.kind === 'error'
    ? 'Start Service'
    : 'Restart Service';

  return { status: STATUS_LABELS[state.kind], action };
}

export function itemCountLabel(count: number | null): string {
  return count === null ? 'Items: -' : `Items: ${count}`;
}
