import type { ProcessEntry } from '../../../shared/protocol.js';
import { formatBytes, formatPercent } from '../format.js';
import type { ProcessSort, ProcessSortField } from '../types.js';

export const DEFAULT_PROCESS_SORT: ProcessSort = { field: 'cpuPercent', direction: 'desc' };

export function sortProcesses(processes: ProcessEntry[], sort: ProcessSort): ProcessEntry[] {
  const sign = sort.direction === 'asc' ? 1 : -1;
  return [...processes].sort((a, b) => (a[sort.field] - b[sort.field]) * sign);
}

/** Clicking the active column flips direction; a new column starts descending. */
export function toggleSort(current: ProcessSort, field: ProcessSortField): ProcessSort {
  if (current.field === field) return { field, direction: current.direction === 'asc' ? 'desc' : 'asc' };
  return { field, direction: 'desc' };
}

export function renderProcessTable(processes: ProcessEntry[], sort: ProcessSort = DEFAULT_PROCESS_SORT): string {
  if (processes.length === 0) return 'no processes';
  const arrow = sort.direction === 'asc' ? '^' : 'v';
  const head = (label: string, field: ProcessSortField) => (sort.field === field ? `${label}${arrow}` : label);
  const rows = sortProcesses(processes, sort).map(
    (p) => `${p.pid}\t${p.user}\t${formatPercent(p.cpuPercent)}\t${formatBytes(p.memBytes)}\t${p.cmd}`
  );
  return [`${head('PID', 'pid')}\tUSER\t${head('CPU', 'cpuPercent')}\t${head('MEM', 'memBytes')}\tCOMMAND`, ...rows].join('\n');
}
