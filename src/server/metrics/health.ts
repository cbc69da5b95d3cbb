import type { ServerMetrics } from '../types.js';
import type { Counters } from './counters.js';

export function buildHealthSummary(metrics: ServerMetrics, counters: Counters) {
  return {
    metrics,
    wsCloseByCode: counters.wsCloseTotal,
    requestsByKind: counters.requestsTotal,
    collaboratorFailuresByKind: counters.collaboratorFailureTotal,
    reconnectTotal: counters.reconnectTotal,
    clientIdConflictTotal: counters.clientIdConflictTotal,
    validationFailureTotal: counters.validationFailureTotal,
    malformedMessageTotal: counters.malformedMessageTotal
  };
}
