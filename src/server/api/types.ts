import type { CommandDispatcher } from '../commands/command-dispatcher.js';
import type { LogFollowers } from '../logs/log-followers.js';
import type { Counters } from '../metrics/counters.js';
import type { ClientRegistry } from '../session/client-registry.js';
import type { ConnectionManager } from '../session/connection-manager.js';
import type { HostActions, TelemetrySource } from '../telemetry/telemetry-source.js';
import type { ServerMetrics } from '../types.js';

export interface ServerContext {
  port: number;
  clientRegistry: ClientRegistry;
  connectionManager: ConnectionManager;
  counters: Counters;
  telemetry: TelemetrySource;
  actions: HostActions;
  dispatcher: CommandDispatcher;
  logFollowers: LogFollowers;
  getMetrics: () => ServerMetrics;
}

export interface ContextDeps {
  port: number;
  telemetry: TelemetrySource;
  actions: HostActions;
}
