import type { ContextDeps, ServerContext } from './api/types.js';
import { CommandDispatcher } from './commands/command-dispatcher.js';
import { LogFollowers } from './logs/log-followers.js';
import { Counters } from './metrics/counters.js';
import { ClientRegistry } from './session/client-registry.js';
import { ConnectionManager } from './session/connection-manager.js';

export function createServerContext(deps: ContextDeps): ServerContext {
  const clientRegistry = new ClientRegistry();
  const connectionManager = new ConnectionManager();
  const counters = new Counters();
  const logFollowers = new LogFollowers();
  const dispatcher = new CommandDispatcher(deps.actions, counters);

  return {
    ...deps,
    clientRegistry,
    connectionManager,
    counters,
    dispatcher,
    logFollowers,
    getMetrics: () => ({
      clientsOnline: clientRegistry.list().filter((c) => c.status === 'online').length,
      wsConnections: connectionManager.size(),
      activeLogFollowers: logFollowers.size()
    })
  };
}
