import Fastify from 'fastify';
import type { Specialist } from './agents/specialist';
import type { CustomerStore } from './contracts/customerStore';
import { SessionRegistry } from './mcp/sessions';
import type { CoordinationDispatcher } from './orchestration/dispatcher';
import { registerAgentRoutes } from './routes/agents';
import { registerMcpRoutes } from './routes/mcp';
import { registerRouterRoutes } from './routes/router';
import { config } from './config';

export interface AppOptions {
  /** Fastify request logging; off unless the entrypoint turns it on. */
  logger?: boolean;
}

export interface McpAppDeps {
  store: CustomerStore;
  sessions?: SessionRegistry;
}

export async function buildMcpApp(deps: McpAppDeps, options: AppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });
  const sessions = deps.sessions ?? new SessionRegistry(config.mcp.maxQueuedMessages);

  app.get('/health', async () => {
    try {
      await deps.store.listCustomers('active', 1);
      return { status: 'ok', store: 'ok', sessions: sessions.size };
    } catch (err) {
      app.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error', sessions: sessions.size };
    }
  });

  await registerMcpRoutes(app, { store: deps.store, sessions });
  return app;
}

export async function buildAgentApp(agent: Specialist, options: AppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });

  app.get('/health', async () => ({ status: 'ok', agent: agent.kind }));

  await registerAgentRoutes(app, agent);
  return app;
}

export async function buildRouterApp(dispatcher: CoordinationDispatcher, options: AppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });

  app.get('/health', async () => ({
    status: 'ok',
    agent: 'router',
    transport: dispatcher.transportKind,
  }));

  await registerRouterRoutes(app, dispatcher);
  return app;
}
