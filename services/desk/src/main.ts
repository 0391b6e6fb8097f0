import type { FastifyInstance } from 'fastify';
import { CustomerDataAgent } from './agents/customerDataAgent';
import { SupportAgent } from './agents/supportAgent';
import { config } from './config';
import { logger } from './logger';
import { McpClient } from './mcp/client';
import { CoordinationDispatcher } from './orchestration/dispatcher';
import { buildAgentApp, buildMcpApp, buildRouterApp } from './server';
import { getCustomerStore } from './storage';
import { seedStore } from './storage/seed';
import { createTransport } from './transport/agentTransport';
import type { Specialists } from './transport/agentTransport';

function mcpClient() {
  return new McpClient({ baseUrl: config.mcp.url, timeoutMs: config.mcp.timeoutMs });
}

async function localAgents(): Promise<Specialists> {
  const agents = {
    customer_data: new CustomerDataAgent(mcpClient()),
    support: new SupportAgent(mcpClient()),
  };
  await agents.customer_data.initialize();
  await agents.support.initialize();
  return agents;
}

async function listen(app: FastifyInstance, port: number, name: string) {
  try {
    await app.listen({ port, host: config.host });
    app.log.info(`${name} listening on http://${config.host}:${port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

/**
 * Service entrypoint: `main.ts <mcp|data|support|router|seed>`.
 * Each service listens on its configured port; `seed` loads the sample data and exits.
 */
async function main(command: string | undefined) {
  switch (command) {
    case 'mcp': {
      const app = await buildMcpApp({ store: getCustomerStore() }, { logger: true });
      return listen(app, config.ports.mcp, 'MCP server');
    }
    case 'data': {
      const agent = new CustomerDataAgent(mcpClient());
      await agent.initialize();
      return listen(await buildAgentApp(agent, { logger: true }), config.ports.customerData, 'Customer data agent');
    }
    case 'support': {
      const agent = new SupportAgent(mcpClient());
      await agent.initialize();
      return listen(await buildAgentApp(agent, { logger: true }), config.ports.support, 'Support agent');
    }
    case 'router': {
      // without A2A over HTTP both specialists run inside the router process
      const agents = config.a2a.useHttp ? undefined : await localAgents();
      const dispatcher = new CoordinationDispatcher(createTransport(config.a2a, { agents }));
      logger.info({ transport: dispatcher.transportKind }, 'Router transport selected');
      return listen(await buildRouterApp(dispatcher, { logger: true }), config.ports.router, 'Router');
    }
    case 'seed': {
      const store = getCustomerStore();
      const counts = await seedStore(store);
      logger.info(counts, 'Store seeded');
      await store.close();
      return;
    }
    default:
      logger.error({ command }, 'Usage: main.ts <mcp|data|support|router|seed>');
      process.exit(1);
  }
}

main(process.argv[2]).catch((err) => {
  logger.fatal({ err }, 'Fatal error during startup');
  process.exit(1);
});
