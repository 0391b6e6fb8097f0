import 'dotenv/config';

const DEFAULT_TIMEOUT_MS = 30_000;

export type StoreDriver = 'redis' | 'memory';

function storeDriver(value: string | undefined): StoreDriver {
  return value === 'memory' ? 'memory' : 'redis';
}

const settings = {
  host: process.env.HOST || '0.0.0.0',
  ports: {
    mcp: parseInt(process.env.MCP_PORT || '8003', 10),
    customerData: parseInt(process.env.DATA_AGENT_PORT || '8001', 10),
    support: parseInt(process.env.SUPPORT_AGENT_PORT || '8002', 10),
    router: parseInt(process.env.ROUTER_PORT || '8000', 10),
  },
  mcp: {
    url: process.env.MCP_SERVER_URL || 'http://localhost:8003',
    timeoutMs: DEFAULT_TIMEOUT_MS,
    // per-session replay queue for GET /mcp
    maxQueuedMessages: 100,
  },
  a2a: {
    useHttp: (process.env.A2A_USE_HTTP || 'false').toLowerCase() === 'true',
    customerDataUrl: process.env.A2A_CUSTOMER_DATA_URL || 'http://localhost:8001',
    supportUrl: process.env.A2A_SUPPORT_URL || 'http://localhost:8002',
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  store: {
    driver: storeDriver(process.env.STORE_DRIVER),
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
    keyPrefix: process.env.STORE_KEY_PREFIX || 'desk',
  },
  router: {
    maxIterations: 10,
  },
  support: {
    privilegedCustomerId: 12345,
  },
  logLevel: process.env.LOG_LEVEL,
};

export type AppConfig = typeof settings;

for (const section of Object.values(settings)) {
  if (typeof section === 'object') Object.freeze(section);
}

export const config: Readonly<AppConfig> = Object.freeze(settings);
