export * from './types';
export * from './errors';
export * from './contracts/envelope';
export * from './contracts/actions';
export * from './contracts/jsonrpc';
export type { CustomerStore, SeedFixture, UpdateOutcome } from './contracts/customerStore';
export { MemoryCustomerStore } from './storage/memoryCustomerStore';
export { RedisCustomerStore } from './storage/redisCustomerStore';
export { getCustomerStore } from './storage';
export { seedStore } from './storage/seed';
export { McpClient } from './mcp/client';
export type { McpClientOptions } from './mcp/client';
export { TOOL_CATALOG, executeTool } from './mcp/tools';
export { CustomerDataAgent } from './agents/customerDataAgent';
export { SupportAgent } from './agents/supportAgent';
export type { Specialist } from './agents/specialist';
export { findAgentForTask, getAgentCard, listAgentCards } from './agents/cards';
export type { AgentCard } from './agents/cards';
export { DirectTransport, HttpTransport, createTransport } from './transport/agentTransport';
export type { AgentTransport, Specialists } from './transport/agentTransport';
export { analyzeIntent } from './orchestration/intent';
export type { IntentDescriptor, IntentTag } from './orchestration/intent';
export { CoordinationDispatcher } from './orchestration/dispatcher';
export type { CoordinationResult, ScenarioName } from './orchestration/types';
export { buildAgentApp, buildMcpApp, buildRouterApp } from './server';
