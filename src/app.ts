import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env';
import { logger } from './observability/logger';
import { openHistoryStore, worstCaseWriteMs } from './history/history-store';
import { PolicyService } from './knowledge/policy-service';
import { ToolRegistry, registerSupportTools } from './tools/registry';
import { DEFAULT_TOOL_TIMEOUT_MS, ToolRuntime } from './tools/runtime';
import { buildProvider } from './llm/provider-factory';
import { PromptManager } from './agent/prompt-manager';
import { SupportAgent } from './agent/agent-core';
import { registerChatEndpoint } from './channels/chat-endpoint';
import { HealthCheckable, registerHealthRoutes } from './health/health-routes';
import { HistoryStore, HistoryStoreConfig } from './history/types';
import { TurnResponder } from './agent/types';

export interface AssistantContext {
  historyStore: HistoryStore;
  registry: ToolRegistry;
  agent: SupportAgent;
}

export interface AppContext extends AssistantContext {
  app: FastifyInstance;
}

/**
 * Wire the tool layer and the agent.
 * The history store is opened here and must be closed by the caller on shutdown.
 */
export function buildAssistant(): AssistantContext {
  const provider = buildProvider(env.gemini, env.llmRetry);

  const historyConfig: HistoryStoreConfig = {
    dbPath: env.history.dbPath,
    busyTimeoutMs: env.history.busyTimeoutMs,
    maxAttempts: env.history.writeAttempts,
    delayMs: env.history.retryDelayMs,
  };
  const historyStore = openHistoryStore(historyConfig);
  historyStore.initialize();

  const policyService = PolicyService.fromDirectory();
  const registry = registerSupportTools(new ToolRegistry(), {
    historyStore,
    policyService,
    saveTimeoutMs: worstCaseWriteMs(historyConfig) + DEFAULT_TOOL_TIMEOUT_MS,
  });
  const runtime = new ToolRuntime(registry);

  const agent = new SupportAgent(provider, registry, runtime, new PromptManager(), {
    maxToolRounds: env.agent.maxToolRounds,
    temperature: env.gemini.temperature,
    maxTokens: env.gemini.maxTokens,
  });

  logger.info({ tools: registry.getAll().map((t) => t.name) }, 'Support assistant ready');
  return { historyStore, registry, agent };
}

export async function buildApp(): Promise<AppContext> {
  const assistant = buildAssistant();
  const app = await createHttpApp(assistant.agent, assistant.historyStore);
  return { app, ...assistant };
}

/** HTTP surface over an agent and its history store; closing the app closes the store. */
export async function createHttpApp(
  agent: TurnResponder & HealthCheckable,
  historyStore: HistoryStore,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  registerChatEndpoint(app, agent);
  registerHealthRoutes(app, historyStore, agent);

  app.addHook('onClose', async () => {
    historyStore.close();
  });

  return app;
}
