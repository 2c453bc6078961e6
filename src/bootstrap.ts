import { setDefaultOpenAIKey } from '@openai/agents';
import { createCustomerSupportAgent } from './agents/customer-support';
import { OpenAIAgentExecutor } from './agents/executor';
import { EnvironmentConfig, assertAgentCredentials } from './config/environment';
import { createRunStateStore, createSupportStore } from './config/persistence';
import { SupportStore } from './database/types';
import { AgentTextCompletion } from './llm/completion';
import { OpenAIEmbeddingProvider } from './rag/embeddings';
import { KnowledgeBase, RAG_SYSTEM_PROMPT } from './rag/knowledgeBase';
import { ConversationService } from './services/conversationService';
import { DatabaseQueryService } from './services/databaseQuery';
import { RunStateStore } from './services/persistence/types';
import { TicketService } from './services/ticketService';
import { createSupportToolHandlers } from './tools/handlers';
import { createSupportTools } from './tools/support-tools';

const FAQ_SELECTOR_INSTRUCTIONS = 'You pick the FAQ entry that best answers a customer question. Reply with the number of the entry and nothing else.';

export interface SupportRuntime {
  config: EnvironmentConfig;
  store: SupportStore;
  pendingTurns: RunStateStore;
  tickets: TicketService;
  knowledgeBase: KnowledgeBase;
  conversation: ConversationService;
  close(): Promise<void>;
}

export function createKnowledgeBase(config: EnvironmentConfig): KnowledgeBase {
  const embeddings = new OpenAIEmbeddingProvider({
    provider: config.embeddings.provider,
    model: config.embeddings.model,
    apiKey: config.openaiApiKey,
    azureEndpoint: config.embeddings.azureEndpoint,
    azureApiKey: config.embeddings.azureApiKey,
    azureApiVersion: config.embeddings.azureApiVersion
  });
  const answerModel = new AgentTextCompletion({
    name: 'Documentation Assistant',
    instructions: RAG_SYSTEM_PROMPT,
    model: config.agentModel,
    temperature: 0.1
  });
  return new KnowledgeBase(config.knowledgeBase, embeddings, answerModel);
}

/**
 * Wire stores, services, tools and the agent from configuration
 */
export async function createSupportRuntime(config: EnvironmentConfig): Promise<SupportRuntime> {
  assertAgentCredentials(config);
  setDefaultOpenAIKey(config.openaiApiKey);

  const store = createSupportStore(config);
  await store.init();
  const pendingTurns = createRunStateStore(config);
  await pendingTurns.init();

  const tickets = new TicketService(store);
  const faqSelector = new AgentTextCompletion({
    name: 'FAQ Selector',
    instructions: FAQ_SELECTOR_INSTRUCTIONS,
    model: config.agentModel,
    temperature: 0
  });
  const database = new DatabaseQueryService(store, faqSelector);
  const knowledgeBase = createKnowledgeBase(config);

  const handlers = createSupportToolHandlers({ tickets, database, knowledgeBase });
  const agent = createCustomerSupportAgent({
    model: config.agentModel,
    tools: createSupportTools(handlers)
  });
  const executor = new OpenAIAgentExecutor(agent, {
    maxTurns: config.maxTurns,
    historyLimit: config.historyLimit
  });

  return {
    config,
    store,
    pendingTurns,
    tickets,
    knowledgeBase,
    conversation: new ConversationService(executor, pendingTurns),
    close: () => store.close()
  };
}
