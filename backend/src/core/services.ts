import { AgentDirectory, loadDefaultAgentDirectory } from '../lib/agents/agentDirectory';
import { AgentClassifier } from '../lib/chat/agentClassifier';
import { ChatStreamService } from '../lib/chat/chatStreamService';
import { InMemoryConversationRepository, type ConversationRepository } from '../lib/conversations/conversationRepository';
import { EscalationDetector, PendingConfirmations } from '../lib/escalation/escalationDetector';
import { EscalationHub } from '../lib/escalation/escalationHub';
import { StaffRoster } from '../lib/escalation/staffRoster';
import { GroqProvider } from '../lib/llm/groqProvider';
import { LlmService } from '../lib/llm/llmService';
import { OllamaProvider } from '../lib/llm/ollamaProvider';
import type { LlmProvider } from '../lib/llm/types';
import { NoopContextRetriever } from '../lib/rag/contextRetriever';
import { config } from './config';

const RETRIEVAL_LIMIT = 4;

export type Services = {
  directory: AgentDirectory;
  repository: ConversationRepository;
  llm: LlmService;
  chatStream: ChatStreamService;
  escalationHub: EscalationHub;
};

const buildLlmService = () => {
  const groq = new GroqProvider({
    apiKey: config.groq.apiKey,
    baseUrl: config.groq.baseUrl,
    model: config.groq.model,
    requestTimeoutMs: config.groq.requestTimeoutMs,
  });
  const ollama = new OllamaProvider({
    enabled: config.ollama.enabled,
    baseUrl: config.ollama.baseUrl,
    model: config.ollama.model,
  });

  const providers: LlmProvider[] = config.llm.provider === 'groq' ? [groq, ollama] : [ollama, groq];
  return new LlmService(providers);
};

const buildServices = (): Services => {
  const directory = loadDefaultAgentDirectory();
  const repository = new InMemoryConversationRepository();
  const detector = new EscalationDetector();
  const llm = buildLlmService();

  const chatStream = new ChatStreamService({
    directory,
    classifier: new AgentClassifier(directory),
    detector,
    pending: new PendingConfirmations(config.chat.confirmationTtlMs),
    roster: new StaffRoster(),
    repository,
    retriever: new NoopContextRetriever(),
    llm,
    settings: {
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      historyLimit: config.chat.historyLimit,
      retrievalLimit: RETRIEVAL_LIMIT,
    },
  });

  return {
    directory,
    repository,
    llm,
    chatStream,
    escalationHub: new EscalationHub(repository, detector),
  };
};

let services: Services | null = null;

export const getServices = (): Services => {
  services ??= buildServices();
  return services;
};
