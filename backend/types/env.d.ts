declare global {
  namespace NodeJS {
    interface ProcessEnv {
      SUPPORT_CHAT_ENV?: 'development' | 'staging' | 'production' | 'test';
      NODE_ENV?: 'development' | 'staging' | 'production' | 'test';
      PORT?: string;
      ROOT_URL?: string;
      LOG_LEVEL?: string;
      LLM_PROVIDER?: string;
      LLM_TEMPERATURE?: string;
      LLM_MAX_TOKENS?: string;
      GROQ_API_KEY?: string;
      GROQ_BASE_URL?: string;
      GROQ_MODEL?: string;
      GROQ_TIMEOUT_MS?: string;
      OLLAMA_ENABLED?: string;
      OLLAMA_BASE_URL?: string;
      OLLAMA_MODEL?: string;
      ESCALATION_CONFIRMATION_TTL_MS?: string;
      CHAT_HISTORY_LIMIT?: string;
      DEBUG_TESTS?: string;
    }
  }
}

export { };
