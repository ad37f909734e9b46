import dotenv from 'dotenv';

dotenv.config();

export const config = {
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/insight',
    dbName: process.env.MONGODB_DB_NAME || 'insight',
    memoryCollection: process.env.MEMORY_COLLECTION || 'session_memories',
  },
  openrouter: {
    apiKey: process.env.OPENROUTER_API_KEY || '',
    baseUrl: process.env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1',
    requestsPerMinute: parseInt(process.env.LLM_REQUESTS_PER_MINUTE || '50'),
  },
  server: {
    port: parseInt(process.env.PORT || '3002'),
    env: process.env.NODE_ENV || 'development',
  },
  models: {
    reasoning: process.env.REASONING_MODEL || 'openai/gpt-oss-120b',
    planner: process.env.PLANNER_MODEL || 'openai/gpt-oss-120b',
    responder: process.env.RESPONDER_MODEL || 'openai/gpt-oss-120b',
  },
  execution: {
    // Per-call timeouts (ms), independent of the sandbox and the hop ceiling
    llmTimeout: parseInt(process.env.LLM_TIMEOUT || '60000'),
    dbTimeout: parseInt(process.env.DB_TIMEOUT || '10000'),
  },
  graph: {
    maxCorrections: parseInt(process.env.MAX_CORRECTIONS || '3'),
    maxReflections: parseInt(process.env.MAX_REFLECTIONS || '2'),
    maxHops: parseInt(process.env.MAX_HOPS || '30'),
    // Finished runs whose checkpoints stay readable
    retainedRuns: parseInt(process.env.RETAINED_RUNS || '200'),
  },
  sandbox: {
    timeoutMs: parseInt(process.env.SANDBOX_TIMEOUT || '10000'),
    memoryLimitMb: parseInt(process.env.SANDBOX_MEMORY_MB || '128'),
  },
  memory: {
    maxSummaries: parseInt(process.env.MEMORY_MAX_SUMMARIES || '20'),
    maxDatasetRows: parseInt(process.env.MEMORY_MAX_DATASET_ROWS || '5000'),
  },
  retrieval: {
    defaultLimit: parseInt(process.env.RETRIEVAL_DEFAULT_LIMIT || '1000'),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
};

export type AppConfig = typeof config;
