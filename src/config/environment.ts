import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform(value => value === 'true');

const EnvironmentSchema = z.object({
  OPENAI_API_KEY: z.string().default(''),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  AGENT_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MAX_TURNS: z.coerce.number().int().positive().default(10),
  HISTORY_LIMIT: z.coerce.number().int().nonnegative().default(10),
  PORT: z.coerce.number().int().positive().default(8000),

  DATABASE_ADAPTER: z.enum(['file', 'postgres']).default('file'),
  SUPPORT_DB_FILE: z.string().min(1).default('./data/support-db.json'),
  DATABASE_URL: z.string().optional(),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_DATABASE: z.string().default('ai_agent'),
  POSTGRES_USERNAME: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().optional(),
  POSTGRES_SSL: booleanFlag,

  DOCUMENTS_DIR: z.string().min(1).default('./documents'),
  KNOWLEDGE_BASE_DIR: z.string().min(1).default('./data/knowledge-base'),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),

  EMBEDDING_PROVIDER: z.enum(['openai', 'azure']).default('openai'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  AZURE_OPENAI_ENDPOINT: z.string().optional(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().default('2023-05-15'),

  STATE_PERSISTENCE_DIR: z.string().min(1).default('./data/pending-turns'),
  STATE_MAX_AGE: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000)
})
  .refine(env => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP']
  })
  .refine(env => env.EMBEDDING_PROVIDER !== 'azure' || (!!env.AZURE_OPENAI_ENDPOINT && !!env.AZURE_OPENAI_API_KEY), {
    message: 'AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_API_KEY are required for the azure embedding provider',
    path: ['EMBEDDING_PROVIDER']
  });

export interface EnvironmentConfig {
  openaiApiKey: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  agentModel: string;
  maxTurns: number;
  historyLimit: number;
  port: number;
  database: {
    adapter: 'file' | 'postgres';
    filePath: string;
    postgres: {
      connectionString?: string;
      host: string;
      port: number;
      database: string;
      username: string;
      password?: string;
      ssl: boolean;
    };
  };
  knowledgeBase: {
    documentsDir: string;
    persistDir: string;
    chunkSize: number;
    chunkOverlap: number;
    topK: number;
  };
  embeddings: {
    provider: 'openai' | 'azure';
    model: string;
    azureEndpoint?: string;
    azureApiKey?: string;
    azureApiVersion: string;
  };
  pendingTurns: {
    dataDir: string;
    maxAge: number;
  };
}

/**
 * Read and validate configuration from environment variables.
 * Empty strings are treated as unset so `.env` placeholders fall back to defaults.
 */
export const loadEnvironment = (env: NodeJS.ProcessEnv = process.env): EnvironmentConfig => {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const result = EnvironmentSchema.safeParse(raw);
  if (!result.success) {
    const errorMessages = result.error.errors
      .map(err => `${err.path.join('.')}: ${err.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  const parsed = result.data;
  return {
    openaiApiKey: parsed.OPENAI_API_KEY,
    logLevel: parsed.LOG_LEVEL,
    agentModel: parsed.AGENT_MODEL,
    maxTurns: parsed.MAX_TURNS,
    historyLimit: parsed.HISTORY_LIMIT,
    port: parsed.PORT,
    database: {
      adapter: parsed.DATABASE_ADAPTER,
      filePath: parsed.SUPPORT_DB_FILE,
      postgres: {
        connectionString: parsed.DATABASE_URL,
        host: parsed.POSTGRES_HOST,
        port: parsed.POSTGRES_PORT,
        database: parsed.POSTGRES_DATABASE,
        username: parsed.POSTGRES_USERNAME,
        password: parsed.POSTGRES_PASSWORD,
        ssl: parsed.POSTGRES_SSL
      }
    },
    knowledgeBase: {
      documentsDir: parsed.DOCUMENTS_DIR,
      persistDir: parsed.KNOWLEDGE_BASE_DIR,
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
      topK: parsed.RETRIEVAL_TOP_K
    },
    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      azureEndpoint: parsed.AZURE_OPENAI_ENDPOINT,
      azureApiKey: parsed.AZURE_OPENAI_API_KEY,
      azureApiVersion: parsed.AZURE_OPENAI_API_VERSION
    },
    pendingTurns: {
      dataDir: parsed.STATE_PERSISTENCE_DIR,
      maxAge: parsed.STATE_MAX_AGE
    }
  };
};

/**
 * Fails fast when the agent is about to run without model credentials.
 */
export const assertAgentCredentials = (config: EnvironmentConfig): void => {
  if (!config.openaiApiKey) {
    throw new Error('OPENAI_API_KEY environment variable is required');
  }
};
