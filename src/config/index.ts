import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function flagFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(raw.toLowerCase());
}

export type EmbeddingProviderName = 'hashed' | 'openai';
export type VectorBackendName = 'pgvector' | 'memory';

function embeddingProviderFromEnv(): EmbeddingProviderName {
  return process.env.EMBEDDING_PROVIDER === 'openai' ? 'openai' : 'hashed';
}

function vectorBackendFromEnv(): VectorBackendName {
  return process.env.VECTOR_BACKEND === 'memory' ? 'memory' : 'pgvector';
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),

  // Database
  databaseUrl: process.env.DATABASE_URL || '',

  // Redis
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',

  // Anthropic Claude
  anthropic: {
    apiKey: process.env.ANTHROPIC_API_KEY || '',
    model: process.env.ANTHROPIC_MODEL || 'claude-sonnet-4-5-20250929',
  },

  // LLM gateway retry policy
  llm: {
    maxAttempts: intFromEnv('LLM_MAX_ATTEMPTS', 3),
    backoffBaseMs: intFromEnv('LLM_BACKOFF_BASE_MS', 500),
    backoffCapMs: intFromEnv('LLM_BACKOFF_CAP_MS', 8000),
    timeoutMs: intFromEnv('LLM_TIMEOUT_MS', 30000),
  },

  // Embeddings + vector index
  embedding: {
    provider: embeddingProviderFromEnv(),
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
    dimension: intFromEnv('EMBEDDING_DIMENSION', 1536), // text-embedding-3-small
  },
  vector: {
    backend: vectorBackendFromEnv(),
    databaseUrl: process.env.VECTOR_DATABASE_URL || process.env.DATABASE_URL || '',
    maxAttempts: intFromEnv('VECTOR_MAX_ATTEMPTS', 3),
  },

  // Enrichment pipeline
  enrichment: {
    stages: {
      classify: flagFromEnv('ENRICH_CLASSIFY', true),
      estimate: flagFromEnv('ENRICH_ESTIMATE', true),
      priority: flagFromEnv('ENRICH_PRIORITY', true),
    },
    joinTimeoutMs: intFromEnv('ENRICH_JOIN_TIMEOUT_MS', 120000),
    // join timeout plus headroom for the claim and the merge write
    claimLeaseMs: intFromEnv('ENRICH_CLAIM_LEASE_MS', 180000),
    reconcileCron: process.env.RECONCILE_CRON || '*/30 * * * *',
  },

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
};

export type AppConfig = typeof config;

// Validation: Check required env vars
export function validateConfig() {
  const required = ['DATABASE_URL', 'ANTHROPIC_API_KEY'];
  if (config.embedding.provider === 'openai') required.push('OPENAI_API_KEY');

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    console.error('❌ Missing required environment variables:', missing.join(', '));
    console.error('Please check your .env file');
    process.exit(1);
  }

  console.log('✓ All required environment variables are set');
}

export default config;
