import { config } from '../config';
import { pool, vectorPool } from '../config/database';
import { InMemoryVectorStore, PgVectorStore, VectorStore } from '../repositories/embedding.repository';
import { TaskRepository } from '../repositories/task.repository';
import { ClaudeService } from './ai/claude.service';
import { EmbeddingStoreAdapter } from './ai/embedding-store.service';
import { EmbeddingProvider, HashedEmbeddingProvider, OpenAIEmbeddingProvider } from './ai/embeddings.service';
import { DEFAULT_CATEGORIES, EnrichmentService } from './ai/enrichment.service';
import { LLMGateway } from './ai/llm-gateway.service';
import { PromptTemplateStore } from './ai/prompt-templates';

// Application wiring: every collaborator is built here from config and passed in explicitly.

function createEmbeddingProvider(): EmbeddingProvider {
  if (config.embedding.provider === 'openai') {
    return new OpenAIEmbeddingProvider({
      apiKey: config.embedding.openaiApiKey,
      model: config.embedding.model,
      dimension: config.embedding.dimension,
    });
  }
  return new HashedEmbeddingProvider(config.embedding.dimension);
}

function createVectorStore(): VectorStore {
  return config.vector.backend === 'memory' ? new InMemoryVectorStore() : new PgVectorStore(vectorPool);
}

export const taskRepository = new TaskRepository(pool);

export const promptTemplates = new PromptTemplateStore();

export const claudeService = new ClaudeService({
  apiKey: config.anthropic.apiKey,
  model: config.anthropic.model,
  timeoutMs: config.llm.timeoutMs,
});

export const llmGateway = new LLMGateway(claudeService, promptTemplates, config.llm);

export const embeddingStore = new EmbeddingStoreAdapter(createEmbeddingProvider(), createVectorStore(), {
  maxAttempts: config.vector.maxAttempts,
  backoffBaseMs: config.llm.backoffBaseMs,
  backoffCapMs: config.llm.backoffCapMs,
});

export const enrichmentService = new EnrichmentService(taskRepository, llmGateway, embeddingStore, {
  stages: config.enrichment.stages,
  joinTimeoutMs: config.enrichment.joinTimeoutMs,
  claimLeaseMs: config.enrichment.claimLeaseMs,
  categories: DEFAULT_CATEGORIES,
});
