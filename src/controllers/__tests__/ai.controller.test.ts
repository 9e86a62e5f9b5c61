import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { AIController } from '../ai.controller';
import { createAIRouter } from '../../routes/ai.routes';
import { LLMGateway } from '../../services/ai/llm-gateway.service';
import { PromptTemplateStore } from '../../services/ai/prompt-templates';
import { ScriptedBackend, createMockLogger } from '../../__tests__/helpers/fakes';

function setup(priorityReply: string) {
  const backend = new ScriptedBackend({
    classify: '{"category": "Errands", "confidence": 0.6}',
    estimate: '{"estimated_minutes": 15}',
    priority: priorityReply,
  });
  const gateway = new LLMGateway(
    backend,
    new PromptTemplateStore(),
    { maxAttempts: 1, backoffBaseMs: 1, backoffCapMs: 1, timeoutMs: 1000 },
    createMockLogger(),
    async (_ms: number) => undefined,
  );

  const app = express();
  app.use(express.json());
  app.use('/api/ai', createAIRouter(new AIController(gateway, ['errands', 'work'])));

  return { app, backend };
}

describe('ai routes', () => {
  it('recommends a priority for a raw description', async () => {
    const { app, backend } = setup('{"priority": "low", "confidence": 0.4}');

    const response = await request(app).post('/api/ai/recommend-priority').send({ description: 'Buy stamps' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ priority: 'low', confidence: 0.4 });
    expect(backend.requests[0].prompt).toContain('**Task:** Buy stamps');
  });

  it('rejects a request without a description', async () => {
    const { app, backend } = setup('{"priority": "low"}');

    const response = await request(app).post('/api/ai/recommend-priority').send({});

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Description is required' });
    expect(backend.requests).toHaveLength(0);
  });

  it('answers 502 with the code when the model reply does not parse', async () => {
    const { app } = setup('{"priority": "asap"}');

    const response = await request(app).post('/api/ai/recommend-priority').send({ description: 'Buy stamps' });

    expect(response.status).toBe(502);
    expect(response.body.code).toBe('MALFORMED_RESPONSE');
  });

  it('lowercases the classification label', async () => {
    const { app } = setup('{"priority": "low"}');

    const response = await request(app).post('/api/ai/classify').send({ description: 'Buy stamps' });

    expect(response.body).toEqual({ category: 'errands', confidence: 0.6 });
  });
});
