import { describe, it, expect, vi } from 'vitest';
import { LLMGateway, LLMGatewayOptions, extractJSON } from '../llm-gateway.service';
import { PromptTemplateStore } from '../prompt-templates';
import { CompletionRequest } from '../claude.service';
import {
  LLMBackendError,
  LLMUnavailableError,
  MalformedResponseError,
  MissingVariableError,
  TemplateNotFoundError,
} from '../../../utils/errors';
import { createMockLogger } from '../../../__tests__/helpers/fakes';

const OPTIONS: LLMGatewayOptions = {
  maxAttempts: 3,
  backoffBaseMs: 100,
  backoffCapMs: 250,
  timeoutMs: 1000,
};

const VARIABLES = { description: 'Prepare Q3 finance report', categories: 'work, finance' };

function createGateway(reply: string, options: Partial<LLMGatewayOptions> = {}, templates = new PromptTemplateStore()) {
  const complete = vi.fn(async (_request: CompletionRequest): Promise<string> => reply);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const gateway = new LLMGateway({ complete }, templates, { ...OPTIONS, ...options }, createMockLogger(), sleep);
  return { gateway, complete, sleep };
}

describe('LLMGateway', () => {
  describe('parsing', () => {
    it('parses a classification from a fenced JSON block', async () => {
      const { gateway, complete } = createGateway('```json\n{"category": "Finance", "confidence": 0.8}\n```');

      const result = await gateway.invoke('classify_task', VARIABLES);

      expect(result).toEqual({
        kind: 'classification',
        label: 'finance',
        confidence: 0.8,
        raw: '```json\n{"category": "Finance", "confidence": 0.8}\n```',
      });
      expect(complete).toHaveBeenCalledTimes(1);
      expect(complete.mock.calls[0][0].systemPrompt).toBe('You classify personal and work tasks. Return only valid JSON.');
      expect(complete.mock.calls[0][0].prompt).toContain('**Task:** Prepare Q3 finance report');
    });

    it('parses whole minutes with no confidence', async () => {
      const { gateway } = createGateway('Sure! {"estimated_minutes": 45}');

      const result = await gateway.invoke('estimate_time', VARIABLES);

      expect(result.kind).toBe('time_estimate');
      expect(result.minutes).toBe(45);
      expect(result.confidence).toBeNull();
    });

    it('parses a priority enum value', async () => {
      const { gateway } = createGateway('{"priority": "urgent", "confidence": 1}');

      const result = await gateway.invoke('recommend_priority', VARIABLES);

      expect(result.priority).toBe('urgent');
      expect(result.confidence).toBe(1);
    });

    it.each([
      ['a numeric string', '{"estimated_minutes": "45"}'],
      ['prose in the field', '{"estimated_minutes": "about an hour"}'],
      ['a negative number', '{"estimated_minutes": -5}'],
      ['a fraction', '{"estimated_minutes": 1.5}'],
      ['a missing field', '{"minutes": 30}'],
    ])('rejects %s as malformed without retrying', async (_label, reply) => {
      const { gateway, complete } = createGateway(reply);

      await expect(gateway.invoke('estimate_time', VARIABLES)).rejects.toBeInstanceOf(MalformedResponseError);
      expect(complete).toHaveBeenCalledTimes(1);
    });

    it('rejects a priority outside the enum', async () => {
      const { gateway } = createGateway('{"priority": "critical"}');

      await expect(gateway.invoke('recommend_priority', VARIABLES)).rejects.toMatchObject({
        code: 'MALFORMED_RESPONSE',
        rawResponse: '{"priority": "critical"}',
      });
    });

    it('rejects replies that are not JSON', async () => {
      const { gateway } = createGateway('I think this is high priority');

      await expect(gateway.invoke('recommend_priority', VARIABLES)).rejects.toThrow(
        'Malformed LLM response for "recommend_priority": response was not valid JSON'
      );
    });
  });

  describe('templates', () => {
    it('fails before calling the backend when the template is unknown', async () => {
      const { gateway, complete } = createGateway('{}', {}, new PromptTemplateStore([]));

      await expect(gateway.invoke('classify_task', VARIABLES)).rejects.toBeInstanceOf(TemplateNotFoundError);
      expect(complete).not.toHaveBeenCalled();
    });

    it('fails before calling the backend when a variable is missing', async () => {
      const { gateway, complete } = createGateway('{}');

      await expect(gateway.invoke('classify_task', { description: 'x' })).rejects.toBeInstanceOf(MissingVariableError);
      expect(complete).not.toHaveBeenCalled();
    });
  });

  describe('retry policy', () => {
    it('makes exactly maxAttempts calls against a backend that always times out', async () => {
      const { gateway, complete, sleep } = createGateway('', { timeoutMs: 20 });
      complete.mockImplementation(() => new Promise<string>(() => undefined));

      const promise = gateway.invoke('estimate_time', VARIABLES);

      await expect(promise).rejects.toBeInstanceOf(LLMUnavailableError);
      await expect(promise).rejects.toMatchObject({ attempts: 3, code: 'LLM_UNAVAILABLE' });
      expect(complete).toHaveBeenCalledTimes(3);

      const delays = sleep.mock.calls.map(([ms]) => ms);
      expect(delays).toEqual([100, 200]);
      expect(complete.mock.calls[0][0].signal?.aborted).toBe(true);
    });

    it('carries the last underlying cause', async () => {
      const { gateway, complete } = createGateway('');
      complete.mockRejectedValue(new LLMBackendError('rate limited', true));

      const error = await gateway.invoke('classify_task', VARIABLES).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LLMUnavailableError);
      expect(error instanceof LLMUnavailableError && error.cause).toBeInstanceOf(LLMBackendError);
      expect(error instanceof Error && error.message).toBe(
        'LLM unavailable for "classify_task" after 3 attempt(s): rate limited'
      );
    });

    it('caps the backoff delay', async () => {
      const { gateway, complete, sleep } = createGateway('', { maxAttempts: 5 });
      complete.mockRejectedValue(new LLMBackendError('503', true));

      await expect(gateway.invoke('classify_task', VARIABLES)).rejects.toBeInstanceOf(LLMUnavailableError);

      expect(complete).toHaveBeenCalledTimes(5);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 250, 250]);
    });

    it('recovers when a transient failure is followed by a good reply', async () => {
      const { gateway, complete, sleep } = createGateway('{"category": "work"}');
      complete.mockRejectedValueOnce(new LLMBackendError('rate limited', true));

      const result = await gateway.invoke('classify_task', VARIABLES);

      expect(result.label).toBe('work');
      expect(complete).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('does not retry non-transient backend errors', async () => {
      const { gateway, complete, sleep } = createGateway('');
      complete.mockRejectedValue(new LLMBackendError('invalid api key', false));

      await expect(gateway.invoke('classify_task', VARIABLES)).rejects.toMatchObject({ attempts: 1 });
      expect(complete).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('keeps no state between invocations', async () => {
      const { gateway, complete } = createGateway('{"category": "work"}');

      await gateway.invoke('classify_task', VARIABLES);
      await gateway.invoke('classify_task', { ...VARIABLES, description: 'Book dentist' });

      expect(complete.mock.calls[1][0].prompt).toContain('**Task:** Book dentist');
      expect(complete.mock.calls[1][0].prompt).not.toContain('Prepare Q3 finance report');
    });
  });
});

describe('extractJSON', () => {
  it('prefers a fenced block over surrounding braces', () => {
    expect(extractJSON('t', 'note {x}\n```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('falls back to the outermost object', () => {
    expect(extractJSON('t', 'Here you go: {"a": {"b": 2}} thanks')).toEqual({ a: { b: 2 } });
  });
});
