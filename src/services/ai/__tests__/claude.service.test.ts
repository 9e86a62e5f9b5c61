import { describe, it, expect } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { toBackendError } from '../claude.service';
import { LLMBackendError } from '../../../utils/errors';

describe('toBackendError', () => {
  it('treats connection timeouts as transient', () => {
    const error = toBackendError(new Anthropic.APIConnectionTimeoutError());

    expect(error.transient).toBe(true);
    expect(error.cause).toBeInstanceOf(Anthropic.APIConnectionTimeoutError);
  });

  it.each([
    [429, true],
    [500, true],
    [529, true],
    [400, false],
    [401, false],
  ])('maps HTTP %i to transient=%s', (status, transient) => {
    const error = toBackendError(Anthropic.APIError.generate(status, undefined, 'upstream said no', undefined));

    expect(error.transient).toBe(transient);
    expect(error.message).toContain(`Claude API error ${status}`);
  });

  it('treats aborted requests as transient', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';

    expect(toBackendError(abort).transient).toBe(true);
  });

  it('treats unknown failures as permanent', () => {
    const error = toBackendError(new TypeError('bad input'));

    expect(error.transient).toBe(false);
    expect(error.message).toBe('Claude request failed: bad input');
  });

  it('passes backend errors through unchanged', () => {
    const original = new LLMBackendError('No text content in Claude response', false);

    expect(toBackendError(original)).toBe(original);
  });
});
