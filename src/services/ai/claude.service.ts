import Anthropic from '@anthropic-ai/sdk';
import { LLMBackendError } from '../../utils/errors';

export interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * A language-model backend the gateway can send a rendered prompt to.
 * Implementations throw LLMBackendError, flagging whether a retry may help.
 */
export interface LLMBackend {
  complete(request: CompletionRequest): Promise<string>;
}

export interface ClaudeServiceOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class ClaudeService implements LLMBackend {
  private client: Anthropic;

  constructor(private readonly options: ClaudeServiceOptions, client?: Anthropic) {
    this.client =
      client ??
      new Anthropic({
        apiKey: options.apiKey,
        // retries are owned by the gateway
        maxRetries: 0,
        timeout: options.timeoutMs,
      });
  }

  /**
   * Complete a prompt using Claude
   */
  async complete({ prompt, systemPrompt, maxTokens = 1024, signal }: CompletionRequest): Promise<string> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: maxTokens,
          system: systemPrompt,
          messages: [
            {
              role: 'user',
              content: prompt,
            },
          ],
        },
        { signal },
      );
    } catch (error) {
      throw toBackendError(error);
    }

    const textContent = response.content.find((block): block is Anthropic.TextBlock => block.type === 'text');
    if (!textContent) {
      throw new LLMBackendError('No text content in Claude response', false);
    }

    return textContent.text;
  }
}

/**
 * Map Anthropic SDK failures onto the retry taxonomy:
 * connection problems, timeouts, 429 and 5xx are transient; other API errors are not.
 */
export function toBackendError(error: unknown): LLMBackendError {
  if (error instanceof LLMBackendError) return error;

  if (error instanceof Anthropic.APIConnectionError) {
    // includes APIConnectionTimeoutError
    return new LLMBackendError(`Claude connection failed: ${error.message}`, true, error);
  }

  if (error instanceof Anthropic.APIError) {
    const status = error.status ?? 0;
    const transient = status === 408 || status === 429 || status >= 500;
    return new LLMBackendError(`Claude API error ${status}: ${error.message}`, transient, error);
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return new LLMBackendError('Claude request aborted', true, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new LLMBackendError(`Claude request failed: ${message}`, false, error);
}
