import { z } from 'zod';
import { PRIORITIES, Priority } from '../../types/task.types';
import {
  LLMBackendError,
  LLMUnavailableError,
  MalformedResponseError,
} from '../../utils/errors';
import { Logger, createLogger, errorMessage } from '../../utils/logger';
import { BackoffPolicy, RetryExhaustedError, Sleep, retryWithBackoff, withTimeout } from '../../utils/retry';
import { LLMBackend } from './claude.service';
import { PromptTemplateStore, TemplateName, TemplateVariables } from './prompt-templates';

export interface ClassificationResult {
  kind: 'classification';
  label: string;
  confidence: number | null;
  raw: string;
}

export interface TimeEstimateResult {
  kind: 'time_estimate';
  minutes: number;
  confidence: number | null;
  raw: string;
}

export interface PriorityResult {
  kind: 'priority';
  priority: Priority;
  confidence: number | null;
  raw: string;
}

export interface ResultByTemplate {
  classify_task: ClassificationResult;
  estimate_time: TimeEstimateResult;
  recommend_priority: PriorityResult;
}

export type StructuredResult = ResultByTemplate[TemplateName];

export interface LLMGatewayOptions extends BackoffPolicy {
  timeoutMs: number;
}

const confidence = z.number().min(0).max(1).nullish();

// Strict shapes: no defaults, no coercion from prose
const classificationSchema = z.object({
  category: z.string().trim().min(1).max(64),
  confidence,
});

const timeEstimateSchema = z.object({
  estimated_minutes: z.number().int().nonnegative(),
  confidence,
});

const prioritySchema = z.object({
  priority: z.enum(PRIORITIES),
  confidence,
});

type Parser<K extends TemplateName> = (payload: unknown, raw: string) => ResultByTemplate[K];

function fromSchema<S extends z.ZodTypeAny, K extends TemplateName>(
  name: K,
  schema: S,
  build: (data: z.infer<S>, raw: string) => ResultByTemplate[K],
): Parser<K> {
  return (payload, raw) => {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || 'response'}: ${issue.message}` : 'shape mismatch';
      throw new MalformedResponseError(name, detail, raw);
    }
    return build(parsed.data, raw);
  };
}

const PARSERS: { [K in TemplateName]: Parser<K> } = {
  classify_task: fromSchema('classify_task', classificationSchema, (data, raw) => ({
    kind: 'classification',
    label: data.category.toLowerCase(),
    confidence: data.confidence ?? null,
    raw,
  })),
  estimate_time: fromSchema('estimate_time', timeEstimateSchema, (data, raw) => ({
    kind: 'time_estimate',
    minutes: data.estimated_minutes,
    confidence: data.confidence ?? null,
    raw,
  })),
  recommend_priority: fromSchema('recommend_priority', prioritySchema, (data, raw) => ({
    kind: 'priority',
    priority: data.priority,
    confidence: data.confidence ?? null,
    raw,
  })),
};

/**
 * Extract the JSON payload from a model reply (handles fenced ```json blocks).
 */
export function extractJSON(templateName: string, response: string): unknown {
  const jsonMatch = response.match(/```(?:json)?\s*\n([\s\S]*?)\n\s*```/) || response.match(/{[\s\S]*}/);
  const jsonString = jsonMatch ? jsonMatch[1] ?? jsonMatch[0] : response;

  try {
    return JSON.parse(jsonString);
  } catch {
    throw new MalformedResponseError(templateName, 'response was not valid JSON', response);
  }
}

/**
 * Sends rendered prompts to the LLM backend and parses the reply into the shape
 * expected for each template. Every invocation is independent: no conversation state
 * is carried between calls.
 */
export class LLMGateway {
  constructor(
    private readonly backend: LLMBackend,
    private readonly templates: PromptTemplateStore,
    private readonly options: LLMGatewayOptions,
    private readonly logger: Logger = createLogger('llm-gateway'),
    private readonly sleep?: Sleep,
  ) {}

  async invoke<K extends TemplateName>(name: K, variables: TemplateVariables): Promise<ResultByTemplate[K]> {
    // Template errors are configuration errors; they surface before any backend call
    const template = this.templates.get(name);
    const prompt = this.templates.render(name, variables);

    let raw: string;
    try {
      raw = await retryWithBackoff(
        () => this.callOnce(prompt, template.system, template.maxTokens),
        {
          maxAttempts: this.options.maxAttempts,
          backoffBaseMs: this.options.backoffBaseMs,
          backoffCapMs: this.options.backoffCapMs,
          isRetryable: (error) => error instanceof LLMBackendError && error.transient,
          sleep: this.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger.warn(`${name} attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              error: errorMessage(error),
            });
          },
        },
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        this.logger.error(`${name} gave up`, { attempts: error.attempts, error: errorMessage(error.lastError) });
        throw new LLMUnavailableError(name, error.attempts, error.lastError);
      }
      throw error;
    }

    const result = PARSERS[name](extractJSON(name, raw), raw);
    this.logger.debug(`${name} parsed`, { kind: result.kind });
    return result;
  }

  private callOnce(prompt: string, systemPrompt: string, maxTokens: number): Promise<string> {
    const controller = new AbortController();
    return withTimeout(
      this.backend.complete({ prompt, systemPrompt, maxTokens, signal: controller.signal }),
      this.options.timeoutMs,
      () => {
        controller.abort();
        return new LLMBackendError(`LLM request timed out after ${this.options.timeoutMs}ms`, true);
      },
    );
  }
}
