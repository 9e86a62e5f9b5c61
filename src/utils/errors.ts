/**
 * Error taxonomy for the task service.
 *
 * Every error carries an HTTP status and a stable `code` so the Express error
 * handler and the enrichment failure summary can report them without string matching.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500, options?: { cause?: unknown; isOperational?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options?.isOperational ?? true;
  }
}

// Configuration-time errors: a template or its variables are wrong, fix before deploy
export class TemplateNotFoundError extends AppError {
  constructor(readonly templateName: string) {
    super(`Prompt template not found: ${templateName}`, 'TEMPLATE_NOT_FOUND', 500, { isOperational: false });
  }
}

export class MissingVariableError extends AppError {
  constructor(readonly templateName: string, readonly variable: string) {
    super(`Template "${templateName}" is missing variable "${variable}"`, 'MISSING_VARIABLE', 500, {
      isOperational: false,
    });
  }
}

export class MalformedResponseError extends AppError {
  constructor(readonly templateName: string, detail: string, readonly rawResponse: string) {
    super(`Malformed LLM response for "${templateName}": ${detail}`, 'MALFORMED_RESPONSE', 502);
  }
}

/**
 * Raised by an LLM backend. `transient` failures (timeouts, rate limits, 5xx)
 * are retried by the gateway; anything else fails the call immediately.
 */
export class LLMBackendError extends AppError {
  constructor(message: string, readonly transient: boolean, cause?: unknown) {
    super(message, 'LLM_BACKEND_ERROR', 502, { cause });
  }
}

export class LLMUnavailableError extends AppError {
  constructor(readonly templateName: string, readonly attempts: number, cause: unknown) {
    super(
      `LLM unavailable for "${templateName}" after ${attempts} attempt(s): ${cause instanceof Error ? cause.message : String(cause)}`,
      'LLM_UNAVAILABLE',
      503,
      { cause },
    );
  }
}

export class VectorStoreUnavailableError extends AppError {
  constructor(readonly operation: string, readonly attempts: number, cause: unknown) {
    super(
      `Vector store unavailable during ${operation} after ${attempts} attempt(s): ${cause instanceof Error ? cause.message : String(cause)}`,
      'VECTOR_STORE_UNAVAILABLE',
      503,
      { cause },
    );
  }
}

export class AlreadyRunningError extends AppError {
  constructor(readonly taskId: string) {
    super(`Enrichment already running for task ${taskId}`, 'ALREADY_RUNNING', 409);
  }
}

export class VersionConflictError extends AppError {
  constructor(readonly taskId: string, readonly expectedVersion: number) {
    super(`Task ${taskId} is no longer at version ${expectedVersion}`, 'VERSION_CONFLICT', 409);
  }
}

export class NotFoundError extends AppError {
  constructor(readonly resource: string, readonly id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404);
  }
}

export class StageTimeoutError extends AppError {
  constructor(readonly stage: string, readonly timeoutMs: number) {
    super(`Stage "${stage}" did not finish within ${timeoutMs}ms`, 'STAGE_TIMEOUT', 504);
  }
}
