/**
 * Pipeline error taxonomy
 *
 * Every failure that can end a generation run is one of these classes, so the
 * run driver maps it to a terminal job message without inspecting text.
 */

export type PipelineErrorKind =
  | 'configuration'
  | 'rate_limited'
  | 'transient'
  | 'validation'
  | 'post_processing'
  | 'fatal';

export const RATE_LIMIT_MESSAGE =
  'The AI provider is rate limiting requests. Try again later or switch provider, and avoid starting several generation runs at once.';

export const INVALID_RESPONSE_MESSAGE =
  'AI service returned an invalid response (empty or not JSON). Check the base URL, the model name and network connectivity, and confirm the service speaks the OpenAI-compatible API.';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: PipelineErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.details = details;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('configuration', message, details);
    this.name = 'ConfigurationError';
  }
}

export class LLMRateLimitError extends PipelineError {
  constructor(details?: Record<string, unknown>) {
    super('rate_limited', RATE_LIMIT_MESSAGE, details);
    this.name = 'LLMRateLimitError';
  }
}

export class LLMCallError extends PipelineError {
  readonly attempts: number;

  constructor(message: string, attempts: number, kind: 'transient' | 'fatal' = 'transient') {
    super(kind, message, { attempts });
    this.name = 'LLMCallError';
    this.attempts = attempts;
  }
}

/**
 * Expected malformed model output (bad JSON, wrong shape). The LLM adapter retries these.
 */
export class ResponseFormatError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('transient', message, details);
    this.name = 'ResponseFormatError';
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('validation', message, details);
    this.name = 'ValidationError';
  }
}

export class PostProcessingError extends PipelineError {
  readonly output: string;

  constructor(output: string, exitCode: number | null) {
    super('post_processing', output, { exitCode });
    this.name = 'PostProcessingError';
    this.output = output;
  }
}

/**
 * Errors raised by Node's own modules come from another realm under some test
 * runners, so these helpers read the error's shape instead of its prototype.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  const wrapped = new Error(errorMessage(error));
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    wrapped.name = error.name;
  }
  return wrapped;
}
