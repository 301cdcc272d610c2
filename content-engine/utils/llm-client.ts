/**
 * LLM Client Integration
 *
 * Chat-completion client shared by every generation pipeline:
 * - Typed failure classification (rate limited / transient / fatal)
 * - Linear-backoff retries through the retry policy manager
 * - Caller-signalled format errors (bad JSON) retried like transient failures
 * - Streaming deltas for the chat boundary
 */

import OpenAI from 'openai';
import { RetryPolicyManager, retryPolicyManager, RetryDecision } from '../../server/resilience/retry-policies.js';
import {
  INVALID_RESPONSE_MESSAGE,
  LLMCallError,
  LLMRateLimitError,
  ResponseFormatError,
  toError
} from './errors.js';
import { Logger, maskSecret, silentLogger } from './logger.js';
import { isRecord } from './result.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
}

/**
 * Wire boundary to a chat-completion service. `complete` resolves null when the
 * service answers without any completion choice.
 */
export interface ChatCompletionTransport {
  complete(request: ChatRequest): Promise<string | null>;
  stream(request: ChatRequest): AsyncIterable<string>;
}

export interface LLMCredentials {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export type LLMErrorClass = 'RateLimited' | 'Transient' | 'Fatal';

export interface PromptOptions {
  model?: string;
  temperature?: number;
  operation?: string;
}

export interface LLMClientConfig {
  model: string;
  maxAttempts: number;
  backoffStepMs: number;
  timeoutMs: number;
}

/**
 * Sampling temperatures used by the pipelines
 */
export const LLM_TEMPERATURES = {
  content: 0.7,
  timeReallocation: 0.3,
  extraction: 0.2
} as const;

export const DEFAULT_LLM_CONFIG: LLMClientConfig = {
  model: process.env.LLM_MODEL || 'gpt-4o-mini',
  maxAttempts: 3,
  backoffStepMs: 1500,
  timeoutMs: 600000
};

/**
 * Shown to the chat user when the provider closes the stream without any delta
 */
export const EMPTY_STREAM_MESSAGE =
  '[The AI service returned no content. Check the API key, base URL and model name, then try again.]';

const FATAL_STATUS_CODES = new Set([400, 401, 403, 404, 422]);
const RATE_LIMIT_VOCABULARY = ['rate limit', 'too many requests', '429'];

/**
 * Ensure an OpenAI-compatible base URL ends in /v1
 */
export function normalizeBaseUrl(baseUrl: string): string {
  if (!baseUrl) return baseUrl;
  const trimmed = baseUrl.trim().replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

function statusOf(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.status_code === 'number') return error.status_code;
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') return response.status;
  return undefined;
}

function errorText(error: unknown): string {
  const parts: string[] = [];
  if (error instanceof Error) {
    parts.push(error.name, error.message);
  } else {
    parts.push(String(error));
  }
  if (isRecord(error) && error.error !== undefined) {
    parts.push(JSON.stringify(error.error));
  }
  return parts.filter(Boolean).join(' ');
}

/**
 * Classify a failed chat call. Typed SDK errors and HTTP status decide first;
 * the vocabulary match is a fallback for providers that only put it in the text.
 */
export function classifyLLMError(error: unknown): LLMErrorClass {
  if (error instanceof LLMRateLimitError || error instanceof OpenAI.RateLimitError) {
    return 'RateLimited';
  }

  const status = statusOf(error);
  if (status === 429) return 'RateLimited';
  if (status !== undefined && FATAL_STATUS_CODES.has(status)) return 'Fatal';

  const text = errorText(error).toLowerCase();
  if (RATE_LIMIT_VOCABULARY.some(term => text.includes(term))) {
    return 'RateLimited';
  }

  return 'Transient';
}

export function isRateLimitError(error: unknown): boolean {
  return classifyLLMError(error) === 'RateLimited';
}

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

function toOpenAIMessage(message: ChatMessage): OpenAIMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

/**
 * Transport backed by the official openai SDK
 */
export class OpenAITransport implements ChatCompletionTransport {
  private openai: OpenAI;

  constructor(credentials: Pick<LLMCredentials, 'apiKey' | 'baseUrl'>, timeoutMs: number = DEFAULT_LLM_CONFIG.timeoutMs) {
    this.openai = new OpenAI({
      apiKey: credentials.apiKey,
      baseURL: normalizeBaseUrl(credentials.baseUrl),
      timeout: timeoutMs,
      maxRetries: 0
    });
  }

  async complete(request: ChatRequest): Promise<string | null> {
    const response = await this.openai.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature
    });

    const choice = response.choices[0];
    if (!choice) return null;
    return choice.message.content ?? '';
  }

  async *stream(request: ChatRequest): AsyncIterable<string> {
    const stream = await this.openai.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature,
      stream: true
    });

    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta?.content;
      if (delta) yield delta;
    }
  }
}

/**
 * LLM client with retry and error classification
 */
export class LLMClient {
  private transport: ChatCompletionTransport;
  private retryManager: RetryPolicyManager;
  private config: LLMClientConfig;
  private logger: Logger;

  constructor(
    transport: ChatCompletionTransport,
    config: Partial<LLMClientConfig> = {},
    retryManager: RetryPolicyManager = retryPolicyManager,
    logger?: Logger
  ) {
    this.transport = transport;
    this.config = { ...DEFAULT_LLM_CONFIG, ...config };
    this.retryManager = retryManager;
    this.logger = logger || silentLogger;
  }

  static fromCredentials(
    credentials: LLMCredentials,
    config: Partial<LLMClientConfig> = {},
    logger?: Logger
  ): LLMClient {
    logger?.('info', 'Creating LLM client', {
      model: credentials.model,
      baseUrl: normalizeBaseUrl(credentials.baseUrl),
      apiKey: maskSecret(credentials.apiKey)
    });
    const transport = new OpenAITransport(credentials, config.timeoutMs);
    return new LLMClient(transport, { ...config, model: credentials.model }, retryPolicyManager, logger);
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Send one system/user pair and return the trimmed completion text.
   * No completion choice yields an empty string.
   */
  async runPrompt(systemPrompt: string, userPrompt: string, options: PromptOptions = {}): Promise<string> {
    return this.runStructured(systemPrompt, userPrompt, text => text, options);
  }

  /**
   * Like runPrompt, but feeds the text to `parse`. A ResponseFormatError thrown
   * by `parse` consumes an attempt and is retried like a transient failure.
   */
  async runStructured<T>(
    systemPrompt: string,
    userPrompt: string,
    parse: (text: string) => T,
    options: PromptOptions = {}
  ): Promise<T> {
    const operation = options.operation || 'run-prompt';
    const request: ChatRequest = {
      model: options.model || this.config.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt }
      ],
      temperature: options.temperature ?? LLM_TEMPERATURES.content
    };

    const result = await this.retryManager.executeWithRetry(
      async attempt => {
        this.logger('debug', 'Sending chat completion', { operation, attempt, model: request.model });
        const content = await this.transport.complete(request);
        return parse((content ?? '').trim());
      },
      'llm-request',
      operation,
      {
        maxAttempts: this.config.maxAttempts,
        initialDelayMs: this.config.backoffStepMs,
        classify: error => this.retryDecision(error)
      }
    );

    if (result.success && result.result !== undefined) {
      return result.result;
    }

    const lastError = result.error || new Error('unknown error');
    throw this.toCallError(lastError, result.attempts, operation);
  }

  /**
   * Stream completion deltas for a multi-turn conversation
   */
  async *streamChat(messages: ChatMessage[], options: PromptOptions = {}): AsyncGenerator<string> {
    const request: ChatRequest = {
      model: options.model || this.config.model,
      messages,
      temperature: options.temperature
    };

    let received = false;
    try {
      for await (const delta of this.transport.stream(request)) {
        received = true;
        yield delta;
      }
    } catch (error) {
      throw this.toCallError(toError(error), 1, 'stream-chat');
    }

    if (!received) {
      this.logger('warn', 'Chat stream ended without content', { model: request.model });
      yield EMPTY_STREAM_MESSAGE;
    }
  }

  private retryDecision(error: Error): RetryDecision {
    if (error instanceof ResponseFormatError) return 'retry';
    return classifyLLMError(error) === 'Transient' ? 'retry' : 'abort';
  }

  private toCallError(error: Error, attempts: number, operation: string): Error {
    if (error instanceof ResponseFormatError) {
      this.logger('warn', 'AI response could not be parsed', { operation, attempts, reason: error.message });
      return new LLMCallError(INVALID_RESPONSE_MESSAGE, attempts);
    }

    const classification = classifyLLMError(error);
    this.logger('error', 'LLM call failed', { operation, attempts, classification, error: error.message });

    if (classification === 'RateLimited') {
      return new LLMRateLimitError({ attempts, operation });
    }
    return new LLMCallError(
      `LLM call failed: ${error.message}`,
      attempts,
      classification === 'Fatal' ? 'fatal' : 'transient'
    );
  }
}
