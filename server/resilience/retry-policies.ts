/**
 * Retry policies for model requests and workspace file operations
 *
 * Model requests back off linearly and retry any failure the caller's
 * classifier does not reject; file operations back off exponentially and only
 * retry transient errno codes.
 */

import { toError } from '../../content-engine/utils/errors.js';
import { Logger, createConsoleLogger } from '../../content-engine/utils/logger.js';

export type BackoffStrategy = 'linear' | 'exponential';

/**
 * Decides what to do with a failed attempt. 'abort' stops immediately, whatever budget is left.
 */
export type RetryDecision = 'retry' | 'abort';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoff: BackoffStrategy;
  backoffMultiplier: number;
  jitterMs: number;
  retryableErrors: (string | RegExp)[];
  classify?: (error: Error) => RetryDecision;
}

export interface RetryContext {
  operation: string;
  phase: PipelinePhase;
  attempt: number;
  totalElapsedMs: number;
  lastError?: Error;
}

export interface RetryResult<T> {
  success: boolean;
  result?: T;
  error?: Error;
  attempts: number;
  totalTimeMs: number;
  aborted?: boolean;
}

export const PIPELINE_PHASES = ['llm-request', 'file-operations'] as const;

export type PipelinePhase = typeof PIPELINE_PHASES[number];

export type SleepFn = (ms: number) => Promise<void>;

export interface OperationStats {
  attempts: number;
  successes: number;
  failures: number;
  lastError?: string;
}

/**
 * Default retry configurations for the pipeline phases
 */
const DEFAULT_RETRY_CONFIGS: Record<PipelinePhase, RetryConfig> = {
  // attempt n waits 1.5s * n before attempt n + 1
  'llm-request': {
    maxAttempts: 3,
    initialDelayMs: 1500,
    maxDelayMs: 30000,
    backoff: 'linear',
    backoffMultiplier: 1,
    jitterMs: 0,
    retryableErrors: [/.*/]
  },
  'file-operations': {
    maxAttempts: 6,
    initialDelayMs: 100,
    maxDelayMs: 5000,
    backoff: 'exponential',
    backoffMultiplier: 1.8,
    jitterMs: 100,
    retryableErrors: [
      /EBUSY/i,
      /EMFILE/i,
      /ENFILE/i,
      /EAGAIN/i,
      /EPERM/i
    ]
  }
};

const defaultSleep: SleepFn = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Retry policy manager
 */
export class RetryPolicyManager {
  private configs: Map<PipelinePhase, RetryConfig> = new Map();
  private retryStats: Map<string, OperationStats> = new Map();
  private sleep: SleepFn;
  private logger: Logger;

  constructor(sleep: SleepFn = defaultSleep, logger: Logger = createConsoleLogger('retry')) {
    this.sleep = sleep;
    this.logger = logger;
    for (const phase of PIPELINE_PHASES) {
      this.configs.set(phase, DEFAULT_RETRY_CONFIGS[phase]);
    }
  }

  /**
   * Update retry configuration for a specific phase
   */
  setRetryConfig(phase: PipelinePhase, config: Partial<RetryConfig>): void {
    const existingConfig = this.configs.get(phase) || DEFAULT_RETRY_CONFIGS[phase];
    this.configs.set(phase, { ...existingConfig, ...config });
  }

  getRetryConfig(phase: PipelinePhase): RetryConfig {
    return this.configs.get(phase) || DEFAULT_RETRY_CONFIGS[phase];
  }

  /**
   * Execute operation with retry logic
   */
  async executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    phase: PipelinePhase,
    operationId: string,
    overrides: Partial<RetryConfig> = {}
  ): Promise<RetryResult<T>> {
    const config = { ...this.getRetryConfig(phase), ...overrides };
    const startTime = Date.now();
    let attempt = 0;
    let lastError: Error | undefined;

    while (attempt < config.maxAttempts) {
      attempt++;

      try {
        const result = await operation(attempt);
        this.recordSuccess(phase, operationId, attempt);

        return {
          success: true,
          result,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime
        };

      } catch (error) {
        lastError = toError(error);

        // Non-retryable error - fail immediately
        if (!this.isRetryableError(lastError, config)) {
          this.recordFailure(phase, operationId, attempt, lastError);

          return {
            success: false,
            error: lastError,
            attempts: attempt,
            totalTimeMs: Date.now() - startTime,
            aborted: true
          };
        }

        if (attempt >= config.maxAttempts) {
          break;
        }

        const delay = this.calculateDelay(attempt, config);
        const context: RetryContext = {
          operation: operationId,
          phase,
          attempt,
          totalElapsedMs: Date.now() - startTime,
          lastError
        };

        this.logger('warn', `Retry attempt ${attempt}/${config.maxAttempts} for ${phase}:${operationId} after ${delay}ms`, {
          error: lastError.message,
          elapsedMs: context.totalElapsedMs
        });

        await this.sleep(delay);
      }
    }

    const error = lastError ?? new Error('All retry attempts failed');
    this.recordFailure(phase, operationId, attempt, error);

    return {
      success: false,
      error,
      attempts: attempt,
      totalTimeMs: Date.now() - startTime
    };
  }

  /**
   * Get retry statistics
   */
  getRetryStats(): Record<string, OperationStats & { successRate: number }> {
    const stats: Record<string, OperationStats & { successRate: number }> = {};

    for (const [key, data] of Array.from(this.retryStats.entries())) {
      const total = data.successes + data.failures;
      stats[key] = {
        ...data,
        successRate: total > 0 ? data.successes / total : 0
      };
    }

    return stats;
  }

  resetStats(): void {
    this.retryStats.clear();
  }

  /**
   * Check if error is retryable: the classifier wins, then the pattern list
   */
  private isRetryableError(error: Error, config: RetryConfig): boolean {
    if (config.classify) {
      return config.classify(error) === 'retry';
    }

    const errorString = `${error.name || ''}: ${error.message || ''}`;

    return config.retryableErrors.some(pattern => {
      if (pattern instanceof RegExp) {
        return pattern.test(errorString);
      }
      return errorString.toLowerCase().includes(pattern.toLowerCase());
    });
  }

  /**
   * Delay before the attempt after `attempt`
   */
  calculateDelay(attempt: number, config: RetryConfig): number {
    const baseDelay = config.backoff === 'linear'
      ? config.initialDelayMs * attempt
      : config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
    const jitter = config.jitterMs > 0 ? Math.random() * config.jitterMs : 0;

    return Math.floor(Math.min(baseDelay + jitter, config.maxDelayMs));
  }

  private statsFor(phase: PipelinePhase, operationId: string): OperationStats {
    const key = `${phase}:${operationId}`;
    let stats = this.retryStats.get(key);
    if (!stats) {
      stats = { attempts: 0, successes: 0, failures: 0 };
      this.retryStats.set(key, stats);
    }
    return stats;
  }

  private recordSuccess(phase: PipelinePhase, operationId: string, attempts: number): void {
    const stats = this.statsFor(phase, operationId);
    stats.attempts += attempts;
    stats.successes++;
  }

  private recordFailure(phase: PipelinePhase, operationId: string, attempts: number, error: Error): void {
    const stats = this.statsFor(phase, operationId);
    stats.attempts += attempts;
    stats.failures++;
    stats.lastError = error.message;

    if (attempts > 1) {
      this.logger('error', `${phase}:${operationId} failed after ${attempts} attempts`, { error: error.message });
    }
  }
}

/**
 * File operations retried under the shared policy
 */
export class RetryHelper {
  constructor(private retryManager: RetryPolicyManager) {}

  async retryFileOperation<T>(
    operation: (attempt: number) => Promise<T>,
    operationId: string = 'file-op'
  ): Promise<RetryResult<T>> {
    return this.retryManager.executeWithRetry(operation, 'file-operations', operationId);
  }
}

export const retryPolicyManager = new RetryPolicyManager();
export const retryHelper = new RetryHelper(retryPolicyManager);
