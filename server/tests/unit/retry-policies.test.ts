import { describe, test, expect, beforeEach } from '@jest/globals';
import { LogLevel } from '../../../content-engine/utils/logger.js';
import { RetryPolicyManager, RetryHelper } from '../../resilience/retry-policies.js';

describe('RetryPolicyManager', () => {
  let delays: number[];
  let logs: Array<{ level: LogLevel; message: string }>;
  let manager: RetryPolicyManager;

  beforeEach(() => {
    delays = [];
    logs = [];
    manager = new RetryPolicyManager(
      async ms => {
        delays.push(ms);
      },
      (level, message) => logs.push({ level, message })
    );
  });

  test('computes linear and exponential delays', () => {
    const llm = manager.getRetryConfig('llm-request');
    expect([1, 2, 3].map(attempt => manager.calculateDelay(attempt, llm))).toEqual([1500, 3000, 4500]);

    const files = { ...manager.getRetryConfig('file-operations'), jitterMs: 0 };
    expect([1, 2].map(attempt => manager.calculateDelay(attempt, files))).toEqual([100, 180]);
  });

  test('caps delays at maxDelayMs', () => {
    const config = { ...manager.getRetryConfig('llm-request'), maxDelayMs: 2000 };
    expect(manager.calculateDelay(3, config)).toBe(2000);
  });

  test('aborts immediately when the classifier says so', async () => {
    let calls = 0;
    const result = await manager.executeWithRetry(
      async () => {
        calls++;
        throw new Error('nope');
      },
      'llm-request',
      'abort-case',
      { classify: () => 'abort' }
    );

    expect(result).toMatchObject({ success: false, attempts: 1, aborted: true });
    expect(result.error?.message).toBe('nope');
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });

  test('only retries file errors matching the retryable patterns', async () => {
    const helper = new RetryHelper(manager);
    manager.setRetryConfig('file-operations', { jitterMs: 0 });

    let busy = 0;
    const recovered = await helper.retryFileOperation(async () => {
      busy++;
      if (busy < 3) throw new Error('EBUSY: resource busy or locked');
      return 'written';
    });
    expect(recovered).toMatchObject({ success: true, result: 'written', attempts: 3 });
    expect(delays).toEqual([100, 180]);
    expect(logs).toEqual([
      { level: 'warn', message: 'Retry attempt 1/6 for file-operations:file-op after 100ms' },
      { level: 'warn', message: 'Retry attempt 2/6 for file-operations:file-op after 180ms' }
    ]);

    const missing = await helper.retryFileOperation(async () => {
      throw new Error('ENOENT: no such file or directory');
    });
    expect(missing).toMatchObject({ success: false, attempts: 1, aborted: true });
  });

  test('records success and failure statistics per operation', async () => {
    await manager.executeWithRetry(async () => 'ok', 'llm-request', 'stats');
    await manager.executeWithRetry(
      async () => {
        throw new Error('down');
      },
      'llm-request',
      'stats',
      { maxAttempts: 2 }
    );

    expect(manager.getRetryStats()['llm-request:stats']).toEqual({
      attempts: 3,
      successes: 1,
      failures: 1,
      lastError: 'down',
      successRate: 0.5
    });
    expect(logs.at(-1)).toEqual({ level: 'error', message: 'llm-request:stats failed after 2 attempts' });

    manager.resetStats();
    expect(manager.getRetryStats()).toEqual({});
  });
});
