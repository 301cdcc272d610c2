import { describe, test, expect } from '@jest/globals';
import { DraftAllocation, RepairEngine, mergeTimeAllocation } from '../../src/repair-engine.js';
import { TIME_REASONS } from '../../../parsers/src/time-allocation.js';
import { LLMClient } from '../../../utils/llm-client.js';
import { silentLogger } from '../../../utils/logger.js';
import { ValidationError } from '../../../utils/errors.js';
import { RetryPolicyManager } from '../../../../server/resilience/retry-policies.js';
import { ScriptedTransport } from './fixtures.js';

const DRAFT: DraftAllocation = {
  review_time: 10,
  new_lessons: [
    { content: 'Task 1', time: 50 },
    { content: 'Task 2', time: 50 },
    { content: 'Task 3', time: 50 }
  ]
};

function clientFor(transport: ScriptedTransport): LLMClient {
  return new LLMClient(transport, { model: 'test-model', maxAttempts: 1 }, new RetryPolicyManager(async () => undefined, silentLogger));
}

describe('mergeTimeAllocation', () => {
  test('takes only integer times and keeps the content', () => {
    const { merged, applied } = mergeTimeAllocation(DRAFT, {
      review_time: '12',
      new_lessons: [{ content: 'Rewritten', time: 40 }, { time: 45.5 }, { time: 45 }, { time: 5 }]
    });

    expect(merged).toEqual({
      review_time: 10,
      new_lessons: [
        { content: 'Task 1', time: 40 },
        { content: 'Task 2', time: 50 },
        { content: 'Task 3', time: 45 }
      ]
    });
    expect(applied).toEqual(['new_lessons[0].time', 'new_lessons[2].time']);
    expect(DRAFT.new_lessons[0]?.time).toBe(50);
  });

  test('ignores a correction that is not an object', () => {
    expect(mergeTimeAllocation(DRAFT, [1, 2, 3])).toEqual({ merged: DRAFT, applied: [] });
  });
});

describe('RepairEngine', () => {
  test('returns a valid allocation without calling the model', async () => {
    const transport = new ScriptedTransport([]);
    const valid: DraftAllocation = { ...DRAFT, new_lessons: DRAFT.new_lessons.map((lesson, i) => ({ ...lesson, time: i === 2 ? 35 : 50 })) };

    const result = await new RepairEngine().reconcile(valid, 4, clientFor(transport));

    expect(result.repairs).toEqual([]);
    expect(result.allocation.new_lessons.map(lesson => lesson.time)).toEqual([50, 50, 35]);
    expect(transport.requests).toHaveLength(0);
  });

  test('fails at once on an invalid hours value', async () => {
    const transport = new ScriptedTransport([]);

    await expect(new RepairEngine().reconcile(DRAFT, 0, clientFor(transport))).rejects.toThrow(
      new ValidationError(`Time allocation check failed: ${TIME_REASONS.invalidHours}`)
    );
    expect(transport.requests).toHaveLength(0);
  });

  test('counts an unparseable correction as a spent repair', async () => {
    const fixed = '{"review_time": 10, "new_lessons": [{"time": 50}, {"time": 50}, {"time": 35}]}';
    const transport = new ScriptedTransport(['not json', fixed]);

    const result = await new RepairEngine().reconcile(DRAFT, 4, clientFor(transport));

    expect(result.repairs).toEqual([
      { attempt: 1, reason: `${TIME_REASONS.totalMismatch} (175 of 160 minutes)`, applied: [] },
      {
        attempt: 2,
        reason: `${TIME_REASONS.totalMismatch} (175 of 160 minutes)`,
        applied: ['review_time', 'new_lessons[0].time', 'new_lessons[1].time', 'new_lessons[2].time']
      }
    ]);
  });

  test('stops after the configured number of repairs', async () => {
    const transport = new ScriptedTransport(['{}', '{}', '{}']);

    await expect(new RepairEngine({ maxRepairs: 1 }).reconcile(DRAFT, 4, clientFor(transport))).rejects.toThrow(
      new ValidationError(`Time allocation check failed: ${TIME_REASONS.totalMismatch} (175 of 160 minutes)`)
    );
    expect(transport.requests).toHaveLength(1);
  });

  test('repairs a lesson count error through the same loop', async () => {
    const twoItems: DraftAllocation = { review_time: 10, new_lessons: DRAFT.new_lessons.slice(0, 2) };
    const transport = new ScriptedTransport(['{}', '{}']);

    await expect(new RepairEngine().reconcile(twoItems, 4, clientFor(transport))).rejects.toThrow(
      `Time allocation check failed: ${TIME_REASONS.lessonCount}`
    );
    expect(transport.requests).toHaveLength(2);
  });
});
