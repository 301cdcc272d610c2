/**
 * Time-budget repair
 *
 * A lesson plan whose time allocation fails validation is sent back to the
 * model with a time-only prompt, a bounded number of times. Only well-typed
 * integers from a correction are merged; anything else keeps the previous
 * value. A plan still failing after the last repair fails the run.
 */

import { TIME_REASONS, TimeAllocation, parseJsonResponse, validateTimeAllocation } from '../../parsers/src/index.js';
import { buildTimeReallocationPrompt } from '../../prompts/src/lesson-plan-prompt.js';
import { ValidationError } from '../../utils/errors.js';
import { LLMClient, LLM_TEMPERATURES } from '../../utils/llm-client.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { isRecord } from '../../utils/result.js';

/**
 * Time fields of a lesson plan before they are known to be valid
 */
export interface DraftAllocation {
  review_time?: unknown;
  new_lessons: Array<{ content: string; time?: unknown }>;
}

export interface RepairRecord {
  attempt: number;
  reason: string;
  applied: string[];
}

export interface RepairResult {
  allocation: TimeAllocation;
  repairs: RepairRecord[];
}

export interface RepairEngineConfig {
  maxRepairs: number;
}

export const DEFAULT_REPAIR_CONFIG: RepairEngineConfig = {
  maxRepairs: 2
};

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Overlay the integer times of `correction` onto `current`
 */
export function mergeTimeAllocation(
  current: DraftAllocation,
  correction: unknown
): { merged: DraftAllocation; applied: string[] } {
  const merged: DraftAllocation = {
    review_time: current.review_time,
    new_lessons: current.new_lessons.map(lesson => ({ ...lesson }))
  };
  const applied: string[] = [];
  if (!isRecord(correction)) {
    return { merged, applied };
  }

  if (isInteger(correction.review_time)) {
    merged.review_time = correction.review_time;
    applied.push('review_time');
  }

  const lessons = correction.new_lessons;
  if (Array.isArray(lessons)) {
    merged.new_lessons.forEach((lesson, index) => {
      const item: unknown = lessons[index];
      if (isRecord(item) && isInteger(item.time)) {
        lesson.time = item.time;
        applied.push(`new_lessons[${index}].time`);
      }
    });
  }

  return { merged, applied };
}

export class RepairEngine {
  private config: RepairEngineConfig;
  private logger: Logger;

  constructor(config: Partial<RepairEngineConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_REPAIR_CONFIG, ...config };
    this.logger = logger || silentLogger;
  }

  /**
   * Validated allocation for `draft`, repairing it through `client` when needed
   */
  async reconcile(draft: DraftAllocation, hours: number, client: LLMClient): Promise<RepairResult> {
    const repairs: RepairRecord[] = [];
    let current = draft;
    let check = validateTimeAllocation(current, hours);

    if (!check.ok && check.reason === TIME_REASONS.invalidHours) {
      throw new ValidationError(`Time allocation check failed: ${check.reason}`, { hours });
    }

    for (let attempt = 1; !check.ok && attempt <= this.config.maxRepairs; attempt++) {
      this.logger('warn', 'Time allocation invalid, requesting a repair', { attempt, reason: check.reason, hours });

      const prompt = buildTimeReallocationPrompt({ hours, newLessons: current.new_lessons });
      const text = await client.runPrompt(prompt.systemPrompt, prompt.userPrompt, {
        temperature: LLM_TEMPERATURES.timeReallocation,
        operation: 'time-reallocation'
      });

      const parsed = parseJsonResponse(text);
      const { merged, applied } = mergeTimeAllocation(current, parsed.kind === 'ok' ? parsed.value : null);
      repairs.push({ attempt, reason: check.reason, applied });

      current = merged;
      check = validateTimeAllocation(current, hours);
    }

    if (!check.ok) {
      throw new ValidationError(`Time allocation check failed: ${check.reason}`, {
        hours,
        repairs: repairs.length
      });
    }

    return { allocation: check.allocation, repairs };
  }
}
