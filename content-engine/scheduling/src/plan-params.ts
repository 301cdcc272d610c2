/**
 * Plan parameter normalization
 *
 * Schedules arrive from generated plans, from model extraction over uploaded
 * documents and from stored JSON, each with its own key spellings. Everything
 * downstream (lesson-plan system fields, cumulative hours) reads PlanParams only.
 */

import { isRecord } from '../../utils/result.js';
import { toInteger } from './schedule-engine.js';
import { PlanItem, PlanParams } from './types.js';

const ORDER_KEYS = ['order', 'sequence', 'lesson_number'];
const HOUR_KEYS = ['hour', 'hours', '学时'];
const TITLE_KEYS = ['title', 'project_name', 'project'];
const TASK_KEYS = ['tasks', 'task', 'content'];

function firstTruthy(item: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    const value = item[key];
    if (value !== undefined && value !== null && value !== '' && value !== 0 && value !== false) {
      return value;
    }
  }
  return undefined;
}

function normalizeTasks(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (Array.isArray(value)) {
    return value
      .map(entry => String(entry).trim())
      .filter(entry => entry.length > 0)
      .join('\n');
  }
  return String(value).trim();
}

export interface LooseScheduleItem {
  week: number | null;
  order: number | null;
  title: string;
  tasks: string;
  hour: number | null;
}

export function normalizeScheduleItem(item: Record<string, unknown>): LooseScheduleItem {
  const title = firstTruthy(item, TITLE_KEYS);

  return {
    week: toInteger(item.week),
    order: toInteger(firstTruthy(item, ORDER_KEYS)),
    hour: toInteger(firstTruthy(item, HOUR_KEYS)),
    title: title === undefined ? '' : String(title).trim(),
    tasks: normalizeTasks(firstTruthy(item, TASK_KEYS))
  };
}

/**
 * Most frequent positive hour value; ties go to the value seen first
 */
export function inferHourPerClass(schedule: ReadonlyArray<{ hour: number | null }>, fallback?: number | null): number | null {
  const counts = new Map<number, number>();
  for (const item of schedule) {
    if (item.hour !== null && Number.isInteger(item.hour) && item.hour > 0) {
      counts.set(item.hour, (counts.get(item.hour) ?? 0) + 1);
    }
  }

  let mode: number | null = null;
  let best = 0;
  for (const [hour, count] of counts) {
    if (count > best) {
      mode = hour;
      best = count;
    }
  }
  if (mode !== null) return mode;

  return typeof fallback === 'number' && Number.isInteger(fallback) && fallback > 0 ? fallback : null;
}

export interface PlanParamsOptions {
  hourPerClass?: number | null;
  totalHours?: number | null;
}

/**
 * Normalize, order and fill a raw schedule. Items without an order are dropped.
 */
export function buildPlanParams(schedule: ReadonlyArray<unknown>, options: PlanParamsOptions = {}): PlanParams {
  const normalized: PlanItem[] = [];
  for (const raw of schedule) {
    if (!isRecord(raw)) continue;
    const item = normalizeScheduleItem(raw);
    if (item.order === null) continue;
    normalized.push({ ...item, order: item.order });
  }
  normalized.sort((a, b) => a.order - b.order);

  let hourPerClass = inferHourPerClass(normalized, options.hourPerClass);
  const totalHours = options.totalHours;
  if (hourPerClass === null && typeof totalHours === 'number' && totalHours > 0 && normalized.length > 0) {
    hourPerClass = Math.ceil(totalHours / normalized.length);
  }

  if (hourPerClass !== null) {
    for (const item of normalized) {
      if (!item.hour) item.hour = hourPerClass;
    }
  }

  return { schedule: normalized, hour_per_class: hourPerClass };
}

/**
 * Plan params from a stored teaching-plan content blob (`{schedule: [...]}`)
 */
export function planParamsFromContent(content: unknown): PlanParams | null {
  if (!isRecord(content) || !Array.isArray(content.schedule)) {
    return null;
  }
  return buildPlanParams(content.schedule);
}

/**
 * Plan params from a `{schedule, hour_per_class}` JSON text; null when the text
 * is not that shape. `totalHours` spreads the course hours over the sessions
 * when no hour value can be found.
 */
export function parsePlanParamsJson(raw: string | null | undefined, totalHours: number | null = null): PlanParams | null {
  if (!raw) return null;

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }

  if (!isRecord(data) || !Array.isArray(data.schedule)) return null;
  const hourPerClass = typeof data.hour_per_class === 'number' ? data.hour_per_class : null;
  return buildPlanParams(data.schedule, { hourPerClass, totalHours });
}

export function getPlanItem(schedule: ReadonlyArray<PlanItem>, sequence: number): PlanItem | null {
  return schedule.find(item => item.order === sequence) ?? null;
}

/**
 * Sum of hours over every item up to and including `sequence`
 */
export function computeCumulativeHours(
  schedule: ReadonlyArray<PlanItem>,
  sequence: number,
  defaultHour?: number | null
): number {
  let total = 0;
  for (const item of schedule) {
    if (item.order > sequence) continue;
    if (item.hour !== null && item.hour > 0) {
      total += item.hour;
    } else if (typeof defaultHour === 'number' && defaultHour > 0) {
      total += defaultHour;
    }
  }
  return total;
}
