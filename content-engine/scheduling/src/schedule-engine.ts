import { Err, ModuleError, Ok, Result, isRecord, moduleError } from '../../utils/result.js';
import { CalendarParams, ScheduleRequest, SchedulePlan, ScheduleSlot, SkipSlotInput } from './types.js';

/**
 * Largest tolerated surplus of free slots over required classes
 */
export const DEFAULT_SCHEDULE_SLACK = 6;

const MAX_CLASSES_PER_WEEK = 7;
const SKIP_INDEX_KEYS = ['class', 'class_index', 'session'] as const;

interface Capacity {
  classesPerWeek: number;
  firstWeekClasses: number;
}

/**
 * Lenient integer coercion for client-supplied values; booleans and fractions-as-text are rejected
 */
export function toInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function normalizeCapacity(params: CalendarParams): Capacity {
  const classesPerWeek = clamp(params.classesPerWeek, 1, MAX_CLASSES_PER_WEEK);
  return {
    classesPerWeek,
    firstWeekClasses: clamp(params.firstWeekClasses, 1, classesPerWeek)
  };
}

function weekCapacity(week: number, capacity: Capacity): number {
  return week === 1 ? capacity.firstWeekClasses : capacity.classesPerWeek;
}

function slotKey(week: number, index: number): string {
  return `${week}:${index}`;
}

function skipIndexOf(entry: SkipSlotInput): number | null {
  for (const key of SKIP_INDEX_KEYS) {
    const raw = entry[key];
    // first present, non-zero value wins
    if (raw !== undefined && raw !== null && raw !== '' && raw !== 0) {
      return toInteger(raw);
    }
  }
  return null;
}

/**
 * Skip entries that name a real slot; anything malformed or outside the calendar is ignored
 */
function collectSkipSet(params: CalendarParams, capacity: Capacity): Set<string> {
  const skipped = new Set<string>();

  for (const entry of params.skipSlots ?? []) {
    if (!isRecord(entry)) continue;

    const week = toInteger(entry.week);
    const index = skipIndexOf(entry);
    if (week === null || index === null) continue;

    if (week >= 1 && week <= params.totalWeeks && index >= 1 && index <= weekCapacity(week, capacity)) {
      skipped.add(slotKey(week, index));
    }
  }

  return skipped;
}

function* iterateOpenSlots(params: CalendarParams): Generator<{ week: number; index: number }> {
  if (params.totalWeeks < 1 || params.classesPerWeek < 1) {
    return;
  }

  const capacity = normalizeCapacity(params);
  const skipped = collectSkipSet(params, capacity);

  for (let week = 1; week <= params.totalWeeks; week++) {
    const limit = weekCapacity(week, capacity);
    for (let index = 1; index <= limit; index++) {
      if (!skipped.has(slotKey(week, index))) {
        yield { week, index };
      }
    }
  }
}

/**
 * Number of class slots the calendar offers after exclusions
 */
export function availableSlotCount(params: CalendarParams): number {
  let count = 0;
  for (const _slot of iterateOpenSlots(params)) {
    count++;
  }
  return count;
}

/**
 * Assign week numbers to `actualClasses` sessions in week-then-index order
 */
export function buildScheduleFrame(params: CalendarParams, actualClasses: number): ScheduleSlot[] {
  const frame: ScheduleSlot[] = [];
  if (actualClasses < 1) return frame;

  for (const slot of iterateOpenSlots(params)) {
    frame.push({ order: frame.length + 1, week: slot.week });
    if (frame.length >= actualClasses) break;
  }

  return frame;
}

/**
 * Accept only 0 <= available - actual <= slack
 */
export function checkScheduleCapacity(
  availableSlots: number,
  actualClasses: number,
  slack: number = DEFAULT_SCHEDULE_SLACK
): Result<{ availableSlots: number; actualClasses: number }, ModuleError[]> {
  const diff = availableSlots - actualClasses;

  if (diff < 0) {
    return Err([moduleError(
      'schedule',
      'capacity',
      `Schedule mismatch: the plan needs ${actualClasses} classes but only ${availableSlots} slots are available. ` +
        'Adjust the first-week classes, the classes per week or the skipped slots.',
      { availableSlots, actualClasses }
    )]);
  }

  if (diff > slack) {
    return Err([moduleError(
      'schedule',
      'slack',
      `Schedule slack too large: the plan needs ${actualClasses} classes but ${availableSlots} slots are available. ` +
        `The difference may not exceed ${slack}; adjust the parameters.`,
      { availableSlots, actualClasses, slack }
    )]);
  }

  return Ok({ availableSlots, actualClasses });
}

/**
 * Full scheduling step of a teaching-plan run: class counts, capacity check and frame
 */
export function planSchedule(
  request: ScheduleRequest,
  slack: number = DEFAULT_SCHEDULE_SLACK
): Result<SchedulePlan, ModuleError[]> {
  if (!Number.isInteger(request.hourPerClass) || request.hourPerClass < 1) {
    return Err([moduleError('schedule', 'hour-per-class', 'Hours per class must be a positive integer', {
      hourPerClass: request.hourPerClass
    })]);
  }

  const actualClasses = Math.floor(request.totalHours / request.hourPerClass);
  if (actualClasses < 1) {
    return Err([moduleError('schedule', 'no-classes', `Total hours (${request.totalHours}) do not cover a single class`, {
      totalHours: request.totalHours,
      hourPerClass: request.hourPerClass
    })]);
  }

  const availableSlots = availableSlotCount(request);
  const capacity = checkScheduleCapacity(availableSlots, actualClasses, slack);
  if (capacity.isError()) {
    return Err(capacity.errors);
  }

  const theoryClasses = Math.round(request.theoryHours / request.hourPerClass);
  const frame = buildScheduleFrame(request, actualClasses);
  const contentCount = request.finalReview ? actualClasses - 1 : actualClasses;

  return Ok({
    frame,
    contentFrame: frame.slice(0, contentCount),
    availableSlots,
    actualClasses,
    theoryClasses,
    practiceClasses: actualClasses - theoryClasses
  });
}
