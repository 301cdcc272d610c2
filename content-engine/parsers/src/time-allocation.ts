import { isRecord } from '../../utils/result.js';
import { NewLessonItem, TimeAllocation } from './types.js';

export const MINUTES_PER_HOUR = 40;
export const ASSESSMENT_MINUTES = 10;
export const SUMMARY_MINUTES = 5;
export const REVIEW_MINUTES_RANGE = { min: 5, max: 15 } as const;
export const NEW_LESSON_COUNT_RANGE = { min: 3, max: 5 } as const;

export type TimeCheck =
  | { ok: true; allocation: TimeAllocation }
  | { ok: false; reason: string };

export const TIME_REASONS = {
  invalidHours: 'Invalid hours value',
  reviewRange: `review_time is not within ${REVIEW_MINUTES_RANGE.min}-${REVIEW_MINUTES_RANGE.max} minutes`,
  lessonCount: `new_lessons must contain ${NEW_LESSON_COUNT_RANGE.min}-${NEW_LESSON_COUNT_RANGE.max} items`,
  nonObjectLesson: 'new_lessons contains a non-object item',
  lessonTime: 'new_lessons.time must be a positive integer',
  totalMismatch: 'Time allocation total does not match'
} as const;

/**
 * Total class minutes for a lesson of `hours`
 */
export function totalMinutes(hours: number): number {
  return hours * MINUTES_PER_HOUR;
}

/**
 * Minutes left for review and new content once the fixed assessment and summary are taken out
 */
export function teachableMinutes(hours: number): number {
  return totalMinutes(hours) - ASSESSMENT_MINUTES - SUMMARY_MINUTES;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Check review_time + sum(new_lessons.time) + assessment + summary == hours * 40.
 * Checks run in a fixed order and the first failing one names the reason.
 */
export function validateTimeAllocation(record: unknown, hours: number): TimeCheck {
  if (!isPositiveInteger(hours)) {
    return { ok: false, reason: TIME_REASONS.invalidHours };
  }

  const data = isRecord(record) ? record : {};
  const reviewTime = data.review_time;
  const newLessons = data.new_lessons;

  if (
    typeof reviewTime !== 'number' ||
    !Number.isInteger(reviewTime) ||
    reviewTime < REVIEW_MINUTES_RANGE.min ||
    reviewTime > REVIEW_MINUTES_RANGE.max
  ) {
    return { ok: false, reason: TIME_REASONS.reviewRange };
  }

  if (
    !Array.isArray(newLessons) ||
    newLessons.length < NEW_LESSON_COUNT_RANGE.min ||
    newLessons.length > NEW_LESSON_COUNT_RANGE.max
  ) {
    return { ok: false, reason: TIME_REASONS.lessonCount };
  }

  const lessons: NewLessonItem[] = [];
  for (const item of newLessons) {
    if (!isRecord(item)) {
      return { ok: false, reason: TIME_REASONS.nonObjectLesson };
    }
    if (!isPositiveInteger(item.time)) {
      return { ok: false, reason: TIME_REASONS.lessonTime };
    }
    lessons.push({ content: typeof item.content === 'string' ? item.content : String(item.content ?? ''), time: item.time });
  }

  const used = reviewTime + lessons.reduce((sum, lesson) => sum + lesson.time, 0) + ASSESSMENT_MINUTES + SUMMARY_MINUTES;
  if (used !== totalMinutes(hours)) {
    return { ok: false, reason: `${TIME_REASONS.totalMismatch} (${used} of ${totalMinutes(hours)} minutes)` };
  }

  return { ok: true, allocation: { review_time: reviewTime, new_lessons: lessons } };
}
