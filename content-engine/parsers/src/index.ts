// Response parsers and validators

export { parseJsonResponse, stripCodeFence, unwrapParseResult } from './json-response.js';
export type { ParseResult, ShapeValidator } from './json-response.js';
export { FILE_MARKER_PATTERN, normalizeBlockPath, parseFileBlocks, serializeFileBlocks } from './file-blocks.js';
export {
  ASSESSMENT_MINUTES,
  MINUTES_PER_HOUR,
  NEW_LESSON_COUNT_RANGE,
  REVIEW_MINUTES_RANGE,
  SUMMARY_MINUTES,
  TIME_REASONS,
  teachableMinutes,
  totalMinutes,
  validateTimeAllocation
} from './time-allocation.js';
export type { TimeCheck } from './time-allocation.js';
export { validateLessonPlanShape } from './lesson-plan-schema.js';
export { planItemsValidator, stripBracketTags } from './plan-schedule.js';
export { EMPTY_INSIGHTS, parseFrameworkInsights, parsePageItems } from './design-extraction.js';
export { LESSON_PLAN_FIELDS, LESSON_TEXT_FIELDS } from './types.js';
export type {
  DraftLessonPlan,
  FrameworkInsights,
  LessonPlanContent,
  LessonSystemFields,
  LessonTextField,
  NewLessonItem,
  PageItem,
  TimeAllocation
} from './types.js';
