// Generation pipeline exports

export { DEFAULT_REPAIR_CONFIG, RepairEngine, mergeTimeAllocation } from './repair-engine.js';
export type { DraftAllocation, RepairEngineConfig, RepairRecord, RepairResult } from './repair-engine.js';
export { StageReporter, failureMessage, runJob } from './run-driver.js';
export type { PipelineBody } from './run-driver.js';
export {
  EMPTY_CATALOG_MESSAGE,
  INVALID_SKIP_SLOTS_MESSAGE,
  TEACHING_PLAN_TEMPLATE,
  parseSkipSlots,
  runTeachingPlanPipeline,
  teachingPlanTitle
} from './teaching-plan-pipeline.js';
export {
  LESSON_PLAN_TEMPLATE,
  MISSING_PLAN_MESSAGE,
  buildCourseContext,
  lessonPlanTitle,
  runLessonPlanPipeline,
  scheduleText
} from './lesson-plan-pipeline.js';
export { EMPTY_REQUIREMENTS_MESSAGE, runCopyrightPipeline } from './copyright-pipeline.js';
export {
  EMPTY_PLAN_TEXT_MESSAGE,
  NO_SESSIONS_MESSAGE,
  PLAN_FILE_EXTENSIONS,
  UNSUPPORTED_PLAN_FILE_MESSAGE,
  extractPlanParams,
  importTeachingPlan,
  planFileExtension,
  planFileText
} from './plan-import.js';
export type { PlanFileExtension, PlanImportInput } from './plan-import.js';
export type {
  CopyrightRequest,
  CourseInfo,
  LessonPlanRequest,
  PipelineDeps,
  PipelineOutcome,
  PipelineSettings,
  TeachingPlanRequest
} from './types.js';
