// Scheduling module exports

export {
  DEFAULT_SCHEDULE_SLACK,
  availableSlotCount,
  buildScheduleFrame,
  checkScheduleCapacity,
  planSchedule,
  toInteger
} from './schedule-engine.js';
export {
  buildPlanParams,
  computeCumulativeHours,
  getPlanItem,
  inferHourPerClass,
  normalizeScheduleItem,
  parsePlanParamsJson,
  planParamsFromContent
} from './plan-params.js';
export type { LooseScheduleItem, PlanParamsOptions } from './plan-params.js';
export type {
  CalendarParams,
  PlanItem,
  PlanParams,
  ScheduleRequest,
  SchedulePlan,
  ScheduleSlot,
  SkipSlotInput
} from './types.js';
