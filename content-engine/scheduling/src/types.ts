// Core types for the scheduling module

export interface ScheduleSlot {
  order: number;
  week: number;
}

/**
 * Raw skip entry as sent by clients: `week` plus one of `class`, `class_index` or `session`
 */
export type SkipSlotInput = Record<string, unknown>;

export interface CalendarParams {
  totalWeeks: number;
  classesPerWeek: number;
  firstWeekClasses: number;
  skipSlots?: ReadonlyArray<SkipSlotInput>;
}

export interface ScheduleRequest extends CalendarParams {
  totalHours: number;
  theoryHours: number;
  hourPerClass: number;
  finalReview: boolean;
}

export interface SchedulePlan {
  frame: ScheduleSlot[];
  /** Slots the model fills; the last slot is dropped when the final session is a review */
  contentFrame: ScheduleSlot[];
  availableSlots: number;
  actualClasses: number;
  theoryClasses: number;
  practiceClasses: number;
}

export interface PlanItem {
  week: number | null;
  order: number;
  title: string;
  tasks: string;
  hour: number | null;
}

export interface PlanParams {
  schedule: PlanItem[];
  hour_per_class: number | null;
}
