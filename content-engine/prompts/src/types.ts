// Core types for the prompt builders

import type { PlanItem, ScheduleSlot } from '../../scheduling/src/types.js';
import type { LessonSystemFields, NewLessonItem } from '../../parsers/src/types.js';

/**
 * One system/user message pair, the unit every builder returns
 */
export interface PromptPair {
  systemPrompt: string;
  userPrompt: string;
}

export interface TeachingPlanPromptInput {
  courseName: string;
  courseCatalog: string;
  theoryHours: number;
  practiceHours: number;
  theoryClasses: number;
  practiceClasses: number;
  hourPerClass: number;
  /** Read-only anchors the model must fill, in order */
  contentFrame: ReadonlyArray<ScheduleSlot>;
  /** Total sessions including a trailing review session, if any */
  actualClasses: number;
  finalReview: boolean;
}

export interface LessonPlanPromptInput {
  sequence: number;
  documentText: string;
  courseContext: string;
  planItem: PlanItem | null;
  systemFields: LessonSystemFields | null;
  /** Strict mode echoes systemFields verbatim; lenient mode lets the model infer them */
  strict: boolean;
}

export interface TimeReallocationPromptInput {
  hours: number;
  newLessons: ReadonlyArray<Pick<NewLessonItem, 'content'>>;
}

export interface PlanParamsPromptInput {
  extractedText: string;
  totalHours: number | null;
}
