// Structured records produced by the response parsers

export interface NewLessonItem {
  content: string;
  time: number;
}

/**
 * Fields the caller computes; model-supplied values are always overwritten
 */
export interface LessonSystemFields {
  project_name: string;
  week: number | null;
  sequence: number;
  hours: number;
  total_hours: number | null;
}

export const LESSON_TEXT_FIELDS = [
  'knowledge_goals',
  'ability_goals',
  'quality_goals',
  'teaching_content',
  'teaching_focus',
  'teaching_difficulty',
  'review_content',
  'assessment_content',
  'summary_content',
  'homework_content'
] as const;

export type LessonTextField = typeof LESSON_TEXT_FIELDS[number];

export const LESSON_PLAN_FIELDS = [
  'project_name',
  'week',
  'sequence',
  'hours',
  'total_hours',
  'knowledge_goals',
  'ability_goals',
  'quality_goals',
  'teaching_content',
  'teaching_focus',
  'teaching_difficulty',
  'review_content',
  'review_time',
  'new_lessons',
  'assessment_content',
  'summary_content',
  'homework_content'
] as const;

/**
 * Lesson plan as returned by the model, after the shape check but before time validation
 */
export type DraftLessonPlan = Record<LessonTextField, string> & {
  project_name?: unknown;
  week?: unknown;
  sequence?: unknown;
  hours?: unknown;
  total_hours?: unknown;
  review_time?: unknown;
  new_lessons: Array<{ content: string; time?: unknown }>;
};

export type LessonPlanContent = LessonSystemFields & Record<LessonTextField, string> & {
  review_time: number;
  new_lessons: NewLessonItem[];
};

export interface TimeAllocation {
  review_time: number;
  new_lessons: NewLessonItem[];
}

export interface PageItem {
  name: string;
  path: string;
  file: string;
  description: string;
}

export interface FrameworkInsights {
  moduleList: string;
  innovationPoints: string;
}
