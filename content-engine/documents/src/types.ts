// Course documents produced by the teaching-plan and lesson-plan pipelines

export type DocType = 'plan' | 'lesson';

export interface CourseDocument {
  id: string;
  course_id: string;
  doc_type: DocType;
  title: string;
  content: Record<string, unknown>;
  /** Normalized schedule of a plan document, `{schedule, hour_per_class}` */
  plan_params: Record<string, unknown> | null;
  /** Rendered file, relative to the data directory */
  file_path: string | null;
  lesson_number: number | null;
  created_at: string;
  updated_at: string;
}

export interface NewPlanDocument {
  courseId: string;
  title: string;
  content: Record<string, unknown>;
  planParams: Record<string, unknown> | null;
  filePath: string | null;
}

export interface NewLessonDocument {
  courseId: string;
  title: string;
  content: Record<string, unknown>;
  filePath: string | null;
  lessonNumber: number;
}

export interface DocumentStore {
  get(documentId: string): Promise<CourseDocument | null>;
  /** The course's single plan document, if any */
  findPlan(courseId: string): Promise<CourseDocument | null>;
  listForCourse(courseId: string, docType?: DocType): Promise<CourseDocument[]>;
  /** Replaces any existing plan of the course, deleting its rendered file */
  savePlan(input: NewPlanDocument): Promise<CourseDocument>;
  saveLesson(input: NewLessonDocument): Promise<CourseDocument>;
}
