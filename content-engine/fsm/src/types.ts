// Pipeline inputs, collaborators and outcomes

import type { DocumentStore } from '../../documents/src/types.js';
import type { JobStore } from '../../jobs/src/types.js';
import type { StageTemplateLoader } from '../../prompts/src/copyright-templates.js';
import type { DocumentRenderer } from '../../rendering/src/types.js';
import type { ActorContext, CredentialsProvider } from '../../utils/credentials.js';
import type { LLMClient, LLMCredentials } from '../../utils/llm-client.js';
import type { Logger } from '../../utils/logger.js';
import type { MergeRunner } from '../../workspace/src/merge.js';
import type { CopyrightProjectInput } from '../../workspace/src/types.js';
import type { WorkspaceManager } from '../../workspace/src/workspace.js';

export interface PipelineSettings {
  scheduleSlack: number;
  timeRepairAttempts: number;
  /** Directory rendered documents are written to */
  generatedDir: string;
  resourcesDir: string;
}

/**
 * Everything a pipeline touches outside its own arithmetic
 */
export interface PipelineDeps {
  jobs: JobStore;
  documents: DocumentStore;
  renderer: DocumentRenderer;
  credentials: CredentialsProvider;
  createClient: (credentials: LLMCredentials) => LLMClient;
  templates: StageTemplateLoader;
  workspace: WorkspaceManager;
  merge: MergeRunner;
  settings: PipelineSettings;
  logger: Logger;
  now?: () => Date;
}

/**
 * Course fields the teaching-plan and lesson-plan pipelines read
 */
export interface CourseInfo {
  id: string;
  name: string;
  catalog: string;
  totalHours: number;
  practiceHours: number;
  semester: string;
  className: string;
}

export interface TeachingPlanRequest {
  actor: ActorContext;
  course: CourseInfo;
  teacherName: string;
  totalWeeks: number;
  hourPerClass: number;
  classesPerWeek: number;
  firstWeekClasses: number;
  finalReview: boolean;
  /** JSON text or an already parsed list of `{week, class}` entries */
  skipSlots: string | ReadonlyArray<unknown> | null;
}

export interface LessonPlanRequest {
  actor: ActorContext;
  course: Pick<CourseInfo, 'id' | 'name' | 'totalHours'>;
  sequence: number;
  /** Full text of the teaching plan; defaults to the stored plan's schedule */
  documentText?: string;
  /** Extra course notes for the model */
  courseContext?: string;
}

export interface CopyrightRequest {
  actor: ActorContext;
  project: CopyrightProjectInput;
}

/**
 * What a finished run writes back into its job
 */
export interface PipelineOutcome {
  message: string;
  outputPath: string | null;
  result: Record<string, unknown>;
}
