// Generation job records and their stage vocabulary

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

export type JobKind = 'teaching_plan' | 'lesson_plan' | 'copyright';

/**
 * Ordered stage tags per pipeline; 'error' is the terminal pseudo-stage of a failed run
 */
export const JOB_STAGES = {
  teaching_plan: ['validating', 'generating', 'rendering', 'saving', 'completed'],
  lesson_plan: ['analyzing', 'parsing', 'retrieving', 'generating', 'rendering', 'completed'],
  copyright: ['preparing', 'generating', 'rendering', 'saving', 'completed']
} as const;

export const ERROR_STAGE = 'error';

export interface GenerationJob {
  id: string;
  kind: JobKind;
  project_id: string;
  status: JobStatus;
  stage: string;
  message: string;
  progress: number;
  error: string | null;
  output_path: string | null;
  result: Record<string, unknown> | null;
  created_at: string;
  updated_at: string;
}

/**
 * One stage transition; every field is optional and applied together
 */
export interface JobUpdate {
  status?: JobStatus;
  stage?: string;
  message?: string;
  progress?: number;
  error?: string | null;
  output_path?: string | null;
  result?: Record<string, unknown> | null;
}

export interface NewJobInput {
  kind: JobKind;
  projectId: string;
  message?: string;
}

/**
 * What a client can learn from one read of a job
 */
export interface JobDescription {
  id: string;
  kind: JobKind;
  status: JobStatus;
  stage: string;
  stage_index: number;
  stage_count: number;
  progress: number;
  message: string;
  terminal: boolean;
  /** A failed run is retried only by starting a new run */
  retryable: boolean;
  error: string | null;
  output_path: string | null;
  updated_at: string;
}

export interface JobStore {
  create(input: NewJobInput): Promise<GenerationJob>;
  get(jobId: string): Promise<GenerationJob | null>;
  update(jobId: string, update: JobUpdate): Promise<GenerationJob>;
  latestForProject(projectId: string, kind?: JobKind): Promise<GenerationJob | null>;
}
