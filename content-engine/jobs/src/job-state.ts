/**
 * Job state transitions
 *
 * queued -> running -> completed | failed. Terminal jobs never change again;
 * a failed run is retried by creating a new job.
 */

import { randomBytes } from 'crypto';
import { PipelineError } from '../../utils/errors.js';
import { ERROR_STAGE, GenerationJob, JOB_STAGES, JobDescription, JobKind, JobStatus, JobUpdate, NewJobInput } from './types.js';

export class JobUpdateError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('fatal', message, details);
    this.name = 'JobUpdateError';
  }
}

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  queued: ['queued', 'running', 'failed'],
  running: ['running', 'completed', 'failed'],
  completed: [],
  failed: []
};

export const QUEUED_MESSAGE = 'Queued, waiting to start...';

export function generateJobId(now: number = Date.now()): string {
  return `job-${now}-${randomBytes(4).toString('hex')}`;
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function stagesFor(kind: JobKind): readonly string[] {
  return JOB_STAGES[kind];
}

export function createJob(input: NewJobInput, now: Date = new Date()): GenerationJob {
  const timestamp = now.toISOString();

  return {
    id: generateJobId(now.getTime()),
    kind: input.kind,
    project_id: input.projectId,
    status: 'queued',
    stage: stagesFor(input.kind)[0],
    message: input.message ?? QUEUED_MESSAGE,
    progress: 0,
    error: null,
    output_path: null,
    result: null,
    created_at: timestamp,
    updated_at: timestamp
  };
}

/**
 * Apply one update and return the new record. Completion pins progress at 100;
 * failure moves to the error stage and keeps the last reported progress.
 */
export function applyJobUpdate(job: GenerationJob, update: JobUpdate, now: Date = new Date()): GenerationJob {
  if (isTerminal(job.status)) {
    throw new JobUpdateError(`Job ${job.id} is already ${job.status}`, { jobId: job.id, update });
  }

  const status = update.status ?? job.status;
  if (!TRANSITIONS[job.status].includes(status)) {
    throw new JobUpdateError(`Job ${job.id} cannot move from ${job.status} to ${status}`, { jobId: job.id });
  }

  if (update.stage !== undefined && update.stage !== ERROR_STAGE && !stagesFor(job.kind).includes(update.stage)) {
    throw new JobUpdateError(`Unknown stage "${update.stage}" for ${job.kind} job`, { jobId: job.id });
  }

  if (update.progress !== undefined && (!Number.isInteger(update.progress) || update.progress < 0 || update.progress > 100)) {
    throw new JobUpdateError(`Progress must be an integer between 0 and 100, got ${update.progress}`, { jobId: job.id });
  }

  const next: GenerationJob = {
    ...job,
    ...update,
    status,
    updated_at: now.toISOString()
  };

  if (status === 'completed') {
    next.stage = 'completed';
    next.progress = 100;
    next.error = null;
  } else if (status === 'failed') {
    next.stage = ERROR_STAGE;
    next.progress = update.progress ?? job.progress;
  }

  return next;
}

export function describeJob(job: GenerationJob): JobDescription {
  const stages = stagesFor(job.kind);
  const terminal = isTerminal(job.status);

  return {
    id: job.id,
    kind: job.kind,
    status: job.status,
    stage: job.stage,
    stage_index: stages.indexOf(job.stage),
    stage_count: stages.length,
    progress: job.progress,
    message: job.message,
    terminal,
    retryable: job.status === 'failed',
    error: job.error,
    output_path: job.output_path,
    updated_at: job.updated_at
  };
}
