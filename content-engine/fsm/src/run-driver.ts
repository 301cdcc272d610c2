/**
 * Run driver
 *
 * Owns one job from its first stage to a terminal status. Every error a
 * pipeline throws ends here and becomes a failed job with a readable message;
 * the job is never left running.
 */

import { GenerationJob, JobKind, JobStore } from '../../jobs/src/types.js';
import { ConfigurationError, LLMRateLimitError, errorMessage } from '../../utils/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { PipelineOutcome } from './types.js';

/**
 * Stage transitions of one run, each written before the stage's work starts
 */
export class StageReporter {
  constructor(
    private jobs: JobStore,
    readonly jobId: string,
    private logger: Logger = silentLogger
  ) {}

  async stage(stage: string, progress: number, message: string): Promise<void> {
    await this.jobs.update(this.jobId, { status: 'running', stage, progress, message });
    this.logger('info', message, { jobId: this.jobId, stage, progress });
  }
}

export type PipelineBody = (reporter: StageReporter) => Promise<PipelineOutcome>;

/**
 * Job message for a failed run. Rate limiting and missing configuration
 * carry their own user-facing text.
 */
export function failureMessage(error: unknown): string {
  if (error instanceof LLMRateLimitError || error instanceof ConfigurationError) {
    return error.message;
  }
  return `Generation failed: ${errorMessage(error)}`;
}

/**
 * Execute `body` for `jobId` and record how it ended. Resolves with the final
 * job, or null when not even the failure could be recorded.
 */
export async function runJob(
  jobs: JobStore,
  jobId: string,
  kind: JobKind,
  body: PipelineBody,
  logger: Logger = silentLogger
): Promise<GenerationJob | null> {
  const reporter = new StageReporter(jobs, jobId, logger);

  try {
    const outcome = await body(reporter);
    const job = await jobs.update(jobId, {
      status: 'completed',
      message: outcome.message,
      output_path: outcome.outputPath,
      result: outcome.result
    });
    logger('info', 'Generation run completed', { jobId, kind, outputPath: outcome.outputPath });
    return job;
  } catch (error) {
    const message = failureMessage(error);
    logger('error', 'Generation run failed', { jobId, kind, error: errorMessage(error) });

    try {
      return await jobs.update(jobId, { status: 'failed', message, error: errorMessage(error) });
    } catch (updateError) {
      logger('error', 'Could not record the failed run', { jobId, error: errorMessage(updateError) });
      return null;
    }
  }
}
