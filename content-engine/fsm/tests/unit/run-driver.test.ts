import { describe, test, expect, jest } from '@jest/globals';
import { InMemoryJobStore } from '../../../jobs/src/job-store.js';
import { GenerationJob, JobStore, JobUpdate } from '../../../jobs/src/types.js';
import {
  ConfigurationError,
  LLMCallError,
  LLMRateLimitError,
  PostProcessingError,
  RATE_LIMIT_MESSAGE
} from '../../../utils/errors.js';
import { Logger } from '../../../utils/logger.js';
import { failureMessage, runJob } from '../../src/run-driver.js';

describe('failureMessage', () => {
  test('passes rate limiting and configuration messages through', () => {
    expect(failureMessage(new LLMRateLimitError())).toBe(RATE_LIMIT_MESSAGE);
    expect(failureMessage(new ConfigurationError('Please configure AI first'))).toBe('Please configure AI first');
  });

  test('prefixes every other failure', () => {
    expect(failureMessage(new LLMCallError('LLM call failed: timeout', 3))).toBe('Generation failed: LLM call failed: timeout');
    expect(failureMessage(new PostProcessingError('merge exited 2', 2))).toBe('Generation failed: merge exited 2');
    expect(failureMessage('plain text')).toBe('Generation failed: plain text');
  });
});

describe('runJob', () => {
  test('records stages and completes the job', async () => {
    const jobs = new InMemoryJobStore();
    const job = await jobs.create({ kind: 'copyright', projectId: 'p1' });
    const seen: string[] = [];

    const final = await runJob(jobs, job.id, 'copyright', async reporter => {
      await reporter.stage('preparing', 5, 'Preparing...');
      seen.push((await jobs.get(job.id))?.status ?? 'missing');
      await reporter.stage('saving', 96, 'Packaging...');
      return { message: 'Done', outputPath: '/tmp/p1.zip', result: { files: 3 } };
    });

    expect(seen).toEqual(['running']);
    expect(final).toMatchObject({
      status: 'completed',
      stage: 'completed',
      progress: 100,
      message: 'Done',
      output_path: '/tmp/p1.zip',
      result: { files: 3 }
    });
  });

  test('turns a thrown error into a failed job at the last progress', async () => {
    const jobs = new InMemoryJobStore();
    const job = await jobs.create({ kind: 'lesson_plan', projectId: 'course-1' });

    const final = await runJob(jobs, job.id, 'lesson_plan', async reporter => {
      await reporter.stage('retrieving', 30, 'Collecting course information...');
      throw new Error('disk full');
    });

    expect(final).toMatchObject({
      status: 'failed',
      stage: 'error',
      progress: 30,
      message: 'Generation failed: disk full',
      error: 'disk full'
    });
  });

  test('returns null when even the failure cannot be written', async () => {
    const broken: JobStore = {
      create: async () => {
        throw new Error('unused');
      },
      get: async () => null,
      update: async (_jobId: string, _update: JobUpdate): Promise<GenerationJob> => {
        throw new Error('store offline');
      },
      latestForProject: async () => null
    };
    const logger = jest.fn<Logger>();

    const final = await runJob(broken, 'job-1', 'teaching_plan', async () => {
      throw new Error('never reached the model');
    }, logger);

    expect(final).toBeNull();
    expect(logger).toHaveBeenCalledWith('error', 'Could not record the failed run', { jobId: 'job-1', error: 'store offline' });
  });
});
