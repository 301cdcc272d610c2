/**
 * Job persistence
 *
 * FileJobStore keeps one JSON file per job and replaces it by atomic rename on
 * every update, so a poller never reads a half-written record. Updates to the
 * same job are serialized in-process.
 *
 * The newest job of each (project, kind) is indexed in memory. The index is
 * built from one directory scan on first use and kept current by create, so a
 * long-poll re-check reads a single record. Jobs are only ever created through
 * this process's store.
 */

import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { pathFor } from '../../../config/paths.js';
import { isNotFound, writeFileAtomic } from '../../utils/atomic-write.js';
import { errorMessage } from '../../utils/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { JobUpdateError, applyJobUpdate, createJob } from './job-state.js';
import { GenerationJob, JobKind, JobStore, JobUpdate, NewJobInput } from './types.js';

const JOB_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const GenerationJobSchema = z.object({
  id: z.string().regex(JOB_ID_PATTERN),
  kind: z.enum(['teaching_plan', 'lesson_plan', 'copyright']),
  project_id: z.string(),
  status: z.enum(['queued', 'running', 'completed', 'failed']),
  stage: z.string(),
  message: z.string(),
  progress: z.number().int().min(0).max(100),
  error: z.string().nullable(),
  output_path: z.string().nullable(),
  result: z.record(z.unknown()).nullable(),
  created_at: z.string(),
  updated_at: z.string()
});

function matches(job: GenerationJob, projectId: string, kind?: JobKind): boolean {
  return job.project_id === projectId && (kind === undefined || job.kind === kind);
}

type JobRef = Pick<GenerationJob, 'id' | 'created_at'>;

type JobIndex = Map<string, Map<JobKind, JobRef>>;

/**
 * Newest first by creation time, then by id for jobs created in the same millisecond
 */
function newest<T extends JobRef>(jobs: Iterable<T>): T | null {
  let latest: T | null = null;
  for (const job of jobs) {
    if (
      latest === null ||
      job.created_at > latest.created_at ||
      (job.created_at === latest.created_at && job.id > latest.id)
    ) {
      latest = job;
    }
  }
  return latest;
}

export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, GenerationJob>();

  async create(input: NewJobInput): Promise<GenerationJob> {
    const job = createJob(input);
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  async get(jobId: string): Promise<GenerationJob | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async update(jobId: string, update: JobUpdate): Promise<GenerationJob> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobUpdateError(`Job ${jobId} not found`);
    }
    const next = applyJobUpdate(job, update);
    this.jobs.set(jobId, next);
    return structuredClone(next);
  }

  async latestForProject(projectId: string, kind?: JobKind): Promise<GenerationJob | null> {
    const latest = newest(Array.from(this.jobs.values()).filter(job => matches(job, projectId, kind)));
    return latest ? structuredClone(latest) : null;
  }
}

export interface FileJobStoreConfig {
  jobsDir: string;
}

export class FileJobStore implements JobStore {
  private config: FileJobStoreConfig;
  private logger: Logger;
  private pending = new Map<string, Promise<unknown>>();
  private index: Promise<JobIndex> | null = null;

  constructor(config: Partial<FileJobStoreConfig> = {}, logger?: Logger) {
    this.config = { jobsDir: pathFor('JOBS_DIR'), ...config };
    this.logger = logger || silentLogger;
  }

  async create(input: NewJobInput): Promise<GenerationJob> {
    const job = createJob(input);
    await writeFileAtomic(this.jobPath(job.id), JSON.stringify(job, null, 2));
    indexJob(await this.loadIndex(), job);
    this.logger('debug', 'Job created', { jobId: job.id, kind: job.kind, projectId: job.project_id });
    return job;
  }

  async get(jobId: string): Promise<GenerationJob | null> {
    if (!JOB_ID_PATTERN.test(jobId)) return null;
    return this.readJob(this.jobPath(jobId));
  }

  update(jobId: string, update: JobUpdate): Promise<GenerationJob> {
    return this.serialize(jobId, async () => {
      const job = await this.get(jobId);
      if (!job) {
        throw new JobUpdateError(`Job ${jobId} not found`);
      }
      const next = applyJobUpdate(job, update);
      await writeFileAtomic(this.jobPath(jobId), JSON.stringify(next, null, 2));
      return next;
    });
  }

  async latestForProject(projectId: string, kind?: JobKind): Promise<GenerationJob | null> {
    const byKind = (await this.loadIndex()).get(projectId);
    if (!byKind) return null;

    const ref = kind === undefined ? newest(byKind.values()) : byKind.get(kind);
    if (!ref) return null;

    const job = await this.get(ref.id);
    if (!job) {
      // record removed from disk; rebuild from what is left
      this.index = null;
      const rebuilt = (await this.loadIndex()).get(projectId);
      const next = rebuilt && (kind === undefined ? newest(rebuilt.values()) : rebuilt.get(kind));
      return next ? this.get(next.id) : null;
    }
    return job;
  }

  private loadIndex(): Promise<JobIndex> {
    if (!this.index) {
      const loading = this.scanJobs();
      loading.catch(() => {
        if (this.index === loading) this.index = null;
      });
      this.index = loading;
    }
    return this.index;
  }

  private async scanJobs(): Promise<JobIndex> {
    const index: JobIndex = new Map();
    let entries: string[];
    try {
      entries = await readdir(this.config.jobsDir);
    } catch (error) {
      if (isNotFound(error)) return index;
      throw error;
    }

    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const job = await this.readJob(path.join(this.config.jobsDir, entry));
      if (job) indexJob(index, job);
    }
    this.logger('debug', 'Job index built', { jobs: entries.length });
    return index;
  }

  private async readJob(filePath: string): Promise<GenerationJob | null> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.logger('warn', 'Ignoring unreadable job record', { filePath, error: errorMessage(error) });
      return null;
    }

    const parsed = GenerationJobSchema.safeParse(document);
    if (!parsed.success) {
      this.logger('warn', 'Ignoring malformed job record', { filePath });
      return null;
    }
    return parsed.data;
  }

  private serialize<T>(jobId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(jobId) ?? Promise.resolve();
    const run = previous.then(task, task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.pending.set(jobId, settled);
    void settled.then(() => {
      if (this.pending.get(jobId) === settled) this.pending.delete(jobId);
    });
    return run;
  }

  private jobPath(jobId: string): string {
    if (!JOB_ID_PATTERN.test(jobId)) {
      throw new JobUpdateError(`Invalid job id "${jobId}"`);
    }
    return path.join(this.config.jobsDir, `${jobId}.json`);
  }
}

function indexJob(index: JobIndex, job: GenerationJob): void {
  let byKind = index.get(job.project_id);
  if (!byKind) {
    byKind = new Map();
    index.set(job.project_id, byKind);
  }
  const current = byKind.get(job.kind);
  const ref = { id: job.id, created_at: job.created_at };
  if (!current || newest([current, ref]) === ref) {
    byKind.set(job.kind, ref);
  }
}
