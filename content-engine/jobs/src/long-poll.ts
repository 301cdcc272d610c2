import { isTerminal } from './job-state.js';
import { GenerationJob, JobKind, JobStore } from './types.js';

export interface LongPollOptions {
  /** Seconds the caller is willing to wait; 0 answers at once */
  wait: number;
  /** ISO timestamp of the last update the caller has seen */
  since?: string;
  kind?: JobKind;
  maxWaitSeconds: number;
  intervalMs: number;
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_LONG_POLL_OPTIONS: Omit<LongPollOptions, 'wait'> = {
  maxWaitSeconds: 25,
  intervalMs: 1000,
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms))
};

/**
 * Latest job of a project, held back until it changes after `since` or ends.
 * Returns null when the project has no job, or when it disappears mid-wait.
 */
export async function waitForLatestJob(
  store: JobStore,
  projectId: string,
  options: Partial<LongPollOptions> = {}
): Promise<GenerationJob | null> {
  const { wait = 0, since, kind, maxWaitSeconds, intervalMs, sleep } = { ...DEFAULT_LONG_POLL_OPTIONS, ...options };

  let job = await store.latestForProject(projectId, kind);
  if (!job || !since || wait <= 0) return job;

  const sinceTime = Date.parse(since);
  if (Number.isNaN(sinceTime)) return job;

  const rounds = Math.max(0, Math.min(Math.floor(wait), maxWaitSeconds));
  for (let round = 0; round < rounds; round++) {
    if (Date.parse(job.updated_at) > sinceTime || isTerminal(job.status)) break;

    await sleep(intervalMs);
    job = await store.latestForProject(projectId, kind);
    if (!job) return null;
  }

  return job;
}
