// Job state machine exports

export {
  JobUpdateError,
  QUEUED_MESSAGE,
  applyJobUpdate,
  createJob,
  describeJob,
  generateJobId,
  isTerminal,
  stagesFor
} from './job-state.js';
export { FileJobStore, InMemoryJobStore } from './job-store.js';
export type { FileJobStoreConfig } from './job-store.js';
export { DEFAULT_LONG_POLL_OPTIONS, waitForLatestJob } from './long-poll.js';
export type { LongPollOptions } from './long-poll.js';
export { ERROR_STAGE, JOB_STAGES } from './types.js';
export type {
  GenerationJob,
  JobDescription,
  JobKind,
  JobStatus,
  JobStore,
  JobUpdate,
  NewJobInput
} from './types.js';
