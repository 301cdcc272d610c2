/**
 * Generation API Endpoints
 * Starts teaching-plan, lesson-plan and copyright runs in the background,
 * reports their jobs, and imports uploaded teaching plans
 */

import { stat } from 'fs/promises';
import { basename } from 'path';
import { z } from 'zod';
import {
  PipelineBody,
  PipelineDeps,
  UNSUPPORTED_PLAN_FILE_MESSAGE,
  importTeachingPlan,
  planFileExtension,
  planFileText,
  runCopyrightPipeline,
  runJob,
  runLessonPlanPipeline,
  runTeachingPlanPipeline
} from '../../content-engine/fsm/src/index.js';
import { GenerationJob, JobKind, LongPollOptions, describeJob, waitForLatestJob } from '../../content-engine/jobs/src/index.js';
import { isNotFound } from '../../content-engine/utils/atomic-write.js';
import { ActorContext, MISSING_CREDENTIALS_MESSAGE } from '../../content-engine/utils/credentials.js';
import { PipelineError, errorMessage } from '../../content-engine/utils/errors.js';
import { Logger } from '../../content-engine/utils/logger.js';
import { ProjectLockManager } from '../concurrency/lock-manager.js';

export const RUN_IN_PROGRESS_MESSAGE = 'A generation run is already in progress for this project';

export const ANONYMOUS_USER = 'anonymous';

// Request validation schemas
const JOB_KINDS = ['teaching_plan', 'lesson_plan', 'copyright'] as const;

const CourseSchema = z.object({
  id: z.string().min(1).max(100),
  name: z.string().min(1).max(200),
  catalog: z.string().default(''),
  total_hours: z.coerce.number().int().min(1).max(1000),
  practice_hours: z.coerce.number().int().min(0).max(1000).default(0),
  semester: z.string().default(''),
  class_name: z.string().default('')
});

const TeachingPlanSchema = z.object({
  course: CourseSchema,
  teacher_name: z.string().default(''),
  total_weeks: z.coerce.number().int().min(1).max(52),
  hour_per_class: z.coerce.number().int().min(1).max(12),
  classes_per_week: z.coerce.number().int().min(1).max(7),
  first_week_classes: z.coerce.number().int().min(0).max(7).optional(),
  final_review: z.boolean().default(false),
  skip_slots: z.union([z.string(), z.array(z.unknown())]).nullable().default(null)
});

const LessonPlanSchema = z.object({
  course: CourseSchema.pick({ id: true, name: true, total_hours: true }),
  sequence: z.coerce.number().int(),
  document_text: z.string().optional(),
  course_context: z.string().optional()
});

const CopyrightProjectSchema = z.object({
  name: z.string().min(1).max(200),
  system_name: z.string().nullable().default(null),
  software_abbr: z.string().nullable().default(null),
  domain: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  generation_mode: z.enum(['fast', 'full']).catch('fast'),
  include_ui_desc: z.boolean().default(false),
  include_tech_desc: z.boolean().default(false),
  requirements_text: z.string().default(''),
  ui_description: z.string().nullable().default(null),
  tech_description: z.string().nullable().default(null)
});

const PlanImportSchema = z.object({
  course: z.object({
    name: z.string().min(1).max(200),
    total_hours: z.coerce.number().int().min(1).max(1000).nullable().default(null)
  }),
  file_name: z.string().min(1).max(255),
  /** File bytes, base64 encoded */
  content_base64: z.string().min(1)
});

const LatestJobQuerySchema = z.object({
  wait: z.coerce.number().min(0).default(0),
  since: z.string().optional(),
  kind: z.enum(JOB_KINDS).optional()
});

const ChatSchema = z.object({
  messages: z
    .array(
      z.object({
        role: z.enum(['system', 'user', 'assistant']),
        content: z.string()
      })
    )
    .min(1),
  temperature: z.number().min(0).max(2).optional()
});

/**
 * The parts of an express request and response the handlers use
 */
export interface ApiRequest {
  body: unknown;
  params: Record<string, string | undefined>;
  query: unknown;
  get(name: string): string | undefined;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  download(path: string, filename: string, callback: (error?: Error) => void): void;
}

export type BackgroundScheduler = (task: () => Promise<void>) => void;

export interface GenerationServices {
  pipeline: PipelineDeps;
  locks: ProjectLockManager;
  longPoll?: Partial<Omit<LongPollOptions, 'wait' | 'since' | 'kind'>>;
  /** Runs a started job after the 202 has been sent */
  schedule?: BackgroundScheduler;
  logger: Logger;
}

const runInBackground: BackgroundScheduler = task => {
  setImmediate(() => {
    void task();
  });
};

function actorOf(req: ApiRequest): ActorContext {
  return { userId: req.get('X-User-ID')?.trim() || ANONYMOUS_USER };
}

function sendError(res: ApiResponse, error: unknown, logger: Logger, endpoint: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({
      success: false,
      error: 'Invalid request format',
      details: error.errors
    });
    return;
  }

  logger('error', `${endpoint} endpoint error`, { error: errorMessage(error) });
  res.status(500).json({
    success: false,
    error: 'Internal server error'
  });
}

function jobView(job: GenerationJob) {
  return { ...describeJob(job), result: job.result };
}

/**
 * Route handlers bound to one set of services
 */
export function createGenerationHandlers(services: GenerationServices) {
  const { pipeline, locks, logger } = services;
  const jobs = pipeline.jobs;
  const schedule = services.schedule ?? runInBackground;

  /**
   * Lock the project, create the job, answer 202 and run the pipeline afterwards.
   * A held lock answers 409 and creates nothing.
   */
  async function startRun(
    res: ApiResponse,
    kind: JobKind,
    projectId: string,
    actor: ActorContext,
    body: PipelineBody
  ): Promise<void> {
    const lock = await locks.acquireLock(kind, projectId, { userId: actor.userId });
    if (!lock.acquired || !lock.lockInfo) {
      if (lock.error) {
        throw new Error(`Could not lock project ${projectId}: ${lock.error}`);
      }
      res.status(409).json({
        success: false,
        error: RUN_IN_PROGRESS_MESSAGE,
        details: {
          kind,
          projectId,
          since: lock.existingLock ? new Date(lock.existingLock.acquiredAt).toISOString() : null
        }
      });
      return;
    }
    const lockId = lock.lockInfo.lockId;

    const job = await jobs.create({ kind, projectId }).catch(async (error: unknown) => {
      await locks.releaseLock(lockId);
      throw error;
    });

    res.status(202).json({
      success: true,
      jobId: job.id,
      status: job.status,
      message: job.message,
      statusUrl: `/api/jobs/${job.id}`
    });

    schedule(async () => {
      try {
        await runJob(jobs, job.id, kind, body, logger);
      } catch (error) {
        logger('error', 'Background run failed', { jobId: job.id, kind, error: errorMessage(error) });
      } finally {
        try {
          await locks.releaseLock(lockId);
        } catch (error) {
          logger('error', 'Could not release project lock', { jobId: job.id, projectId, error: errorMessage(error) });
        }
      }
    });
  }

  const startTeachingPlan = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    try {
      const body = TeachingPlanSchema.parse(req.body);
      const actor = actorOf(req);
      const { course } = body;

      await startRun(res, 'teaching_plan', course.id, actor, reporter =>
        runTeachingPlanPipeline(
          {
            actor,
            course: {
              id: course.id,
              name: course.name,
              catalog: course.catalog,
              totalHours: course.total_hours,
              practiceHours: course.practice_hours,
              semester: course.semester,
              className: course.class_name
            },
            teacherName: body.teacher_name,
            totalWeeks: body.total_weeks,
            hourPerClass: body.hour_per_class,
            classesPerWeek: body.classes_per_week,
            firstWeekClasses: body.first_week_classes ?? body.classes_per_week,
            finalReview: body.final_review,
            skipSlots: body.skip_slots
          },
          pipeline,
          reporter
        )
      );
    } catch (error) {
      sendError(res, error, logger, 'Teaching plan');
    }
  };

  const startLessonPlan = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    try {
      const body = LessonPlanSchema.parse(req.body);
      const actor = actorOf(req);

      await startRun(res, 'lesson_plan', body.course.id, actor, reporter =>
        runLessonPlanPipeline(
          {
            actor,
            course: { id: body.course.id, name: body.course.name, totalHours: body.course.total_hours },
            sequence: body.sequence,
            documentText: body.document_text,
            courseContext: body.course_context
          },
          pipeline,
          reporter
        )
      );
    } catch (error) {
      sendError(res, error, logger, 'Lesson plan');
    }
  };

  const startCopyright = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    try {
      const projectId = z.string().min(1).max(100).parse(req.params.projectId);
      const body = CopyrightProjectSchema.parse(req.body);
      const actor = actorOf(req);

      const project = { ...body, id: projectId };

      await startRun(res, 'copyright', projectId, actor, reporter =>
        runCopyrightPipeline({ actor, project }, pipeline, reporter)
      );
    } catch (error) {
      sendError(res, error, logger, 'Copyright');
    }
  };

  /**
   * Extracts the session schedule from an uploaded .docx or .md plan and stores
   * it as the course's plan. Runs inline; the project lock keeps it apart from
   * a teaching-plan run on the same course.
   */
  const importPlan = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    try {
      const courseId = z.string().min(1).max(100).parse(req.params.courseId);
      const body = PlanImportSchema.parse(req.body);
      const actor = actorOf(req);

      if (!planFileExtension(body.file_name)) {
        res.status(400).json({ success: false, error: UNSUPPORTED_PLAN_FILE_MESSAGE });
        return;
      }

      const credentials = await pipeline.credentials.resolve(actor);
      if (!credentials) {
        res.status(400).json({ success: false, error: MISSING_CREDENTIALS_MESSAGE });
        return;
      }

      const lock = await locks.acquireLock('teaching_plan', courseId, { userId: actor.userId });
      if (!lock.acquired || !lock.lockInfo) {
        if (lock.error) {
          throw new Error(`Could not lock project ${courseId}: ${lock.error}`);
        }
        res.status(409).json({ success: false, error: RUN_IN_PROGRESS_MESSAGE, details: { kind: 'teaching_plan', projectId: courseId } });
        return;
      }
      const lockId = lock.lockInfo.lockId;

      try {
        const text = await planFileText(body.file_name, Buffer.from(body.content_base64, 'base64'));
        const { document } = await importTeachingPlan(
          { course: { id: courseId, name: body.course.name, totalHours: body.course.total_hours }, text },
          pipeline.createClient(credentials),
          pipeline.documents
        );

        res.status(201).json({
          success: true,
          document: {
            id: document.id,
            title: document.title,
            plan_params: document.plan_params
          }
        });
      } catch (error) {
        if (!(error instanceof PipelineError)) throw error;
        logger('warn', 'Teaching plan import failed', { courseId, error: error.message });
        res.status(error.kind === 'rate_limited' ? 429 : 400).json({ success: false, error: error.message });
      } finally {
        await locks.releaseLock(lockId);
      }
    } catch (error) {
      sendError(res, error, logger, 'Plan import');
    }
  };

  const getJob = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    try {
      const job = await jobs.get(req.params.jobId ?? '');
      if (!job) {
        res.status(404).json({
          success: false,
          error: 'Job not found'
        });
        return;
      }

      res.json({ success: true, job: jobView(job) });
    } catch (error) {
      sendError(res, error, logger, 'Job status');
    }
  };

  /**
   * Long-poll: holds the answer up to `wait` seconds until the job moves past `since`
   */
  const getLatestJob = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    try {
      const query = LatestJobQuerySchema.parse(req.query);
      const job = await waitForLatestJob(jobs, req.params.projectId ?? '', { ...services.longPoll, ...query });
      if (!job) {
        res.status(404).json({
          success: false,
          error: 'No job found for this project'
        });
        return;
      }

      res.json({ success: true, job: jobView(job) });
    } catch (error) {
      sendError(res, error, logger, 'Latest job');
    }
  };

  const downloadArchive = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    try {
      const projectId = req.params.projectId ?? '';
      const job = await jobs.latestForProject(projectId, 'copyright');
      const archivePath = job?.status === 'completed' ? job.output_path : null;

      if (!archivePath || !(await fileExists(archivePath))) {
        res.status(404).json({
          success: false,
          error: 'No archive available for this project'
        });
        return;
      }

      res.download(archivePath, basename(archivePath), error => {
        if (error) {
          logger('error', 'Archive download failed', { projectId, error: error.message });
        }
      });
    } catch (error) {
      sendError(res, error, logger, 'Download');
    }
  };

  /**
   * Server-sent events: one `data: {"content": ...}` per delta, then a `done` event
   */
  const chat = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    try {
      const body = ChatSchema.parse(req.body);
      const credentials = await pipeline.credentials.resolve(actorOf(req));
      if (!credentials) {
        res.status(400).json({
          success: false,
          error: MISSING_CREDENTIALS_MESSAGE
        });
        return;
      }

      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');

      const client = pipeline.createClient(credentials);
      try {
        for await (const content of client.streamChat(body.messages, { temperature: body.temperature })) {
          res.write(`data: ${JSON.stringify({ content })}\n\n`);
        }
        res.write('event: done\ndata: {}\n\n');
      } catch (error) {
        logger('warn', 'Chat stream failed', { error: errorMessage(error) });
        res.write(`event: error\ndata: ${JSON.stringify({ error: errorMessage(error) })}\n\n`);
      }
      res.end();
    } catch (error) {
      sendError(res, error, logger, 'Chat');
    }
  };

  return {
    startTeachingPlan,
    startLessonPlan,
    startCopyright,
    importPlan,
    getJob,
    getLatestJob,
    downloadArchive,
    chat
  };
}

export type GenerationHandlers = ReturnType<typeof createGenerationHandlers>;

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}
