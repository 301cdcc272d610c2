import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { NO_SESSIONS_MESSAGE, UNSUPPORTED_PLAN_FILE_MESSAGE } from '../../../content-engine/fsm/src/plan-import.js';
import { QUEUED_MESSAGE } from '../../../content-engine/jobs/src/job-state.js';
import { MISSING_CREDENTIALS_MESSAGE } from '../../../content-engine/utils/credentials.js';
import { TestHarness, createHarness } from '../../../content-engine/fsm/tests/unit/fixtures.js';
import { GenerationHandlers, RUN_IN_PROGRESS_MESSAGE, createGenerationHandlers } from '../../api/generation.js';
import { ProjectLockManager } from '../../concurrency/lock-manager.js';
import { FakeRequest, FakeResponse } from './http-fakes.js';

const TEACHING_PLAN_BODY = {
  course: {
    id: 'course-1',
    name: 'Network Basics',
    catalog: 'Cabling\nAddressing\nRouting',
    total_hours: 16,
    practice_hours: 4
  },
  teacher_name: 'J. Doe',
  total_weeks: 2,
  hour_per_class: 4,
  classes_per_week: 2,
  final_review: true
};

const MODEL_SCHEDULE = JSON.stringify([
  { week: 1, order: 1, title: 'Project 1: Cabling', tasks: '1. Crimping', hour: 4 },
  { week: 1, order: 2, title: 'Project 2: Addressing', tasks: '1. Subnets', hour: 4 },
  { week: 2, order: 3, title: 'Project 3: Routing', tasks: '1. Static routes', hour: 4 }
]);

describe('generation handlers', () => {
  let tempDir: string;
  let harness: TestHarness;
  let locks: ProjectLockManager;
  let handlers: GenerationHandlers;
  let background: Array<() => Promise<void>>;

  function setup(replies: string[], apiKey?: string): void {
    harness = createHarness(tempDir, replies, apiKey);
    locks = new ProjectLockManager({ lockDir: path.join(tempDir, 'locks') });
    background = [];
    handlers = createGenerationHandlers({
      pipeline: harness.deps,
      locks,
      longPoll: { sleep: async () => undefined },
      schedule: task => {
        background.push(task);
      },
      logger: () => undefined
    });
  }

  async function drain(): Promise<void> {
    await Promise.all(background.splice(0).map(task => task()));
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'api-'));
    setup([MODEL_SCHEDULE]);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test('accepts a teaching plan run, answers 202 and runs it afterwards', async () => {
    const res = new FakeResponse();

    await handlers.startTeachingPlan(new FakeRequest({ body: TEACHING_PLAN_BODY, headers: { 'X-User-ID': 'teacher-1' } }), res);

    expect(res.statusCode).toBe(202);
    expect(res.body).toMatchObject({ success: true, status: 'queued', message: QUEUED_MESSAGE });
    expect((await locks.isLocked('teaching_plan', 'course-1')).locked).toBe(true);
    expect(harness.transport.requests).toHaveLength(0);

    await drain();

    const job = await harness.jobs.latestForProject('course-1', 'teaching_plan');
    expect(job).toMatchObject({ status: 'completed', progress: 100 });
    expect(res.body).toMatchObject({ jobId: job?.id, statusUrl: `/api/jobs/${job?.id}` });
    expect((await locks.isLocked('teaching_plan', 'course-1')).locked).toBe(false);
  });

  test('refuses a run while the project is locked and creates no job', async () => {
    await locks.acquireLock('teaching_plan', 'course-1');
    const res = new FakeResponse();

    await handlers.startTeachingPlan(new FakeRequest({ body: TEACHING_PLAN_BODY }), res);

    expect(res.statusCode).toBe(409);
    expect(res.body).toMatchObject({ success: false, error: RUN_IN_PROGRESS_MESSAGE, details: { kind: 'teaching_plan', projectId: 'course-1' } });
    expect(await harness.jobs.latestForProject('course-1')).toBeNull();
    expect(background).toHaveLength(0);
  });

  test('answers 400 for a malformed body', async () => {
    const res = new FakeResponse();
    const { total_weeks: _omitted, ...body } = TEACHING_PLAN_BODY;

    await handlers.startTeachingPlan(new FakeRequest({ body }), res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ success: false, error: 'Invalid request format' });
    expect((await locks.isLocked('teaching_plan', 'course-1')).locked).toBe(false);
  });

  test('releases the lock after a failed run', async () => {
    setup([MODEL_SCHEDULE], '');
    const res = new FakeResponse();

    await handlers.startTeachingPlan(new FakeRequest({ body: TEACHING_PLAN_BODY }), res);
    await drain();

    const job = await harness.jobs.latestForProject('course-1');
    expect(job).toMatchObject({ status: 'failed', message: MISSING_CREDENTIALS_MESSAGE });
    expect((await locks.isLocked('teaching_plan', 'course-1')).locked).toBe(false);
  });

  test('reports a job by id and 404 for an unknown id', async () => {
    const job = await harness.jobs.create({ kind: 'lesson_plan', projectId: 'course-1' });
    const found = new FakeResponse();
    const missing = new FakeResponse();

    await handlers.getJob(new FakeRequest({ params: { jobId: job.id } }), found);
    await handlers.getJob(new FakeRequest({ params: { jobId: 'job-0-missing' } }), missing);

    expect(found.statusCode).toBe(200);
    expect(found.body).toEqual({
      success: true,
      job: {
        id: job.id,
        kind: 'lesson_plan',
        status: 'queued',
        stage: 'analyzing',
        stage_index: 0,
        stage_count: 6,
        progress: 0,
        message: QUEUED_MESSAGE,
        terminal: false,
        retryable: false,
        error: null,
        output_path: null,
        updated_at: job.updated_at,
        result: null
      }
    });
    expect(missing.statusCode).toBe(404);
    expect(missing.body).toEqual({ success: false, error: 'Job not found' });
  });

  test('returns the latest job of a project, or 404 when it has none', async () => {
    const older = await harness.jobs.create({ kind: 'copyright', projectId: 'p1' });
    await harness.jobs.update(older.id, { status: 'failed', message: 'Generation failed: boom' });
    const res = new FakeResponse();
    const none = new FakeResponse();

    await handlers.getLatestJob(new FakeRequest({ params: { projectId: 'p1' }, query: { wait: '5', since: older.updated_at } }), res);
    await handlers.getLatestJob(new FakeRequest({ params: { projectId: 'p2' } }), none);

    expect(res.body).toMatchObject({ success: true, job: { id: older.id, status: 'failed', terminal: true, retryable: true } });
    expect(none.statusCode).toBe(404);
  });

  test('rejects an unknown job kind filter', async () => {
    const res = new FakeResponse();

    await handlers.getLatestJob(new FakeRequest({ params: { projectId: 'p1' }, query: { kind: 'poster' } }), res);

    expect(res.statusCode).toBe(400);
  });

  test('serves the archive of the latest completed copyright run', async () => {
    const archivePath = path.join(tempDir, 'p1_20260301090507.zip');
    await writeFile(archivePath, 'zip bytes');
    const job = await harness.jobs.create({ kind: 'copyright', projectId: 'p1' });
    await harness.jobs.update(job.id, { status: 'running', stage: 'saving', progress: 96 });
    await harness.jobs.update(job.id, { status: 'completed', output_path: archivePath });
    const res = new FakeResponse();

    await handlers.downloadArchive(new FakeRequest({ params: { projectId: 'p1' } }), res);

    expect(res.downloaded).toEqual({ path: archivePath, filename: 'p1_20260301090507.zip' });
  });

  test('answers 404 when no archive exists', async () => {
    const job = await harness.jobs.create({ kind: 'copyright', projectId: 'p1' });
    await harness.jobs.update(job.id, { status: 'running', stage: 'saving', progress: 96 });
    await harness.jobs.update(job.id, { status: 'completed', output_path: path.join(tempDir, 'gone.zip') });
    const res = new FakeResponse();

    await handlers.downloadArchive(new FakeRequest({ params: { projectId: 'p1' } }), res);

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'No archive available for this project' });
    expect(res.downloaded).toBeNull();
  });

  test('starts a copyright run for the project named in the path', async () => {
    setup([]);
    const res = new FakeResponse();

    await handlers.startCopyright(
      new FakeRequest({ params: { projectId: 'p1' }, body: { name: 'Inventory Desk', generation_mode: 'full', requirements_text: '' } }),
      res
    );
    await drain();

    expect(res.statusCode).toBe(202);
    expect(await harness.jobs.latestForProject('p1', 'copyright')).toMatchObject({
      status: 'failed',
      message: 'Requirements document cannot be empty'
    });
  });

  test('passes the requested generation mode to the stage prompts', async () => {
    setup(['# Framework']);
    const res = new FakeResponse();

    await handlers.startCopyright(
      new FakeRequest({
        params: { projectId: 'p1' },
        body: { name: 'Inventory Desk', generation_mode: 'full', requirements_text: 'Track stock levels.' }
      }),
      res
    );
    await drain();

    expect(res.statusCode).toBe(202);
    expect(harness.transport.systemPrompt(0)).toContain('- Generation mode: full (');
  });

  test('runs an unknown generation mode as fast', async () => {
    setup(['# Framework']);

    await handlers.startCopyright(
      new FakeRequest({
        params: { projectId: 'p1' },
        body: { name: 'Inventory Desk', generation_mode: 'turbo', requirements_text: 'Track stock levels.' }
      }),
      new FakeResponse()
    );
    await drain();

    expect(harness.transport.systemPrompt(0)).toContain('- Generation mode: fast (');
  });

  test('imports an uploaded plan and stores its schedule', async () => {
    setup(['{"schedule":[{"week":1,"order":1,"title":"Cabling","hour":4}],"hour_per_class":4}']);
    const res = new FakeResponse();
    const content = Buffer.from('Week 1 session 1: Cabling (4 hours)', 'utf-8').toString('base64');

    await handlers.importPlan(
      new FakeRequest({
        params: { courseId: 'course-1' },
        body: { course: { name: 'Network Basics', total_hours: 4 }, file_name: 'plan.md', content_base64: content }
      }),
      res
    );

    const plan = await harness.documents.findPlan('course-1');
    expect(res.statusCode).toBe(201);
    expect(res.body).toEqual({
      success: true,
      document: {
        id: plan?.id,
        title: 'Network Basics Teaching Plan',
        plan_params: { hour_per_class: 4, schedule: [{ week: 1, order: 1, hour: 4, title: 'Cabling', tasks: '' }] }
      }
    });
    expect(harness.transport.userPrompt(0)).toContain('Week 1 session 1: Cabling (4 hours)');
    expect((await locks.isLocked('teaching_plan', 'course-1')).locked).toBe(false);
  });

  test('answers 400 when an uploaded plan holds no sessions', async () => {
    setup(['{"schedule":[]}']);
    const res = new FakeResponse();

    await handlers.importPlan(
      new FakeRequest({
        params: { courseId: 'course-1' },
        body: { course: { name: 'Network Basics' }, file_name: 'plan.md', content_base64: Buffer.from('notes').toString('base64') }
      }),
      res
    );

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ success: false, error: NO_SESSIONS_MESSAGE });
    expect(await harness.documents.findPlan('course-1')).toBeNull();
    expect((await locks.isLocked('teaching_plan', 'course-1')).locked).toBe(false);
  });

  test('refuses plan files other than docx and markdown', async () => {
    const res = new FakeResponse();

    await handlers.importPlan(
      new FakeRequest({
        params: { courseId: 'course-1' },
        body: { course: { name: 'Network Basics' }, file_name: 'plan.pdf', content_base64: 'JVBERg==' }
      }),
      res
    );

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ success: false, error: UNSUPPORTED_PLAN_FILE_MESSAGE });
    expect(harness.transport.requests).toHaveLength(0);
  });

  test('streams chat deltas as server-sent events', async () => {
    setup(['Hel', 'lo']);
    const res = new FakeResponse();

    await handlers.chat(new FakeRequest({ body: { messages: [{ role: 'user', content: 'Hi' }] } }), res);

    expect(res.headers['Content-Type']).toBe('text/event-stream');
    expect(res.chunks).toEqual(['data: {"content":"Hel"}\n\n', 'data: {"content":"lo"}\n\n', 'event: done\ndata: {}\n\n']);
    expect(res.ended).toBe(true);
  });

  test('refuses chat without credentials', async () => {
    setup([], '');
    const res = new FakeResponse();

    await handlers.chat(new FakeRequest({ body: { messages: [{ role: 'user', content: 'Hi' }] } }), res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ success: false, error: MISSING_CREDENTIALS_MESSAGE });
    expect(res.chunks).toEqual([]);
  });
});
