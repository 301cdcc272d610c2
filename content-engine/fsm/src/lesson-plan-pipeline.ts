/**
 * Lesson-plan pipeline
 *
 * analyzing → parsing → retrieving → generating → rendering. When the course
 * has a stored teaching plan with a matching session, the run is strict: the
 * caller fixes the system fields and the model only writes the teaching text.
 * A course without a stored plan but with plan text gets its plan imported from
 * that text first. Otherwise the model infers the fields (lenient mode) and
 * only the sequence is pinned. Either way the time allocation goes through the repair loop before
 * anything is rendered.
 */

import { planParamsOf } from '../../documents/src/document-store.js';
import {
  DraftLessonPlan,
  LessonPlanContent,
  LessonSystemFields,
  parseJsonResponse,
  unwrapParseResult,
  validateLessonPlanShape
} from '../../parsers/src/index.js';
import { buildLessonPlanPrompt } from '../../prompts/src/lesson-plan-prompt.js';
import { saveGeneratedDocument } from '../../rendering/src/docx-template.js';
import { RenderData } from '../../rendering/src/types.js';
import { PlanItem, PlanParams, computeCumulativeHours, getPlanItem, toInteger } from '../../scheduling/src/index.js';
import { requireCredentials } from '../../utils/credentials.js';
import { ConfigurationError, ValidationError, errorMessage } from '../../utils/errors.js';
import { LLMClient, LLM_TEMPERATURES } from '../../utils/llm-client.js';
import { importTeachingPlan } from './plan-import.js';
import { RepairEngine } from './repair-engine.js';
import { StageReporter } from './run-driver.js';
import { LessonPlanRequest, PipelineDeps, PipelineOutcome } from './types.js';

export const LESSON_PLAN_TEMPLATE = 'lesson_plan.docx';

export const MISSING_PLAN_MESSAGE = 'No teaching plan found for this course. Generate or upload a teaching plan first.';

export function lessonPlanTitle(sequence: number): string {
  return `Lesson plan - session ${sequence}`;
}

/**
 * Plain-text rendering of a schedule, used as the plan text when the caller sends none
 */
export function scheduleText(schedule: ReadonlyArray<PlanItem>): string {
  return schedule
    .map(item => {
      const week = item.week === null ? '' : `Week ${item.week}, `;
      const hours = item.hour === null ? '' : ` (${item.hour} hours)`;
      return `${week}session ${item.order}: ${item.title}${hours}\n${item.tasks}`.trimEnd();
    })
    .join('\n\n');
}

/**
 * Course notes for the model: the course itself plus the sessions either side of this one
 */
export function buildCourseContext(
  course: LessonPlanRequest['course'],
  schedule: ReadonlyArray<PlanItem>,
  sequence: number
): string {
  const lines = [`Course: ${course.name}`, `Total hours: ${course.totalHours}`];
  const previous = getPlanItem(schedule, sequence - 1);
  const next = getPlanItem(schedule, sequence + 1);
  if (previous) lines.push(`Previous session: ${previous.title}`);
  if (next) lines.push(`Next session: ${next.title}`);
  return lines.join('\n');
}

interface LessonFrame {
  params: PlanParams | null;
  planItem: PlanItem | null;
  systemFields: LessonSystemFields | null;
}

function strictFrame(request: LessonPlanRequest, params: PlanParams | null): LessonFrame {
  const planItem = params ? getPlanItem(params.schedule, request.sequence) : null;
  const hours = planItem?.hour ?? params?.hour_per_class ?? null;
  if (!params || !planItem || hours === null) {
    return { params, planItem, systemFields: null };
  }

  return {
    params,
    planItem,
    systemFields: {
      project_name: planItem.title,
      week: planItem.week,
      sequence: request.sequence,
      hours,
      total_hours: computeCumulativeHours(params.schedule, request.sequence, params.hour_per_class)
    }
  };
}

/**
 * System fields for a lenient run: the model's values where they are usable,
 * with the sequence always taken from the request
 */
function lenientFields(draft: DraftLessonPlan, sequence: number, params: PlanParams | null): LessonSystemFields {
  const name = typeof draft.project_name === 'string' ? draft.project_name.trim() : '';
  return {
    project_name: name || lessonPlanTitle(sequence),
    week: toInteger(draft.week),
    sequence,
    hours: toInteger(draft.hours) ?? params?.hour_per_class ?? 0,
    total_hours: toInteger(draft.total_hours)
  };
}

/**
 * Stored schedule imported from the caller's plan text, or null when the text
 * holds no sessions (the run then stays lenient)
 */
async function importPlanText(
  request: LessonPlanRequest,
  text: string,
  client: LLMClient,
  deps: PipelineDeps
): Promise<PlanParams | null> {
  try {
    const { params } = await importTeachingPlan(
      { course: { id: request.course.id, name: request.course.name, totalHours: request.course.totalHours }, text },
      client,
      deps.documents
    );
    return params;
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    deps.logger('warn', 'Plan text has no usable sessions, continuing without a plan', {
      courseId: request.course.id,
      error: errorMessage(error)
    });
    return null;
  }
}

export async function runLessonPlanPipeline(
  request: LessonPlanRequest,
  deps: PipelineDeps,
  reporter: StageReporter
): Promise<PipelineOutcome> {
  const { course, sequence } = request;

  await reporter.stage('analyzing', 10, 'Analyzing the lesson plan request...');
  const credentials = await requireCredentials(deps.credentials, request.actor);
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new ValidationError(`Invalid session number: ${sequence}`, { sequence });
  }

  const client = deps.createClient(credentials);

  await reporter.stage('parsing', 20, 'Reading the teaching plan...');
  const uploadedText = request.documentText?.trim() ?? '';
  const plan = await deps.documents.findPlan(course.id);
  let params = plan ? planParamsOf(plan) : null;
  if (!plan && uploadedText) {
    await reporter.stage('parsing', 25, 'Extracting session parameters from the teaching plan...');
    params = await importPlanText(request, uploadedText, client, deps);
  }
  const frame = strictFrame(request, params);
  const schedule = frame.params?.schedule ?? [];
  const documentText = uploadedText || scheduleText(schedule);
  if (!documentText) {
    throw new ConfigurationError(MISSING_PLAN_MESSAGE, { courseId: course.id });
  }
  const strict = frame.systemFields !== null;

  await reporter.stage('retrieving', 30, 'Collecting course information...');
  const courseContext = request.courseContext?.trim() || buildCourseContext(course, schedule, sequence);

  await reporter.stage('generating', 50, 'Generating the lesson plan content...');
  const prompt = buildLessonPlanPrompt({
    sequence,
    documentText,
    courseContext,
    planItem: frame.planItem,
    systemFields: frame.systemFields,
    strict
  });
  const draft = await client.runStructured(
    prompt.systemPrompt,
    prompt.userPrompt,
    text => unwrapParseResult(parseJsonResponse(text, validateLessonPlanShape)),
    { temperature: LLM_TEMPERATURES.content, operation: 'lesson-plan' }
  );

  const systemFields = frame.systemFields ?? lenientFields(draft, sequence, frame.params);
  const repairer = new RepairEngine({ maxRepairs: deps.settings.timeRepairAttempts }, deps.logger);
  const { allocation, repairs } = await repairer.reconcile(draft, systemFields.hours, client);

  const lessonPlan: LessonPlanContent = {
    knowledge_goals: draft.knowledge_goals,
    ability_goals: draft.ability_goals,
    quality_goals: draft.quality_goals,
    teaching_content: draft.teaching_content,
    teaching_focus: draft.teaching_focus,
    teaching_difficulty: draft.teaching_difficulty,
    review_content: draft.review_content,
    assessment_content: draft.assessment_content,
    summary_content: draft.summary_content,
    homework_content: draft.homework_content,
    ...systemFields,
    ...allocation
  };
  await reporter.stage('generating', 70, 'AI generation complete, processing data...');

  await reporter.stage('rendering', 85, 'Rendering the Word document...');
  const renderData: RenderData = {
    ...lessonPlan,
    new_lessons: lessonPlan.new_lessons.map(lesson => ({ ...lesson }))
  };
  const bytes = await deps.renderer.render(LESSON_PLAN_TEMPLATE, renderData);
  const saved = await saveGeneratedDocument(bytes, 'lesson_plan', course.id, {
    generatedDir: deps.settings.generatedDir,
    now: deps.now?.()
  });

  const document = await deps.documents.saveLesson({
    courseId: course.id,
    title: lessonPlanTitle(sequence),
    content: { ...lessonPlan },
    filePath: saved.relativePath,
    lessonNumber: sequence
  });

  return {
    message: 'Lesson plan generated',
    outputPath: saved.relativePath,
    result: { document_id: document.id, strict, repairs: repairs.length, lesson_plan: lessonPlan }
  };
}
