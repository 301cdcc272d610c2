/**
 * Teaching-plan pipeline
 *
 * validating → generating → rendering → saving. The calendar is fixed by the
 * scheduling engine before the model is asked for anything; the model only
 * fills titles and tasks into the frame.
 */

import { parseJsonResponse, planItemsValidator, unwrapParseResult } from '../../parsers/src/index.js';
import { FINAL_REVIEW_ITEM, buildTeachingPlanPrompt } from '../../prompts/src/teaching-plan-prompt.js';
import { saveGeneratedDocument } from '../../rendering/src/docx-template.js';
import { RenderData } from '../../rendering/src/types.js';
import { PlanItem, buildPlanParams, planSchedule } from '../../scheduling/src/index.js';
import { requireCredentials } from '../../utils/credentials.js';
import { ValidationError } from '../../utils/errors.js';
import { LLM_TEMPERATURES } from '../../utils/llm-client.js';
import { StageReporter } from './run-driver.js';
import { PipelineDeps, PipelineOutcome, TeachingPlanRequest } from './types.js';

export const TEACHING_PLAN_TEMPLATE = 'teaching_plan.docx';

export const EMPTY_CATALOG_MESSAGE = 'Course catalog is empty. Edit the course catalog on the course page first.';
export const INVALID_SKIP_SLOTS_MESSAGE =
  'Invalid schedule adjustment. Check the weeks and sessions marked as having no class.';

/**
 * Skip list from a request: JSON text or a list, anything else is a validation error
 */
export function parseSkipSlots(raw: TeachingPlanRequest['skipSlots']): Record<string, unknown>[] {
  if (raw === null || raw === '') return [];

  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new ValidationError(INVALID_SKIP_SLOTS_MESSAGE, { skipSlots: raw });
    }
  }

  if (!Array.isArray(value)) {
    throw new ValidationError(INVALID_SKIP_SLOTS_MESSAGE);
  }
  return value.filter((entry): entry is Record<string, unknown> => typeof entry === 'object' && entry !== null && !Array.isArray(entry));
}

export function teachingPlanTitle(courseName: string): string {
  return `${courseName} Teaching Plan`;
}

export async function runTeachingPlanPipeline(
  request: TeachingPlanRequest,
  deps: PipelineDeps,
  reporter: StageReporter
): Promise<PipelineOutcome> {
  const { course } = request;

  await reporter.stage('validating', 10, 'Checking course information...');
  const credentials = await requireCredentials(deps.credentials, request.actor);
  if (!course.catalog.trim()) {
    throw new ValidationError(EMPTY_CATALOG_MESSAGE, { courseId: course.id });
  }

  const theoryHours = course.totalHours - course.practiceHours;
  const planned = planSchedule(
    {
      totalWeeks: request.totalWeeks,
      classesPerWeek: request.classesPerWeek,
      firstWeekClasses: request.firstWeekClasses,
      skipSlots: parseSkipSlots(request.skipSlots),
      totalHours: course.totalHours,
      theoryHours,
      hourPerClass: request.hourPerClass,
      finalReview: request.finalReview
    },
    deps.settings.scheduleSlack
  );
  if (!planned.isSuccess()) {
    const first = planned.errors?.[0];
    throw new ValidationError(first ? first.message : 'Schedule could not be planned', { code: first?.code });
  }
  const plan = planned.value;

  await reporter.stage('generating', 30, 'Generating teaching plan content...');
  const client = deps.createClient(credentials);
  const prompt = buildTeachingPlanPrompt({
    courseName: course.name,
    courseCatalog: course.catalog,
    theoryHours,
    practiceHours: course.practiceHours,
    theoryClasses: plan.theoryClasses,
    practiceClasses: plan.practiceClasses,
    hourPerClass: request.hourPerClass,
    contentFrame: plan.contentFrame,
    actualClasses: plan.actualClasses,
    finalReview: request.finalReview
  });
  const validator = planItemsValidator(plan.contentFrame, request.hourPerClass);
  const schedule: PlanItem[] = await client.runStructured(
    prompt.systemPrompt,
    prompt.userPrompt,
    text => unwrapParseResult(parseJsonResponse(text, validator)),
    { temperature: LLM_TEMPERATURES.content, operation: 'teaching-plan' }
  );

  const last = plan.frame[plan.frame.length - 1];
  if (request.finalReview && last) {
    schedule.push({ week: last.week, order: last.order, ...FINAL_REVIEW_ITEM, hour: request.hourPerClass });
  }
  await reporter.stage('generating', 70, `AI generation complete, ${schedule.length} classes`);

  await reporter.stage('rendering', 85, 'Rendering the Word document...');
  const templateData = {
    academic_year: course.semester,
    course_name: course.name,
    target_classes: course.className,
    teacher_name: request.teacherName,
    total_hours: course.totalHours,
    theory_hours: theoryHours,
    practice_hours: course.practiceHours,
    schedule
  };
  const renderData: RenderData = { ...templateData, schedule: schedule.map(item => ({ ...item })) };
  const bytes = await deps.renderer.render(TEACHING_PLAN_TEMPLATE, renderData);
  const saved = await saveGeneratedDocument(bytes, 'teaching_plan', course.id, {
    generatedDir: deps.settings.generatedDir,
    now: deps.now?.()
  });

  await reporter.stage('saving', 95, 'Saving the teaching plan...');
  const planParams = buildPlanParams(schedule, { hourPerClass: request.hourPerClass, totalHours: course.totalHours });
  const document = await deps.documents.savePlan({
    courseId: course.id,
    title: teachingPlanTitle(course.name),
    content: templateData,
    planParams: { ...planParams },
    filePath: saved.relativePath
  });

  return {
    message: 'Teaching plan generated',
    outputPath: saved.relativePath,
    result: { document_id: document.id, classes: schedule.length }
  };
}
