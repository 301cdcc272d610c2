/**
 * Lesson-plan prompt contracts
 *
 * Three builders share the time-budget law: the full lesson, the time-only
 * repair used by the reconciliation loop, and plan-parameter extraction from an
 * uploaded teaching plan.
 */

import { ASSESSMENT_MINUTES, SUMMARY_MINUTES, totalMinutes } from '../../parsers/src/time-allocation.js';
import { LESSON_PLAN_FIELDS } from '../../parsers/src/types.js';
import {
  LessonPlanPromptInput,
  PlanParamsPromptInput,
  PromptPair,
  TimeReallocationPromptInput
} from './types.js';

export const INSUFFICIENT_INPUT_TEXT = 'Insufficient input: please provide more details.';

const LESSON_SYSTEM_PROMPT =
  'You are an experienced vocational college instructor who designs courses and writes lesson plans.';

const SYSTEM_FIELD_NAMES = ['project_name', 'week', 'sequence', 'hours', 'total_hours'] as const;

function modeRules(input: LessonPlanPromptInput): string {
  if (input.strict) {
    return `- System fields are authoritative: ${SYSTEM_FIELD_NAMES.map(name => `\`${name}\``).join(', ')} must equal the System Fields exactly. Do not rewrite or recompute them.
- The Plan Item is the only source for this lesson: \`project_name\` equals the Plan Item \`title\`, and the teaching content and new lessons develop its \`tasks\`.`;
  }
  return `- No System Fields or Plan Item are available: \`sequence\` must equal ${input.sequence}; infer \`project_name\`, \`week\`, \`hours\` and \`total_hours\` from the plan text and keep them consistent with each other.`;
}

/**
 * Full lesson plan for one session, in strict or lenient mode
 */
export function buildLessonPlanPrompt(input: LessonPlanPromptInput): PromptPair {
  const sections: string[] = [
    `Write the data for one lesson plan, following the generation rules below.

Input:
1. Sequence: ${input.sequence}
2. Teaching plan full text:
${input.documentText}`
  ];

  if (input.systemFields) {
    sections.push(`3. System Fields: ${JSON.stringify(input.systemFields)}`);
  }
  if (input.planItem) {
    sections.push(`4. Plan Item: ${JSON.stringify(input.planItem)}`);
  }

  sections.push(`Course context:
${input.courseContext}`);

  sections.push(`Rules (any violation fails the task):

1. Keys
- Use exactly these keys: ${LESSON_PLAN_FIELDS.join(', ')}.
${modeRules(input)}

2. Content
- knowledge_goals, ability_goals, quality_goals: at least 3 lines each, numbered (1) (2) (3), at least 20 characters per line.
- teaching_content: an overview of at least 2 paragraphs, at least 50 characters each.
- teaching_focus, teaching_difficulty: at least 2 lines each, numbered (1) (2), at least 20 characters per line.
- review_content: first person plural in an objective written register. No assumptions about what students remember or have mastered. Three parts of at least 30 characters each: recap of the previous session's key points, the lead-in to this session, this session's goals.
- summary_content: first person plural, objective. Numbered 1. key points and skills of this session, 2. cautions and common mistakes, 3. how goal attainment was checked (questions, exercises, observation) and how gaps are addressed next session. At least 30 characters per point.
- homework_content: 1 to 2 short, achievable assignments.
- Every line of every multi-line field ends with a newline, and the field itself ends with a newline.

3. Time budget
- Total minutes = hours * 40. Assessment takes ${ASSESSMENT_MINUTES} minutes and the summary ${SUMMARY_MINUTES} minutes, both fixed.
- review_time is an integer between 5 and 15.
- All remaining minutes go to new_lessons.
- review_time + sum(new_lessons.time) + ${ASSESSMENT_MINUTES} + ${SUMMARY_MINUTES} == hours * 40 must hold exactly.

4. new_lessons
- A list of 3 to 5 objects, each with "content" (task name and teacher activity) and "time" (integer minutes).

5. When the input is not enough, still return the complete structure with every text field set to "${INSUFFICIENT_INPUT_TEXT}".

Output format (STRICT):
- Return ONLY a single JSON object.
- Do not include any prose, comments, markdown, or code fences.`);

  return { systemPrompt: LESSON_SYSTEM_PROMPT, userPrompt: sections.join('\n\n') };
}

/**
 * Time-only repair: the model may change review_time and per-item times, nothing else
 */
export function buildTimeReallocationPrompt(input: TimeReallocationPromptInput): PromptPair {
  const minutes = totalMinutes(input.hours);
  const lessons = JSON.stringify(input.newLessons.map(lesson => ({ content: lesson.content })));

  const userPrompt = `Regenerate the time allocation of a lesson plan without changing any teaching content.

Input:
- Hours: ${input.hours}
- Total minutes: ${minutes}
- Fixed deductions: assessment ${ASSESSMENT_MINUTES} minutes, summary ${SUMMARY_MINUTES} minutes
- New lessons: ${lessons}

Rules:
1. review_time is an integer between 5 and 15.
2. new_lessons has the same length and order as the input; copy every content unchanged and only fill in time.
3. Every time is a positive integer and review_time + sum(time) + ${ASSESSMENT_MINUTES} + ${SUMMARY_MINUTES} == ${minutes}.

Output format (STRICT):
- Return ONLY a single JSON object: {"review_time": 10, "new_lessons": [{"content": "...", "time": 20}]}.
- Do not include any prose, comments, markdown, or code fences.`;

  return { systemPrompt: 'You only correct lesson-plan time allocations.', userPrompt };
}

/**
 * Plan parameters from the extracted text of an uploaded teaching plan
 */
export function buildPlanParamsPrompt(input: PlanParamsPromptInput): PromptPair {
  const userPrompt = `Extract the session parameters from a teaching plan as structured JSON.

Input:
- Course total hours (usable to infer hours per session): ${input.totalHours ?? 'unknown'}
- Teaching plan text:
${input.extractedText}

Rules:
1. "schedule" lists every session, including theory, practical and review/assessment sessions.
2. "week" and "order" are integers; keep "title" and "tasks" as close to the text as possible.
3. When the text gives no hours for a session, leave "hour" empty, but still infer "hour_per_class" where possible.

Output format (STRICT):
- Return ONLY a single JSON object: {"schedule": [{"week": 1, "order": 1, "title": "Project 1: ...", "tasks": "1. ...\\n2. ...", "hour": 4}], "hour_per_class": 4}.
- Do not include any prose, comments, markdown, or code fences.`;

  return { systemPrompt: 'You extract teaching-plan session parameters into structured data.', userPrompt };
}
