/**
 * Teaching-plan import
 *
 * Session parameters are read back out of a teaching plan's text by the model,
 * normalized, and stored on the course's plan document. Lesson-plan runs then
 * take their system fields from that schedule.
 */

import { CourseDocument, DocumentStore } from '../../documents/src/index.js';
import { stripCodeFence } from '../../parsers/src/index.js';
import { buildPlanParamsPrompt } from '../../prompts/src/index.js';
import { extractDocxText } from '../../rendering/src/index.js';
import { PlanParams, parsePlanParamsJson } from '../../scheduling/src/index.js';
import { ResponseFormatError, ValidationError } from '../../utils/errors.js';
import { LLMClient, LLM_TEMPERATURES } from '../../utils/llm-client.js';
import { teachingPlanTitle } from './teaching-plan-pipeline.js';

export const EMPTY_PLAN_TEXT_MESSAGE = 'Teaching plan parsing failed: the document is empty';

export const NO_SESSIONS_MESSAGE = 'No sessions could be extracted from the teaching plan';

export const UNSUPPORTED_PLAN_FILE_MESSAGE = 'Teaching plan import only supports .docx or .md files';

export const PLAN_FILE_EXTENSIONS = ['.docx', '.md'] as const;

export type PlanFileExtension = typeof PLAN_FILE_EXTENSIONS[number];

export function planFileExtension(fileName: string): PlanFileExtension | null {
  const lower = fileName.trim().toLowerCase();
  return PLAN_FILE_EXTENSIONS.find(extension => lower.endsWith(extension)) ?? null;
}

/**
 * Plain text of an uploaded plan file
 */
export async function planFileText(fileName: string, bytes: Uint8Array): Promise<string> {
  const extension = planFileExtension(fileName);
  if (extension === '.docx') {
    return extractDocxText(bytes);
  }
  if (extension === '.md') {
    return new TextDecoder('utf-8').decode(bytes);
  }
  throw new ValidationError(UNSUPPORTED_PLAN_FILE_MESSAGE, { fileName });
}

/**
 * Ask the model for the session schedule in `text`. Unreadable output is retried
 * within the client's attempt budget; a readable answer without sessions fails.
 */
export async function extractPlanParams(client: LLMClient, text: string, totalHours: number | null): Promise<PlanParams> {
  const extractedText = text.trim();
  if (!extractedText) {
    throw new ValidationError(EMPTY_PLAN_TEXT_MESSAGE);
  }

  const prompt = buildPlanParamsPrompt({ extractedText, totalHours });
  const params = await client.runStructured(
    prompt.systemPrompt,
    prompt.userPrompt,
    reply => {
      const parsed = parsePlanParamsJson(stripCodeFence(reply), totalHours);
      if (!parsed) {
        throw new ResponseFormatError('Plan parameters are not a {"schedule": [...]} object', { preview: reply.slice(0, 200) });
      }
      return parsed;
    },
    { temperature: LLM_TEMPERATURES.extraction, operation: 'plan-params' }
  );

  if (params.schedule.length === 0) {
    throw new ValidationError(NO_SESSIONS_MESSAGE);
  }
  return params;
}

export interface PlanImportInput {
  course: { id: string; name: string; totalHours: number | null };
  text: string;
}

/**
 * Extract the schedule from `input.text` and store it as the course's plan,
 * replacing any earlier one
 */
export async function importTeachingPlan(
  input: PlanImportInput,
  client: LLMClient,
  documents: DocumentStore
): Promise<{ document: CourseDocument; params: PlanParams }> {
  const params = await extractPlanParams(client, input.text, input.course.totalHours);
  const document = await documents.savePlan({
    courseId: input.course.id,
    title: teachingPlanTitle(input.course.name),
    content: { source: 'import' },
    planParams: { ...params },
    filePath: null
  });
  return { document, params };
}
