import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { readFileSync } from 'fs';
import { PATHS, resolvePath } from '../../../config/paths.js';
import { ShapeValidator } from './json-response.js';
import { DraftLessonPlan } from './types.js';

const SCHEMA_FILE = 'schemas/lesson-plan.schema.json';

let compiled: ValidateFunction<DraftLessonPlan> | null = null;

function lessonPlanValidator(): ValidateFunction<DraftLessonPlan> {
  if (!compiled) {
    const ajv = new Ajv({ strict: true, allErrors: true, coerceTypes: false });
    addFormats(ajv);
    const schema = JSON.parse(readFileSync(resolvePath(PATHS.RESOURCES_DIR, SCHEMA_FILE), 'utf-8'));
    compiled = ajv.compile<DraftLessonPlan>(schema);
  }
  return compiled;
}

/**
 * Field path an ajv error points at (`new_lessons[1].content`, `review_time`, ...)
 */
function fieldOf(error: ErrorObject): string {
  const segments = error.instancePath
    .split('/')
    .filter(Boolean)
    .map(segment => (/^\d+$/.test(segment) ? `[${segment}]` : `.${segment}`))
    .join('')
    .replace(/^\./, '');

  if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
    return segments ? `${segments}.${error.params.missingProperty}` : error.params.missingProperty;
  }
  return segments || '(root)';
}

/**
 * Shape check for a generated lesson plan; time fields are left to validateTimeAllocation
 */
export const validateLessonPlanShape: ShapeValidator<DraftLessonPlan> = data => {
  const validate = lessonPlanValidator();
  if (validate(data)) {
    return { ok: true, value: data };
  }

  const fields = Array.from(new Set((validate.errors ?? []).map(fieldOf)));
  return { ok: false, fields };
};
