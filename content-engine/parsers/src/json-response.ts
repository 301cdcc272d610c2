/**
 * JSON extraction from model output
 *
 * Expected malformed output is a value (JsonError / SchemaError), never a throw,
 * so callers choose between retrying, repairing and failing.
 */

import { ResponseFormatError, errorMessage } from '../../utils/errors.js';

export type ParseResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'json_error'; message: string; raw: string }
  | { kind: 'schema_error'; fields: string[]; message: string };

/**
 * Shape check run after JSON.parse: returns the typed value or the offending field names
 */
export type ShapeValidator<T> = (data: unknown) => { ok: true; value: T } | { ok: false; fields: string[] };

/**
 * Remove a wrapping markdown code fence and its language tag
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/);
  if (fenced) {
    return fenced[1].trim();
  }
  // Opening fence without a closing one (truncated output)
  if (trimmed.startsWith('```')) {
    return trimmed.replace(/^```[\w-]*[ \t]*\r?\n?/, '').trim();
  }
  return trimmed;
}

export function parseJsonResponse(text: string): ParseResult<unknown>;
export function parseJsonResponse<T>(text: string, validate: ShapeValidator<T>): ParseResult<T>;
export function parseJsonResponse<T>(text: string, validate?: ShapeValidator<T>): ParseResult<T | unknown> {
  const body = stripCodeFence(text);
  if (!body) {
    return { kind: 'json_error', message: 'Empty response', raw: text };
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    return {
      kind: 'json_error',
      message: errorMessage(error),
      raw: text
    };
  }

  if (!validate) {
    return { kind: 'ok', value: data };
  }

  const checked = validate(data);
  if (!checked.ok) {
    return {
      kind: 'schema_error',
      fields: checked.fields,
      message: `Response is missing or mistypes: ${checked.fields.join(', ')}`
    };
  }
  return { kind: 'ok', value: checked.value };
}

/**
 * Unwrap a ParseResult, converting failures into ResponseFormatError so the LLM client retries them
 */
export function unwrapParseResult<T>(result: ParseResult<T>): T {
  switch (result.kind) {
    case 'ok':
      return result.value;
    case 'json_error':
      throw new ResponseFormatError(`Invalid JSON in AI response: ${result.message}`, {
        preview: result.raw.slice(0, 200)
      });
    case 'schema_error':
      throw new ResponseFormatError(result.message, { fields: result.fields });
  }
}
