/**
 * Best-effort extraction from free-text design documents.
 * Failures degrade to empty results; callers bring their own fallback content.
 */

import { isRecord } from '../../utils/result.js';
import { parseJsonResponse } from './json-response.js';
import { FrameworkInsights, PageItem } from './types.js';

export const EMPTY_INSIGHTS: FrameworkInsights = { moduleList: '', innovationPoints: '' };

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .map(item => String(item).trim())
    .filter(item => item.length > 0);
}

function bulletList(items: string[]): string {
  return items.map(item => `- ${item}`).join('\n');
}

/**
 * `{module_list: string[], innovation_points: string[]}` rendered as "- item" lines
 */
export function parseFrameworkInsights(text: string): FrameworkInsights {
  const parsed = parseJsonResponse(text);
  if (parsed.kind !== 'ok' || !isRecord(parsed.value)) {
    return EMPTY_INSIGHTS;
  }

  return {
    moduleList: bulletList(stringList(parsed.value.module_list)),
    innovationPoints: bulletList(stringList(parsed.value.innovation_points))
  };
}

function textField(item: Record<string, unknown>, key: string, fallback: string): string {
  const value = item[key];
  return value === undefined || value === null ? fallback : String(value);
}

/**
 * JSON array of `{name, path, file, description}`; anything else yields []
 */
export function parsePageItems(text: string): PageItem[] {
  const parsed = parseJsonResponse(text);
  if (parsed.kind !== 'ok' || !Array.isArray(parsed.value)) {
    return [];
  }

  return parsed.value.filter(isRecord).map(item => ({
    name: textField(item, 'name', 'Page'),
    path: textField(item, 'path', '/'),
    file: textField(item, 'file', 'index.html'),
    description: textField(item, 'description', '')
  }));
}
