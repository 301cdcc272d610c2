/**
 * Multi-file text protocol
 *
 *   ### FILE: output_sourcecode/front/index.html
 *   <html>...</html>
 *   ### FILE: output_sourcecode/front/app.js
 *   ...
 *
 * The localized label `文件` and a full-width colon are accepted as well.
 */

import { pathValidation } from '../../../config/paths.js';

export const FILE_MARKER_PATTERN = /^###\s*(?:FILE|文件)\s*[:：]\s*(.+)$/i;

/**
 * Relative, non-escaping path or null
 */
export function normalizeBlockPath(rawPath: string): string | null {
  const trimmed = rawPath.trim().replace(/\\/g, '/');
  if (!trimmed || pathValidation.hasPathTraversal(trimmed)) {
    return null;
  }
  return trimmed.replace(/^(\.\/)+/, '');
}

function trimBlankLines(lines: string[]): string {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end).join('\n');
}

/**
 * Split model output into `{path: content}`; blocks with absolute or escaping paths are skipped
 */
export function parseFileBlocks(text: string): Map<string, string> {
  const files = new Map<string, string>();
  let currentPath: string | null = null;
  let inBlock = false;
  let buffer: string[] = [];

  const flush = () => {
    if (inBlock && currentPath !== null) {
      files.set(currentPath, trimBlankLines(buffer));
    }
  };

  for (const line of text.split(/\r?\n/)) {
    const match = line.trim().match(FILE_MARKER_PATTERN);
    if (match) {
      flush();
      inBlock = true;
      currentPath = normalizeBlockPath(match[1]);
      buffer = [];
    } else if (inBlock) {
      buffer.push(line);
    }
  }
  flush();

  return files;
}

/**
 * Inverse of parseFileBlocks
 */
export function serializeFileBlocks(files: Map<string, string> | Record<string, string>): string {
  const entries = files instanceof Map ? Array.from(files.entries()) : Object.entries(files);
  return entries
    .map(([path, content]) => `### FILE: ${path}\n${content}`)
    .join('\n\n');
}
