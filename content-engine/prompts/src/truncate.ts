export const TRUNCATION_MARKER = '[content too long, truncated]';

/**
 * Context budgets (characters) by how central a source is to the prompt reading it
 */
export const CONTEXT_BUDGETS = {
  primary: 12000,
  extraction: 10000,
  supporting: 8000,
  secondary: 6000,
  peripheral: 4000
} as const;

/**
 * Cut `text` to `maxChars` and append the truncation marker when anything was dropped
 */
export function truncateText(text: string, maxChars: number = CONTEXT_BUDGETS.primary): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}\n\n${TRUNCATION_MARKER}`;
}
