import { CONTEXT_BUDGETS, truncateText } from './truncate.js';
import { PromptPair } from './types.js';

export function buildFrameworkInsightsPrompt(frameworkDoc: string): PromptPair {
  const userPrompt = `Extract from the framework design document below:
1) the list of functional modules
2) the list of core innovation points

Output format (STRICT):
- Return ONLY a single JSON object with the keys module_list and innovation_points, both arrays of strings.
- Do not include any prose, comments, markdown, or code fences.

Framework design document:
${truncateText(frameworkDoc, CONTEXT_BUDGETS.extraction)}`;

  return { systemPrompt: 'You extract structured facts from software design documents.', userPrompt };
}

export function buildPageListPrompt(pagePlanDoc: string): PromptPair {
  const userPrompt = `Extract the list of pages from the page plan below.
Each element has: name (page name), path (route), file (suggested file name, e.g. dashboard.html) and description (what the page does, at most 50 words).

Output format (STRICT):
- Return ONLY a JSON array.
- Do not include any prose, comments, markdown, or code fences.

Page plan:
${truncateText(pagePlanDoc, CONTEXT_BUDGETS.extraction)}`;

  return { systemPrompt: 'You extract page structures from planning documents.', userPrompt };
}
