// Prompt builders

export { CONTEXT_BUDGETS, TRUNCATION_MARKER, truncateText } from './truncate.js';
export { FINAL_REVIEW_ITEM, buildTeachingPlanPrompt } from './teaching-plan-prompt.js';
export {
  INSUFFICIENT_INPUT_TEXT,
  buildLessonPlanPrompt,
  buildPlanParamsPrompt,
  buildTimeReallocationPrompt
} from './lesson-plan-prompt.js';
export { buildFrameworkInsightsPrompt, buildPageListPrompt } from './extraction-prompts.js';
export {
  CONFIG_PLACEHOLDERS,
  COPYRIGHT_STAGES,
  DEFAULT_TEMPLATE_LOADER_CONFIG,
  INSIGHT_PLACEHOLDERS,
  STAGE_CONTEXT_BUDGETS,
  STAGE_PLACEHOLDERS,
  StageTemplateLoader,
  buildStagePrompt,
  copyrightTemplateLoader,
  findPlaceholders,
  renderTemplate
} from './copyright-templates.js';
export type {
  ConfigPlaceholder,
  CopyrightStage,
  InsightPlaceholder,
  StageContextMap,
  StageTemplate,
  StageVariables,
  TemplateLoaderConfig
} from './copyright-templates.js';
export type {
  LessonPlanPromptInput,
  PlanParamsPromptInput,
  PromptPair,
  TeachingPlanPromptInput,
  TimeReallocationPromptInput
} from './types.js';
