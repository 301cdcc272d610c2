/**
 * Copyright material stage templates
 *
 * Each of the eight stages has a YAML template under templates/copyright/ with a
 * system and a user prompt. The placeholders a stage may use are declared here;
 * a template naming anything else is rejected when it is loaded, so a typo
 * surfaces at startup instead of as a silently empty prompt section.
 */

import { createHash } from 'crypto';
import { existsSync, readFileSync } from 'fs';
import yaml from 'js-yaml';
import path from 'path';
import { z } from 'zod';
import { PATHS, resolvePath } from '../../../config/paths.js';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { CONTEXT_BUDGETS, truncateText } from './truncate.js';
import { PromptPair } from './types.js';

export const COPYRIGHT_STAGES = [
  'framework',
  'page_list',
  'ui_design',
  'frontend',
  'database',
  'backend',
  'user_manual',
  'application_form'
] as const;

export type CopyrightStage = typeof COPYRIGHT_STAGES[number];

/**
 * Values from the workspace configuration, available to every stage
 */
export const CONFIG_PLACEHOLDERS = [
  'front',
  'backend',
  'title',
  'short_title',
  'requirements_description',
  'dev_tech_stack',
  'ui_design_spec',
  'ui_design_style',
  'generation_mode',
  'page_count_fast',
  'page_count_full',
  'api_count_min',
  'api_count_max',
  'framework_design',
  'page_list',
  'ui_design',
  'database_schema',
  'copyright_application'
] as const;

/**
 * Extracted from the framework document, so unavailable to the framework stage itself
 */
export const INSIGHT_PLACEHOLDERS = ['module_list', 'innovation_points'] as const;

export type ConfigPlaceholder = typeof CONFIG_PLACEHOLDERS[number];
export type InsightPlaceholder = typeof INSIGHT_PLACEHOLDERS[number];
export type StageVariables = Record<ConfigPlaceholder | InsightPlaceholder, string>;

/**
 * Prior-stage material each stage's user prompt receives
 */
export interface StageContextMap {
  framework: { requirements_text: string; tech_stack_text: string };
  page_list: { framework_text: string };
  ui_design: { page_plan_text: string; framework_text: string; ui_spec_text: string };
  frontend: { page_items_json: string; ui_design_text: string };
  database: { framework_text: string; page_plan_text: string; ui_design_text: string };
  backend: { framework_text: string; page_plan_text: string; schema_text: string };
  user_manual: { requirements_text: string; framework_text: string; page_plan_text: string; ui_design_text: string };
  application_form: { requirements_text: string; framework_text: string };
}

type StageBudgets = { readonly [S in CopyrightStage]: { readonly [K in keyof StageContextMap[S]]: number | null } };

/**
 * Character budget per context entry; null passes the value through whole
 */
export const STAGE_CONTEXT_BUDGETS: StageBudgets = {
  framework: { requirements_text: CONTEXT_BUDGETS.primary, tech_stack_text: CONTEXT_BUDGETS.peripheral },
  page_list: { framework_text: CONTEXT_BUDGETS.primary },
  ui_design: {
    page_plan_text: CONTEXT_BUDGETS.primary,
    framework_text: CONTEXT_BUDGETS.secondary,
    ui_spec_text: CONTEXT_BUDGETS.peripheral
  },
  frontend: { page_items_json: null, ui_design_text: CONTEXT_BUDGETS.supporting },
  database: {
    framework_text: CONTEXT_BUDGETS.supporting,
    page_plan_text: CONTEXT_BUDGETS.supporting,
    ui_design_text: CONTEXT_BUDGETS.peripheral
  },
  backend: {
    framework_text: CONTEXT_BUDGETS.supporting,
    page_plan_text: CONTEXT_BUDGETS.supporting,
    schema_text: CONTEXT_BUDGETS.secondary
  },
  user_manual: {
    requirements_text: CONTEXT_BUDGETS.supporting,
    framework_text: CONTEXT_BUDGETS.secondary,
    page_plan_text: CONTEXT_BUDGETS.secondary,
    ui_design_text: CONTEXT_BUDGETS.secondary
  },
  application_form: { requirements_text: CONTEXT_BUDGETS.secondary, framework_text: CONTEXT_BUDGETS.secondary }
};

function declare(stage: CopyrightStage): ReadonlySet<string> {
  return new Set<string>([
    ...CONFIG_PLACEHOLDERS,
    ...(stage === 'framework' ? [] : INSIGHT_PLACEHOLDERS),
    ...Object.keys(STAGE_CONTEXT_BUDGETS[stage])
  ]);
}

export const STAGE_PLACEHOLDERS: Readonly<Record<CopyrightStage, ReadonlySet<string>>> = {
  framework: declare('framework'),
  page_list: declare('page_list'),
  ui_design: declare('ui_design'),
  frontend: declare('frontend'),
  database: declare('database'),
  backend: declare('backend'),
  user_manual: declare('user_manual'),
  application_form: declare('application_form')
};

const PLACEHOLDER_PATTERN = /\{\{\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*\}\}/g;

const StageTemplateSchema = z.object({
  template_version: z.string().min(1),
  prompt_profile: z.string().min(1),
  stage: z.enum(COPYRIGHT_STAGES),
  system_prompt: z.string().min(1),
  user_prompt: z.string().min(1),
  llm_directives: z.object({ temperature: z.number().min(0).max(2).optional() }).optional()
});

export interface StageTemplate {
  stage: CopyrightStage;
  templateId: string;
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  hash: string;
}

export function findPlaceholders(text: string): string[] {
  return Array.from(new Set(Array.from(text.matchAll(PLACEHOLDER_PATTERN), match => match[1])));
}

/**
 * Substitute `{{name}}` placeholders; names without a value render empty
 */
export function renderTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER_PATTERN, (_, key: string) => vars[key] ?? '').trim();
}

export interface TemplateLoaderConfig {
  templatesDir: string;
  cachingEnabled: boolean;
}

export const DEFAULT_TEMPLATE_LOADER_CONFIG: TemplateLoaderConfig = {
  templatesDir: resolvePath(PATHS.TEMPLATES_DIR, 'copyright'),
  cachingEnabled: true
};

/**
 * Loads and checks stage templates
 */
export class StageTemplateLoader {
  private config: TemplateLoaderConfig;
  private cache = new Map<CopyrightStage, StageTemplate>();
  private logger: Logger;

  constructor(config: Partial<TemplateLoaderConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_TEMPLATE_LOADER_CONFIG, ...config };
    this.logger = logger || silentLogger;
  }

  load(stage: CopyrightStage): StageTemplate {
    const cached = this.config.cachingEnabled ? this.cache.get(stage) : undefined;
    if (cached) return cached;

    const templatePath = path.join(this.config.templatesDir, `${stage}.yaml`);
    if (!existsSync(templatePath)) {
      throw new ConfigurationError(`Prompt template not found for stage "${stage}"`, { templatePath });
    }

    const raw = readFileSync(templatePath, 'utf-8');
    let document: unknown;
    try {
      document = yaml.load(raw);
    } catch (error) {
      throw new ConfigurationError(`Prompt template for stage "${stage}" is not valid YAML: ${errorMessage(error)}`, {
        templatePath
      });
    }

    const parsed = StageTemplateSchema.safeParse(document);
    if (!parsed.success) {
      throw new ConfigurationError(`Prompt template for stage "${stage}" is malformed`, {
        templatePath,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }
    if (parsed.data.stage !== stage) {
      throw new ConfigurationError(`Prompt template ${templatePath} declares stage "${parsed.data.stage}"`, {
        expected: stage
      });
    }

    const declared = STAGE_PLACEHOLDERS[stage];
    const undeclared = findPlaceholders(`${parsed.data.system_prompt}\n${parsed.data.user_prompt}`).filter(
      name => !declared.has(name)
    );
    if (undeclared.length > 0) {
      throw new ConfigurationError(
        `Prompt template for stage "${stage}" uses undeclared placeholders: ${undeclared.join(', ')}`,
        { templatePath, undeclared }
      );
    }

    const template: StageTemplate = {
      stage,
      templateId: `${parsed.data.prompt_profile}@${parsed.data.template_version}`,
      systemPrompt: parsed.data.system_prompt,
      userPrompt: parsed.data.user_prompt,
      temperature: parsed.data.llm_directives?.temperature,
      hash: createHash('sha256').update(raw).digest('hex')
    };

    this.logger('debug', 'Loaded stage template', { stage, templateId: template.templateId });
    if (this.config.cachingEnabled) {
      this.cache.set(stage, template);
    }
    return template;
  }

  /**
   * Load every stage so a broken template fails the caller before any work starts
   */
  loadAll(): Record<CopyrightStage, StageTemplate> {
    return {
      framework: this.load('framework'),
      page_list: this.load('page_list'),
      ui_design: this.load('ui_design'),
      frontend: this.load('frontend'),
      database: this.load('database'),
      backend: this.load('backend'),
      user_manual: this.load('user_manual'),
      application_form: this.load('application_form')
    };
  }

  clearCache(): void {
    this.cache.clear();
  }
}

/**
 * Render one stage: config values into both prompts, truncated prior-stage
 * context into the user prompt
 */
export function buildStagePrompt<S extends CopyrightStage>(
  stage: S,
  template: StageTemplate,
  variables: StageVariables,
  context: StageContextMap[S]
): PromptPair {
  if (template.stage !== stage) {
    throw new ConfigurationError(`Template ${template.templateId} belongs to stage "${template.stage}", not "${stage}"`);
  }

  const budgets: Readonly<Record<string, number | null>> = STAGE_CONTEXT_BUDGETS[stage];
  const values: Readonly<Record<string, string>> = context;
  const truncated: Record<string, string> = {};
  for (const [key, budget] of Object.entries(budgets)) {
    const value = values[key] ?? '';
    truncated[key] = budget === null ? value : truncateText(value, budget);
  }

  return {
    systemPrompt: renderTemplate(template.systemPrompt, variables),
    userPrompt: renderTemplate(template.userPrompt, { ...variables, ...truncated })
  };
}

export const copyrightTemplateLoader = new StageTemplateLoader();
