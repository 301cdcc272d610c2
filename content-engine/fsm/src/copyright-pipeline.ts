/**
 * Copyright material pipeline
 *
 * Eight chained generation stages over one prepared workspace. Each stage's
 * output is written to the workspace before the next stage reads it; code
 * stages use the multi-file block format and fall back to fixed sample files
 * when the model returns nothing usable. The run ends with the source merge
 * and a zip of the whole workspace.
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { PageItem, parseFileBlocks, parseFrameworkInsights, parsePageItems } from '../../parsers/src/index.js';
import {
  CopyrightStage,
  StageContextMap,
  StageTemplate,
  StageVariables,
  buildStagePrompt
} from '../../prompts/src/copyright-templates.js';
import { buildFrameworkInsightsPrompt, buildPageListPrompt } from '../../prompts/src/extraction-prompts.js';
import { isNotFound } from '../../utils/atomic-write.js';
import { requireCredentials } from '../../utils/credentials.js';
import { ConfigurationError } from '../../utils/errors.js';
import { LLMClient, LLM_TEMPERATURES } from '../../utils/llm-client.js';
import { Logger } from '../../utils/logger.js';
import { fallbackBackendFiles, fallbackDatabaseFiles, fallbackFrontendFiles, loadDefaultPages } from '../../workspace/src/fallbacks.js';
import { USER_MANUAL_FILE } from '../../workspace/src/types.js';
import { buildProjectConfig, safeWriteFiles, systemNameOf, writeProjectDocuments } from '../../workspace/src/workspace.js';
import { StageReporter } from './run-driver.js';
import { CopyrightRequest, PipelineDeps, PipelineOutcome } from './types.js';

export const EMPTY_REQUIREMENTS_MESSAGE = 'Requirements document cannot be empty';

async function readOptional(filePath: string | null): Promise<string> {
  if (!filePath) return '';
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return '';
    throw error;
  }
}

async function writeStageDocument(projectDir: string, relativePath: string, content: string): Promise<void> {
  await writeFile(path.join(projectDir, relativePath), `${content}\n`, 'utf-8');
}

/**
 * One stage call: template plus context in, model text out
 */
class StageRunner {
  constructor(
    private client: LLMClient,
    private templates: Record<CopyrightStage, StageTemplate>,
    private variables: StageVariables
  ) {}

  setInsights(moduleList: string, innovationPoints: string): void {
    this.variables = { ...this.variables, module_list: moduleList, innovation_points: innovationPoints };
  }

  async run<S extends CopyrightStage>(stage: S, context: StageContextMap[S]): Promise<string> {
    const template = this.templates[stage];
    const prompt = buildStagePrompt(stage, template, this.variables, context);
    return this.client.runPrompt(prompt.systemPrompt, prompt.userPrompt, {
      temperature: template.temperature ?? LLM_TEMPERATURES.content,
      operation: `copyright-${stage}`
    });
  }
}

/**
 * Write the parsed file blocks of a code stage, or the fallback files when there are none
 */
async function writeCodeStage(
  projectDir: string,
  output: string,
  fallback: () => Record<string, string>,
  logger: Logger,
  stage: CopyrightStage
): Promise<string[]> {
  const blocks = parseFileBlocks(output);
  if (blocks.size > 0) {
    return safeWriteFiles(projectDir, blocks, logger);
  }
  logger('warn', 'Stage returned no file blocks, writing fallback files', { stage });
  return safeWriteFiles(projectDir, fallback(), logger);
}

export async function runCopyrightPipeline(
  request: CopyrightRequest,
  deps: PipelineDeps,
  reporter: StageReporter
): Promise<PipelineOutcome> {
  const { project } = request;
  const logger = deps.logger;

  await reporter.stage('preparing', 5, 'Preparing the project workspace...');
  const credentials = await requireCredentials(deps.credentials, request.actor);
  const requirementsText = project.requirements_text.trim();
  if (!requirementsText) {
    throw new ConfigurationError(EMPTY_REQUIREMENTS_MESSAGE, { projectId: project.id });
  }

  const templates = deps.templates.loadAll();
  const projectDir = await deps.workspace.prepareWorkspace(project.id);
  const documents = await writeProjectDocuments(projectDir, project);
  const { variables } = await buildProjectConfig(projectDir, project, deps.workspace.vendorDir);
  const systemName = systemNameOf(project);

  const client = deps.createClient(credentials);
  const stages = new StageRunner(client, templates, variables);

  await reporter.stage('generating', 15, 'Generating the framework design...');
  const frameworkDoc = await stages.run('framework', {
    requirements_text: requirementsText,
    tech_stack_text: await readOptional(documents.techStackPath)
  });
  await writeStageDocument(projectDir, variables.framework_design, frameworkDoc);

  const insightsPrompt = buildFrameworkInsightsPrompt(frameworkDoc);
  const insights = parseFrameworkInsights(
    await client.runPrompt(insightsPrompt.systemPrompt, insightsPrompt.userPrompt, {
      temperature: LLM_TEMPERATURES.extraction,
      operation: 'framework-insights'
    })
  );
  stages.setInsights(insights.moduleList, insights.innovationPoints);

  await reporter.stage('generating', 30, 'Generating the page plan...');
  const pagePlanDoc = await stages.run('page_list', { framework_text: frameworkDoc });
  await writeStageDocument(projectDir, variables.page_list, pagePlanDoc);

  const pagesPrompt = buildPageListPrompt(pagePlanDoc);
  let pages: PageItem[] = parsePageItems(
    await client.runPrompt(pagesPrompt.systemPrompt, pagesPrompt.userPrompt, {
      temperature: LLM_TEMPERATURES.extraction,
      operation: 'page-list'
    })
  );
  if (pages.length === 0) {
    logger('warn', 'No pages extracted from the page plan, using the default page list', { projectId: project.id });
    pages = loadDefaultPages(deps.settings.resourcesDir);
  }

  await reporter.stage('generating', 45, 'Generating the interface design...');
  const uiDesignDoc = await stages.run('ui_design', {
    page_plan_text: pagePlanDoc,
    framework_text: frameworkDoc,
    ui_spec_text: await readOptional(documents.uiSpecPath)
  });
  await writeStageDocument(projectDir, variables.ui_design, uiDesignDoc);

  await reporter.stage('generating', 55, 'Generating the frontend source...');
  const frontendOutput = await stages.run('frontend', {
    page_items_json: JSON.stringify(pages, null, 2),
    ui_design_text: uiDesignDoc
  });
  const frontendFiles = await writeCodeStage(
    projectDir,
    frontendOutput,
    () => fallbackFrontendFiles(systemName, pages),
    logger,
    'frontend'
  );
  if (!frontendFiles.some(file => path.extname(file).toLowerCase() === '.html')) {
    logger('warn', 'Frontend stage wrote no HTML pages, adding fallback pages', { projectId: project.id });
    await safeWriteFiles(projectDir, fallbackFrontendFiles(systemName, pages), logger);
  }

  await reporter.stage('generating', 65, 'Generating the database script...');
  const databaseOutput = await stages.run('database', {
    framework_text: frameworkDoc,
    page_plan_text: pagePlanDoc,
    ui_design_text: uiDesignDoc
  });
  await writeCodeStage(
    projectDir,
    databaseOutput,
    () => fallbackDatabaseFiles(systemName, deps.now?.()),
    logger,
    'database'
  );

  await reporter.stage('generating', 75, 'Generating the backend source...');
  const backendOutput = await stages.run('backend', {
    framework_text: frameworkDoc,
    page_plan_text: pagePlanDoc,
    schema_text: await readOptional(path.join(projectDir, variables.database_schema))
  });
  await writeCodeStage(projectDir, backendOutput, () => fallbackBackendFiles(systemName), logger, 'backend');

  await reporter.stage('generating', 82, 'Generating the user manual...');
  const manualDoc = await stages.run('user_manual', {
    requirements_text: requirementsText,
    framework_text: frameworkDoc,
    page_plan_text: pagePlanDoc,
    ui_design_text: uiDesignDoc
  });
  await writeStageDocument(projectDir, USER_MANUAL_FILE, manualDoc);

  await reporter.stage('generating', 88, 'Generating the registration form...');
  const formDoc = await stages.run('application_form', {
    requirements_text: requirementsText,
    framework_text: frameworkDoc
  });
  await writeStageDocument(projectDir, variables.copyright_application, formDoc);

  await reporter.stage('rendering', 92, 'Merging the source documents...');
  await deps.merge.merge(projectDir);

  await reporter.stage('saving', 96, 'Packaging the archive...');
  const archivePath = await deps.workspace.packageWorkspace(projectDir, project.id, deps.now?.());

  return {
    message: 'Copyright materials generated',
    outputPath: archivePath,
    result: { project_id: project.id, pages: pages.length }
  };
}
