/**
 * Copyright workspace manager
 *
 * One directory per project under the workspaces root. Every run copies the
 * vendor tree in again and recreates the generated subtrees, so nothing from a
 * previous run survives into the next archive.
 */

import { Dirent } from 'fs';
import { copyFile, mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { pathFor, pathValidation, PATHS, resolvePath } from '../../../config/paths.js';
import { isNotFound, writeFileAtomic } from '../../utils/atomic-write.js';
import { ConfigurationError, ValidationError } from '../../utils/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { Uint8ArrayReader, Uint8ArrayWriter, ZipWriter } from '../../utils/zip.js';
import { ConfigPlaceholder, StageVariables } from '../../prompts/src/copyright-templates.js';
import {
  CopyrightProjectInput,
  DEFAULT_TECH_STACK_FILE,
  DEFAULT_UI_SPEC_FILE,
  GENERATED_DIRS,
  PROJECT_CONFIG_FILE,
  PROMPTS_DIR,
  ProjectDocuments,
  REQUIREMENTS_FILE,
  SOURCE_DIRS,
  TECH_STACK_FILE,
  UI_SPEC_FILE,
  VENDOR_DIRS
} from './types.js';

const PROJECT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

async function syncDirectory(source: string, target: string): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(source, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) return;
    throw error;
  }

  await mkdir(target, { recursive: true });
  for (const entry of entries) {
    const from = path.join(source, entry.name);
    const to = path.join(target, entry.name);
    if (entry.isDirectory()) {
      await syncDirectory(from, to);
    } else if (entry.isFile()) {
      await copyFile(from, to);
    }
  }
}

/**
 * Every regular file under `root`, as sorted relative posix paths
 */
export async function listFiles(root: string, prefix = ''): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(path.join(root, prefix), { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files.sort();
}

/**
 * Write `{relativePath: content}` under root. Entries that would land outside
 * root are skipped. Content is trimmed and ends with one newline.
 */
export async function safeWriteFiles(
  root: string,
  files: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
  logger: Logger = silentLogger
): Promise<string[]> {
  const entries = files instanceof Map ? Array.from(files.entries()) : Object.entries(files);
  const written: string[] = [];

  for (const [rawPath, content] of entries) {
    const relativePath = rawPath.trim().replace(/\\/g, '/');
    const targetPath = path.resolve(root, relativePath);
    if (
      !relativePath ||
      pathValidation.hasPathTraversal(relativePath) ||
      !pathValidation.isWithinDirectory(targetPath, root) ||
      targetPath === path.resolve(root)
    ) {
      logger('warn', 'Skipping file outside the workspace', { path: rawPath });
      continue;
    }

    await mkdir(path.dirname(targetPath), { recursive: true });
    await writeFile(targetPath, `${content.trim()}\n`, 'utf-8');
    written.push(targetPath);
  }

  return written;
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export function systemNameOf(project: CopyrightProjectInput): string {
  return project.system_name?.trim() || project.name;
}

/**
 * Requirements document, plus the UI specification and technology stack
 * documents the project opted into
 */
export async function writeProjectDocuments(projectDir: string, project: CopyrightProjectInput): Promise<ProjectDocuments> {
  const header = [`# ${systemNameOf(project)} Requirements`];
  if (project.domain) header.push(`\n**Domain**: ${project.domain}`);
  if (project.description) header.push(`\n**Description**: ${project.description}`);
  header.push('\n## Requirements description\n');

  const requirementsPath = path.join(projectDir, REQUIREMENTS_FILE);
  await mkdir(path.dirname(requirementsPath), { recursive: true });
  await writeFile(requirementsPath, `${header.join('\n')}${project.requirements_text.trim()}\n`, 'utf-8');

  let uiSpecPath: string | null = null;
  if (project.include_ui_desc) {
    uiSpecPath = path.join(projectDir, UI_SPEC_FILE);
    const content = project.ui_description?.trim() || 'Please add a UI design specification.\n';
    await writeFile(uiSpecPath, withTrailingNewline(content), 'utf-8');
  }

  let techStackPath: string | null = null;
  if (project.include_tech_desc) {
    techStackPath = path.join(projectDir, TECH_STACK_FILE);
    const content = project.tech_description?.trim() || 'Please add a technology stack description.\n';
    await writeFile(techStackPath, withTrailingNewline(content), 'utf-8');
  }

  return { requirementsPath, uiSpecPath, techStackPath };
}

const VendorConfigSchema = z
  .object({
    front: z.string().default('React'),
    backend: z.string().default('Node.js Express'),
    ui_design_style: z.string().default('corporate'),
    page_count_fast: z.coerce.number().int().positive().default(5),
    page_count_full: z.coerce.number().int().positive().default(10),
    api_count_min: z.coerce.number().int().positive().default(8),
    api_count_max: z.coerce.number().int().positive().default(15)
  })
  .passthrough();

export type ProjectConfig = z.infer<typeof VendorConfigSchema> & Record<ConfigPlaceholder, string | number>;

export interface BuiltProjectConfig {
  config: ProjectConfig;
  /** Stage placeholder values; the framework insights start empty */
  variables: StageVariables;
}

/**
 * Merge the vendor defaults with the project's values, write the result into
 * the workspace and derive the stage placeholder values from it
 */
export async function buildProjectConfig(
  projectDir: string,
  project: CopyrightProjectInput,
  vendorDir: string = pathFor('VENDOR_DIR')
): Promise<BuiltProjectConfig> {
  const configPath = path.join(vendorDir, 'config.json');
  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    if (!isNotFound(error)) {
      throw new ConfigurationError(`Vendor config ${configPath} is unreadable`, { error: String(error) });
    }
  }

  const parsed = VendorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Vendor config ${configPath} is malformed`, {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    });
  }

  const title = systemNameOf(project);
  const config: ProjectConfig = {
    ...parsed.data,
    title,
    short_title: project.software_abbr?.trim() || project.name,
    requirements_description: REQUIREMENTS_FILE,
    dev_tech_stack: project.include_tech_desc ? TECH_STACK_FILE : DEFAULT_TECH_STACK_FILE,
    ui_design_spec: project.include_ui_desc ? UI_SPEC_FILE : DEFAULT_UI_SPEC_FILE,
    generation_mode: project.generation_mode,
    framework_design: `process_docs/${pathValidation.sanitizeFilename(title)}_framework_design.md`,
    page_list: 'process_docs/page_plan.md',
    ui_design: 'process_docs/ui_design.md',
    database_schema: 'output_sourcecode/db/database_schema.sql',
    copyright_application: 'output_docs/copyright_application.md'
  };

  await writeFile(path.join(projectDir, PROJECT_CONFIG_FILE), JSON.stringify(config, null, 2), 'utf-8');

  const text = (name: ConfigPlaceholder) => String(config[name]);
  const variables: StageVariables = {
    front: text('front'),
    backend: text('backend'),
    title: text('title'),
    short_title: text('short_title'),
    requirements_description: text('requirements_description'),
    dev_tech_stack: text('dev_tech_stack'),
    ui_design_spec: text('ui_design_spec'),
    ui_design_style: text('ui_design_style'),
    generation_mode: text('generation_mode'),
    page_count_fast: text('page_count_fast'),
    page_count_full: text('page_count_full'),
    api_count_min: text('api_count_min'),
    api_count_max: text('api_count_max'),
    framework_design: text('framework_design'),
    page_list: text('page_list'),
    ui_design: text('ui_design'),
    database_schema: text('database_schema'),
    copyright_application: text('copyright_application'),
    module_list: '',
    innovation_points: ''
  };
  return { config, variables };
}

/**
 * YYYYMMDDHHMMSS in local time
 */
export function archiveTimestamp(now: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export interface WorkspaceConfig {
  workspacesDir: string;
  archivesDir: string;
  vendorDir: string;
  promptTemplatesDir: string;
}

export const DEFAULT_WORKSPACE_CONFIG: WorkspaceConfig = {
  workspacesDir: pathFor('WORKSPACES_DIR'),
  archivesDir: pathFor('ARCHIVES_DIR'),
  vendorDir: pathFor('VENDOR_DIR'),
  promptTemplatesDir: resolvePath(PATHS.TEMPLATES_DIR, 'copyright')
};

export class WorkspaceManager {
  private config: WorkspaceConfig;
  private logger: Logger;

  constructor(config: Partial<WorkspaceConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_WORKSPACE_CONFIG, ...config };
    this.logger = logger || silentLogger;
  }

  get vendorDir(): string {
    return this.config.vendorDir;
  }

  /**
   * Fresh workspace for one run of `projectId`
   */
  async prepareWorkspace(projectId: string): Promise<string> {
    if (!PROJECT_ID_PATTERN.test(projectId)) {
      throw new ValidationError(`Invalid project id "${projectId}"`);
    }

    const projectDir = path.join(this.config.workspacesDir, projectId);
    await mkdir(projectDir, { recursive: true });

    for (const dir of VENDOR_DIRS) {
      await mkdir(path.join(projectDir, dir), { recursive: true });
      await syncDirectory(path.join(this.config.vendorDir, dir), path.join(projectDir, dir));
    }
    await syncDirectory(this.config.promptTemplatesDir, path.join(projectDir, PROMPTS_DIR));

    const workflow = path.join(this.config.vendorDir, 'WORKFLOW.md');
    await copyFile(workflow, path.join(projectDir, 'WORKFLOW.md')).catch(error => {
      if (!isNotFound(error)) throw error;
    });

    for (const dir of GENERATED_DIRS) {
      const target = path.join(projectDir, dir);
      await rm(target, { recursive: true, force: true });
      await mkdir(target, { recursive: true });
    }
    for (const dir of SOURCE_DIRS) {
      await mkdir(path.join(projectDir, 'output_sourcecode', dir), { recursive: true });
    }

    this.logger('info', 'Workspace prepared', { projectId, projectDir });
    return projectDir;
  }

  /**
   * Zip every file under the workspace into `{projectId}_{YYYYMMDDHHMMSS}.zip`
   */
  async packageWorkspace(projectDir: string, projectId: string, now: Date = new Date()): Promise<string> {
    const files = await listFiles(projectDir);
    const writer = new ZipWriter(new Uint8ArrayWriter());
    for (const file of files) {
      const bytes = await readFile(path.join(projectDir, file));
      await writer.add(file, new Uint8ArrayReader(bytes));
    }
    const archive = await writer.close();

    const archivePath = path.join(
      this.config.archivesDir,
      pathValidation.sanitizeFilename(projectId),
      `${pathValidation.sanitizeFilename(projectId)}_${archiveTimestamp(now)}.zip`
    );
    await writeFileAtomic(archivePath, archive);

    this.logger('info', 'Workspace packaged', { projectId, archivePath, files: files.length });
    return archivePath;
  }
}

export const workspaceManager = new WorkspaceManager();
