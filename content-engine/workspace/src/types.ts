// Copyright workspace inputs and layout

export type GenerationMode = 'fast' | 'full';

/**
 * Project data a copyright run starts from
 */
export interface CopyrightProjectInput {
  id: string;
  name: string;
  system_name: string | null;
  software_abbr: string | null;
  domain: string | null;
  description: string | null;
  generation_mode: GenerationMode;
  include_ui_desc: boolean;
  include_tech_desc: boolean;
  requirements_text: string;
  ui_description: string | null;
  tech_description: string | null;
}

/**
 * Subtrees wiped and recreated at the start of every run
 */
export const GENERATED_DIRS = ['process_docs', 'output_docs', 'output_sourcecode'] as const;

export const SOURCE_DIRS = ['front', 'backend', 'db'] as const;

export type SourceDir = typeof SOURCE_DIRS[number];

/**
 * Static subtrees copied from the vendor tree
 */
export const VENDOR_DIRS = ['specs', 'requirements', 'scripts'] as const;

export const PROMPTS_DIR = 'system_prompts';

export const REQUIREMENTS_FILE = 'requirements/requirements.md';
export const UI_SPEC_FILE = 'requirements/ui_design_spec.md';
export const TECH_STACK_FILE = 'requirements/tech_stack.md';
export const DEFAULT_UI_SPEC_FILE = 'specs/ui_design/ui_design_corporate.md';
export const DEFAULT_TECH_STACK_FILE = 'specs/tech_stack/tech_stack_default.md';
export const PROJECT_CONFIG_FILE = 'copyright-config.json';

export const USER_MANUAL_FILE = 'output_docs/user_manual.txt';

export interface ProjectDocuments {
  requirementsPath: string;
  /** Absent when the project does not supply the document */
  uiSpecPath: string | null;
  techStackPath: string | null;
}
