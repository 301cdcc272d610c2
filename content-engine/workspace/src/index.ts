// Workspace and artifact exports

export {
  DEFAULT_WORKSPACE_CONFIG,
  WorkspaceManager,
  archiveTimestamp,
  buildProjectConfig,
  listFiles,
  safeWriteFiles,
  systemNameOf,
  workspaceManager,
  writeProjectDocuments
} from './workspace.js';
export type { BuiltProjectConfig, ProjectConfig, WorkspaceConfig } from './workspace.js';
export { fallbackBackendFiles, fallbackDatabaseFiles, fallbackFrontendFiles, loadDefaultPages } from './fallbacks.js';
export { CommandMergeRunner, InProcessMergeRunner, MERGED_DOCUMENTS, createMergeRunner } from './merge.js';
export type { MergeRunner } from './merge.js';
export {
  GENERATED_DIRS,
  PROJECT_CONFIG_FILE,
  SOURCE_DIRS,
  USER_MANUAL_FILE
} from './types.js';
export type { CopyrightProjectInput, GenerationMode, ProjectDocuments, SourceDir } from './types.js';
