/**
 * Centralized Path Configuration
 * Single source of truth for all file system paths used by the generation pipeline
 */

import { resolve, normalize, relative, isAbsolute } from 'path';

/**
 * Path configuration with environment variable overrides
 */
export const PATHS = {
  // Base directories
  ROOT_DIR: process.cwd(),

  // Persistent data
  DATA_DIR: process.env.DATA_DIR || 'data',
  JOBS_DIR: process.env.JOBS_DIR || 'data/jobs',
  LOCKS_DIR: process.env.LOCKS_DIR || 'data/locks',
  DOCUMENTS_DIR: process.env.DOCUMENTS_DIR || 'data/documents',

  // Copyright generation
  WORKSPACES_DIR: process.env.WORKSPACES_DIR || 'data/workspaces',
  ARCHIVES_DIR: process.env.ARCHIVES_DIR || 'data/zips',
  VENDOR_DIR: process.env.VENDOR_DIR || 'vendor/copyright',

  // Document rendering
  TEMPLATES_DIR: process.env.TEMPLATES_DIR || 'templates',
  GENERATED_DIR: process.env.GENERATED_DIR || 'data/generated',

  // Static lookup data and schemas
  RESOURCES_DIR: process.env.RESOURCES_DIR || 'content-engine/resources'
} as const;

export type PathKey = keyof typeof PATHS;

/**
 * Resolve path relative to project root
 */
export function resolvePath(...segments: string[]): string {
  return resolve(PATHS.ROOT_DIR, ...segments);
}

/**
 * Absolute location of a configured directory
 */
export function pathFor(key: PathKey): string {
  return key === 'ROOT_DIR' ? PATHS.ROOT_DIR : resolvePath(PATHS[key]);
}

/**
 * Validation utilities for paths
 */
export const pathValidation = {
  /**
   * Check if path is within allowed directory
   */
  isWithinDirectory: (filePath: string, allowedDir: string): boolean => {
    const normalizedPath = resolve(normalize(filePath));
    const normalizedDir = resolve(normalize(allowedDir));
    const relativePath = relative(normalizedDir, normalizedPath);

    // Path is within directory if relative path doesn't start with '..' or '/'
    return !relativePath.startsWith('..') && !isAbsolute(relativePath);
  },

  /**
   * Sanitize a single path segment (project ids, archive names)
   */
  sanitizeFilename: (filename: string): string => {
    return filename
      .replace(/[<>:"/\\|?*]/g, '_')
      .replace(/[\x00-\x1f\x7f]/g, '')
      .replace(/^\.+/, '')
      .substring(0, 255);
  },

  /**
   * Check for path traversal attempts in a relative path supplied by a caller
   */
  hasPathTraversal: (filePath: string): boolean => {
    if (isAbsolute(filePath) || /^[a-zA-Z]:[\\/]/.test(filePath)) {
      return true;
    }
    return filePath.split(/[\\/]+/).some(segment => segment === '..');
  }
};

/**
 * Configuration validation
 */
export function validatePathConfiguration(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const [key, pathValue] of Object.entries(PATHS)) {
    if (key !== 'ROOT_DIR' && isAbsolute(pathValue)) {
      errors.push(`Path ${key} should be relative, got: ${pathValue}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
