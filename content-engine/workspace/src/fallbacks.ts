/**
 * Placeholder sources written when a code stage yields no usable file blocks,
 * so every archive still carries front-end, back-end and database code
 */

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { pathFor } from '../../../config/paths.js';
import { PageItem } from '../../parsers/src/types.js';

const DefaultPagesSchema = z
  .array(
    z.object({
      name: z.string().min(1),
      path: z.string().min(1),
      file: z.string().min(1),
      description: z.string()
    })
  )
  .min(1);

/**
 * Pages used when none can be extracted from the page plan
 */
export function loadDefaultPages(resourcesDir: string = pathFor('RESOURCES_DIR')): PageItem[] {
  const raw: unknown = JSON.parse(readFileSync(path.join(resourcesDir, 'copyright', 'default-pages.json'), 'utf-8'));
  return DefaultPagesSchema.parse(raw);
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

const BASE_CSS = `
body { font-family: "Noto Sans", sans-serif; margin: 0; background: #f5f7fb; color: #1f2a44; }
.layout { display: flex; min-height: 100vh; }
.sidebar { width: 240px; background: #1f2937; color: #fff; padding: 24px; }
.content { flex: 1; padding: 32px; }
.card { background: #fff; border-radius: 12px; padding: 24px; box-shadow: 0 8px 24px rgba(15, 23, 42, 0.08); }
.grid { display: grid; grid-template-columns: 1fr 1fr; gap: 16px; }
.tile { padding: 16px; border-radius: 8px; }
`;

function pageHtml(systemName: string, page: PageItem): string {
  const system = escapeHtml(systemName);
  const title = escapeHtml(page.name || 'Page');
  const description = escapeHtml(page.description || 'Page description to be completed.');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${title} - ${system}</title>
  <style>${BASE_CSS}</style>
</head>
<body>
  <div class="layout">
    <aside class="sidebar">
      <h1>${system}</h1>
      <nav>
        <div>Navigation</div>
        <div>${title}</div>
      </nav>
    </aside>
    <main class="content">
      <div class="card">
        <h2>${title}</h2>
        <p>${description}</p>
        <div class="grid">
          <div class="tile" style="background: #eff6ff">AI features</div>
          <div class="tile" style="background: #f0fdf4">Business data overview</div>
        </div>
      </div>
    </main>
  </div>
</body>
</html>`;
}

/**
 * One static page per page item, keyed by workspace-relative path
 */
export function fallbackFrontendFiles(systemName: string, pages: readonly PageItem[]): Record<string, string> {
  const files: Record<string, string> = {};
  for (const page of pages) {
    files[`output_sourcecode/front/${page.file || 'index.html'}`] = pageHtml(systemName, page);
  }
  return files;
}

export function fallbackBackendFiles(systemName: string): Record<string, string> {
  const content = `/**
 * ${systemName} back-end sample
 */
const express = require('express');

const app = express();

app.get('/health', (req, res) => {
  res.json({ status: 'ok' });
});

app.get('/modules', (req, res) => {
  res.json({ modules: ['User management', 'AI generation', 'Document management'] });
});

app.listen(process.env.PORT || 3000);`;

  return { 'output_sourcecode/backend/app.js': content };
}

export function fallbackDatabaseFiles(systemName: string, now: Date = new Date()): Record<string, string> {
  const content = `/*
* Database schema definition
* Project: ${systemName}
* Created: ${now.toISOString().slice(0, 10)}
*/

CREATE TABLE sys_users (
  id BIGSERIAL PRIMARY KEY,
  username VARCHAR(50) NOT NULL UNIQUE,
  password_hash VARCHAR(255) NOT NULL,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE ai_generation_jobs (
  id BIGSERIAL PRIMARY KEY,
  job_type VARCHAR(50) NOT NULL,
  status VARCHAR(20) NOT NULL,
  payload TEXT,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);`;

  return { 'output_sourcecode/db/database_schema.sql': content };
}
