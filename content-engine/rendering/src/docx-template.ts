/**
 * Word template renderer
 *
 * A .docx is a zip of XML parts. Placeholders are written in the template as
 * `{{key}}` inside one run of text; table rows carrying `{{list.field}}` are
 * repeated for every entry of `data[list]`.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { PATHS, pathValidation, resolvePath } from '../../../config/paths.js';
import { isNotFound, writeFileAtomic } from '../../utils/atomic-write.js';
import { ConfigurationError } from '../../utils/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { TextReader, Uint8ArrayReader, Uint8ArrayWriter, ZipReader, ZipWriter } from '../../utils/zip.js';
import { DocumentRenderer, RenderData, RenderRow, RenderScalar } from './types.js';

const FILLED_PARTS = /^word\/(document|header\d*|footer\d*)\.xml$/;
const SCALAR_PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;
const ROW_PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;
const TABLE_ROW = /<w:tr(?:\s[^>]*)?>[\s\S]*?<\/w:tr>/g;
const LINE_BREAK = '</w:t><w:br/><w:t xml:space="preserve">';

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function xmlValue(value: RenderScalar | undefined): string {
  if (value === null || value === undefined) return '';
  return escapeXml(String(value)).replace(/\r?\n/g, LINE_BREAK);
}

function isRowList(value: RenderScalar | readonly RenderRow[] | undefined): value is readonly RenderRow[] {
  return Array.isArray(value);
}

function fillRows(xml: string, data: RenderData): string {
  return xml.replace(TABLE_ROW, row => {
    const lists = new Set(Array.from(row.matchAll(ROW_PLACEHOLDER), match => match[1]).filter(name => isRowList(data[name])));
    if (lists.size === 0) return row;

    const [listName] = lists;
    const entries = data[listName];
    if (!isRowList(entries)) return row;

    return entries
      .map(entry =>
        row.replace(ROW_PLACEHOLDER, (placeholder, name: string, field: string) =>
          name === listName ? xmlValue(entry[field]) : placeholder
        )
      )
      .join('');
  });
}

/**
 * Fill one XML part. Placeholders without data render empty.
 */
export function fillDocxXml(xml: string, data: RenderData): string {
  return fillRows(xml, data)
    .replace(SCALAR_PLACEHOLDER, (_, key: string) => {
      const value = data[key];
      return isRowList(value) ? '' : xmlValue(value);
    })
    .replace(ROW_PLACEHOLDER, '');
}

/**
 * Fill every text part of a .docx archive and repack it
 */
export async function fillDocx(template: Uint8Array, data: RenderData): Promise<Uint8Array> {
  const reader = new ZipReader(new Uint8ArrayReader(template));
  const writer = new ZipWriter(new Uint8ArrayWriter());

  try {
    for (const entry of await reader.getEntries()) {
      if (entry.directory || !entry.getData) {
        await writer.add(entry.filename, undefined, { directory: true });
        continue;
      }

      const bytes = await entry.getData(new Uint8ArrayWriter());
      if (FILLED_PARTS.test(entry.filename)) {
        const xml = new TextDecoder().decode(bytes);
        await writer.add(entry.filename, new TextReader(fillDocxXml(xml, data)));
      } else {
        await writer.add(entry.filename, new Uint8ArrayReader(bytes));
      }
    }
  } finally {
    await reader.close();
  }

  return writer.close();
}

export interface DocxRendererConfig {
  templatesDir: string;
}

export const DEFAULT_DOCX_RENDERER_CONFIG: DocxRendererConfig = {
  templatesDir: resolvePath(PATHS.TEMPLATES_DIR, 'docx')
};

export class DocxTemplateRenderer implements DocumentRenderer {
  private config: DocxRendererConfig;
  private logger: Logger;

  constructor(config: Partial<DocxRendererConfig> = {}, logger?: Logger) {
    this.config = { ...DEFAULT_DOCX_RENDERER_CONFIG, ...config };
    this.logger = logger || silentLogger;
  }

  async render(templateName: string, data: RenderData): Promise<Uint8Array> {
    const templatePath = path.join(this.config.templatesDir, templateName);
    if (pathValidation.hasPathTraversal(templateName) || !pathValidation.isWithinDirectory(templatePath, this.config.templatesDir)) {
      throw new ConfigurationError(`Template not found: ${templateName}`);
    }

    let template: Uint8Array;
    try {
      template = await readFile(templatePath);
    } catch (error) {
      if (isNotFound(error)) {
        throw new ConfigurationError(`Template not found: ${templateName}`, { templatePath });
      }
      throw error;
    }

    const output = await fillDocx(template, data);
    this.logger('debug', 'Rendered document', { templateName, bytes: output.length });
    return output;
  }
}

export interface GeneratedDocument {
  /** Path under the generated-documents root, as stored on documents and jobs */
  relativePath: string;
  absolutePath: string;
}

/**
 * Save rendered bytes as `{baseName}_{ownerId}_{unixSeconds}.docx`
 */
export async function saveGeneratedDocument(
  bytes: Uint8Array,
  baseName: string,
  ownerId: string,
  options: { generatedDir?: string; now?: Date } = {}
): Promise<GeneratedDocument> {
  const generatedDir = options.generatedDir ?? resolvePath(PATHS.GENERATED_DIR);
  const seconds = Math.floor((options.now ?? new Date()).getTime() / 1000);
  const fileName = pathValidation.sanitizeFilename(`${baseName}_${ownerId}_${seconds}.docx`);
  const absolutePath = path.join(generatedDir, fileName);

  await writeFileAtomic(absolutePath, bytes);
  return { relativePath: `generated/${fileName}`, absolutePath };
}

export const docxRenderer = new DocxTemplateRenderer();
