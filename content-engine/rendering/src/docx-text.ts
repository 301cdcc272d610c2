import { ValidationError } from '../../utils/errors.js';
import { TextWriter, Uint8ArrayReader, ZipReader } from '../../utils/zip.js';

const TABLE = /<w:tbl>[\s\S]*?<\/w:tbl>/g;
const PARAGRAPH = /<w:p(?:\s[^>]*)?>[\s\S]*?<\/w:p>/g;
const ROW = /<w:tr(?:\s[^>]*)?>[\s\S]*?<\/w:tr>/g;
const CELL = /<w:tc(?:\s[^>]*)?>[\s\S]*?<\/w:tc>/g;
const TEXT_RUN = /<w:t(?:\s[^>]*)?>([\s\S]*?)<\/w:t>/g;

export function decodeXmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&');
}

function paragraphText(xml: string): string {
  return Array.from(xml.matchAll(TEXT_RUN), match => decodeXmlEntities(match[1])).join('').trim();
}

function paragraphs(xml: string): string[] {
  return Array.from(xml.matchAll(PARAGRAPH), match => paragraphText(match[0]));
}

/**
 * Plain text of a Word body: non-empty paragraphs one per line, then every
 * table row as its cells joined by " | "
 */
export function extractDocumentXmlText(xml: string): string {
  const parts = paragraphs(xml.replace(TABLE, '')).filter(text => text.length > 0);

  for (const table of xml.match(TABLE) ?? []) {
    for (const row of table.match(ROW) ?? []) {
      const cells = (row.match(CELL) ?? []).map(cell => paragraphs(cell).filter(Boolean).join(' '));
      if (cells.some(Boolean)) {
        parts.push(cells.join(' | '));
      }
    }
  }

  return parts.join('\n');
}

export async function extractDocxText(bytes: Uint8Array): Promise<string> {
  const reader = new ZipReader(new Uint8ArrayReader(bytes));
  try {
    const entry = (await reader.getEntries()).find(candidate => candidate.filename === 'word/document.xml');
    if (!entry || entry.directory || !entry.getData) {
      throw new ValidationError('Invalid DOCX file: missing word/document.xml');
    }
    return extractDocumentXmlText(await entry.getData(new TextWriter()));
  } finally {
    await reader.close();
  }
}
