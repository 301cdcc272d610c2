import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
  DocxTemplateRenderer,
  extractDocumentXmlText,
  extractDocxText,
  fillDocx,
  fillDocxXml,
  saveGeneratedDocument
} from '../../src/index.js';
import { ConfigurationError, ValidationError } from '../../../utils/errors.js';
import { TextReader, Uint8ArrayWriter, ZipWriter } from '../../../utils/zip.js';

const TEMPLATES_DIR = path.resolve(__dirname, '../../../../templates/docx');

const paragraph = (text: string) => `<w:p><w:r><w:t>${text}</w:t></w:r></w:p>`;
const cell = (text: string) => `<w:tc>${paragraph(text)}</w:tc>`;

async function buildDocx(body: string): Promise<Uint8Array> {
  const writer = new ZipWriter(new Uint8ArrayWriter());
  await writer.add('[Content_Types].xml', new TextReader('<Types/>'));
  await writer.add(
    'word/document.xml',
    new TextReader(`<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`)
  );
  return writer.close();
}

describe('fillDocxXml', () => {
  test('escapes values and turns newlines into breaks', () => {
    expect(fillDocxXml(paragraph('{{ title }}'), { title: 'Tools & <Tags>' })).toBe(paragraph('Tools &amp; &lt;Tags&gt;'));
    expect(fillDocxXml('<w:t>{{tasks}}</w:t>', { tasks: '1. A\n2. B' })).toBe(
      '<w:t>1. A</w:t><w:br/><w:t xml:space="preserve">2. B</w:t>'
    );
  });

  test('renders missing values and nulls empty', () => {
    expect(fillDocxXml('<w:t>[{{week}}][{{absent}}][{{rows.x}}]</w:t>', { week: null })).toBe('<w:t>[][][]</w:t>');
  });

  test('repeats a table row once per list entry', () => {
    const xml = `<w:tbl><w:tr>${cell('Week')}</w:tr><w:tr w:rsidR="00A1">${cell('{{schedule.week}}')}${cell('{{schedule.title}}')}</w:tr></w:tbl>`;

    const filled = fillDocxXml(xml, {
      schedule: [
        { week: 1, title: 'Cabling' },
        { week: 2, title: 'Routing' }
      ]
    });

    expect(filled).toBe(
      `<w:tbl><w:tr>${cell('Week')}</w:tr>` +
        `<w:tr w:rsidR="00A1">${cell('1')}${cell('Cabling')}</w:tr>` +
        `<w:tr w:rsidR="00A1">${cell('2')}${cell('Routing')}</w:tr></w:tbl>`
    );
  });

  test('drops the row for an empty list', () => {
    expect(fillDocxXml(`<w:tbl><w:tr>${cell('{{rows.a}}')}</w:tr></w:tbl>`, { rows: [] })).toBe('<w:tbl></w:tbl>');
  });
});

describe('extractDocumentXmlText', () => {
  test('lists paragraphs, then table rows with cells joined', () => {
    const xml =
      paragraph('Plan') +
      '<w:p></w:p>' +
      `<w:tbl><w:tr>${cell('1')}${cell('Project 1: A &amp; B')}</w:tr><w:tr>${cell('')}${cell('')}</w:tr></w:tbl>` +
      paragraph('Signed');

    expect(extractDocumentXmlText(xml)).toBe('Plan\nSigned\n1 | Project 1: A & B');
  });
});

describe('DocxTemplateRenderer', () => {
  const renderer = new DocxTemplateRenderer({ templatesDir: TEMPLATES_DIR });

  test('fills the shipped teaching-plan template', async () => {
    const bytes = await renderer.render('teaching_plan.docx', {
      course_name: 'Networks',
      academic_year: '2026-2027',
      target_classes: 'NET-1',
      teacher_name: 'T. Lee',
      total_hours: 72,
      theory_hours: 40,
      practice_hours: 32,
      schedule: [
        { week: 1, order: 1, title: 'Project 1: Cabling', tasks: '1. Cabling', hour: 4 },
        { week: 2, order: 2, title: 'Course Review and Assessment', tasks: '1. Final review', hour: 4 }
      ]
    });

    expect((await extractDocxText(bytes)).split('\n')).toEqual([
      'Networks Teaching Plan',
      'Academic year: 2026-2027',
      'Classes: NET-1',
      'Teacher: T. Lee',
      'Total hours: 72 (theory 40, practice 32)',
      'Week | Session | Title | Tasks | Hours',
      '1 | 1 | Project 1: Cabling | 1. Cabling | 4',
      '2 | 2 | Course Review and Assessment | 1. Final review | 4'
    ]);
  });

  test('reports a missing template', async () => {
    await expect(renderer.render('missing.docx', {})).rejects.toThrow(ConfigurationError);
    await expect(renderer.render('missing.docx', {})).rejects.toThrow('Template not found: missing.docx');
    await expect(renderer.render('../docx/teaching_plan.docx', {})).rejects.toThrow('Template not found');
  });

  test('keeps parts it does not fill', async () => {
    const filled = await fillDocx(await buildDocx(paragraph('{{name}}')), { name: 'Kept' });

    expect(await extractDocxText(filled)).toBe('Kept');
  });
});

describe('extractDocxText', () => {
  test('rejects an archive without a document body', async () => {
    const writer = new ZipWriter(new Uint8ArrayWriter());
    await writer.add('readme.txt', new TextReader('no body'));

    await expect(extractDocxText(await writer.close())).rejects.toThrow(ValidationError);
  });
});

describe('saveGeneratedDocument', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'generated-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('names the file after owner and time', async () => {
    const saved = await saveGeneratedDocument(new Uint8Array([1, 2, 3]), 'teaching_plan', 'c1', {
      generatedDir: dir,
      now: new Date('2026-03-01T08:00:00.000Z')
    });

    expect(saved.relativePath).toBe('generated/teaching_plan_c1_1772352000.docx');
    expect(Array.from(await readFile(saved.absolutePath))).toEqual([1, 2, 3]);
  });
});
