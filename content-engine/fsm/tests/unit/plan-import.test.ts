import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  EMPTY_PLAN_TEXT_MESSAGE,
  NO_SESSIONS_MESSAGE,
  UNSUPPORTED_PLAN_FILE_MESSAGE,
  extractPlanParams,
  importTeachingPlan,
  planFileExtension,
  planFileText
} from '../../src/plan-import.js';
import { ValidationError } from '../../../utils/errors.js';
import { TextReader, Uint8ArrayWriter, ZipWriter } from '../../../utils/zip.js';
import { TestHarness, createHarness } from './fixtures.js';

async function buildDocx(paragraphs: string[]): Promise<Uint8Array> {
  const body = paragraphs.map(text => `<w:p><w:r><w:t>${text}</w:t></w:r></w:p>`).join('');
  const writer = new ZipWriter(new Uint8ArrayWriter());
  await writer.add('word/document.xml', new TextReader(`<w:document><w:body>${body}</w:body></w:document>`));
  return writer.close();
}

describe('plan files', () => {
  test('recognizes docx and markdown names only', () => {
    expect(planFileExtension('Plan.DOCX')).toBe('.docx');
    expect(planFileExtension('plan.md')).toBe('.md');
    expect(planFileExtension('plan.pdf')).toBeNull();
  });

  test('reads the text of a docx and of a markdown file', async () => {
    const docx = await buildDocx(['Week 1 session 1: Cabling', 'Week 1 session 2: Addressing']);

    expect(await planFileText('plan.docx', docx)).toBe('Week 1 session 1: Cabling\nWeek 1 session 2: Addressing');
    expect(await planFileText('plan.md', new TextEncoder().encode('# Plan\n- Cabling'))).toBe('# Plan\n- Cabling');
  });

  test('rejects other file types', async () => {
    await expect(planFileText('plan.pdf', new Uint8Array())).rejects.toThrow(new ValidationError(UNSUPPORTED_PLAN_FILE_MESSAGE));
  });
});

describe('extractPlanParams', () => {
  let tempDir: string;
  let harness: TestHarness;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'plan-import-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function client(replies: string[]) {
    harness = createHarness(tempDir, replies);
    return harness.deps.createClient({ apiKey: 'test-secret', baseUrl: 'http://localhost:9/v1', model: 'test-model' });
  }

  test('spreads the course hours over the sessions when the text gives none', async () => {
    const reply = JSON.stringify({
      schedule: [
        { week: 1, sequence: 1, project_name: 'Cabling' },
        { week: 1, sequence: 2, project_name: 'Addressing' },
        { week: 2, sequence: 3, project_name: 'Routing', task: ['Static routes', 'Default route'] }
      ]
    });

    const params = await extractPlanParams(client([reply]), 'three sessions', 12);

    expect(params).toEqual({
      hour_per_class: 4,
      schedule: [
        { week: 1, order: 1, hour: 4, title: 'Cabling', tasks: '' },
        { week: 1, order: 2, hour: 4, title: 'Addressing', tasks: '' },
        { week: 2, order: 3, hour: 4, title: 'Routing', tasks: 'Static routes\nDefault route' }
      ]
    });
  });

  test('asks again when the reply is not a schedule object', async () => {
    const params = await extractPlanParams(client(['no json here', '{"schedule":[{"order":1,"hour":2}]}']), 'one session', null);

    expect(params.hour_per_class).toBe(2);
    expect(harness.transport.requests).toHaveLength(2);
  });

  test('fails without sessions, and on empty text without calling the model', async () => {
    await expect(extractPlanParams(client(['{"schedule":[]}']), 'nothing useful', 12)).rejects.toThrow(
      new ValidationError(NO_SESSIONS_MESSAGE)
    );

    await expect(extractPlanParams(client([]), '   ', 12)).rejects.toThrow(new ValidationError(EMPTY_PLAN_TEXT_MESSAGE));
    expect(harness.transport.requests).toHaveLength(0);
  });

  test('stores the extracted schedule as the course plan', async () => {
    const llm = client(['{"schedule":[{"week":1,"order":1,"title":"Cabling","hour":4}],"hour_per_class":4}']);

    const { document } = await importTeachingPlan(
      { course: { id: 'course-1', name: 'Network Basics', totalHours: 4 }, text: 'Week 1: Cabling' },
      llm,
      harness.documents
    );

    expect(document).toMatchObject({
      course_id: 'course-1',
      doc_type: 'plan',
      title: 'Network Basics Teaching Plan',
      plan_params: { hour_per_class: 4, schedule: [{ week: 1, order: 1, hour: 4, title: 'Cabling', tasks: '' }] }
    });
    expect(await harness.documents.findPlan('course-1')).toMatchObject({ id: document.id });
  });
});
