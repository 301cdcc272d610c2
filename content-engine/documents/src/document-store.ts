/**
 * File-backed course document store
 *
 * One JSON record per document under the documents directory. Rendered files
 * live under the data directory and are referenced by relative path.
 */

import { randomBytes } from 'crypto';
import { readdir, readFile, unlink } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { pathFor, pathValidation } from '../../../config/paths.js';
import { buildPlanParams, planParamsFromContent } from '../../scheduling/src/plan-params.js';
import { PlanParams } from '../../scheduling/src/types.js';
import { isNotFound, writeFileAtomic } from '../../utils/atomic-write.js';
import { errorMessage } from '../../utils/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { CourseDocument, DocType, DocumentStore, NewLessonDocument, NewPlanDocument } from './types.js';

const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Canonical document type; `lesson_plan` is an older spelling of `lesson`
 */
export function normalizeDocType(tag: string): DocType | null {
  if (tag === 'plan') return 'plan';
  if (tag === 'lesson' || tag === 'lesson_plan') return 'lesson';
  return null;
}

const CourseDocumentSchema = z.object({
  id: z.string().regex(DOCUMENT_ID_PATTERN),
  course_id: z.string(),
  doc_type: z.enum(['plan', 'lesson', 'lesson_plan']).transform((tag): DocType => (tag === 'lesson_plan' ? 'lesson' : tag)),
  title: z.string(),
  content: z.record(z.unknown()),
  plan_params: z.record(z.unknown()).nullable().default(null),
  file_path: z.string().nullable().default(null),
  lesson_number: z.number().int().nullable().default(null),
  created_at: z.string(),
  updated_at: z.string()
});

/**
 * Schedule of a plan document: stored plan params first, then the schedule
 * inside its content
 */
export function planParamsOf(document: CourseDocument): PlanParams | null {
  const stored = document.plan_params;
  if (stored && Array.isArray(stored.schedule)) {
    const hourPerClass = typeof stored.hour_per_class === 'number' ? stored.hour_per_class : null;
    return buildPlanParams(stored.schedule, { hourPerClass });
  }
  return planParamsFromContent(document.content);
}

function generateDocumentId(now: Date = new Date()): string {
  return `doc-${now.getTime()}-${randomBytes(4).toString('hex')}`;
}

export interface FileDocumentStoreConfig {
  documentsDir: string;
  /** Root that document file paths are relative to */
  dataDir: string;
}

export class FileDocumentStore implements DocumentStore {
  private config: FileDocumentStoreConfig;
  private logger: Logger;

  constructor(config: Partial<FileDocumentStoreConfig> = {}, logger?: Logger) {
    this.config = { documentsDir: pathFor('DOCUMENTS_DIR'), dataDir: pathFor('DATA_DIR'), ...config };
    this.logger = logger || silentLogger;
  }

  async get(documentId: string): Promise<CourseDocument | null> {
    if (!DOCUMENT_ID_PATTERN.test(documentId)) return null;
    return this.readDocument(path.join(this.config.documentsDir, `${documentId}.json`));
  }

  async findPlan(courseId: string): Promise<CourseDocument | null> {
    const plans = await this.listForCourse(courseId, 'plan');
    return plans.length > 0 ? plans[plans.length - 1] : null;
  }

  async listForCourse(courseId: string, docType?: DocType): Promise<CourseDocument[]> {
    let entries: string[];
    try {
      entries = await readdir(this.config.documentsDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const documents: CourseDocument[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const document = await this.readDocument(path.join(this.config.documentsDir, entry));
      if (document && document.course_id === courseId && (docType === undefined || document.doc_type === docType)) {
        documents.push(document);
      }
    }

    return documents.sort(
      (a, b) =>
        (a.lesson_number ?? 0) - (b.lesson_number ?? 0) ||
        a.created_at.localeCompare(b.created_at) ||
        a.id.localeCompare(b.id)
    );
  }

  async savePlan(input: NewPlanDocument): Promise<CourseDocument> {
    const existing = await this.listForCourse(input.courseId, 'plan');
    const now = new Date().toISOString();
    const previous = existing.length > 0 ? existing[existing.length - 1] : null;

    const document: CourseDocument = {
      id: previous ? previous.id : generateDocumentId(),
      course_id: input.courseId,
      doc_type: 'plan',
      title: input.title,
      content: input.content,
      plan_params: input.planParams,
      file_path: input.filePath,
      lesson_number: null,
      created_at: previous ? previous.created_at : now,
      updated_at: now
    };
    await this.writeDocument(document);

    for (const old of existing) {
      if (old.file_path && old.file_path !== input.filePath) {
        await this.removeFile(old.file_path);
      }
      if (old.id !== document.id) {
        await unlink(path.join(this.config.documentsDir, `${old.id}.json`));
      }
    }

    this.logger('info', 'Plan document saved', { courseId: input.courseId, documentId: document.id, replaced: existing.length });
    return document;
  }

  async saveLesson(input: NewLessonDocument): Promise<CourseDocument> {
    const now = new Date().toISOString();
    const document: CourseDocument = {
      id: generateDocumentId(),
      course_id: input.courseId,
      doc_type: 'lesson',
      title: input.title,
      content: input.content,
      plan_params: null,
      file_path: input.filePath,
      lesson_number: input.lessonNumber,
      created_at: now,
      updated_at: now
    };
    await this.writeDocument(document);

    this.logger('info', 'Lesson document saved', { courseId: input.courseId, documentId: document.id });
    return document;
  }

  private async writeDocument(document: CourseDocument): Promise<void> {
    await writeFileAtomic(path.join(this.config.documentsDir, `${document.id}.json`), JSON.stringify(document, null, 2));
  }

  private async removeFile(relativePath: string): Promise<void> {
    const target = path.resolve(this.config.dataDir, relativePath);
    if (!pathValidation.isWithinDirectory(target, this.config.dataDir)) {
      this.logger('warn', 'Not deleting a document file outside the data directory', { filePath: relativePath });
      return;
    }
    try {
      await unlink(target);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  private async readDocument(filePath: string): Promise<CourseDocument | null> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let record: unknown;
    try {
      record = JSON.parse(raw);
    } catch (error) {
      this.logger('warn', 'Ignoring unreadable document record', { filePath, error: errorMessage(error) });
      return null;
    }

    const parsed = CourseDocumentSchema.safeParse(record);
    if (!parsed.success) {
      this.logger('warn', 'Ignoring malformed document record', { filePath });
      return null;
    }
    return parsed.data;
  }
}
