// Course document exports

export { FileDocumentStore, normalizeDocType, planParamsOf } from './document-store.js';
export type { FileDocumentStoreConfig } from './document-store.js';
export type { CourseDocument, DocType, DocumentStore, NewLessonDocument, NewPlanDocument } from './types.js';
