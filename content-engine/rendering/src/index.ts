// Document rendering exports

export {
  DEFAULT_DOCX_RENDERER_CONFIG,
  DocxTemplateRenderer,
  docxRenderer,
  escapeXml,
  fillDocx,
  fillDocxXml,
  saveGeneratedDocument
} from './docx-template.js';
export type { DocxRendererConfig, GeneratedDocument } from './docx-template.js';
export { decodeXmlEntities, extractDocumentXmlText, extractDocxText } from './docx-text.js';
export type { DocumentRenderer, RenderData, RenderRow, RenderScalar } from './types.js';
