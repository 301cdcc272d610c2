// Template-fill boundary

export type RenderScalar = string | number | boolean | null;

export type RenderRow = Readonly<Record<string, RenderScalar>>;

/**
 * Top-level keys fill `{{key}}`; a list fills the table row holding `{{list.field}}`, once per entry
 */
export type RenderData = Readonly<Record<string, RenderScalar | readonly RenderRow[]>>;

export interface DocumentRenderer {
  render(templateName: string, data: RenderData): Promise<Uint8Array>;
}
