export const BLOCK_TYPES = [
  "form",
  "fieldset",
  "text-field",
  "boolean-field",
  "select-field",
  "multiple-select-field",
  "captcha-field",
  "submit-button"
] as const;

export type BlockType = (typeof BLOCK_TYPES)[number];

export type RedirectType = "page" | "url";

export interface BlockAttributes {
  label?: string;
  helpText?: string;
  required?: boolean;
  requiredMessage?: string | null;
  minValue?: number | null;
  maxValue?: number | null;
  placeholderText?: string | null;
  // form container only
  name?: string;
  errorMessage?: string | null;
  redirectType?: RedirectType | null;
  pageId?: number | null;
  url?: string | null;
  recipients?: string[];
}

export interface ContentNode {
  id: number;
  type: string;
  attributes: BlockAttributes;
  children: ContentNode[];
}

/** A content block as the CMS stores it: one row per block, linked to its parent. */
export interface ContentRow {
  nodeId: number;
  parentId: number | null;
  position: number;
  type: string;
  attributes: BlockAttributes;
}

export interface FieldOption {
  id: number;
  value: string;
}
