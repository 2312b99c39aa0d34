import type { ContentNode, FieldOption } from "@formblocks/shared-types";

/** Read-only access to the editor-managed content tree and the data its blocks point at. */
export abstract class ContentTreeRepository {
  abstract loadTree(rootId: number): Promise<ContentNode | null>;

  /** Options per field id, each list in editor order. */
  abstract loadOptions(fieldIds: number[]): Promise<Map<number, FieldOption[]>>;

  abstract resolvePageUrl(pageId: number): Promise<string | null>;
}
