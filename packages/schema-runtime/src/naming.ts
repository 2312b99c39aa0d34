import type { ContentNode } from "@formblocks/shared-types";

export const FIELD_NAME_PREFIX = "field-";

export function fieldName(node: Pick<ContentNode, "id">): string {
  return `${FIELD_NAME_PREFIX}${node.id}`;
}
