import type { ContentNode, ContentRow } from "@formblocks/shared-types";

export function rowsToTree(rows: ContentRow[], rootId: number): ContentNode | null {
  const root = rows.find((row) => row.nodeId === rootId);
  if (!root) return null;

  const byParent = new Map<number, ContentRow[]>();
  for (const row of rows) {
    if (row.parentId === null) continue;
    const siblings = byParent.get(row.parentId) ?? [];
    siblings.push(row);
    byParent.set(row.parentId, siblings);
  }

  const build = (row: ContentRow): ContentNode => ({
    id: row.nodeId,
    type: row.type,
    attributes: row.attributes,
    children: [...(byParent.get(row.nodeId) ?? [])].sort((a, b) => a.position - b.position).map(build)
  });

  return build(root);
}
