import type { ContentNode, FormSchema } from "@formblocks/shared-types";
import type { BlockDefinition } from "@formblocks/plugin-system";
import { buildFieldSpec } from "./field-builders";
import { fieldName } from "./naming";
import type { OptionListProvider } from "./options";

export interface BlockResolver {
  resolve(type: string): BlockDefinition | undefined;
}

export interface CollectContext {
  blocks: BlockResolver;
  options: OptionListProvider;
}

export type ClassifiedNode =
  | { role: "container"; node: ContentNode }
  | { role: "field"; node: ContentNode; block: Extract<BlockDefinition, { role: "field" }> }
  | { role: "opaque"; node: ContentNode };

// Types without a registered plugin behave like opaque blocks.
export function classifyNode(node: ContentNode, blocks: BlockResolver): ClassifiedNode {
  const block = blocks.resolve(node.type);
  if (block?.role === "container") return { role: "container", node };
  if (block?.role === "field") return { role: "field", node, block };
  return { role: "opaque", node };
}

/**
 * Collects the field specs of every field block reachable from `node` through
 * container blocks, depth first in child order. A field block yields its own
 * single entry; opaque blocks yield nothing. On a name collision the later
 * field wins.
 */
export function collectFormFields(node: ContentNode, ctx: CollectContext): FormSchema {
  const classified = classifyNode(node, ctx.blocks);

  if (classified.role === "field") {
    const name = fieldName(node);
    return { [name]: buildFieldSpec(classified.block.fieldKind, node, name, ctx.options) };
  }

  if (classified.role === "opaque") return {};

  const result: FormSchema = {};
  for (const child of node.children) {
    Object.assign(result, collectFormFields(child, ctx));
  }
  return result;
}
