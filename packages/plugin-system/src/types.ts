import type { FieldKind } from "@formblocks/shared-types";

export type BlockDefinition =
  | { type: string; name: string; role: "container" }
  | { type: string; name: string; role: "field"; fieldKind: FieldKind }
  | { type: string; name: string; role: "opaque" };

export type BlockRole = BlockDefinition["role"];

export interface SubmissionPayload {
  formId: number;
  data: Record<string, unknown>;
  recipients: string[];
}

export type SubmissionHook = "beforeSubmit" | "afterSubmit";

export type SubmissionHookHandler = (
  payload: SubmissionPayload
) => Promise<SubmissionPayload | void> | SubmissionPayload | void;

export interface PluginContext {
  registerBlock(definition: BlockDefinition): void;
  addHook(hook: SubmissionHook, handler: SubmissionHookHandler): void;
}

export interface FormBlocksPlugin {
  name: string;
  register(ctx: PluginContext): void;
}
