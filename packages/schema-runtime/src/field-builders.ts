import type { ContentNode, FieldKind, FieldRule, FieldSpec } from "@formblocks/shared-types";
import type { OptionListProvider } from "./options";

type SpecOf<K extends FieldKind> = Extract<FieldSpec, { kind: K }>;

export type FieldSpecBuilder<K extends FieldKind> = (
  node: ContentNode,
  name: string,
  options: OptionListProvider
) => SpecOf<K>;

function baseSpec(node: ContentNode, name: string) {
  const { attributes } = node;
  const rules: FieldRule[] = [];
  return {
    name,
    label: attributes.label ?? "",
    ...(attributes.helpText ? { helpText: attributes.helpText } : {}),
    required: Boolean(attributes.required),
    errorMessages: attributes.requiredMessage ? { required: attributes.requiredMessage } : {},
    rules
  };
}

export const fieldSpecBuilders: { [K in FieldKind]: FieldSpecBuilder<K> } = {
  text: (node, name) => {
    const { minValue, maxValue, placeholderText } = node.attributes;
    return {
      ...baseSpec(node, name),
      kind: "text",
      rules: minValue ? [{ type: "min-length", value: minValue }] : [],
      ...(maxValue !== null && maxValue !== undefined ? { maxLength: maxValue } : {}),
      ...(placeholderText ? { placeholder: placeholderText } : {})
    };
  },

  boolean: (node, name) => ({ ...baseSpec(node, name), kind: "boolean" }),

  "single-choice": (node, name, options) => ({
    ...baseSpec(node, name),
    kind: "single-choice",
    options: options.getOptions(node.id)
  }),

  // "required" follows minValue, and the max-choices bound reads minValue, not maxValue.
  // TODO: move max-choices to maxValue once product confirms the intended bound.
  "multi-choice": (node, name, options) => {
    const { minValue, maxValue } = node.attributes;
    const rules: FieldRule[] = [];
    if (minValue) rules.push({ type: "min-choices", value: minValue });
    if (maxValue) rules.push({ type: "max-choices", value: minValue ?? undefined });
    return {
      ...baseSpec(node, name),
      kind: "multi-choice",
      required: Boolean(minValue),
      rules,
      options: options.getOptions(node.id)
    };
  },

  captcha: (node, name) => ({ ...baseSpec(node, name), kind: "captcha", required: true })
};

export function buildFieldSpec<K extends FieldKind>(
  kind: K,
  node: ContentNode,
  name: string,
  options: OptionListProvider
): SpecOf<K> {
  const builder: FieldSpecBuilder<K> = fieldSpecBuilders[kind];
  return builder(node, name, options);
}
