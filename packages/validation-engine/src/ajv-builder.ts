import Ajv from "ajv";
import type { FieldSpec, FormSchema } from "@formblocks/shared-types";

type JsonSchemaProperty = Record<string, unknown>;

export type FormJsonSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
  additionalProperties: boolean;
};

function ruleValue(field: FieldSpec, type: FieldSpec["rules"][number]["type"]): number | undefined {
  return field.rules.find((rule) => rule.type === type)?.value;
}

function buildProperty(field: FieldSpec): JsonSchemaProperty {
  const prop: JsonSchemaProperty = { title: field.label };
  if (field.helpText) prop.description = field.helpText;

  switch (field.kind) {
    case "text": {
      prop.type = "string";
      const minLength = ruleValue(field, "min-length");
      if (minLength !== undefined || field.required) prop.minLength = Math.max(minLength ?? 0, field.required ? 1 : 0);
      if (field.maxLength !== undefined) prop.maxLength = field.maxLength;
      break;
    }
    case "boolean":
      prop.type = "boolean";
      if (field.required) prop.const = true;
      break;
    case "single-choice": {
      const ids = field.options.map((option) => String(option.id));
      prop.type = "string";
      prop.enum = field.required ? ids : ["", ...ids];
      break;
    }
    case "multi-choice": {
      prop.type = "array";
      prop.items = { type: "string", enum: field.options.map((option) => String(option.id)) };
      prop.uniqueItems = true;
      const minItems = ruleValue(field, "min-choices");
      const maxItems = ruleValue(field, "max-choices");
      if (minItems !== undefined || field.required) prop.minItems = Math.max(minItems ?? 0, field.required ? 1 : 0);
      if (maxItems !== undefined) prop.maxItems = maxItems;
      break;
    }
    case "captcha":
      prop.type = "string";
      prop.minLength = 1;
      break;
  }
  return prop;
}

export function buildJsonSchema(form: FormSchema): FormJsonSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const [name, field] of Object.entries(form)) {
    properties[name] = buildProperty(field);
    if (field.required) required.push(name);
  }

  return {
    type: "object",
    properties,
    required,
    additionalProperties: false
  };
}

export function buildAjvValidator(form: FormSchema) {
  const ajv = new Ajv({ allErrors: true });
  return ajv.compile(buildJsonSchema(form));
}
