import { z, type RefinementCtx, type ZodTypeAny } from "zod";
import type {
  BooleanFieldSpec,
  CaptchaFieldSpec,
  FieldOption,
  FieldSpec,
  FormSchema,
  MultiChoiceFieldSpec,
  SingleChoiceFieldSpec,
  TextFieldSpec
} from "@formblocks/shared-types";
import {
  INVALID_CHOICE_ERROR,
  INVALID_VALUE_ERROR,
  REQUIRED_FIELD_ERROR,
  invalidListChoiceError,
  maxChoicesError,
  maxLengthError,
  minChoicesError,
  minLengthError
} from "./strings";

const CHECKED_VALUES: unknown[] = [true, "true", "on", "1"];

function toText(value: unknown): unknown {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return value;
}

function toList(value: unknown): unknown {
  if (value === undefined || value === null || value === "") return [];
  if (Array.isArray(value)) return value.map((item) => (typeof item === "number" ? String(item) : item));
  return [toText(value)];
}

function requiredMessage(field: FieldSpec): string {
  return field.errorMessages.required ?? REQUIRED_FIELD_ERROR;
}

function fail(ctx: RefinementCtx, message: string) {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message });
}

function optionValue(options: FieldOption[], id: string): string | undefined {
  return options.find((option) => String(option.id) === id)?.value;
}

function textField(field: TextFieldSpec): ZodTypeAny {
  const value = z.string({ invalid_type_error: INVALID_VALUE_ERROR }).superRefine((input, ctx) => {
    if (input === "") {
      if (field.required) fail(ctx, requiredMessage(field));
      return;
    }
    // counted in code points, as JSON Schema maxLength is
    const length = [...input].length;
    if (field.maxLength !== undefined && length > field.maxLength) {
      fail(ctx, maxLengthError(field.maxLength, length));
    }
    for (const rule of field.rules) {
      if (rule.type === "min-length" && rule.value !== undefined && length < rule.value) {
        fail(ctx, minLengthError(rule.value, length));
      }
    }
  });
  return z.preprocess(toText, value);
}

function booleanField(field: BooleanFieldSpec): ZodTypeAny {
  const value = z.boolean().superRefine((input, ctx) => {
    if (field.required && !input) fail(ctx, requiredMessage(field));
  });
  return z.preprocess((input) => CHECKED_VALUES.includes(input), value);
}

function singleChoiceField(field: SingleChoiceFieldSpec): ZodTypeAny {
  const value = z
    .string({ invalid_type_error: INVALID_VALUE_ERROR })
    .superRefine((input, ctx) => {
      if (input === "") {
        if (field.required) fail(ctx, requiredMessage(field));
        return;
      }
      if (optionValue(field.options, input) === undefined) fail(ctx, INVALID_CHOICE_ERROR);
    })
    .transform((input) => optionValue(field.options, input) ?? null);
  return z.preprocess(toText, value);
}

function multiChoiceField(field: MultiChoiceFieldSpec): ZodTypeAny {
  const value = z
    .array(z.string({ invalid_type_error: INVALID_VALUE_ERROR }))
    .transform((input) => [...new Set(input)])
    .superRefine((input, ctx) => {
      if (input.length === 0) {
        if (field.required) fail(ctx, requiredMessage(field));
        return;
      }
      const invalid = input.find((id) => optionValue(field.options, id) === undefined);
      if (invalid !== undefined) {
        fail(ctx, invalidListChoiceError(invalid));
        return;
      }
      for (const rule of field.rules) {
        if (rule.value === undefined) continue;
        if (rule.type === "min-choices" && input.length < rule.value) fail(ctx, minChoicesError(rule.value));
        if (rule.type === "max-choices" && input.length > rule.value) fail(ctx, maxChoicesError(rule.value));
      }
    })
    .transform((input) => input.flatMap((id) => optionValue(field.options, id) ?? []));
  return z.preprocess(toList, value);
}

function captchaField(field: CaptchaFieldSpec): ZodTypeAny {
  const value = z.string({ invalid_type_error: INVALID_VALUE_ERROR }).superRefine((input, ctx) => {
    if (input === "") fail(ctx, requiredMessage(field));
  });
  return z.preprocess(toText, value);
}

export function buildField(field: FieldSpec): ZodTypeAny {
  switch (field.kind) {
    case "text":
      return textField(field);
    case "boolean":
      return booleanField(field);
    case "single-choice":
      return singleChoiceField(field);
    case "multi-choice":
      return multiChoiceField(field);
    case "captcha":
      return captchaField(field);
  }
}

export function buildZodSchema(form: FormSchema) {
  const shape: Record<string, ZodTypeAny> = {};
  for (const [name, field] of Object.entries(form)) {
    shape[name] = buildField(field);
  }
  return z.object(shape);
}

export type SubmissionResult =
  | { success: true; data: Record<string, unknown> }
  | { success: false; errors: Record<string, string[]> };

export function validateSubmission(form: FormSchema, data: Record<string, unknown>): SubmissionResult {
  const result = buildZodSchema(form).safeParse(data);
  if (result.success) return { success: true, data: result.data };

  const errors: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const key = String(issue.path[0] ?? "");
    const list = errors[key] ?? [];
    list.push(issue.message);
    errors[key] = list;
  }
  return { success: false, errors };
}
