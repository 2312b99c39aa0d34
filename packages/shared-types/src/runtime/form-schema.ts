import type { FieldOption } from "../domain/content-node";

export type FieldKind = "text" | "boolean" | "single-choice" | "multi-choice" | "captcha";

export type FieldRuleType = "min-length" | "min-choices" | "max-choices";

export interface FieldRule {
  type: FieldRuleType;
  value?: number;
}

export interface FieldErrorMessages {
  required?: string;
}

interface BaseFieldSpec {
  name: string;
  label: string;
  helpText?: string;
  required: boolean;
  errorMessages: FieldErrorMessages;
  rules: FieldRule[];
}

export interface TextFieldSpec extends BaseFieldSpec {
  kind: "text";
  maxLength?: number;
  placeholder?: string;
}

export interface BooleanFieldSpec extends BaseFieldSpec {
  kind: "boolean";
}

export interface SingleChoiceFieldSpec extends BaseFieldSpec {
  kind: "single-choice";
  options: FieldOption[];
}

export interface MultiChoiceFieldSpec extends BaseFieldSpec {
  kind: "multi-choice";
  options: FieldOption[];
}

export interface CaptchaFieldSpec extends BaseFieldSpec {
  kind: "captcha";
}

export type FieldSpec =
  | TextFieldSpec
  | BooleanFieldSpec
  | SingleChoiceFieldSpec
  | MultiChoiceFieldSpec
  | CaptchaFieldSpec;

export type FormSchema = Record<string, FieldSpec>;
