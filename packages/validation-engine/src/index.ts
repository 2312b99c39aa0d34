export { buildField, buildZodSchema, validateSubmission } from "./zod-builder";
export type { SubmissionResult } from "./zod-builder";
export { buildJsonSchema, buildAjvValidator } from "./ajv-builder";
export type { FormJsonSchema } from "./ajv-builder";
export * from "./strings";
