export * from "./domain/content-node";
export * from "./runtime/form-schema";
