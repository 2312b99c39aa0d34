export { collectFormFields, classifyNode } from "./collector";
export type { BlockResolver, ClassifiedNode, CollectContext } from "./collector";
export { buildFieldSpec, fieldSpecBuilders } from "./field-builders";
export type { FieldSpecBuilder } from "./field-builders";
export { fieldName, FIELD_NAME_PREFIX } from "./naming";
export { optionListFrom, emptyOptionList } from "./options";
export type { OptionListProvider } from "./options";
export { getSuccessUrl, FormConfigurationError } from "./redirect";
export type { PageUrlResolver } from "./redirect";
export { rowsToTree } from "./mappers/rows-to-tree";
