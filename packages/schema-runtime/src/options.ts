import type { FieldOption } from "@formblocks/shared-types";

export interface OptionListProvider {
  getOptions(fieldId: number): FieldOption[];
}

export function optionListFrom(entries: Iterable<[number, FieldOption[]]>): OptionListProvider {
  const store = new Map(entries);
  return {
    getOptions: (fieldId) => store.get(fieldId) ?? []
  };
}

export const emptyOptionList: OptionListProvider = {
  getOptions: () => []
};
