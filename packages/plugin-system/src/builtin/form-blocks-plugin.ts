import type { FormBlocksPlugin } from "../types";

export const formBlocksPlugin: FormBlocksPlugin = {
  name: "form-blocks",
  register(ctx) {
    ctx.registerBlock({ type: "form", name: "Form", role: "container" });
    ctx.registerBlock({ type: "fieldset", name: "Fieldset", role: "container" });
    ctx.registerBlock({ type: "text-field", name: "Text Field", role: "field", fieldKind: "text" });
    ctx.registerBlock({ type: "boolean-field", name: "Yes/No Field", role: "field", fieldKind: "boolean" });
    ctx.registerBlock({ type: "select-field", name: "Select Field", role: "field", fieldKind: "single-choice" });
    ctx.registerBlock({
      type: "multiple-select-field",
      name: "Multiple Select Field",
      role: "field",
      fieldKind: "multi-choice"
    });
    ctx.registerBlock({ type: "submit-button", name: "Submit Button", role: "opaque" });
  }
};
