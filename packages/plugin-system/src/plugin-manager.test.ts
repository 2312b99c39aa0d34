import { BlockPluginManager, PluginRegistrationError } from "./plugin-manager";
import { captchaPlugin } from "./builtin/captcha-plugin";
import { formBlocksPlugin } from "./builtin/form-blocks-plugin";
import type { FormBlocksPlugin, SubmissionPayload } from "./types";

describe("BlockPluginManager", () => {
  it("registers the builtin form blocks", () => {
    const manager = new BlockPluginManager().use(formBlocksPlugin);

    expect(manager.list().map((block) => block.type)).toEqual([
      "form",
      "fieldset",
      "text-field",
      "boolean-field",
      "select-field",
      "multiple-select-field",
      "submit-button"
    ]);
    expect(manager.resolve("multiple-select-field")).toEqual({
      type: "multiple-select-field",
      name: "Multiple Select Field",
      role: "field",
      fieldKind: "multi-choice"
    });
    expect(manager.resolve("captcha-field")).toBeUndefined();
    expect(manager.has("form-blocks")).toBe(true);
    expect(manager.has("captcha")).toBe(false);
  });

  it("adds the captcha block only when its plugin is used", () => {
    const manager = new BlockPluginManager().use(formBlocksPlugin).use(captchaPlugin);
    expect(manager.resolve("captcha-field")).toMatchObject({ role: "field", fieldKind: "captcha" });
  });

  it("rejects a plugin registered twice", () => {
    const manager = new BlockPluginManager().use(formBlocksPlugin);
    expect(() => manager.use(formBlocksPlugin)).toThrow(PluginRegistrationError);
  });

  it("rejects a block type registered by two plugins", () => {
    const clash: FormBlocksPlugin = {
      name: "custom-form",
      register(ctx) {
        ctx.registerBlock({ type: "form", name: "Custom Form", role: "container" });
      }
    };
    const manager = new BlockPluginManager().use(formBlocksPlugin);

    expect(() => manager.use(clash)).toThrow('Block type "form" is already registered');
    expect(manager.has("custom-form")).toBe(false);
  });

  it("keeps nothing from a plugin whose registration fails", async () => {
    const partial: FormBlocksPlugin = {
      name: "rating",
      register(ctx) {
        ctx.registerBlock({ type: "rating-field", name: "Rating Field", role: "field", fieldKind: "single-choice" });
        ctx.addHook("afterSubmit", () => ({ formId: 0, data: {}, recipients: [] }));
        ctx.registerBlock({ type: "form", name: "Rating Form", role: "container" });
      }
    };
    const manager = new BlockPluginManager().use(formBlocksPlugin);
    const payload: SubmissionPayload = { formId: 1, data: {}, recipients: [] };

    expect(() => manager.use(partial)).toThrow('Block type "form" is already registered');
    expect(manager.has("rating")).toBe(false);
    expect(manager.resolve("rating-field")).toBeUndefined();
    expect(manager.list()).toHaveLength(7);
    expect(await manager.runHook("afterSubmit", payload)).toBe(payload);
  });

  it("rejects a plugin registering the same block type twice", () => {
    const twice: FormBlocksPlugin = {
      name: "twice",
      register(ctx) {
        ctx.registerBlock({ type: "rating-field", name: "Rating Field", role: "opaque" });
        ctx.registerBlock({ type: "rating-field", name: "Rating Field", role: "opaque" });
      }
    };
    const manager = new BlockPluginManager();

    expect(() => manager.use(twice)).toThrow(PluginRegistrationError);
    expect(manager.list()).toEqual([]);
  });

  it("runs hooks in registration order and passes the payload through", async () => {
    const calls: string[] = [];
    const manager = new BlockPluginManager().use({
      name: "hooks",
      register(ctx) {
        ctx.addHook("beforeSubmit", (payload) => {
          calls.push("first");
          return { ...payload, data: { ...payload.data, source: "web" } };
        });
        ctx.addHook("beforeSubmit", () => {
          calls.push("second");
        });
      }
    });
    const payload: SubmissionPayload = { formId: 1, data: { name: "Ada" }, recipients: [] };

    const result = await manager.runHook("beforeSubmit", payload);

    expect(calls).toEqual(["first", "second"]);
    expect(result).toEqual({ formId: 1, data: { name: "Ada", source: "web" }, recipients: [] });
    expect(await manager.runHook("afterSubmit", payload)).toBe(payload);
  });
});
