import type { FormBlocksPlugin } from "../types";

export const captchaPlugin: FormBlocksPlugin = {
  name: "captcha",
  register(ctx) {
    ctx.registerBlock({ type: "captcha-field", name: "Captcha Field", role: "field", fieldKind: "captcha" });
  }
};
