export * from "./types";
export { BlockPluginManager, PluginRegistrationError } from "./plugin-manager";
export { formBlocksPlugin } from "./builtin/form-blocks-plugin";
export { captchaPlugin } from "./builtin/captcha-plugin";
