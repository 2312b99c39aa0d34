import { Logger } from "@nestjs/common";
import { BlockPluginManager, captchaPlugin, formBlocksPlugin } from "@formblocks/plugin-system";
import type { FormBlocksPlugin } from "@formblocks/plugin-system";
import type { AppConfig } from "../../config/app-config";

const logger = new Logger("BlockPlugins");

export function createBlockPluginManager(config: AppConfig, extraPlugins: FormBlocksPlugin[] = []): BlockPluginManager {
  const manager = new BlockPluginManager().use(formBlocksPlugin);

  if (config.recaptcha) {
    manager.use(captchaPlugin);
  } else {
    logger.log("reCAPTCHA keys not configured, captcha field disabled");
  }

  for (const plugin of extraPlugins) manager.use(plugin);

  logger.log(`Registered blocks: ${manager.list().map((block) => block.type).join(", ")}`);
  return manager;
}
