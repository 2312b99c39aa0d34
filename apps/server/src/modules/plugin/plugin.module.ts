import { Module } from "@nestjs/common";
import { BlockPluginManager } from "@formblocks/plugin-system";
import { APP_CONFIG, type AppConfig } from "../../config/app-config";
import { createBlockPluginManager } from "./block-plugins";

@Module({
  providers: [
    {
      provide: BlockPluginManager,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => createBlockPluginManager(config)
    }
  ],
  exports: [BlockPluginManager]
})
export class PluginModule {}
