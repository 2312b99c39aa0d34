import { Module } from "@nestjs/common";
import { ContentModule } from "../content/content.module";
import { PluginModule } from "../plugin/plugin.module";
import { FormController } from "./form.controller";
import { FormService } from "./form.service";

@Module({
  imports: [ContentModule, PluginModule],
  controllers: [FormController],
  providers: [FormService],
  exports: [FormService]
})
export class FormModule {}
