import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { APP_CONFIG, type AppConfig } from "./config/app-config";
import { ConfigModule } from "./config/config.module";
import { FormModule } from "./modules/form/form.module";

@Module({
  imports: [
    ConfigModule,
    MongooseModule.forRootAsync({
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => ({ uri: config.mongoUri })
    }),
    FormModule
  ]
})
export class AppModule {}
