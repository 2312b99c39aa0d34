import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { APP_CONFIG, type AppConfig } from "./config/app-config";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true }));

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);
  Logger.log(`Listening on port ${config.port}`, "Bootstrap");
}

bootstrap().catch((e: unknown) => {
  Logger.error(e instanceof Error ? e.message : String(e), "Bootstrap");
  process.exit(1);
});
