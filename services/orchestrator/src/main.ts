import "reflect-metadata";

import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import morgan from "morgan";

import { AppModule } from "./app.module.js";
import { APP_CONFIG } from "./tokens.js";
import type { AppConfig } from "./config.js";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.use(morgan("tiny"));
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
    transformOptions: { enableImplicitConversion: true },
  }));
  app.enableShutdownHooks();

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);
  Logger.log(`Verification orchestrator listening on ${config.port}`, "Bootstrap");
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Failed to bootstrap orchestrator", error);
    process.exitCode = 1;
  });
}
