import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ConsumerModule } from "./consumer.module";

async function bootstrap() {
  const logger = new Logger("ConsumerBootstrap");

  const app = await NestFactory.create(ConsumerModule, {
    logger: ["error", "warn", "log", "debug"],
  });

  // SIGTERM/SIGINT stop the loop after the in-flight item, then close connections
  app.enableShutdownHooks();

  const port = app.get(ConfigService).getOrThrow<number>("port");

  await app.listen(port);
  logger.log(`Queue Consumer listening on port ${port}`);
}

bootstrap().catch((err: unknown) => {
  const logger = new Logger("ConsumerBootstrap");
  logger.error(
    `Consumer bootstrap failed: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err.stack : undefined,
  );
  process.exit(1);
});
