import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { AppModule } from "./app.module";

const logger = new Logger("Bootstrap");

/**
 * Validate required environment variables before any module is built
 */
function validateEnvironmentVariables(): void {
  const requiredVars = ["BOT_TOKEN"];
  const missingVars = requiredVars.filter((v) => !process.env[v]);

  if (missingVars.length > 0) {
    logger.error(
      `Missing required environment variables: ${missingVars.join(", ")}`,
    );
    process.exit(1);
  }

  // Reject the placeholder shipped in .env.example
  const weakPlaceholders = ["your-bot-token-here", "your_bot_token_here"];
  if (weakPlaceholders.includes(process.env.BOT_TOKEN || "")) {
    logger.error("BOT_TOKEN is still the example placeholder.");
    process.exit(1);
  }
}

async function bootstrap() {
  validateEnvironmentVariables();

  const app = await NestFactory.create(AppModule);

  // SIGTERM/SIGINT stop polling before the Redis connection closes
  app.enableShutdownHooks();

  const port = app.get(ConfigService).getOrThrow<number>("port");
  await app.listen(port);

  logger.log(`Sticker bot is running, health check on port ${port}`);
}

bootstrap().catch((err: unknown) => {
  logger.error(
    `Bot bootstrap failed: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err.stack : undefined,
  );
  process.exit(1);
});
