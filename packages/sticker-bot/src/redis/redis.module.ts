import { Module, Global, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import Redis from "ioredis";
import { BotConfig } from "../config/configuration";
import { REDIS_CLIENT } from "./redis.constants";
import { RedisService } from "./redis.service";

/**
 * RedisModule
 * Global module that provides the ioredis client and RedisService.
 */
@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: (configService: ConfigService) => {
        const logger = new Logger("RedisClient");
        const redis = configService.getOrThrow<BotConfig["redis"]>("redis");
        const client = new Redis({
          host: redis.host,
          port: redis.port,
          maxRetriesPerRequest: 3,
          connectTimeout: 5000,
        });

        client.on("error", (err: Error) => {
          logger.error(`Redis Client Error: ${err.message}`);
        });

        client.on("connect", () => {
          logger.log(`Redis Client Connected to ${redis.host}:${redis.port}`);
        });

        return client;
      },
      inject: [ConfigService],
    },
    RedisService,
  ],
  exports: [REDIS_CLIENT, RedisService],
})
export class RedisModule {}
