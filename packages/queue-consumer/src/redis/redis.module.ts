import { Global, Module } from "@nestjs/common";
import { RedisService } from "./redis.service";

/**
 * Redis connectivity for dequeuing submissions and for health checks.
 */
@Global()
@Module({
  providers: [RedisService],
  exports: [RedisService],
})
export class RedisModule {}
