import { Injectable } from "@nestjs/common";
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from "@nestjs/terminus";
import { RedisService } from "../../redis/redis.service";

@Injectable()
export class RedisHealthIndicator extends HealthIndicator {
  constructor(private readonly redisService: RedisService) {
    super();
  }

  /**
   * PING the command connection.
   *
   * @throws HealthCheckError when Redis does not answer
   */
  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    let isHealthy = false;
    let message = "Redis did not answer PING";

    try {
      isHealthy = await this.redisService.ping();
    } catch (error: unknown) {
      message = error instanceof Error ? error.message : String(error);
    }

    if (isHealthy) {
      return this.getStatus(key, true);
    }
    throw new HealthCheckError(
      `Redis check failed: ${message}`,
      this.getStatus(key, false, { message }),
    );
  }
}
