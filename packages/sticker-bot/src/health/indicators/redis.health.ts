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
   * Check Redis health with a PING
   *
   * @throws HealthCheckError when Redis does not answer
   */
  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    let message = "Redis did not answer PING";
    let isHealthy = false;

    try {
      isHealthy = await this.redisService.healthCheck();
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
