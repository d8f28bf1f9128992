import { Controller, Get } from "@nestjs/common";
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  MemoryHealthIndicator,
} from "@nestjs/terminus";
import {
  ConsumerHealthIndicator,
  DatabaseHealthIndicator,
  RedisHealthIndicator,
} from "./indicators";

/**
 * Health endpoint for Docker HEALTHCHECK
 * (curl -f http://localhost:3001/health). Answers 503 when any check is down.
 */
@Controller()
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly redisHealth: RedisHealthIndicator,
    private readonly databaseHealth: DatabaseHealthIndicator,
    private readonly consumerHealth: ConsumerHealthIndicator,
  ) {}

  @Get("health")
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      // Heap threshold: 512MB
      () => this.memory.checkHeap("memory_heap", 512 * 1024 * 1024),
      () => this.redisHealth.isHealthy("redis"),
      () => this.databaseHealth.isHealthy("postgres"),
      () => this.consumerHealth.isHealthy("consumer"),
    ]);
  }
}
