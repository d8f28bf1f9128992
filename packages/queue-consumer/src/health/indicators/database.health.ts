import { Injectable } from "@nestjs/common";
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from "@nestjs/terminus";
import { DatabaseService } from "../../database/database.service";

@Injectable()
export class DatabaseHealthIndicator extends HealthIndicator {
  constructor(private readonly databaseService: DatabaseService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    let isHealthy = false;
    let message = "PostgreSQL did not answer SELECT 1";

    try {
      isHealthy = await this.databaseService.ping();
    } catch (error: unknown) {
      message = error instanceof Error ? error.message : String(error);
    }

    if (isHealthy) {
      return this.getStatus(key, true);
    }
    throw new HealthCheckError(
      `PostgreSQL check failed: ${message}`,
      this.getStatus(key, false, { message }),
    );
  }
}
