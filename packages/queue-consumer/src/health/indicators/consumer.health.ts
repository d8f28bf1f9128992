import { Injectable } from "@nestjs/common";
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from "@nestjs/terminus";
import { ConsumerService } from "../../consumer.service";

/**
 * Reports whether the processing loop is running, with per-outcome counters.
 */
@Injectable()
export class ConsumerHealthIndicator extends HealthIndicator {
  constructor(private readonly consumerService: ConsumerService) {
    super();
  }

  isHealthy(key: string): HealthIndicatorResult {
    const running = this.consumerService.isRunning();
    const result = this.getStatus(key, running, {
      processed: this.consumerService.getStats(),
    });

    if (running) {
      return result;
    }
    throw new HealthCheckError("Consumer loop is not running", result);
  }
}
