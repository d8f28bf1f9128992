import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TerminusModule } from "@nestjs/terminus";
import { ConsumerService } from "./consumer.service";
import { DatabaseModule } from "./database/database.module";
import { HealthController } from "./health/health.controller";
import {
  ConsumerHealthIndicator,
  DatabaseHealthIndicator,
  RedisHealthIndicator,
} from "./health/indicators";
import { RedisModule } from "./redis/redis.module";
import { ErrorClassifierService } from "./errors";
import { DependencyWaiterService } from "./startup/dependency-waiter.service";
import { PgSubmissionStore } from "./submissions/pg-submission.store";
import { SubmissionService } from "./submissions/submission.service";
import { SubmissionStore } from "./submissions/submission.store";
import configuration from "./config/configuration";

/**
 * Consumer Module
 *
 * Health indicators are registered here: ConsumerHealthIndicator reads the
 * loop's ConsumerService.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      load: [configuration],
      isGlobal: true,
    }),
    TerminusModule,
    DatabaseModule,
    RedisModule,
  ],
  controllers: [HealthController],
  providers: [
    ConsumerService,
    SubmissionService,
    { provide: SubmissionStore, useClass: PgSubmissionStore },
    ErrorClassifierService,
    DependencyWaiterService,
    RedisHealthIndicator,
    DatabaseHealthIndicator,
    ConsumerHealthIndicator,
  ],
})
export class ConsumerModule {}
