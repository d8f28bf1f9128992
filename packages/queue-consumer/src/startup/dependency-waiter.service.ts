import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ConsumerConfig } from "../config/configuration";
import { DatabaseService } from "../database/database.service";
import { DependencyUnavailableError } from "../errors";
import { RedisService } from "../redis/redis.service";

export interface RetryPolicy {
  maxAttempts: number;
  retryDelayMs: number;
}

/**
 * Blocks startup until PostgreSQL and Redis answer.
 *
 * Each dependency gets `maxAttempts` probes with a fixed delay between them.
 * Running out of attempts throws DependencyUnavailableError, which fails the
 * Nest bootstrap and exits the process with status 1.
 */
@Injectable()
export class DependencyWaiterService {
  private readonly logger = new Logger(DependencyWaiterService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly redis: RedisService,
    private readonly configService: ConfigService,
  ) {}

  async waitForDependencies(): Promise<void> {
    const policy =
      this.configService.getOrThrow<ConsumerConfig["startup"]>("startup");

    await this.waitFor(
      "PostgreSQL",
      async () => {
        if (!(await this.database.ping())) {
          return false;
        }
        await this.database.ensureSchema();
        return true;
      },
      policy,
    );
    this.logger.log("PostgreSQL connection successful and database initialized");

    await this.waitFor("Redis", () => this.redis.ping(), policy);
    this.logger.log("Redis connection successful");
  }

  /**
   * Probe until it resolves true. A rejected probe counts as a failed attempt.
   */
  async waitFor(
    dependency: string,
    probe: () => Promise<boolean>,
    { maxAttempts, retryDelayMs }: RetryPolicy,
  ): Promise<void> {
    let lastError: string | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        if (await probe()) {
          return;
        }
        lastError = undefined;
      } catch (error: unknown) {
        lastError = error instanceof Error ? error.message : String(error);
      }

      this.logger.warn(
        `Waiting for ${dependency}... (attempt ${attempt}/${maxAttempts})` +
          (lastError ? `: ${lastError}` : ""),
      );

      if (attempt < maxAttempts) {
        await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
      }
    }

    this.logger.error(`Failed to connect to ${dependency}`);
    throw new DependencyUnavailableError(dependency, maxAttempts, lastError);
  }
}
