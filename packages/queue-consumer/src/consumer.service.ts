import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ConsumerConfig } from "./config/configuration";
import { ErrorClassifierService, MalformedEnvelopeError } from "./errors";
import { RedisService } from "./redis/redis.service";
import { DependencyWaiterService } from "./startup/dependency-waiter.service";
import { SubmissionEnvelopeDto } from "./submissions/dto/submission-envelope.dto";
import { parseEnvelope } from "./submissions/envelope.parser";
import { SubmissionService } from "./submissions/submission.service";
import {
  ProcessingOutcome,
  ProcessingStatus,
} from "./submissions/submission.types";

export type PollResult =
  | { status: "idle" }
  | { status: "transport_error"; reason: string }
  | ProcessingOutcome;

export type ProcessingStats = Record<ProcessingStatus, number>;

/**
 * ConsumerService - drains the submission queue
 *
 * Flow per iteration:
 * 1. BLPOP with a short timeout (the only point where the loop waits)
 * 2. Parse and validate the envelope; malformed payloads are dropped
 * 3. Record it through SubmissionService (commit, duplicate skip or rollback)
 *
 * One item is in flight at a time. Nothing a single item does can stop the
 * loop; only a shutdown request does, and only between items.
 */
@Injectable()
export class ConsumerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(ConsumerService.name);
  private isShuttingDown = false;
  private loop: Promise<void> | null = null;
  private readonly stats: ProcessingStats = {
    recorded: 0,
    already_recorded: 0,
    duplicate: 0,
    malformed: 0,
    failed: 0,
  };

  constructor(
    private readonly redis: RedisService,
    private readonly submissions: SubmissionService,
    private readonly dependencyWaiter: DependencyWaiterService,
    private readonly errorClassifier: ErrorClassifierService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Rejects when a dependency never came up, which aborts the bootstrap.
   */
  async onApplicationBootstrap(): Promise<void> {
    await this.dependencyWaiter.waitForDependencies();
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log("Received shutdown signal, stopping message processing...");
    await this.stop();
    this.logger.log("Consumer gracefully shut down");
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const { name } = this.queueConfig();
    this.isShuttingDown = false;
    this.logger.log(`Worker ready. Listening to queue: ${name}`);
    this.loop = this.run();
  }

  /**
   * Resolves once the in-flight item (if any) has committed or rolled back.
   */
  async stop(): Promise<void> {
    this.isShuttingDown = true;
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  isRunning(): boolean {
    return this.loop !== null && !this.isShuttingDown;
  }

  getStats(): ProcessingStats {
    return { ...this.stats };
  }

  private async run(): Promise<void> {
    while (!this.isShuttingDown) {
      try {
        await this.pollOnce();
      } catch (error: unknown) {
        // pollOnce handles its own failures; this guards the loop itself
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`Error in message processing: ${err.message}`, err.stack);
        await new Promise((resolve) => setTimeout(resolve, 1000));
      }
    }
  }

  /**
   * Dequeue and process at most one payload.
   */
  async pollOnce(): Promise<PollResult> {
    const { name, dequeueTimeoutSeconds, errorBackoffMs } = this.queueConfig();

    let payload: string | null;
    try {
      payload = await this.redis.dequeueBlocking(name, dequeueTimeoutSeconds);
    } catch (error: unknown) {
      const classification = this.errorClassifier.classify(error);
      this.logger.error(
        `Failed to dequeue from ${name}: ${classification.originalMessage} [${classification.category}]`,
      );
      await new Promise((resolve) => setTimeout(resolve, errorBackoffMs));
      return { status: "transport_error", reason: classification.reason };
    }

    if (payload === null) {
      return { status: "idle" };
    }

    const outcome = await this.handlePayload(payload);
    this.stats[outcome.status] += 1;
    return outcome;
  }

  async handlePayload(payload: string): Promise<ProcessingOutcome> {
    let envelope: SubmissionEnvelopeDto;
    try {
      envelope = parseEnvelope(payload);
    } catch (error: unknown) {
      if (error instanceof MalformedEnvelopeError) {
        this.logger.error(
          `Discarding malformed message: ${error.message} (payload: ${payload.substring(0, 200)})`,
        );
        return { status: "malformed", reason: error.message };
      }
      throw error;
    }

    this.logger.log(
      `Processing sticker pack: ${envelope.short_name} from user ${envelope.user_id}`,
    );
    const outcome = await this.submissions.record(envelope);
    this.logger.log(
      `Finished ${envelope.short_name} for user ${envelope.user_id}: ${outcome.status}`,
    );
    return outcome;
  }

  private queueConfig(): ConsumerConfig["queue"] {
    return this.configService.getOrThrow<ConsumerConfig["queue"]>("queue");
  }
}
