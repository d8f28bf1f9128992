import {
  Injectable,
  Logger,
  OnModuleInit,
  OnApplicationShutdown,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import Redis from "ioredis";
import { ConsumerConfig } from "../config/configuration";

/**
 * Redis side of the queue transport for the consumer.
 *
 * BLPOP holds its connection for the whole timeout, so dequeues run on a
 * dedicated duplicate connection and PING stays responsive on the main one.
 */
@Injectable()
export class RedisService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private blockingClient: Redis | null = null;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    const { host, port } =
      this.configService.getOrThrow<ConsumerConfig["redis"]>("redis");

    this.logger.log(`Initializing Redis connection to ${host}:${port}`);

    const client = new Redis({
      host,
      port,
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => Math.min(times * 100, 3000),
      enableReadyCheck: true,
      connectTimeout: 5000,
    });
    // Blocking calls must not be cut short by the per-request retry limit
    const blockingClient = client.duplicate({ maxRetriesPerRequest: null });

    this.client = client;
    this.blockingClient = blockingClient;

    for (const [name, connection] of [
      ["main", client],
      ["blocking", blockingClient],
    ] as const) {
      connection.on("error", (error: Error) => {
        this.logger.error(`Redis ${name} connection error: ${error.message}`);
      });
      connection.on("ready", () => {
        this.logger.log(`Redis ${name} connection ready`);
      });
      connection.on("close", () => {
        this.logger.warn(`Redis ${name} connection closed`);
      });
    }
  }

  async onApplicationShutdown(): Promise<void> {
    const connections = [this.blockingClient, this.client];
    this.client = null;
    this.blockingClient = null;

    for (const connection of connections) {
      if (connection) {
        await connection.quit().catch((error: unknown) => {
          this.logger.warn(
            `Redis quit failed, disconnecting: ${error instanceof Error ? error.message : String(error)}`,
          );
          connection.disconnect();
        });
      }
    }
    this.logger.log("Redis connections closed");
  }

  /**
   * Pop one payload from the head of the queue, blocking up to `timeoutSeconds`.
   *
   * @returns the payload, or null when the timeout elapsed with an empty queue
   * @throws when Redis is unreachable
   */
  async dequeueBlocking(
    queueName: string,
    timeoutSeconds: number,
  ): Promise<string | null> {
    if (!this.blockingClient) {
      throw new Error("Redis connection is closed");
    }

    const result = await this.blockingClient.blpop(queueName, timeoutSeconds);
    if (!result) {
      return null;
    }

    const [, payload] = result;
    return payload;
  }

  async ping(): Promise<boolean> {
    if (!this.client) {
      return false;
    }

    try {
      const result = await this.client.ping();
      return result === "PONG";
    } catch (error) {
      this.logger.debug(
        `Redis ping failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
