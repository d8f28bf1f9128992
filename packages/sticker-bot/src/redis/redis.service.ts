import {
  Injectable,
  Inject,
  Logger,
  OnApplicationShutdown,
} from "@nestjs/common";
import Redis from "ioredis";
import { REDIS_CLIENT } from "./redis.constants";

/**
 * RedisService
 * Wrapper around the ioredis client for the producer side of the queue.
 */
@Injectable()
export class RedisService implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly client: Redis) {}

  /**
   * Append to the tail of a list
   *
   * @returns length of the list after the push
   */
  async rpush(key: string, value: string): Promise<number> {
    return this.client.rpush(key, value);
  }

  /**
   * Health check for Redis connection
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.ping();
      return true;
    } catch (error: unknown) {
      this.logger.error(
        `Redis health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /**
   * Runs after the bot has stopped polling, so no enqueue is cut off
   */
  async onApplicationShutdown(): Promise<void> {
    try {
      await this.client.quit();
      this.logger.log("Redis client disconnected");
    } catch (error: unknown) {
      this.logger.warn(
        `Error disconnecting Redis: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
