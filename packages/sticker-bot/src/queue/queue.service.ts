import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { BotConfig } from "../config/configuration";
import { RedisService } from "../redis/redis.service";
import { StickerPackEnvelope } from "./dto/sticker-pack-envelope.dto";

/**
 * QueueService - submission queue producer
 *
 * RPUSHes one JSON envelope per submission and returns once Redis has
 * acknowledged it. Consumption happens in the queue-consumer service.
 */
@Injectable()
export class QueueService {
  private readonly logger = new Logger(QueueService.name);

  constructor(
    private readonly redis: RedisService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * @returns queue length after the push
   * @throws the Redis client error when the push is not acknowledged
   */
  async enqueue(envelope: StickerPackEnvelope): Promise<number> {
    const { name } = this.configService.getOrThrow<BotConfig["queue"]>("queue");
    const length = await this.redis.rpush(name, JSON.stringify(envelope));

    this.logger.log(
      `Queued sticker pack '${envelope.name}', '${envelope.short_name}' from user ${envelope.user_id} (depth=${length})`,
    );
    return length;
  }

  isReachable(): Promise<boolean> {
    return this.redis.healthCheck();
  }
}
