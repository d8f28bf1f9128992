import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { Bot } from "grammy";
import { QueueService } from "../queue/queue.service";
import { InstructionVideoService } from "../stickers/instruction-video.service";
import { WELCOME_TEXT } from "../stickers/messages";
import { StickerSubmissionService } from "../stickers/sticker-submission.service";
import { TELEGRAM_BOT } from "./telegram.constants";

/**
 * TelegramService
 *
 * Registers the /start and sticker handlers and drives long polling for the
 * lifetime of the application. Updates received while the bot was offline
 * are still processed.
 */
@Injectable()
export class TelegramService
  implements OnModuleInit, OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(TelegramService.name);
  private polling: Promise<void> | null = null;

  constructor(
    @Inject(TELEGRAM_BOT) private readonly bot: Bot,
    private readonly submissions: StickerSubmissionService,
    private readonly instructionVideo: InstructionVideoService,
    private readonly queueService: QueueService,
  ) {}

  onModuleInit(): void {
    this.bot.command("start", async (ctx) => {
      await ctx.reply(WELCOME_TEXT);
      await this.instructionVideo.send(ctx);
    });

    this.bot.on("message:sticker", async (ctx) => {
      const userId = ctx.from?.id;
      if (userId === undefined) {
        return;
      }
      await this.submissions.handleSticker(
        { userId, setName: ctx.message.sticker.set_name },
        ctx,
      );
    });

    this.bot.catch((err) => {
      this.logger.error(
        `Unhandled error for update ${err.ctx.update.update_id}: ${err.message}`,
        err.stack,
      );
    });
  }

  /**
   * Fails the bootstrap when Redis or the Telegram API is unreachable.
   */
  async onApplicationBootstrap(): Promise<void> {
    if (!(await this.queueService.isReachable())) {
      throw new Error("Redis is not reachable; refusing to start polling");
    }
    this.logger.log("Redis connection successful");

    await this.bot.init();
    this.logger.log(`Starting Telegram bot @${this.bot.botInfo.username}`);

    this.polling = this.bot
      .start({
        drop_pending_updates: false,
        allowed_updates: ["message"],
      })
      .catch((error: unknown) => {
        this.logger.error(
          `Polling stopped with an error: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
      });
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.polling) {
      return;
    }
    this.logger.log("Stopping Telegram bot...");
    await this.bot.stop();
    await this.polling;
    this.polling = null;
    this.logger.log("Telegram bot stopped");
  }

  isPolling(): boolean {
    return this.polling !== null && this.bot.isRunning();
  }
}
