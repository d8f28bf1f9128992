import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Bot } from "grammy";
import { BotConfig } from "../config/configuration";
import { QueueModule } from "../queue/queue.module";
import { StickerSetResolver } from "../stickers/chat.types";
import { InstructionVideoService } from "../stickers/instruction-video.service";
import { StickerSubmissionService } from "../stickers/sticker-submission.service";
import { TELEGRAM_BOT } from "./telegram.constants";
import { TelegramService } from "./telegram.service";

@Module({
  imports: [QueueModule],
  providers: [
    {
      provide: TELEGRAM_BOT,
      useFactory: (configService: ConfigService) =>
        new Bot(configService.getOrThrow<BotConfig["botToken"]>("botToken")),
      inject: [ConfigService],
    },
    {
      provide: StickerSetResolver,
      useFactory: (bot: Bot): StickerSetResolver => ({
        getStickerSet: (name: string) => bot.api.getStickerSet(name),
      }),
      inject: [TELEGRAM_BOT],
    },
    StickerSubmissionService,
    InstructionVideoService,
    TelegramService,
  ],
  exports: [TelegramService],
})
export class TelegramModule {}
