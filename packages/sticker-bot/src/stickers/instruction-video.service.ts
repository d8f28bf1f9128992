import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { access } from "fs/promises";
import { resolve } from "path";
import { InputFile } from "grammy";
import { BotConfig } from "../config/configuration";
import { ChatReplies } from "./chat.types";
import {
  INSTRUCTION_VIDEO_CAPTION,
  VIDEO_MISSING_TEXT,
  VIDEO_UNAVAILABLE_TEXT,
} from "./messages";

/**
 * Sends the how-to video shown after /start.
 *
 * The first upload's Telegram file_id is cached and reused; a send that fails
 * with the cached id drops it and uploads the file again.
 */
@Injectable()
export class InstructionVideoService {
  private readonly logger = new Logger(InstructionVideoService.name);
  private cachedFileId: string | null = null;

  constructor(private readonly configService: ConfigService) {}

  getCachedFileId(): string | null {
    return this.cachedFileId;
  }

  async send(chat: ChatReplies): Promise<void> {
    if (this.cachedFileId) {
      try {
        await chat.replyWithVideo(this.cachedFileId, {
          caption: INSTRUCTION_VIDEO_CAPTION,
        });
        this.logger.debug("Video sent using cached file_id");
        return;
      } catch (error: unknown) {
        this.logger.warn(
          `Failed to send video with cached file_id: ${error instanceof Error ? error.message : String(error)}. Will upload new.`,
        );
        this.cachedFileId = null;
      }
    }

    const videoPath = resolve(
      this.configService.getOrThrow<BotConfig["instructionVideoPath"]>(
        "instructionVideoPath",
      ),
    );

    if (!(await fileExists(videoPath))) {
      this.logger.warn(`Instruction video not found at: ${videoPath}`);
      await chat.reply(VIDEO_MISSING_TEXT);
      return;
    }

    try {
      const sent = await chat.replyWithVideo(new InputFile(videoPath), {
        caption: INSTRUCTION_VIDEO_CAPTION,
      });
      if (sent.video) {
        this.cachedFileId = sent.video.file_id;
        this.logger.log(
          `Video uploaded and file_id cached: ${sent.video.file_id.substring(0, 20)}...`,
        );
      }
    } catch (error: unknown) {
      this.logger.error(
        `Error uploading instruction video: ${error instanceof Error ? error.message : String(error)}`,
      );
      await chat.reply(VIDEO_UNAVAILABLE_TEXT);
    }
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
