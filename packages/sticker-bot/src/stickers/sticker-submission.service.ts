import { Injectable, Logger } from "@nestjs/common";
import { QueueService } from "../queue/queue.service";
import {
  StickerPackEnvelope,
  buildPackLink,
  isStickerType,
} from "../queue/dto/sticker-pack-envelope.dto";
import { ChatReplies, StickerEvent, StickerSetResolver } from "./chat.types";
import {
  NOT_IN_PACK_TEXT,
  THANK_YOU_TEXT,
  TRY_AGAIN_LATER_TEXT,
} from "./messages";

export type SubmissionResult =
  | { status: "rejected" }
  | { status: "queued"; envelope: StickerPackEnvelope }
  | { status: "failed"; reason: string };

/**
 * StickerSubmissionService - producer handler
 *
 * Resolves the pack behind a received sticker, enqueues one envelope and
 * acknowledges right away. Persistence happens later in the consumer;
 * duplicates are left for it to absorb.
 */
@Injectable()
export class StickerSubmissionService {
  private readonly logger = new Logger(StickerSubmissionService.name);

  constructor(
    private readonly stickerSets: StickerSetResolver,
    private readonly queueService: QueueService,
  ) {}

  async handleSticker(
    event: StickerEvent,
    chat: ChatReplies,
  ): Promise<SubmissionResult> {
    if (!event.setName) {
      await chat.reply(NOT_IN_PACK_TEXT);
      return { status: "rejected" };
    }

    let envelope: StickerPackEnvelope;
    try {
      envelope = await this.buildEnvelope(event.setName, event.userId);
      await this.queueService.enqueue(envelope);
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Error handling sticker from set ${event.setName} (user ${event.userId}): ${err.message}`,
        err.stack,
      );
      await chat.reply(TRY_AGAIN_LATER_TEXT);
      return { status: "failed", reason: err.message };
    }

    await chat.reply(THANK_YOU_TEXT);
    return { status: "queued", envelope };
  }

  private async buildEnvelope(
    setName: string,
    userId: number,
  ): Promise<StickerPackEnvelope> {
    const stickerSet = await this.stickerSets.getStickerSet(setName);

    if (!isStickerType(stickerSet.sticker_type)) {
      throw new Error(
        `Unsupported sticker type '${stickerSet.sticker_type}' for set ${stickerSet.name}`,
      );
    }

    // The resolved name is canonical; the set name on the sticker is only a lookup key
    return {
      short_name: stickerSet.name,
      name: stickerSet.title,
      sticker_type: stickerSet.sticker_type,
      link: buildPackLink(stickerSet.name),
      user_id: userId,
    };
  }
}
