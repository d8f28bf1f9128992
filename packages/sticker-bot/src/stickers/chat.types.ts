import { InputFile } from "grammy";

/**
 * The slice of a grammy Context the handlers reply through.
 */
export interface ChatReplies {
  reply(text: string): Promise<unknown>;
  replyWithVideo(
    video: string | InputFile,
    other?: { caption?: string },
  ): Promise<{ video?: { file_id: string } }>;
}

export interface StickerEvent {
  userId: number;
  /** Absent for stickers sent outside any pack */
  setName?: string;
}

export interface StickerSetInfo {
  name: string;
  title: string;
  sticker_type: string;
}

/**
 * Looks up a pack by the set name carried on a sticker.
 */
export abstract class StickerSetResolver {
  abstract getStickerSet(name: string): Promise<StickerSetInfo>;
}
