export const STICKER_TYPES = ["regular", "mask", "custom_emoji"] as const;

export type StickerType = (typeof STICKER_TYPES)[number];

/**
 * Message format (consumer contract), serialized as JSON onto the queue.
 */
export interface StickerPackEnvelope {
  /** Canonical pack identifier */
  short_name: string;
  /** Display title */
  name: string;
  sticker_type: StickerType;
  /** https://t.me/addstickers/<short_name> */
  link: string;
  user_id: number;
}

export function isStickerType(value: string): value is StickerType {
  return STICKER_TYPES.some((type) => type === value);
}

export function buildPackLink(shortName: string): string {
  return `https://t.me/addstickers/${shortName}`;
}
