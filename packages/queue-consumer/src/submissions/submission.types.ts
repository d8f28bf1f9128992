export const STICKER_TYPES = ["regular", "mask", "custom_emoji"] as const;

export type StickerType = (typeof STICKER_TYPES)[number];

export interface StickerPack {
  id: number;
  shortName: string;
  name: string;
  stickerType: StickerType;
  link: string;
  createdAt: Date;
}

export type NewStickerPack = Pick<
  StickerPack,
  "shortName" | "name" | "stickerType" | "link"
>;

export interface UserStickerSubmission {
  id: number;
  userId: number;
  stickerPackId: number;
  submittedAt: Date;
}

/**
 * Result of an insert guarded by a uniqueness constraint. `already_exists`
 * means another writer recorded the same key first; it is not a failure.
 */
export type InsertResult<T> =
  | { status: "inserted"; row: T }
  | { status: "already_exists" };

export type ProcessingOutcome =
  | {
      status: "recorded";
      pack: StickerPack;
      submission: UserStickerSubmission;
      packCreated: boolean;
    }
  | {
      status: "already_recorded";
      pack: StickerPack;
      packCreated: boolean;
    }
  | { status: "duplicate"; constraint?: string }
  | { status: "malformed"; reason: string }
  | { status: "failed"; reason: string };

export type ProcessingStatus = ProcessingOutcome["status"];
