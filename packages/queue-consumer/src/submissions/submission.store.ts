import {
  InsertResult,
  NewStickerPack,
  StickerPack,
  UserStickerSubmission,
} from "./submission.types";

/**
 * Reads and writes available inside one open transaction.
 */
export interface SubmissionUnitOfWork {
  findPackByShortName(shortName: string): Promise<StickerPack | null>;

  /** Inserts and returns the row with its key, without committing. */
  insertPack(pack: NewStickerPack): Promise<InsertResult<StickerPack>>;

  findSubmission(
    userId: number,
    stickerPackId: number,
  ): Promise<UserStickerSubmission | null>;

  insertSubmission(
    userId: number,
    stickerPackId: number,
  ): Promise<InsertResult<UserStickerSubmission>>;
}

/**
 * Transactional store for packs and submissions. The uniqueness of
 * `short_name` and of `(user_id, sticker_pack_id)` is enforced by the store
 * itself, not by callers.
 */
export abstract class SubmissionStore {
  /**
   * Commits when `work` resolves; rolls back and rethrows otherwise.
   * A commit rejected by a uniqueness constraint also rejects.
   */
  abstract withTransaction<T>(
    work: (unitOfWork: SubmissionUnitOfWork) => Promise<T>,
  ): Promise<T>;
}
