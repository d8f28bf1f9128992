import { Injectable, Logger } from "@nestjs/common";
import { ErrorCategory, ErrorClassifierService } from "../errors";
import { SubmissionEnvelopeDto } from "./dto/submission-envelope.dto";
import { SubmissionStore, SubmissionUnitOfWork } from "./submission.store";
import { ProcessingOutcome, StickerPack } from "./submission.types";

/**
 * SubmissionService - records one envelope, idempotently
 *
 * Flow (single transaction):
 * 1. Find the pack by short_name, insert it when missing
 * 2. Find the (user_id, pack id) submission, insert it when missing
 * 3. Commit
 *
 * Redelivered envelopes find both rows and commit nothing new. A concurrent
 * worker inserting the same keys is absorbed either by the store reporting
 * `already_exists` or by a unique violation, which rolls back and counts as
 * a duplicate. No failure escapes this method.
 */
@Injectable()
export class SubmissionService {
  private readonly logger = new Logger(SubmissionService.name);

  constructor(
    private readonly store: SubmissionStore,
    private readonly errorClassifier: ErrorClassifierService,
  ) {}

  async record(envelope: SubmissionEnvelopeDto): Promise<ProcessingOutcome> {
    try {
      return await this.store.withTransaction((unitOfWork) =>
        this.apply(unitOfWork, envelope),
      );
    } catch (error: unknown) {
      const classification = this.errorClassifier.classify(error);

      if (classification.category === ErrorCategory.DUPLICATE) {
        this.logger.warn(
          `Duplicate submission rolled back for user ${envelope.user_id}, pack ${envelope.short_name}` +
            (classification.constraint ? ` (${classification.constraint})` : ""),
        );
        return { status: "duplicate", constraint: classification.constraint };
      }

      this.logger.error(
        `Failed to record submission for user ${envelope.user_id}, pack ${envelope.short_name} ` +
          `[${classification.category}]: ${classification.originalMessage}`,
        error instanceof Error ? error.stack : undefined,
      );
      return {
        status: "failed",
        reason: `${classification.reason}: ${classification.originalMessage}`,
      };
    }
  }

  private async apply(
    unitOfWork: SubmissionUnitOfWork,
    envelope: SubmissionEnvelopeDto,
  ): Promise<ProcessingOutcome> {
    const { pack, created: packCreated } = await this.findOrCreatePack(
      unitOfWork,
      envelope,
    );

    const existing = await unitOfWork.findSubmission(envelope.user_id, pack.id);
    if (existing) {
      this.logger.log(
        `User ${envelope.user_id} already submitted sticker pack ${pack.name}`,
      );
      return { status: "already_recorded", pack, packCreated };
    }

    const inserted = await unitOfWork.insertSubmission(
      envelope.user_id,
      pack.id,
    );
    if (inserted.status === "already_exists") {
      this.logger.log(
        `Submission from user ${envelope.user_id} for ${pack.name} was recorded concurrently`,
      );
      return { status: "already_recorded", pack, packCreated };
    }

    this.logger.log(
      `Recorded submission from user ${envelope.user_id} for sticker pack ${pack.name}`,
    );
    return {
      status: "recorded",
      pack,
      submission: inserted.row,
      packCreated,
    };
  }

  private async findOrCreatePack(
    unitOfWork: SubmissionUnitOfWork,
    envelope: SubmissionEnvelopeDto,
  ): Promise<{ pack: StickerPack; created: boolean }> {
    const existing = await unitOfWork.findPackByShortName(envelope.short_name);
    if (existing) {
      this.logger.log(
        `Sticker pack already exists: ${existing.name} (ID: ${existing.id})`,
      );
      return { pack: existing, created: false };
    }

    const inserted = await unitOfWork.insertPack({
      shortName: envelope.short_name,
      name: envelope.name,
      stickerType: envelope.sticker_type,
      link: envelope.link,
    });
    if (inserted.status === "inserted") {
      this.logger.log(
        `Created new sticker pack: ${inserted.row.name} (ID: ${inserted.row.id})`,
      );
      return { pack: inserted.row, created: true };
    }

    // Another worker committed the same short_name between our read and insert
    const winner = await unitOfWork.findPackByShortName(envelope.short_name);
    if (!winner) {
      throw new Error(
        `Sticker pack ${envelope.short_name} reported as existing but not found`,
      );
    }
    this.logger.log(
      `Sticker pack ${winner.shortName} was created concurrently (ID: ${winner.id})`,
    );
    return { pack: winner, created: false };
  }
}
