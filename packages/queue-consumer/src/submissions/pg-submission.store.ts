import { Injectable } from "@nestjs/common";
import { PoolClient } from "pg";
import { DatabaseService } from "../database/database.service";
import { SubmissionStore, SubmissionUnitOfWork } from "./submission.store";
import {
  InsertResult,
  NewStickerPack,
  STICKER_TYPES,
  StickerPack,
  StickerType,
  UserStickerSubmission,
} from "./submission.types";

interface StickerPackRow {
  id: number;
  short_name: string;
  name: string;
  sticker_type: string;
  link: string;
  created_at: Date;
}

interface SubmissionRow {
  id: number;
  // BIGINT columns arrive as strings
  user_id: string;
  sticker_pack_id: number;
  submitted_at: Date;
}

const PACK_COLUMNS = "id, short_name, name, sticker_type, link, created_at";
const SUBMISSION_COLUMNS = "id, user_id, sticker_pack_id, submitted_at";

function toStickerType(value: string): StickerType {
  const stickerType = STICKER_TYPES.find((type) => type === value);
  if (!stickerType) {
    throw new Error(`Unknown sticker_type in sticker_packs: ${value}`);
  }
  return stickerType;
}

function toStickerPack(row: StickerPackRow): StickerPack {
  return {
    id: row.id,
    shortName: row.short_name,
    name: row.name,
    stickerType: toStickerType(row.sticker_type),
    link: row.link,
    createdAt: row.created_at,
  };
}

function toSubmission(row: SubmissionRow): UserStickerSubmission {
  return {
    id: row.id,
    userId: Number(row.user_id),
    stickerPackId: row.sticker_pack_id,
    submittedAt: row.submitted_at,
  };
}

/**
 * Statements run on the transaction's client. Inserts use
 * ON CONFLICT DO NOTHING so a concurrent writer's row surfaces as
 * `already_exists` instead of aborting the transaction.
 */
export class PgSubmissionUnitOfWork implements SubmissionUnitOfWork {
  constructor(private readonly client: PoolClient) {}

  async findPackByShortName(shortName: string): Promise<StickerPack | null> {
    const { rows } = await this.client.query<StickerPackRow>(
      `SELECT ${PACK_COLUMNS} FROM sticker_packs WHERE short_name = $1`,
      [shortName],
    );
    return rows.length > 0 ? toStickerPack(rows[0]) : null;
  }

  async insertPack(pack: NewStickerPack): Promise<InsertResult<StickerPack>> {
    const { rows } = await this.client.query<StickerPackRow>(
      `
      INSERT INTO sticker_packs (short_name, name, sticker_type, link)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (short_name) DO NOTHING
      RETURNING ${PACK_COLUMNS}
      `,
      [pack.shortName, pack.name, pack.stickerType, pack.link],
    );
    return rows.length > 0
      ? { status: "inserted", row: toStickerPack(rows[0]) }
      : { status: "already_exists" };
  }

  async findSubmission(
    userId: number,
    stickerPackId: number,
  ): Promise<UserStickerSubmission | null> {
    const { rows } = await this.client.query<SubmissionRow>(
      `
      SELECT ${SUBMISSION_COLUMNS}
      FROM user_sticker_submissions
      WHERE user_id = $1 AND sticker_pack_id = $2
      `,
      [userId, stickerPackId],
    );
    return rows.length > 0 ? toSubmission(rows[0]) : null;
  }

  async insertSubmission(
    userId: number,
    stickerPackId: number,
  ): Promise<InsertResult<UserStickerSubmission>> {
    const { rows } = await this.client.query<SubmissionRow>(
      `
      INSERT INTO user_sticker_submissions (user_id, sticker_pack_id)
      VALUES ($1, $2)
      ON CONFLICT ON CONSTRAINT uix_user_sticker_pack DO NOTHING
      RETURNING ${SUBMISSION_COLUMNS}
      `,
      [userId, stickerPackId],
    );
    return rows.length > 0
      ? { status: "inserted", row: toSubmission(rows[0]) }
      : { status: "already_exists" };
  }
}

@Injectable()
export class PgSubmissionStore extends SubmissionStore {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  withTransaction<T>(
    work: (unitOfWork: SubmissionUnitOfWork) => Promise<T>,
  ): Promise<T> {
    return this.database.transaction((client) =>
      work(new PgSubmissionUnitOfWork(client)),
    );
  }
}
