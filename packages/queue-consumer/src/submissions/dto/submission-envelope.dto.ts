import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  IsUrl,
  MaxLength,
} from "class-validator";
import { STICKER_TYPES, StickerType } from "../submission.types";

/**
 * Queue envelope as published by the sticker bot. Field names are the wire
 * format and must match the producer exactly.
 */
export class SubmissionEnvelopeDto {
  /** Pack's stable external id, e.g. "abc123" */
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  short_name!: string;

  /** Display title */
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsIn(STICKER_TYPES)
  sticker_type!: StickerType;

  @IsUrl({ protocols: ["https"], require_protocol: true })
  @MaxLength(512)
  link!: string;

  /** Telegram user id of the submitter */
  @IsInt()
  user_id!: number;
}
