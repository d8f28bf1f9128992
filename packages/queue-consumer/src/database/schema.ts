/**
 * DDL for the two tables the pipeline writes. Every statement is idempotent
 * so the consumer can apply it on each start.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `
  CREATE TABLE IF NOT EXISTS sticker_packs (
    id SERIAL PRIMARY KEY,
    short_name VARCHAR(255) NOT NULL,
    name VARCHAR(255) NOT NULL,
    sticker_type VARCHAR(50) NOT NULL,
    link VARCHAR(512) NOT NULL,
    created_at TIMESTAMP NOT NULL DEFAULT (now() AT TIME ZONE 'utc'),
    CONSTRAINT uix_sticker_pack_short_name UNIQUE (short_name)
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS user_sticker_submissions (
    id SERIAL PRIMARY KEY,
    user_id BIGINT NOT NULL,
    sticker_pack_id INTEGER NOT NULL REFERENCES sticker_packs (id),
    submitted_at TIMESTAMP NOT NULL DEFAULT (now() AT TIME ZONE 'utc'),
    CONSTRAINT uix_user_sticker_pack UNIQUE (user_id, sticker_pack_id)
  )
  `,
  `CREATE INDEX IF NOT EXISTS ix_user_sticker_submissions_user_id ON user_sticker_submissions (user_id)`,
];
