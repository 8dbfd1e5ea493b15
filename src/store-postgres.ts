/**
 * Postgres-backed VoicemailStore on the `postgres` client.
 *
 * Every query names its columns explicitly. `updated_at` is stamped by
 * each write rather than by a trigger so the schema stays portable.
 */

import postgres from "postgres";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { log } from "./logger.ts";
import type { InitialProcessingState, InsertResult, VoicemailListFilter, VoicemailStore } from "./store.ts";
import {
  MIN_DURATION_SECONDS,
  PLACEHOLDER_TRANSCRIPTS,
  type NewVoicemail,
  type Setting,
  type SummaryResult,
  type TranscriptionResult,
  type VoicemailRecord,
} from "./types.ts";

const logger = log.child("store");

const SCHEMA_PATH = fileURLToPath(new URL("../db/schema.sql", import.meta.url));

type Sql = ReturnType<typeof postgres>;

/** Escapes LIKE wildcards so a search term matches literally. */
function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, ch => `\\${ch}`);
}

export class PostgresVoicemailStore implements VoicemailStore {
  private sql: Sql;

  constructor(databaseUrl: string) {
    this.sql = postgres(databaseUrl, {
      max: 5,
      idle_timeout: 30,
      connect_timeout: 10,
      onnotice: () => {},
    });
  }

  /** Creates tables and indexes if missing. */
  async migrate(): Promise<void> {
    const schema = readFileSync(SCHEMA_PATH, "utf-8");
    await this.sql.unsafe(schema).simple();
    logger.info("Schema applied");
  }

  // ── Records ──────────────────────────────────────────────

  async getById(id: number): Promise<VoicemailRecord | null> {
    const rows = await this.sql<VoicemailRecord[]>`
      SELECT * FROM voicemails WHERE id = ${id} LIMIT 1
    `;
    return rows[0] ?? null;
  }

  async findByExternalId(provider: string, externalId: string): Promise<VoicemailRecord | null> {
    const rows = await this.sql<VoicemailRecord[]>`
      SELECT * FROM voicemails
      WHERE provider = ${provider} AND external_id = ${externalId}
      LIMIT 1
    `;
    return rows[0] ?? null;
  }

  async insert(draft: NewVoicemail): Promise<InsertResult> {
    const rows = await this.sql<VoicemailRecord[]>`
      INSERT INTO voicemails (
        external_id, provider, direction, status,
        from_number, to_number, to_number_name, duration, started_at,
        file_url, unread, transcription_status, transcription_text, email_status
      ) VALUES (
        ${draft.external_id}, ${draft.provider}, ${draft.direction}, ${draft.status},
        ${draft.from_number}, ${draft.to_number}, ${draft.to_number_name}, ${draft.duration}, ${draft.started_at},
        ${draft.file_url}, ${draft.unread}, ${draft.transcription_status}, ${draft.transcription_text}, ${draft.email_status}
      )
      ON CONFLICT (provider, external_id) DO NOTHING
      RETURNING *
    `;
    const row = rows[0];
    if (row) return { record: row, created: true };

    const existing = await this.findByExternalId(draft.provider, draft.external_id);
    if (!existing) throw new Error(`Insert conflicted but no row found for ${draft.provider}:${draft.external_id}`);
    return { record: existing, created: false };
  }

  private filterClause(filter: Pick<VoicemailListFilter, "transcription_status" | "search">) {
    const status = filter.transcription_status ?? null;
    const pattern = filter.search ? `%${escapeLike(filter.search)}%` : null;
    return this.sql`
      WHERE (${status}::text IS NULL OR transcription_status = ${status})
        AND (${pattern}::text IS NULL
          OR transcription_text ILIKE ${pattern}
          OR summary ILIKE ${pattern}
          OR from_number ILIKE ${pattern})
    `;
  }

  async list(filter: VoicemailListFilter): Promise<VoicemailRecord[]> {
    return await this.sql<VoicemailRecord[]>`
      SELECT * FROM voicemails
      ${this.filterClause(filter)}
      ORDER BY started_at DESC NULLS LAST, id DESC
      LIMIT ${filter.limit} OFFSET ${filter.offset}
    `;
  }

  async count(filter: Pick<VoicemailListFilter, "transcription_status" | "search"> = {}): Promise<number> {
    const rows = await this.sql<{ count: number }[]>`
      SELECT count(*)::int AS count FROM voicemails
      ${this.filterClause(filter)}
    `;
    return rows[0]?.count ?? 0;
  }

  async deleteById(id: number): Promise<VoicemailRecord | null> {
    const rows = await this.sql<VoicemailRecord[]>`
      DELETE FROM voicemails WHERE id = ${id} RETURNING *
    `;
    return rows[0] ?? null;
  }

  async markRead(id: number): Promise<void> {
    await this.sql`
      UPDATE voicemails SET unread = false, updated_at = now() WHERE id = ${id}
    `;
  }

  // ── Stage scans ──────────────────────────────────────────

  async findPendingDownloads(limit: number): Promise<VoicemailRecord[]> {
    return await this.sql<VoicemailRecord[]>`
      SELECT * FROM voicemails
      WHERE status = 'voicemail'
        AND transcription_status = 'pending'
        AND local_file_path IS NULL
        AND duration >= ${MIN_DURATION_SECONDS}
      ORDER BY started_at ASC NULLS LAST, id ASC
      LIMIT ${limit}
    `;
  }

  async findPendingTranscriptions(limit: number): Promise<VoicemailRecord[]> {
    return await this.sql<VoicemailRecord[]>`
      SELECT * FROM voicemails
      WHERE transcription_status = 'pending'
        AND local_file_path IS NOT NULL
        AND duration >= ${MIN_DURATION_SECONDS}
      ORDER BY started_at ASC NULLS LAST, id ASC
      LIMIT ${limit}
    `;
  }

  async findPendingSummaries(limit: number, maxAttempts: number): Promise<VoicemailRecord[]> {
    return await this.sql<VoicemailRecord[]>`
      SELECT * FROM voicemails
      WHERE transcription_status = 'completed'
        AND transcription_text IS NOT NULL
        AND NOT (transcription_text = ANY(${this.sql.array([...PLACEHOLDER_TRANSCRIPTS])}))
        AND summary IS NULL
        AND summary_attempts < ${maxAttempts}
      ORDER BY started_at ASC NULLS LAST, id ASC
      LIMIT ${limit}
    `;
  }

  async findPendingNotifications(limit: number, cutoff: Date | null): Promise<VoicemailRecord[]> {
    const cutoffClause = cutoff
      ? this.sql`AND started_at >= ${cutoff}`
      : this.sql``;
    return await this.sql<VoicemailRecord[]>`
      SELECT * FROM voicemails
      WHERE email_status = 'pending'
        AND summary IS NOT NULL
        ${cutoffClause}
      ORDER BY started_at ASC NULLS LAST, id ASC
      LIMIT ${limit}
    `;
  }

  // ── Stage writes ─────────────────────────────────────────

  async setFileUrl(id: number, fileUrl: string): Promise<void> {
    await this.sql`
      UPDATE voicemails SET file_url = ${fileUrl}, updated_at = now() WHERE id = ${id}
    `;
  }

  async setLocalFilePath(id: number, localPath: string): Promise<void> {
    await this.sql`
      UPDATE voicemails SET local_file_path = ${localPath}, updated_at = now() WHERE id = ${id}
    `;
  }

  async markTranscriptionProcessing(id: number): Promise<void> {
    await this.sql`
      UPDATE voicemails SET transcription_status = 'processing', updated_at = now() WHERE id = ${id}
    `;
  }

  async saveTranscription(id: number, result: TranscriptionResult, at: Date): Promise<void> {
    await this.sql`
      UPDATE voicemails SET
        transcription_status = 'completed',
        transcription_text = ${result.text},
        transcription_language = ${result.language},
        transcription_confidence = ${result.confidence},
        transcription_model = ${result.model},
        transcribed_at = ${at},
        updated_at = now()
      WHERE id = ${id}
    `;
  }

  async markTranscriptionFailed(id: number): Promise<void> {
    await this.sql`
      UPDATE voicemails SET transcription_status = 'failed', updated_at = now() WHERE id = ${id}
    `;
  }

  async saveSummary(id: number, result: SummaryResult, model: string, at: Date): Promise<void> {
    await this.sql`
      UPDATE voicemails SET
        corrected_text = ${result.corrected_text},
        summary = ${result.summary},
        summary_en = ${result.summary_en},
        sentiment = ${result.sentiment},
        emotion = ${result.emotion},
        category = ${result.category},
        priority = ${result.priority},
        email_subject = ${result.email_subject},
        summary_model = ${model},
        summarized_at = ${at},
        summary_error = NULL,
        updated_at = now()
      WHERE id = ${id}
    `;
  }

  async saveSummaryPlaceholder(id: number, summary: string, at: Date): Promise<void> {
    await this.sql`
      UPDATE voicemails SET summary = ${summary}, summarized_at = ${at}, updated_at = now()
      WHERE id = ${id}
    `;
  }

  async recordSummaryFailure(id: number, error: string): Promise<number> {
    const rows = await this.sql<{ summary_attempts: number }[]>`
      UPDATE voicemails SET
        summary_attempts = summary_attempts + 1,
        summary_error = ${error.substring(0, 1000)},
        updated_at = now()
      WHERE id = ${id}
      RETURNING summary_attempts
    `;
    return rows[0]?.summary_attempts ?? 0;
  }

  async markEmailSent(id: number, messageId: string, at: Date): Promise<void> {
    await this.sql`
      UPDATE voicemails SET
        email_status = 'sent',
        email_sent_at = ${at},
        email_message_id = ${messageId},
        updated_at = now()
      WHERE id = ${id}
    `;
  }

  async markEmailFailed(id: number): Promise<void> {
    await this.sql`
      UPDATE voicemails SET email_status = 'failed', updated_at = now() WHERE id = ${id}
    `;
  }

  async skipPendingNotifications(): Promise<number> {
    const result = await this.sql`
      UPDATE voicemails SET email_status = 'skipped', updated_at = now()
      WHERE email_status = 'pending'
    `;
    return result.count;
  }

  async resetProcessing(id: number, initial: InitialProcessingState): Promise<VoicemailRecord | null> {
    const rows = await this.sql<VoicemailRecord[]>`
      UPDATE voicemails SET
        transcription_status = ${initial.transcription_status},
        transcription_text = ${initial.transcription_text},
        transcription_language = NULL,
        transcription_confidence = NULL,
        transcription_model = NULL,
        transcribed_at = NULL,
        corrected_text = NULL,
        summary = NULL,
        summary_en = NULL,
        sentiment = NULL,
        emotion = NULL,
        category = NULL,
        priority = NULL,
        email_subject = NULL,
        summary_model = NULL,
        summarized_at = NULL,
        summary_attempts = 0,
        summary_error = NULL,
        email_status = ${initial.email_status},
        email_sent_at = NULL,
        email_message_id = NULL,
        updated_at = now()
      WHERE id = ${id}
      RETURNING *
    `;
    return rows[0] ?? null;
  }

  // ── Settings ─────────────────────────────────────────────

  async getSetting(key: string): Promise<string | null> {
    const rows = await this.sql<{ value: string }[]>`
      SELECT value FROM settings WHERE key = ${key} LIMIT 1
    `;
    return rows[0]?.value ?? null;
  }

  async setSetting(key: string, value: string): Promise<Setting> {
    const rows = await this.sql<Setting[]>`
      INSERT INTO settings (key, value, updated_at)
      VALUES (${key}, ${value}, now())
      ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = now()
      RETURNING key, value, updated_at
    `;
    const row = rows[0];
    if (!row) throw new Error(`Upsert returned no row for setting ${key}`);
    return row;
  }

  async listSettings(): Promise<Setting[]> {
    return await this.sql<Setting[]>`
      SELECT key, value, updated_at FROM settings ORDER BY key
    `;
  }

  async ping(): Promise<void> {
    await this.sql`SELECT 1`;
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }
}
