/**
 * Record Store: durable storage for voicemail records and settings.
 *
 * The pipeline only talks to this interface. Each scan method encodes one
 * stage's eligibility rule, so "already advanced" is decided by status
 * columns rather than by any bookkeeping outside the record.
 */

import type {
  EmailStatus,
  NewVoicemail,
  Setting,
  SummaryResult,
  TranscriptionResult,
  TranscriptionStatus,
  VoicemailRecord,
} from "./types.ts";

export interface VoicemailListFilter {
  limit: number;
  offset: number;
  transcription_status?: TranscriptionStatus;
  /** Case-insensitive substring match on transcript, summary and caller number. */
  search?: string;
}

/** `created` is false when another writer inserted the same call first. */
export interface InsertResult {
  record: VoicemailRecord;
  created: boolean;
}

/** Downstream state a record returns to when it is reprocessed. */
export interface InitialProcessingState {
  transcription_status: TranscriptionStatus;
  transcription_text: string | null;
  email_status: EmailStatus;
}

export interface VoicemailStore {
  // ── Records ──
  getById(id: number): Promise<VoicemailRecord | null>;
  findByExternalId(provider: string, externalId: string): Promise<VoicemailRecord | null>;
  /** Idempotent on (provider, external_id): a conflicting insert returns the stored row. */
  insert(draft: NewVoicemail): Promise<InsertResult>;
  list(filter: VoicemailListFilter): Promise<VoicemailRecord[]>;
  count(filter?: Pick<VoicemailListFilter, "transcription_status" | "search">): Promise<number>;
  markRead(id: number): Promise<void>;
  /** Removes the record and returns it, or null when it did not exist. */
  deleteById(id: number): Promise<VoicemailRecord | null>;

  // ── Stage scans ──
  /** pending transcription, no local audio, duration at/above threshold */
  findPendingDownloads(limit: number): Promise<VoicemailRecord[]>;
  /** pending transcription, local audio present, duration at/above threshold */
  findPendingTranscriptions(limit: number): Promise<VoicemailRecord[]>;
  /** completed non-placeholder transcript, no summary, attempts below the cap */
  findPendingSummaries(limit: number, maxAttempts: number): Promise<VoicemailRecord[]>;
  /** pending email with a summary, received at/after the cutoff when one is set */
  findPendingNotifications(limit: number, cutoff: Date | null): Promise<VoicemailRecord[]>;

  // ── Stage writes ──
  setFileUrl(id: number, fileUrl: string): Promise<void>;
  setLocalFilePath(id: number, localPath: string): Promise<void>;
  markTranscriptionProcessing(id: number): Promise<void>;
  saveTranscription(id: number, result: TranscriptionResult, at: Date): Promise<void>;
  markTranscriptionFailed(id: number): Promise<void>;
  saveSummary(id: number, result: SummaryResult, model: string, at: Date): Promise<void>;
  saveSummaryPlaceholder(id: number, summary: string, at: Date): Promise<void>;
  /** Increments the attempt counter and returns the new value. */
  recordSummaryFailure(id: number, error: string): Promise<number>;
  markEmailSent(id: number, messageId: string, at: Date): Promise<void>;
  markEmailFailed(id: number): Promise<void>;
  /** Marks every pending notification skipped; returns how many changed. */
  skipPendingNotifications(): Promise<number>;
  resetProcessing(id: number, initial: InitialProcessingState): Promise<VoicemailRecord | null>;

  // ── Settings ──
  getSetting(key: string): Promise<string | null>;
  setSetting(key: string, value: string): Promise<Setting>;
  listSettings(): Promise<Setting[]>;

  ping(): Promise<void>;
  close(): Promise<void>;
}
