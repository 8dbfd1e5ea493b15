/**
 * Voicemail record model: field names mirror the `voicemails` table columns.
 */

export type CallDirection = "in" | "out";
export type CallStatus = "answered" | "missed" | "voicemail" | "busy";
export type TranscriptionStatus = "pending" | "processing" | "completed" | "failed" | "skipped";
export type EmailStatus = "pending" | "sent" | "failed" | "skipped";

export type Sentiment = "positive" | "neutral" | "negative";
export type Priority = "high" | "normal" | "low";
export type Category = "sales_inquiry" | "existing_order" | "new_inquiry" | "complaint" | "general";

export const PROVIDER = "placetel";

/** Calls shorter than this are hangups or line noise, not messages. */
export const MIN_DURATION_SECONDS = 2;

export const PLACEHOLDER_NO_AUDIO = "[No audio]";
export const PLACEHOLDER_TOO_SHORT = "[Too short]";
export const PLACEHOLDER_NO_AUDIO_CONTENT = "[No audio content]";
export const PLACEHOLDER_AUDIO_TOO_SHORT = "[Audio too short to transcribe]";

export const PLACEHOLDER_TRANSCRIPTS: readonly string[] = [
  PLACEHOLDER_NO_AUDIO,
  PLACEHOLDER_TOO_SHORT,
  PLACEHOLDER_NO_AUDIO_CONTENT,
  PLACEHOLDER_AUDIO_TOO_SHORT,
];

export const SUMMARY_NO_CONTENT = "[No meaningful content]";
export const SUMMARY_UNAVAILABLE = "[Summary unavailable]";

export interface VoicemailRecord {
  id: number;
  external_id: string;
  provider: string;

  direction: CallDirection;
  status: CallStatus;
  from_number: string | null;
  to_number: string | null;
  to_number_name: string | null;
  duration: number;
  started_at: Date | null;
  answered_at: Date | null;
  ended_at: Date | null;

  file_url: string | null;
  local_file_path: string | null;
  unread: boolean;

  transcription_status: TranscriptionStatus;
  transcription_text: string | null;
  transcription_language: string | null;
  transcription_confidence: number | null;
  transcription_model: string | null;
  transcribed_at: Date | null;

  corrected_text: string | null;
  summary: string | null;
  summary_en: string | null;
  sentiment: string | null;
  emotion: string | null;
  category: string | null;
  priority: string | null;
  email_subject: string | null;
  summary_model: string | null;
  summarized_at: Date | null;
  summary_attempts: number;
  summary_error: string | null;

  email_status: EmailStatus;
  email_sent_at: Date | null;
  email_message_id: string | null;

  created_at: Date;
  updated_at: Date;
}

/** Fields the sync stage and webhook fast-path supply when creating a record. */
export interface NewVoicemail {
  external_id: string;
  provider: string;
  direction: CallDirection;
  status: CallStatus;
  from_number: string | null;
  to_number: string | null;
  to_number_name: string | null;
  duration: number;
  started_at: Date | null;
  file_url: string | null;
  unread: boolean;
  transcription_status: TranscriptionStatus;
  transcription_text: string | null;
  email_status: EmailStatus;
}

export interface Setting {
  key: string;
  value: string;
  updated_at: Date;
}

// ── Collaborator results ────────────────────────────────────

export interface TranscriptionResult {
  text: string;
  language: string;
  confidence: number;
  model: string;
}

export interface SummaryResult {
  corrected_text: string;
  summary: string;
  summary_en: string | null;
  sentiment: Sentiment;
  emotion: string;
  category: Category;
  priority: Priority;
  email_subject: string | null;
}
