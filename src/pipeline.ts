/**
 * Stage Pipeline: advances voicemail records through
 * sync → download → transcribe → summarize → notify.
 *
 * Every stage selects its work by status columns, so a stage that already
 * succeeded for a record never selects it again. Item failures are counted
 * and logged; they never abort the rest of the batch.
 */

import { log } from "./logger.ts";
import { withTraceAsync } from "./trace.ts";
import { errorMessage } from "./resilience.ts";
import { Settings } from "./settings.ts";
import type { InitialProcessingState, VoicemailStore } from "./store.ts";
import type { PlacetelCall, VoicemailGateway } from "./placetel.ts";
import type { Transcriber } from "./transcribe.ts";
import type { Summarizer } from "./summarize.ts";
import type { Notifier } from "./email.ts";
import {
  MIN_DURATION_SECONDS,
  PLACEHOLDER_NO_AUDIO,
  PLACEHOLDER_TOO_SHORT,
  PLACEHOLDER_TRANSCRIPTS,
  PROVIDER,
  SUMMARY_NO_CONTENT,
  SUMMARY_UNAVAILABLE,
  type VoicemailRecord,
} from "./types.ts";

const logger = log.child("pipeline");

export const MAX_SUMMARY_ATTEMPTS = 3;
export const MIN_SUMMARY_TEXT_LENGTH = 20;
const DEFAULT_BATCH = 10;

const DEFAULT_SYNC_DAYS = 30;
const FALLBACK_SYNC_DAYS = 7;
const MAX_AUTO_SYNC_DAYS = 30;
const MAX_MANUAL_SYNC_DAYS = 365;
const DAY_MS = 24 * 60 * 60 * 1000;

// ── Outcomes ────────────────────────────────────────────────

export interface StageError {
  error: string;
}

export interface StageSkipped {
  skipped: string;
}

export interface SyncResult {
  synced: number;
  new: number;
  updated: number;
  downloaded: number;
  email_skipped_by_cutoff: number;
}

export interface RetryDownloadsResult {
  retried: number;
  success: number;
  failed: number;
}

export interface TranscribeResult {
  transcribed: number;
  failed: number;
}

export interface SummarizeResult {
  summarized: number;
  failed: number;
  skipped: number;
}

export interface NotifyResult {
  sent: number;
  failed: number;
}

export interface ReprocessResult {
  id: number;
  steps: string[];
  success: boolean;
  error?: string;
}

export interface CutoffResult {
  cutoff: string;
  skipped_count: number;
}

export type SingleSyncResult =
  | { status: "already_downloaded"; id: number }
  | { status: "not_found" }
  | { status: "synced"; id: number; created: boolean; downloaded: boolean };

export type BatchOpts = { limit?: number } | { recordId: number };

export class VoicemailNotFoundError extends Error {
  constructor(public id: number) {
    super(`Voicemail ${id} not found`);
    this.name = "VoicemailNotFoundError";
  }
}

type SummarizeOutcome =
  | { status: "summarized" }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error: string };

// ── Pure helpers ────────────────────────────────────────────

/**
 * Days to look back on an automatic sync: whole days since the last sync
 * plus one, clamped to [1, 30]. Never synced → 30, unreadable → 7.
 */
export function calculateSyncDays(lastSyncAt: string | null, now: Date): number {
  if (!lastSyncAt) return DEFAULT_SYNC_DAYS;
  const last = new Date(lastSyncAt);
  if (Number.isNaN(last.getTime())) {
    logger.warn("Unparsable last_sync_at, using fallback window", { last_sync_at: lastSyncAt, days: FALLBACK_SYNC_DAYS });
    return FALLBACK_SYNC_DAYS;
  }
  const elapsedDays = Math.floor((now.getTime() - last.getTime()) / DAY_MS);
  return Math.max(1, Math.min(elapsedDays + 1, MAX_AUTO_SYNC_DAYS));
}

export function clampManualDays(days: number): number {
  if (!Number.isFinite(days)) return 1;
  return Math.max(1, Math.min(Math.floor(days), MAX_MANUAL_SYNC_DAYS));
}

/** State a record with this duration starts in. */
export function initialProcessingState(duration: number): InitialProcessingState {
  if (duration < MIN_DURATION_SECONDS) {
    return {
      transcription_status: "skipped",
      transcription_text: duration > 0 ? PLACEHOLDER_TOO_SHORT : PLACEHOLDER_NO_AUDIO,
      email_status: "skipped",
    };
  }
  return { transcription_status: "pending", transcription_text: null, email_status: "pending" };
}

export function isPlaceholderTranscript(text: string | null): boolean {
  return text !== null && PLACEHOLDER_TRANSCRIPTS.includes(text);
}

function transcribeBlocker(record: VoicemailRecord): string | null {
  if (record.duration < MIN_DURATION_SECONDS) {
    return `too short (${record.duration}s < ${MIN_DURATION_SECONDS}s)`;
  }
  if (!record.local_file_path) return "no local audio";
  return null;
}

function summarizeBlocker(record: VoicemailRecord): string | null {
  if (record.transcription_status !== "completed") return `transcription ${record.transcription_status}`;
  if (!record.transcription_text) return "no transcript";
  if (isPlaceholderTranscript(record.transcription_text)) return `placeholder transcript ${record.transcription_text}`;
  return null;
}

// ── Pipeline ────────────────────────────────────────────────

export interface PipelineDeps {
  store: VoicemailStore;
  gateway: VoicemailGateway;
  transcriber: Transcriber;
  summarizer: Summarizer;
  /** Null when no email sender is configured. */
  notifier: Notifier | null;
  now?: () => Date;
}

export class Pipeline {
  readonly settings: Settings;
  private store: VoicemailStore;
  private gateway: VoicemailGateway;
  private transcriber: Transcriber;
  private summarizer: Summarizer;
  private notifier: Notifier | null;
  private now: () => Date;

  constructor(deps: PipelineDeps) {
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.transcriber = deps.transcriber;
    this.summarizer = deps.summarizer;
    this.notifier = deps.notifier;
    this.now = deps.now ?? (() => new Date());
    this.settings = new Settings(deps.store);
  }

  // ── Sync ──

  async runSync(opts: { days?: number } = {}): Promise<SyncResult | StageError> {
    const now = this.now();
    const days = opts.days !== undefined
      ? clampManualDays(opts.days)
      : calculateSyncDays(await this.settings.getLastSyncAt(), now);

    let listing: PlacetelCall[];
    try {
      listing = await this.gateway.fetchListing(days);
    } catch (err) {
      logger.error("Listing fetch failed", { days }, err);
      return { error: errorMessage(err) };
    }

    const cutoff = await this.settings.getEmailCutoff();
    const result: SyncResult = { synced: listing.length, new: 0, updated: 0, downloaded: 0, email_skipped_by_cutoff: 0 };

    for (const call of listing) {
      try {
        const existing = await this.store.findByExternalId(PROVIDER, call.id);
        if (existing) {
          if (call.file_url && existing.file_url !== call.file_url) {
            await this.store.setFileUrl(existing.id, call.file_url);
            result.updated++;
          }
          continue;
        }

        const { record, created, skippedByCutoff } = await this.createRecord(call, cutoff);
        if (!created) continue;
        result.new++;
        if (skippedByCutoff) result.email_skipped_by_cutoff++;

        if (record.duration >= MIN_DURATION_SECONDS && call.file_url) {
          if (await this.downloadAudio(record, call.file_url)) result.downloaded++;
        }
      } catch (err) {
        logger.error("Failed to sync listing item", { external_id: call.id }, err);
      }
    }

    await this.settings.setLastSyncAt(now);
    logger.info("Sync complete", { days, ...result });
    return result;
  }

  /** Single-call sync used by the webhook fast-path. */
  async syncOne(externalId: string): Promise<SingleSyncResult> {
    const existing = await this.store.findByExternalId(PROVIDER, externalId);
    if (existing?.local_file_path) return { status: "already_downloaded", id: existing.id };

    const call = await this.gateway.fetchById(externalId);
    if (!call) {
      logger.warn("Call not found at provider", { external_id: externalId });
      return { status: "not_found" };
    }

    let record: VoicemailRecord;
    let created = false;
    if (existing) {
      record = existing;
      if (!existing.file_url && call.file_url) await this.store.setFileUrl(existing.id, call.file_url);
    } else {
      ({ record, created } = await this.createRecord(call, await this.settings.getEmailCutoff()));
    }

    let downloaded = false;
    const url = call.file_url ?? record.file_url;
    if (record.duration >= MIN_DURATION_SECONDS && url && !record.local_file_path) {
      downloaded = await this.downloadAudio(record, url);
    }
    return { status: "synced", id: record.id, created, downloaded };
  }

  private async createRecord(
    call: PlacetelCall,
    cutoff: Date | null,
  ): Promise<{ record: VoicemailRecord; created: boolean; skippedByCutoff: boolean }> {
    const initial = initialProcessingState(call.duration);
    let skippedByCutoff = false;
    if (initial.email_status === "pending" && cutoff && call.received_at && call.received_at < cutoff) {
      initial.email_status = "skipped";
      skippedByCutoff = true;
    }

    const { record, created } = await this.store.insert({
      external_id: call.id,
      provider: PROVIDER,
      direction: "in",
      status: "voicemail",
      from_number: call.from_number,
      to_number: call.to_number,
      to_number_name: call.to_number_name,
      duration: call.duration,
      started_at: call.received_at,
      file_url: call.file_url,
      unread: call.unread,
      ...initial,
    });
    if (!created) {
      logger.info("Voicemail already recorded by a concurrent sync", { voicemail_id: record.id, external_id: call.id });
      return { record, created, skippedByCutoff: false };
    }
    logger.info("Voicemail recorded", { voicemail_id: record.id, external_id: call.id, duration: call.duration });
    return { record, created, skippedByCutoff };
  }

  private async downloadAudio(record: VoicemailRecord, url: string): Promise<boolean> {
    try {
      const localPath = await this.gateway.download(record.external_id, url);
      await this.store.setLocalFilePath(record.id, localPath);
      return true;
    } catch (err) {
      logger.error("Audio download failed", { voicemail_id: record.id, external_id: record.external_id }, err);
      return false;
    }
  }

  // ── Retry downloads ──

  async runRetryDownloads(opts: { limit?: number } = {}): Promise<RetryDownloadsResult> {
    const pending = await this.store.findPendingDownloads(opts.limit ?? DEFAULT_BATCH);
    let success = 0;
    let failed = 0;

    for (const record of pending) {
      try {
        let url = record.file_url;
        if (!url) {
          const fresh = await this.gateway.fetchById(record.external_id);
          if (!fresh?.file_url) {
            logger.warn("No audio URL available", { voicemail_id: record.id });
            continue;
          }
          url = fresh.file_url;
          await this.store.setFileUrl(record.id, url);
        }

        const localPath = await this.gateway.download(record.external_id, url);
        await this.store.setLocalFilePath(record.id, localPath);
        success++;
      } catch (err) {
        logger.error("Download retry failed", { voicemail_id: record.id }, err);
        failed++;
      }
    }

    if (pending.length > 0) logger.info("Download retries complete", { retried: pending.length, success, failed });
    return { retried: pending.length, success, failed };
  }

  // ── Transcribe ──

  async runTranscribe(opts: BatchOpts = {}): Promise<TranscribeResult | StageSkipped> {
    let records: VoicemailRecord[];
    if ("recordId" in opts) {
      const record = await this.requireRecord(opts.recordId);
      const blocker = transcribeBlocker(record);
      if (blocker) return { skipped: blocker };
      records = [record];
    } else {
      if (!(await this.settings.isEnabled("auto_transcribe"))) return { skipped: "auto_transcribe disabled" };
      records = await this.store.findPendingTranscriptions(opts.limit ?? DEFAULT_BATCH);
    }

    const result: TranscribeResult = { transcribed: 0, failed: 0 };
    for (const record of records) {
      const error = await this.transcribeOne(record);
      if (error === null) result.transcribed++;
      else result.failed++;
    }
    if (records.length > 0) logger.info("Transcription batch complete", { ...result });
    return result;
  }

  /** Returns null on success, the failure message otherwise. */
  private async transcribeOne(record: VoicemailRecord): Promise<string | null> {
    const localPath = record.local_file_path;
    if (!localPath) return "no local audio";

    await this.store.markTranscriptionProcessing(record.id);
    try {
      const result = await this.transcriber.transcribe(localPath);
      await this.store.saveTranscription(record.id, result, this.now());
      logger.info("Transcribed", { voicemail_id: record.id, language: result.language, chars: result.text.length });
      return null;
    } catch (err) {
      logger.error("Transcription failed", { voicemail_id: record.id }, err);
      await this.store.markTranscriptionFailed(record.id);
      return errorMessage(err);
    }
  }

  // ── Summarize ──

  async runSummarize(opts: BatchOpts = {}): Promise<SummarizeResult | StageSkipped> {
    let records: VoicemailRecord[];
    if ("recordId" in opts) {
      const record = await this.requireRecord(opts.recordId);
      const blocker = summarizeBlocker(record);
      if (blocker) return { skipped: blocker };
      records = [record];
    } else {
      if (!(await this.settings.isEnabled("auto_summarize"))) return { skipped: "auto_summarize disabled" };
      records = await this.store.findPendingSummaries(opts.limit ?? DEFAULT_BATCH, MAX_SUMMARY_ATTEMPTS);
    }

    const result: SummarizeResult = { summarized: 0, failed: 0, skipped: 0 };
    for (const record of records) {
      const outcome = await this.summarizeOne(record);
      if (outcome.status === "summarized") result.summarized++;
      else if (outcome.status === "skipped") result.skipped++;
      else result.failed++;
    }
    if (records.length > 0) logger.info("Summary batch complete", { ...result });
    return result;
  }

  private async summarizeOne(record: VoicemailRecord): Promise<SummarizeOutcome> {
    const blocker = summarizeBlocker(record);
    if (blocker) return { status: "skipped", reason: blocker };

    const text = (record.transcription_text ?? "").trim();
    if (text.length < MIN_SUMMARY_TEXT_LENGTH) {
      await this.store.saveSummaryPlaceholder(record.id, SUMMARY_NO_CONTENT, this.now());
      return { status: "skipped", reason: `transcript under ${MIN_SUMMARY_TEXT_LENGTH} characters` };
    }

    try {
      const summary = await this.summarizer.summarize(text, record.transcription_language);
      await this.store.saveSummary(record.id, summary, this.summarizer.model, this.now());
      logger.info("Summarized", { voicemail_id: record.id, category: summary.category, priority: summary.priority });
      return { status: "summarized" };
    } catch (err) {
      const message = errorMessage(err);
      const attempts = await this.store.recordSummaryFailure(record.id, message);
      logger.error("Summarization failed", { voicemail_id: record.id, attempts }, err);
      if (attempts >= MAX_SUMMARY_ATTEMPTS) {
        await this.store.saveSummaryPlaceholder(record.id, SUMMARY_UNAVAILABLE, this.now());
        logger.warn("Summary attempts exhausted", { voicemail_id: record.id, attempts });
      }
      return { status: "failed", error: message };
    }
  }

  // ── Notify ──

  /** Why notifications cannot go out right now, or the destination address. */
  private async notificationTarget(): Promise<{ to: string; notifier: Notifier } | { reason: string }> {
    if (!(await this.settings.isEnabled("auto_email"))) return { reason: "auto_email disabled" };
    const to = await this.settings.getNotificationEmail();
    if (!to) return { reason: "notification_email not set" };
    if (!this.notifier) return { reason: "email sender not configured" };
    return { to, notifier: this.notifier };
  }

  async runNotify(opts: { limit?: number } = {}): Promise<NotifyResult | StageSkipped> {
    const target = await this.notificationTarget();
    if ("reason" in target) return { skipped: target.reason };

    const cutoff = await this.settings.getEmailCutoff();
    const records = await this.store.findPendingNotifications(opts.limit ?? DEFAULT_BATCH, cutoff);
    const result: NotifyResult = { sent: 0, failed: 0 };
    for (const record of records) {
      const error = await this.notifyOne(record, target.to, target.notifier);
      if (error === null) result.sent++;
      else result.failed++;
    }
    if (records.length > 0) logger.info("Notification batch complete", { ...result });
    return result;
  }

  private async notifyOne(record: VoicemailRecord, to: string, notifier: Notifier): Promise<string | null> {
    try {
      const messageId = await notifier.sendVoicemail(to, record);
      await this.store.markEmailSent(record.id, messageId, this.now());
      return null;
    } catch (err) {
      logger.error("Notification failed", { voicemail_id: record.id }, err);
      await this.store.markEmailFailed(record.id);
      return errorMessage(err);
    }
  }

  // ── Reprocess ──

  /**
   * Reset a record's downstream state and run transcribe → summarize →
   * notify for it alone. Stops at the first failure.
   */
  async reprocess(id: number): Promise<ReprocessResult> {
    const existing = await this.store.getById(id);
    if (!existing) return { id, steps: [], success: false, error: `Voicemail ${id} not found` };

    const steps: string[] = [];
    const fail = (step: string): ReprocessResult => {
      steps.push(step);
      logger.warn("Reprocess stopped", { voicemail_id: id, step });
      return { id, steps, success: false };
    };

    const reset = await this.store.resetProcessing(id, initialProcessingState(existing.duration));
    if (!reset) return { id, steps, success: false, error: `Voicemail ${id} not found` };

    const blocker = transcribeBlocker(reset);
    if (blocker) return fail(`transcription_failed: ${blocker}`);
    const transcribeError = await this.transcribeOne(reset);
    if (transcribeError !== null) return fail(`transcription_failed: ${transcribeError}`);
    steps.push("transcribed");

    const transcribed = await this.requireRecord(id);
    const summary = await this.summarizeOne(transcribed);
    if (summary.status === "failed") return fail(`summarization_failed: ${summary.error}`);
    steps.push(summary.status === "summarized" ? "summarized" : `summary_skipped: ${summary.reason}`);

    const summarized = await this.requireRecord(id);
    const target = await this.notificationTarget();
    if ("reason" in target) {
      steps.push(`email_skipped: ${target.reason}`);
    } else if (!summarized.summary) {
      steps.push("email_skipped: no summary");
    } else {
      const emailError = await this.notifyOne(summarized, target.to, target.notifier);
      if (emailError !== null) return fail(`email_failed: ${emailError}`);
      steps.push("email_sent");
    }

    logger.info("Reprocessed", { voicemail_id: id, steps });
    return { id, steps, success: true };
  }

  // ── Cutoff ──

  /** Skip every pending notification and only email records received from now on. */
  async setNotificationCutoff(now: Date = this.now()): Promise<CutoffResult> {
    const skippedCount = await this.store.skipPendingNotifications();
    await this.settings.setEmailCutoff(now);
    logger.info("Notification cutoff set", { cutoff: now.toISOString(), skipped_count: skippedCount });
    return { cutoff: now.toISOString(), skipped_count: skippedCount };
  }

  // ── Full tick ──

  async runAll(): Promise<void> {
    await withTraceAsync(() => this.runStages([
      ["sync", () => this.runSync()],
      ["retry_downloads", () => this.runRetryDownloads()],
      ["transcribe", () => this.runTranscribe()],
      ["summarize", () => this.runSummarize()],
      ["notify", () => this.runNotify()],
    ]));
  }

  /** transcribe → summarize → notify over the whole backlog. */
  async drainBacklog(): Promise<void> {
    await this.runStages([
      ["transcribe", () => this.runTranscribe()],
      ["summarize", () => this.runSummarize()],
      ["notify", () => this.runNotify()],
    ]);
  }

  private async runStages(stages: [string, () => Promise<unknown>][]): Promise<void> {
    for (const [name, run] of stages) {
      try {
        const outcome = await run();
        logger.debug("Stage finished", { stage: name, outcome });
      } catch (err) {
        logger.error("Stage crashed", { stage: name }, err);
      }
    }
  }

  private async requireRecord(id: number): Promise<VoicemailRecord> {
    const record = await this.store.getById(id);
    if (!record) throw new VoicemailNotFoundError(id);
    return record;
  }
}
