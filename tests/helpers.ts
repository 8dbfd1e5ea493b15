/**
 * Shared test utilities: in-memory store and fake collaborators.
 */
import { vi } from "vitest";
import type { InitialProcessingState, InsertResult, VoicemailListFilter, VoicemailStore } from "../src/store.ts";
import type { DownloadOpts, PlacetelCall, VoicemailGateway } from "../src/placetel.ts";
import type { Transcriber } from "../src/transcribe.ts";
import type { Summarizer } from "../src/summarize.ts";
import type { Notifier } from "../src/email.ts";
import { Pipeline } from "../src/pipeline.ts";
import {
  MIN_DURATION_SECONDS,
  PLACEHOLDER_TRANSCRIPTS,
  type NewVoicemail,
  type Setting,
  type SummaryResult,
  type TranscriptionResult,
  type VoicemailRecord,
} from "../src/types.ts";

export const NOW = new Date("2026-03-10T12:00:00.000Z");

// ── Memory Store ──────────────────────────────────────────────

function byReceived(a: VoicemailRecord, b: VoicemailRecord): number {
  const at = a.started_at?.getTime() ?? Infinity;
  const bt = b.started_at?.getTime() ?? Infinity;
  return at !== bt ? at - bt : a.id - b.id;
}

export class MemoryStore implements VoicemailStore {
  records = new Map<number, VoicemailRecord>();
  settings = new Map<string, Setting>();
  private nextId = 1;

  constructor(private now: () => Date = () => NOW) {}

  private update(id: number, patch: Partial<VoicemailRecord>): VoicemailRecord | null {
    const record = this.records.get(id);
    if (!record) return null;
    const next = { ...record, ...patch, updated_at: this.now() };
    this.records.set(id, next);
    return next;
  }

  private scan(predicate: (r: VoicemailRecord) => boolean, limit: number): VoicemailRecord[] {
    return [...this.records.values()].filter(predicate).sort(byReceived).slice(0, limit).map(r => ({ ...r }));
  }

  /** Test seam: write a record directly with any field overrides. */
  seed(overrides: Partial<VoicemailRecord> = {}): VoicemailRecord {
    const id = this.nextId++;
    const record: VoicemailRecord = {
      id,
      external_id: `ext-${id}`,
      provider: "placetel",
      direction: "in",
      status: "voicemail",
      from_number: "01761234567",
      to_number: "0301234567",
      to_number_name: "Support",
      duration: 30,
      started_at: new Date("2026-03-10T09:00:00.000Z"),
      answered_at: null,
      ended_at: null,
      file_url: `https://files.example.test/${id}.mp3?sig=abc`,
      local_file_path: null,
      unread: true,
      transcription_status: "pending",
      transcription_text: null,
      transcription_language: null,
      transcription_confidence: null,
      transcription_model: null,
      transcribed_at: null,
      corrected_text: null,
      summary: null,
      summary_en: null,
      sentiment: null,
      emotion: null,
      category: null,
      priority: null,
      email_subject: null,
      summary_model: null,
      summarized_at: null,
      summary_attempts: 0,
      summary_error: null,
      email_status: "pending",
      email_sent_at: null,
      email_message_id: null,
      created_at: this.now(),
      updated_at: this.now(),
      ...overrides,
    };
    this.records.set(id, record);
    return { ...record };
  }

  /** Direct read without copying, for assertions. */
  get(id: number): VoicemailRecord {
    const record = this.records.get(id);
    if (!record) throw new Error(`No record ${id}`);
    return record;
  }

  async getById(id: number): Promise<VoicemailRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async findByExternalId(provider: string, externalId: string): Promise<VoicemailRecord | null> {
    for (const r of this.records.values()) {
      if (r.provider === provider && r.external_id === externalId) return { ...r };
    }
    return null;
  }

  async insert(draft: NewVoicemail): Promise<InsertResult> {
    const existing = await this.findByExternalId(draft.provider, draft.external_id);
    if (existing) return { record: existing, created: false };
    const record = this.seed({ ...draft, answered_at: null, ended_at: null, local_file_path: null });
    return { record, created: true };
  }

  private matching(filter: Pick<VoicemailListFilter, "transcription_status" | "search">): VoicemailRecord[] {
    const term = filter.search?.toLowerCase();
    return [...this.records.values()]
      .filter(r => !filter.transcription_status || r.transcription_status === filter.transcription_status)
      .filter(r => !term || [r.transcription_text, r.summary, r.from_number].some(v => v?.toLowerCase().includes(term)));
  }

  async list(filter: VoicemailListFilter): Promise<VoicemailRecord[]> {
    return this.matching(filter)
      .sort((a, b) => byReceived(b, a))
      .slice(filter.offset, filter.offset + filter.limit)
      .map(r => ({ ...r }));
  }

  async count(filter: Pick<VoicemailListFilter, "transcription_status" | "search"> = {}): Promise<number> {
    return this.matching(filter).length;
  }

  async deleteById(id: number): Promise<VoicemailRecord | null> {
    const record = this.records.get(id);
    if (!record) return null;
    this.records.delete(id);
    return { ...record };
  }

  async markRead(id: number): Promise<void> {
    this.update(id, { unread: false });
  }

  async findPendingDownloads(limit: number): Promise<VoicemailRecord[]> {
    return this.scan(r =>
      r.status === "voicemail" &&
      r.transcription_status === "pending" &&
      r.local_file_path === null &&
      r.duration >= MIN_DURATION_SECONDS, limit);
  }

  async findPendingTranscriptions(limit: number): Promise<VoicemailRecord[]> {
    return this.scan(r =>
      r.transcription_status === "pending" &&
      r.local_file_path !== null &&
      r.duration >= MIN_DURATION_SECONDS, limit);
  }

  async findPendingSummaries(limit: number, maxAttempts: number): Promise<VoicemailRecord[]> {
    return this.scan(r =>
      r.transcription_status === "completed" &&
      r.transcription_text !== null &&
      !PLACEHOLDER_TRANSCRIPTS.includes(r.transcription_text) &&
      r.summary === null &&
      r.summary_attempts < maxAttempts, limit);
  }

  async findPendingNotifications(limit: number, cutoff: Date | null): Promise<VoicemailRecord[]> {
    return this.scan(r =>
      r.email_status === "pending" &&
      r.summary !== null &&
      (cutoff === null || (r.started_at !== null && r.started_at >= cutoff)), limit);
  }

  async setFileUrl(id: number, fileUrl: string): Promise<void> {
    this.update(id, { file_url: fileUrl });
  }

  async setLocalFilePath(id: number, localPath: string): Promise<void> {
    this.update(id, { local_file_path: localPath });
  }

  async markTranscriptionProcessing(id: number): Promise<void> {
    this.update(id, { transcription_status: "processing" });
  }

  async saveTranscription(id: number, result: TranscriptionResult, at: Date): Promise<void> {
    this.update(id, {
      transcription_status: "completed",
      transcription_text: result.text,
      transcription_language: result.language,
      transcription_confidence: result.confidence,
      transcription_model: result.model,
      transcribed_at: at,
    });
  }

  async markTranscriptionFailed(id: number): Promise<void> {
    this.update(id, { transcription_status: "failed" });
  }

  async saveSummary(id: number, result: SummaryResult, model: string, at: Date): Promise<void> {
    this.update(id, { ...result, summary_model: model, summarized_at: at, summary_error: null });
  }

  async saveSummaryPlaceholder(id: number, summary: string, at: Date): Promise<void> {
    this.update(id, { summary, summarized_at: at });
  }

  async recordSummaryFailure(id: number, error: string): Promise<number> {
    const attempts = (this.records.get(id)?.summary_attempts ?? 0) + 1;
    this.update(id, { summary_attempts: attempts, summary_error: error });
    return attempts;
  }

  async markEmailSent(id: number, messageId: string, at: Date): Promise<void> {
    this.update(id, { email_status: "sent", email_message_id: messageId, email_sent_at: at });
  }

  async markEmailFailed(id: number): Promise<void> {
    this.update(id, { email_status: "failed" });
  }

  async skipPendingNotifications(): Promise<number> {
    let count = 0;
    for (const r of this.records.values()) {
      if (r.email_status === "pending") {
        this.update(r.id, { email_status: "skipped" });
        count++;
      }
    }
    return count;
  }

  async resetProcessing(id: number, initial: InitialProcessingState): Promise<VoicemailRecord | null> {
    const next = this.update(id, {
      ...initial,
      transcription_language: null,
      transcription_confidence: null,
      transcription_model: null,
      transcribed_at: null,
      corrected_text: null,
      summary: null,
      summary_en: null,
      sentiment: null,
      emotion: null,
      category: null,
      priority: null,
      email_subject: null,
      summary_model: null,
      summarized_at: null,
      summary_attempts: 0,
      summary_error: null,
      email_sent_at: null,
      email_message_id: null,
    });
    return next ? { ...next } : null;
  }

  async getSetting(key: string): Promise<string | null> {
    return this.settings.get(key)?.value ?? null;
  }

  async setSetting(key: string, value: string): Promise<Setting> {
    const setting = { key, value, updated_at: this.now() };
    this.settings.set(key, setting);
    return { ...setting };
  }

  async listSettings(): Promise<Setting[]> {
    return [...this.settings.values()].sort((a, b) => a.key.localeCompare(b.key));
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}

// ── Fake collaborators ────────────────────────────────────────

export function makeCall(overrides: Partial<PlacetelCall> = {}): PlacetelCall {
  const id = overrides.id ?? "1001";
  return {
    id,
    from_number: "01761234567",
    to_number: "0301234567",
    to_number_name: "Support",
    duration: 30,
    received_at: new Date("2026-03-10T09:00:00.000Z"),
    file_url: `https://files.example.test/${id}.mp3?sig=abc`,
    unread: true,
    ...overrides,
  };
}

export function localPathFor(externalId: string): string {
  return `/data/voicemails/voicemail_${externalId}.mp3`;
}

export class FakeGateway implements VoicemailGateway {
  listing: PlacetelCall[] = [];
  byId = new Map<string, PlacetelCall>();
  failingDownloads = new Set<string>();
  listingError: Error | null = null;

  fetchListing = vi.fn(async (_days: number): Promise<PlacetelCall[]> => {
    if (this.listingError) throw this.listingError;
    return this.listing;
  });

  fetchById = vi.fn(async (externalId: string): Promise<PlacetelCall | null> => {
    return this.byId.get(externalId) ?? null;
  });

  download = vi.fn(async (externalId: string, _fileUrl: string, _opts?: DownloadOpts): Promise<string> => {
    if (this.failingDownloads.has(externalId)) throw new Error(`download failed for ${externalId}`);
    return localPathFor(externalId);
  });
}

export function transcriptionResult(overrides: Partial<TranscriptionResult> = {}): TranscriptionResult {
  return {
    text: "Hallo, hier ist Anna Becker. Bitte rufen Sie mich wegen meiner Bestellung zurück.",
    language: "de",
    confidence: 0.97,
    model: "scribe_v1",
    ...overrides,
  };
}

export class FakeTranscriber implements Transcriber {
  result: TranscriptionResult = transcriptionResult();
  error: Error | null = null;

  transcribe = vi.fn(async (_filePath: string): Promise<TranscriptionResult> => {
    if (this.error) throw this.error;
    return this.result;
  });
}

export function summaryResult(overrides: Partial<SummaryResult> = {}): SummaryResult {
  return {
    corrected_text: "Hallo, hier ist Anna Becker. Bitte rufen Sie mich wegen meiner Bestellung zurück.",
    summary: "Anna Becker bittet um Rückruf zu ihrer Bestellung.",
    summary_en: "Anna Becker asks for a callback about her order.",
    sentiment: "neutral",
    emotion: "calm",
    category: "existing_order",
    priority: "normal",
    email_subject: "Rückruf zur Bestellung",
    ...overrides,
  };
}

export class FakeSummarizer implements Summarizer {
  readonly model = "test-model";
  result: SummaryResult = summaryResult();
  error: Error | null = null;

  summarize = vi.fn(async (_transcript: string, _language: string | null): Promise<SummaryResult> => {
    if (this.error) throw this.error;
    return this.result;
  });
}

export class FakeNotifier implements Notifier {
  error: Error | null = null;

  sendVoicemail = vi.fn(async (_to: string, record: VoicemailRecord): Promise<string> => {
    if (this.error) throw this.error;
    return `msg-${record.id}`;
  });
}

// ── Pipeline fixture ──────────────────────────────────────────

export interface Fixture {
  store: MemoryStore;
  gateway: FakeGateway;
  transcriber: FakeTranscriber;
  summarizer: FakeSummarizer;
  notifier: FakeNotifier;
  pipeline: Pipeline;
}

export function createFixture(opts: { withNotifier?: boolean; now?: () => Date } = {}): Fixture {
  const now = opts.now ?? (() => NOW);
  const store = new MemoryStore(now);
  const gateway = new FakeGateway();
  const transcriber = new FakeTranscriber();
  const summarizer = new FakeSummarizer();
  const notifier = new FakeNotifier();
  const pipeline = new Pipeline({
    store,
    gateway,
    transcriber,
    summarizer,
    notifier: opts.withNotifier === false ? null : notifier,
    now,
  });
  return { store, gateway, transcriber, summarizer, notifier, pipeline };
}

/** Turn on email delivery settings. */
export async function enableEmail(store: MemoryStore, to = "helpdesk@example.test"): Promise<void> {
  await store.setSetting("auto_email", "true");
  await store.setSetting("notification_email", to);
}
