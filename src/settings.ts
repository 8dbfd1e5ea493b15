/**
 * Typed accessors over the key/value settings table.
 */

import { z } from "zod";
import type { VoicemailStore } from "./store.ts";

export const SETTING_DEFAULTS = {
  sync_interval_minutes: "5",
  auto_transcribe: "true",
  auto_summarize: "true",
  auto_email: "false",
} as const;

export type ToggleKey = "auto_transcribe" | "auto_summarize" | "auto_email";

const TOGGLE_KEYS: readonly string[] = ["auto_transcribe", "auto_summarize", "auto_email"];

export function parseBool(raw: string | null, fallback: boolean): boolean {
  if (raw === null) return fallback;
  const v = raw.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(v)) return true;
  if (["false", "0", "no", "off"].includes(v)) return false;
  return fallback;
}

const boolSchema = z.enum(["true", "1", "yes", "on", "false", "0", "no", "off"]);
const intervalSchema = z.coerce.number().int().min(1).max(1440);
const emailSchema = z.string().trim().email();
const instantSchema = z.string().datetime({ offset: true });

/**
 * Normalize a value written through the settings API.
 * Unknown keys are stored verbatim; known keys must parse.
 */
export function normalizeSettingValue(key: string, value: string): string {
  if (key === "sync_interval_minutes") return String(intervalSchema.parse(value));
  if (TOGGLE_KEYS.includes(key)) {
    return String(parseBool(boolSchema.parse(value.trim().toLowerCase()), false));
  }
  if (key === "notification_email") return value.trim() === "" ? "" : emailSchema.parse(value);
  if (key === "email_only_after" || key === "last_sync_at") return instantSchema.parse(value);
  return value;
}

export class Settings {
  constructor(private store: VoicemailStore) {}

  async getSyncIntervalMinutes(): Promise<number> {
    const raw = await this.store.getSetting("sync_interval_minutes");
    const parsed = intervalSchema.safeParse(raw ?? SETTING_DEFAULTS.sync_interval_minutes);
    return parsed.success ? parsed.data : Number(SETTING_DEFAULTS.sync_interval_minutes);
  }

  async isEnabled(key: ToggleKey): Promise<boolean> {
    const raw = await this.store.getSetting(key);
    return parseBool(raw, SETTING_DEFAULTS[key] === "true");
  }

  async getNotificationEmail(): Promise<string | null> {
    const raw = await this.store.getSetting("notification_email");
    return raw && raw.trim() ? raw.trim() : null;
  }

  /** Raw value; the sync window calculation handles unparsable input. */
  async getLastSyncAt(): Promise<string | null> {
    return this.store.getSetting("last_sync_at");
  }

  async setLastSyncAt(at: Date): Promise<void> {
    await this.store.setSetting("last_sync_at", at.toISOString());
  }

  async getEmailCutoff(): Promise<Date | null> {
    const raw = await this.store.getSetting("email_only_after");
    if (!raw) return null;
    const at = new Date(raw);
    return Number.isNaN(at.getTime()) ? null : at;
  }

  async setEmailCutoff(at: Date): Promise<void> {
    await this.store.setSetting("email_only_after", at.toISOString());
  }
}
