/**
 * Notification email rendering: HTML and plain-text bodies plus subject.
 * Pure functions; the sender lives in email.ts.
 */

import type { VoicemailRecord } from "./types.ts";

export interface VoicemailEmailData {
  id: number;
  from_number: string | null;
  to_number: string | null;
  to_number_name: string | null;
  duration: number;
  received_at: Date;
  summary: string | null;
  summary_en: string | null;
  corrected_text: string | null;
  transcription_text: string | null;
  sentiment: string | null;
  emotion: string | null;
  category: string | null;
  priority: string | null;
  email_subject: string | null;
  audio_url: string;
}

export function emailDataFromRecord(record: VoicemailRecord, audioUrl: string): VoicemailEmailData {
  return {
    id: record.id,
    from_number: record.from_number,
    to_number: record.to_number,
    to_number_name: record.to_number_name,
    duration: record.duration,
    received_at: record.started_at ?? record.created_at,
    summary: record.summary,
    summary_en: record.summary_en,
    corrected_text: record.corrected_text,
    transcription_text: record.transcription_text,
    sentiment: record.sentiment,
    emotion: record.emotion,
    category: record.category,
    priority: record.priority,
    email_subject: record.email_subject,
    audio_url: audioUrl,
  };
}

// ── Formatting ──────────────────────────────────────────────

/** m:ss below one hour, h:mm:ss above. */
export function formatDuration(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  const pad = (n: number) => String(n).padStart(2, "0");
  if (s < 3600) return `${Math.floor(s / 60)}:${pad(s % 60)}`;
  return `${Math.floor(s / 3600)}:${pad(Math.floor((s % 3600) / 60))}:${pad(s % 60)}`;
}

/** Normalize German numbers to +49 and group digits for reading. */
export function formatPhone(number: string | null): string {
  if (!number || !number.trim()) return "Unknown";

  let clean = number.trim();
  if (clean.startsWith("0049")) clean = "+49" + clean.substring(4);
  else if (clean.startsWith("00")) clean = "+" + clean.substring(2);
  else if (clean.startsWith("0")) clean = "+49" + clean.substring(1);

  if (!clean.startsWith("+49")) return clean;

  const rest = clean.substring(3);
  if (rest.length >= 10) return `+49 ${rest.substring(0, 3)} ${rest.substring(3, 7)} ${rest.substring(7)}`;
  if (rest.length >= 7) return `+49 ${rest.substring(0, 3)} ${rest.substring(3)}`;
  return `+49 ${rest}`;
}

/** `{ date: "dd.mm.yyyy", time: "HH:MM" }` in the given zone. */
export function formatReceived(at: Date, timeZone: string): { date: string; time: string } {
  const parts = new Intl.DateTimeFormat("de-DE", {
    timeZone,
    day: "2-digit",
    month: "2-digit",
    year: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(at);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? "";
  return {
    date: `${get("day")}.${get("month")}.${get("year")}`,
    time: `${get("hour")}:${get("minute")}`,
  };
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

const CATEGORY_LABELS: Record<string, string> = {
  sales_inquiry: "Sales Inquiry",
  existing_order: "Existing Order",
  new_inquiry: "New Inquiry",
  complaint: "Complaint",
  general: "General",
};

function titleCase(text: string): string {
  return text
    .split(/[_\s]+/)
    .filter(Boolean)
    .map(w => w.charAt(0).toUpperCase() + w.substring(1).toLowerCase())
    .join(" ");
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.substring(1);
}

export function categoryLabel(category: string): string {
  return CATEGORY_LABELS[category] ?? titleCase(category);
}

// ── Subject ─────────────────────────────────────────────────

export function buildSubject(data: VoicemailEmailData, timeZone: string): string {
  const { date, time } = formatReceived(data.received_at, timeZone);
  return `${data.email_subject || "Voicemail"} | ${formatPhone(data.from_number)} | ${date} ${time}`;
}

// ── HTML ────────────────────────────────────────────────────

function badge(label: string, bg: string, fg: string): string {
  return `<span style="background-color: ${bg}; color: ${fg}; padding: 4px 12px; border-radius: 9999px; font-size: 12px; font-weight: 600;">${escapeHtml(label)}</span>`;
}

const SENTIMENT_COLORS: Record<string, [string, string]> = {
  positive: ["#dcfce7", "#16a34a"],
  negative: ["#fee2e2", "#dc2626"],
  neutral: ["#f3f4f6", "#6b7280"],
};

function renderBadges(data: VoicemailEmailData): string {
  const badges: string[] = [];
  if (data.priority === "high") badges.push(badge("High Priority", "#fee2e2", "#dc2626"));
  else if (data.priority === "low") badges.push(badge("Low Priority", "#f3f4f6", "#6b7280"));

  const mood = data.emotion || data.sentiment;
  if (mood) {
    const [bg, fg] = SENTIMENT_COLORS[data.sentiment ?? ""] ?? ["#f3f4f6", "#6b7280"];
    badges.push(badge(capitalize(mood), bg, fg));
  }

  if (data.category) badges.push(badge(categoryLabel(data.category), "#e0e7ff", "#4338ca"));
  return badges.join(" ");
}

const LABEL_STYLE = "margin-bottom: 4px; font-size: 12px; color: #6b7280; text-transform: uppercase; letter-spacing: 0.05em;";

function transcriptOf(data: VoicemailEmailData): string {
  return data.corrected_text || data.transcription_text || "No transcription available.";
}

function destinationOf(data: VoicemailEmailData): string {
  return data.to_number_name || formatPhone(data.to_number);
}

export function renderEmailHtml(data: VoicemailEmailData, timeZone: string): string {
  const { date, time } = formatReceived(data.received_at, timeZone);
  const badges = renderBadges(data);
  const summary = data.summary || "No summary available.";
  const english = data.summary_en && data.summary_en !== data.summary
    ? `<div style="margin-top: 12px; font-size: 14px; line-height: 1.6; color: #6b7280; font-style: italic;"><strong>English:</strong> ${escapeHtml(data.summary_en)}</div>`
    : "";

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>New Voicemail</title>
</head>
<body style="margin: 0; padding: 0; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background-color: #f9fafb; color: #111827;">
  <table width="100%" cellpadding="0" cellspacing="0" style="background-color: #f9fafb; padding: 40px 20px;">
    <tr><td align="center">
      <table width="600" cellpadding="0" cellspacing="0" style="background-color: #ffffff; border-radius: 12px; overflow: hidden;">
        <tr>
          <td style="background-color: #1f2937; padding: 24px 32px;">
            <h1 style="margin: 0; color: #ffffff; font-size: 20px; font-weight: 600;">New Voicemail</h1>
            <span style="color: #9ca3af; font-size: 14px;">${date} ${time}</span>
          </td>
        </tr>
        <tr>
          <td style="padding: 24px 32px; border-bottom: 1px solid #e5e7eb;">
            <table width="100%" cellpadding="0" cellspacing="0"><tr>
              <td width="50%"><div style="${LABEL_STYLE}">From</div><div style="font-size: 18px; font-weight: 600;">${escapeHtml(formatPhone(data.from_number))}</div></td>
              <td width="25%"><div style="${LABEL_STYLE}">To</div><div style="font-size: 16px; color: #374151;">${escapeHtml(destinationOf(data))}</div></td>
              <td width="25%" align="right"><div style="${LABEL_STYLE}">Duration</div><div style="font-size: 16px; color: #374151;">${formatDuration(data.duration)}</div></td>
            </tr></table>
          </td>
        </tr>
        ${badges ? `<tr><td style="padding: 20px 32px 0 32px;">${badges}</td></tr>` : ""}
        <tr>
          <td style="padding: 24px 32px;">
            <div style="${LABEL_STYLE}">Summary</div>
            <div style="font-size: 16px; line-height: 1.6; color: #374151; background-color: #f9fafb; padding: 16px; border-radius: 8px; border-left: 4px solid #3b82f6;">${escapeHtml(summary)}</div>
            ${english}
          </td>
        </tr>
        <tr>
          <td style="padding: 0 32px 24px 32px;">
            <a href="${escapeHtml(data.audio_url)}" style="display: inline-block; background-color: #3b82f6; color: #ffffff; text-decoration: none; padding: 12px 24px; border-radius: 8px; font-weight: 600; font-size: 14px;">Listen to Voicemail</a>
          </td>
        </tr>
        <tr>
          <td style="padding: 24px 32px; background-color: #f9fafb; border-top: 1px solid #e5e7eb;">
            <div style="${LABEL_STYLE}">Full Transcript</div>
            <div style="font-size: 14px; line-height: 1.7; color: #4b5563; white-space: pre-wrap;">${escapeHtml(transcriptOf(data))}</div>
          </td>
        </tr>
        <tr>
          <td style="padding: 20px 32px; background-color: #f3f4f6; font-size: 12px; color: #9ca3af;">Voicemail #${data.id} &middot; Transcribed automatically</td>
        </tr>
      </table>
    </td></tr>
  </table>
</body>
</html>`;
}

// ── Plain text ──────────────────────────────────────────────

export function renderEmailText(data: VoicemailEmailData, timeZone: string): string {
  const { date, time } = formatReceived(data.received_at, timeZone);
  const caller = formatPhone(data.from_number);
  const rule = "=".repeat(50);
  const thin = "-".repeat(50);
  const lines: string[] = [];

  if (data.priority === "high") lines.push("!!! HIGH PRIORITY !!!", "");

  lines.push(
    rule,
    "  NEW VOICEMAIL",
    `  From: ${caller}`,
    `  To:   ${destinationOf(data)}`,
    `  Date: ${date} at ${time}  (${formatDuration(data.duration)})`,
    rule,
    "",
  );

  const tags: string[] = [];
  if (data.category && data.category !== "general") tags.push(categoryLabel(data.category));
  if (data.emotion && data.emotion !== "calm" && data.emotion !== "neutral") tags.push(capitalize(data.emotion));
  if (tags.length > 0) lines.push(`[${tags.join(" | ")}]`, "");

  lines.push("SUMMARY", thin, "", data.summary || "No summary available.");
  if (data.summary_en && data.summary_en !== data.summary) lines.push("", `(English: ${data.summary_en})`);

  lines.push(
    "",
    "",
    "TRANSCRIPT",
    thin,
    "",
    transcriptOf(data),
    "",
    "",
    rule,
    `Listen: ${data.audio_url}`,
    `Callback: ${caller}`,
    rule,
    "",
    `Voicemail #${data.id}`,
  );

  return lines.join("\n");
}
