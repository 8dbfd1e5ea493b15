/**
 * Email: Resend integration for voicemail notifications.
 *
 * Uses native fetch(). Transient failures (429, 5xx, network) are retried
 * with backoff; anything else surfaces as EmailDeliveryError.
 */

import { readFile } from "fs/promises";
import { log } from "./logger.ts";
import { publicListenUrl } from "./access-token.ts";
import { buildSubject, emailDataFromRecord, renderEmailHtml, renderEmailText } from "./email-template.ts";
import { RemoteHttpError, errorMessage, isTransientError, withRetry } from "./resilience.ts";
import type { FetchLike } from "./placetel.ts";
import type { VoicemailRecord } from "./types.ts";

const logger = log.child("email");

const RESEND_URL = "https://api.resend.com/emails";
const EMAIL_TIMEOUT_MS = 30_000;

export class EmailDeliveryError extends Error {
  constructor(
    message: string,
    public status?: number,
  ) {
    super(message);
    this.name = "EmailDeliveryError";
  }
}

export interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

export interface Notifier {
  /** Sends the notification for one record; returns the provider message id. */
  sendVoicemail(to: string, record: VoicemailRecord): Promise<string>;
}

export interface EmailRenderOpts {
  publicBaseUrl: string;
  publicAccessSecret: string;
  timeZone: string;
}

export function renderVoicemailEmail(record: VoicemailRecord, opts: EmailRenderOpts): RenderedEmail {
  const data = emailDataFromRecord(record, publicListenUrl(opts.publicBaseUrl, opts.publicAccessSecret, record.id));
  return {
    subject: buildSubject(data, opts.timeZone),
    html: renderEmailHtml(data, opts.timeZone),
    text: renderEmailText(data, opts.timeZone),
  };
}

export interface ResendNotifierOpts extends EmailRenderOpts {
  apiKey: string;
  from: string;
  fromName: string;
  attachAudio?: boolean;
  fetch?: FetchLike;
  retryBaseDelayMs?: number;
}

interface ResendAttachment {
  filename: string;
  content: string;
}

export class ResendNotifier implements Notifier {
  private fetchFn: FetchLike;

  constructor(private opts: ResendNotifierOpts) {
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
  }

  private async attachmentsFor(record: VoicemailRecord): Promise<ResendAttachment[]> {
    if (!this.opts.attachAudio || !record.local_file_path) return [];
    try {
      const audio = await readFile(record.local_file_path);
      return [{ filename: `voicemail_${record.id}.mp3`, content: audio.toString("base64") }];
    } catch (err) {
      logger.warn("Audio attachment unavailable", { voicemail_id: record.id }, err);
      return [];
    }
  }

  async sendVoicemail(to: string, record: VoicemailRecord): Promise<string> {
    const email = renderVoicemailEmail(record, this.opts);
    const attachments = await this.attachmentsFor(record);

    const payload = {
      from: `${this.opts.fromName} <${this.opts.from}>`,
      to: [to],
      subject: email.subject,
      html: email.html,
      text: email.text,
      ...(attachments.length > 0 ? { attachments } : {}),
    };

    try {
      const id = await withRetry(async () => {
        const res = await this.fetchFn(RESEND_URL, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.opts.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(EMAIL_TIMEOUT_MS),
        });
        if (!res.ok) {
          throw new RemoteHttpError("resend", res.status, await res.text());
        }
        const body: unknown = await res.json();
        if (typeof body !== "object" || body === null || !("id" in body) || typeof body.id !== "string") {
          throw new EmailDeliveryError("Resend response missing message id", res.status);
        }
        return body.id;
      }, {
        maxRetries: 2,
        baseDelayMs: this.opts.retryBaseDelayMs ?? 1000,
        retryOn: isTransientError,
        label: "resend",
      });

      logger.info("Notification sent", { voicemail_id: record.id, message_id: id });
      return id;
    } catch (err) {
      if (err instanceof EmailDeliveryError) throw err;
      const status = err instanceof RemoteHttpError ? err.status : undefined;
      throw new EmailDeliveryError(errorMessage(err), status);
    }
  }
}
