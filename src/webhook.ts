/**
 * Placetel webhook fast-path.
 *
 * Signed audio URLs expire about 20 minutes after the call, so a voicemail
 * hangup is fetched and downloaded right away instead of waiting for the
 * next scheduled sync. The rest of the backlog is then drained.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { log } from "./logger.ts";
import { withTraceAsync } from "./trace.ts";
import type { Pipeline } from "./pipeline.ts";

const logger = log.child("webhook");

export const SIGNATURE_HEADER = "x-placetel-signature";

const webhookEventSchema = z.object({
  event: z.string().optional(),
  type: z.string().optional(),
  call_id: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  direction: z.string().optional(),
});

export type WebhookEvent = z.infer<typeof webhookEventSchema>;

export interface WebhookResponse {
  status: number;
  body: Record<string, unknown>;
}

/** HMAC-SHA256 hex of the raw body. No secret configured → always valid. */
export function verifySignature(rawBody: string, signature: string, secret: string): boolean {
  if (!secret) return true;
  const expected = Buffer.from(createHmac("sha256", secret).update(rawBody).digest("hex"));
  const given = Buffer.from(signature);
  return given.length === expected.length && timingSafeEqual(given, expected);
}

export function parseWebhookEvent(rawBody: string): WebhookEvent {
  const fields = Object.fromEntries(new URLSearchParams(rawBody));
  return webhookEventSchema.parse(fields);
}

/** Voicemail hangups on inbound calls are the only events worth acting on. */
export function voicemailCallId(event: WebhookEvent): string | null {
  if (event.event === "HungUp" && event.type === "voicemail" && event.direction === "in" && event.call_id) {
    return event.call_id;
  }
  return null;
}

/**
 * Verify and classify one webhook delivery. `dispatch` is handed the call id
 * when processing should start; it must not block the response.
 */
export function handlePlacetelWebhook(
  rawBody: string,
  signature: string,
  secret: string,
  dispatch: (callId: string) => void,
): WebhookResponse {
  if (!verifySignature(rawBody, signature, secret)) {
    logger.warn("Invalid webhook signature");
    return { status: 401, body: { error: "Invalid signature" } };
  }

  const event = parseWebhookEvent(rawBody);
  logger.info("Webhook received", {
    event: event.event,
    type: event.type,
    call_id: event.call_id,
    direction: event.direction,
  });

  const callId = voicemailCallId(event);
  if (!callId) return { status: 200, body: { status: "ok", event: event.event ?? null } };

  dispatch(callId);
  return { status: 202, body: { status: "accepted", message: "Immediate processing triggered" } };
}

/** Fetch, record and download one call, then drain the backlog. */
export async function processVoicemailImmediate(pipeline: Pipeline, callId: string): Promise<void> {
  await withTraceAsync(async () => {
    logger.info("Immediate processing", { external_id: callId });
    const synced = await pipeline.syncOne(callId);
    if (synced.status !== "synced") {
      logger.info("Immediate processing stopped", { external_id: callId, status: synced.status });
      return;
    }
    await pipeline.drainBacklog();
    logger.info("Immediate processing complete", { external_id: callId, voicemail_id: synced.id, downloaded: synced.downloaded });
  });
}
