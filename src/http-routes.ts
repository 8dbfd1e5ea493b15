/**
 * HTTP route handlers for the relay server.
 *
 * `routeRequest` maps a parsed request to a result and never touches the
 * socket; `createHttpHandler` adapts it to node's http server. Each request
 * is handled inside its own trace context.
 */

import { readFile, rm, stat } from "fs/promises";
import type { IncomingMessage, ServerResponse } from "http";
import { z, ZodError } from "zod";
import { log } from "./logger.ts";
import { errorMessage } from "./resilience.ts";
import { withTraceAsync } from "./trace.ts";
import { publicListenUrl, verifyAccessToken } from "./access-token.ts";
import { renderVoicemailEmail, type EmailRenderOpts } from "./email.ts";
import { SETTING_DEFAULTS, normalizeSettingValue } from "./settings.ts";
import { handlePlacetelWebhook, SIGNATURE_HEADER } from "./webhook.ts";
import { VoicemailNotFoundError, type Pipeline } from "./pipeline.ts";
import type { PipelineScheduler } from "./scheduler.ts";
import type { VoicemailStore } from "./store.ts";

const logger = log.child("http");

const MAX_BODY_BYTES = 1024 * 1024;

export interface HttpDeps {
  store: VoicemailStore;
  pipeline: Pipeline;
  scheduler: PipelineScheduler;
  emailRender: EmailRenderOpts;
  webhookSecret: string;
  /** Starts fast-path processing for a call without blocking the response. */
  dispatchVoicemail: (callId: string) => void;
}

export interface HttpRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: Record<string, string | undefined>;
  rawBody: string;
}

export type HttpResult =
  | { status: number; json: unknown }
  | { status: number; html: string }
  | { status: number; text: string }
  | { status: number; audioPath: string };

// ── Validation ──────────────────────────────────────────────

const limitQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

const syncQuery = z.object({
  days: z.coerce.number().int().min(1).optional(),
});

const listQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  transcription_status: z.enum(["pending", "processing", "completed", "failed", "skipped"]).optional(),
  search: z.string().trim().min(1).max(200).optional(),
});

const settingBody = z.object({
  value: z.union([z.string(), z.number(), z.boolean()]).transform(String),
});

const listenQuery = z.object({
  token: z.string().min(1),
});

function queryObject(query: URLSearchParams): Record<string, string> {
  return Object.fromEntries(query);
}

function json(status: number, body: unknown): HttpResult {
  return { status, json: body };
}

function parseJsonBody(raw: string): unknown {
  try {
    return JSON.parse(raw || "{}");
  } catch {
    throw new ZodError([{ code: "custom", path: [], message: "Body is not valid JSON" }]);
  }
}

const VOICEMAIL_ROUTE =
  /^\/voicemails\/(\d+)(?:\/(transcribe|summarize|reprocess|email-preview|email-preview-text|listen-url|read))?$/;
const SETTING_ROUTE = /^\/settings\/([A-Za-z0-9_.-]+)$/;
const LISTEN_ROUTE = /^\/listen\/(\d+)$/;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function audioOnDisk(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}

// ── Router ──────────────────────────────────────────────────

export async function routeRequest(deps: HttpDeps, req: HttpRequest): Promise<HttpResult> {
  try {
    return await withTraceAsync(() => dispatch(deps, req));
  } catch (err) {
    if (err instanceof ZodError) {
      return json(400, { error: "Invalid request", issues: err.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`) });
    }
    if (err instanceof VoicemailNotFoundError) {
      return json(404, { error: err.message });
    }
    logger.error("Request failed", { method: req.method, path: req.path }, err);
    return json(500, { error: errorMessage(err) });
  }
}

async function dispatch(deps: HttpDeps, req: HttpRequest): Promise<HttpResult> {
  const { method, path } = req;
  const { pipeline, store, scheduler } = deps;

  if (path === "/health" && method === "GET") {
    try {
      await store.ping();
      const voicemails = await store.count();
      return json(200, { status: "ok", voicemails, scheduler: scheduler.getStatus() });
    } catch (err) {
      logger.warn("Health check failed", err);
      return json(503, { status: "degraded", error: errorMessage(err), scheduler: scheduler.getStatus() });
    }
  }

  // ── Webhook ──

  if (path === "/webhook/placetel") {
    if (method === "GET") return json(200, { status: "ok", webhook: "placetel" });
    if (method === "POST") {
      const result = handlePlacetelWebhook(
        req.rawBody,
        req.headers[SIGNATURE_HEADER] ?? "",
        deps.webhookSecret,
        deps.dispatchVoicemail,
      );
      return json(result.status, result.body);
    }
  }

  // ── Manual triggers ──

  if (method === "POST") {
    if (path === "/sync") {
      const { days } = syncQuery.parse(queryObject(req.query));
      const result = await pipeline.runSync({ days });
      return json("error" in result ? 502 : 200, result);
    }
    if (path === "/sync-now") {
      const result = await pipeline.runSync();
      return json("error" in result ? 502 : 200, { status: "completed", result });
    }
    if (path === "/transcribe-pending") {
      const { limit } = limitQuery.parse(queryObject(req.query));
      return json(200, await pipeline.runTranscribe({ limit }));
    }
    if (path === "/summarize-pending") {
      const { limit } = limitQuery.parse(queryObject(req.query));
      return json(200, await pipeline.runSummarize({ limit }));
    }
    if (path === "/email-cutoff") {
      return json(200, await pipeline.setNotificationCutoff());
    }
    if (path === "/run-now") {
      await scheduler.trigger("manual");
      return json(200, { status: "completed", scheduler: scheduler.getStatus() });
    }
  }

  // ── Voicemails ──

  if (path === "/voicemails" && method === "GET") {
    const filter = listQuery.parse(queryObject(req.query));
    const [items, total] = await Promise.all([store.list(filter), store.count(filter)]);
    return json(200, { items, total, limit: filter.limit, offset: filter.offset });
  }

  const vm = VOICEMAIL_ROUTE.exec(path);
  if (vm) {
    const id = Number(vm[1]);
    const action = vm[2];

    if (!action && method === "GET") {
      const record = await store.getById(id);
      return record ? json(200, record) : json(404, { error: `Voicemail ${id} not found` });
    }
    if (!action && method === "DELETE") {
      const record = await store.getById(id);
      if (!record) return json(404, { error: `Voicemail ${id} not found` });
      if (record.local_file_path) await rm(record.local_file_path, { force: true });
      await store.deleteById(id);
      logger.info("Voicemail deleted", { voicemail_id: id, external_id: record.external_id });
      return json(200, { deleted: id });
    }
    if ((action === "email-preview" || action === "email-preview-text") && method === "GET") {
      const record = await store.getById(id);
      if (!record) return json(404, { error: `Voicemail ${id} not found` });
      const email = renderVoicemailEmail(record, deps.emailRender);
      return action === "email-preview" ? { status: 200, html: email.html } : { status: 200, text: email.text };
    }
    if (action === "listen-url" && method === "GET") {
      const record = await store.getById(id);
      if (!record) return json(404, { error: `Voicemail ${id} not found` });
      const { publicBaseUrl, publicAccessSecret } = deps.emailRender;
      return json(200, { id, url: publicListenUrl(publicBaseUrl, publicAccessSecret, id) });
    }
    if (method === "POST") {
      if (action === "transcribe") return json(200, await pipeline.runTranscribe({ recordId: id }));
      if (action === "summarize") return json(200, await pipeline.runSummarize({ recordId: id }));
      if (action === "reprocess") {
        const result = await pipeline.reprocess(id);
        return json(result.error ? 404 : 200, result);
      }
      if (action === "read") {
        const record = await store.getById(id);
        if (!record) return json(404, { error: `Voicemail ${id} not found` });
        await store.markRead(id);
        return json(200, { id, unread: false });
      }
    }
  }

  const listen = LISTEN_ROUTE.exec(path);
  if (listen && method === "GET") {
    const id = Number(listen[1]);
    const { token } = listenQuery.parse(queryObject(req.query));
    if (!verifyAccessToken(deps.emailRender.publicAccessSecret, id, token)) {
      return json(403, { error: "Invalid token" });
    }
    const record = await store.getById(id);
    if (!record?.local_file_path) return json(404, { error: "Audio not available" });
    if (!(await audioOnDisk(record.local_file_path))) {
      logger.warn("Audio file missing", { voicemail_id: id, path: record.local_file_path });
      return json(404, { error: "Audio file not found on disk" });
    }
    return { status: 200, audioPath: record.local_file_path };
  }

  // ── Settings ──

  if (path === "/settings" && method === "GET") {
    const stored = await store.listSettings();
    const settings: Record<string, string> = { ...SETTING_DEFAULTS };
    for (const s of stored) settings[s.key] = s.value;
    return json(200, { settings });
  }

  const setting = SETTING_ROUTE.exec(path);
  if (setting) {
    const key = setting[1] ?? "";

    if (method === "GET") {
      const value = await store.getSetting(key);
      if (value !== null) return json(200, { key, value });
      const fallback = Object.entries(SETTING_DEFAULTS).find(([k]) => k === key);
      return fallback
        ? json(200, { key, value: fallback[1] })
        : json(404, { error: `Setting '${key}' not found` });
    }

    if (method === "PUT") {
      const { value } = settingBody.parse(parseJsonBody(req.rawBody));
      const saved = await store.setSetting(key, normalizeSettingValue(key, value));
      if (key === "sync_interval_minutes") {
        scheduler.reschedule(Number(saved.value));
      }
      logger.info("Setting updated", { key });
      return json(200, saved);
    }
  }

  return json(404, { error: "Not found" });
}

// ── Node adapter ────────────────────────────────────────────

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

function headerMap(req: IncomingMessage): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name.toLowerCase()] = Array.isArray(value) ? value[0] : value;
  }
  return headers;
}

async function writeResult(res: ServerResponse, result: HttpResult): Promise<void> {
  if ("html" in result) {
    res.writeHead(result.status, { "Content-Type": "text/html; charset=utf-8" });
    res.end(result.html);
    return;
  }
  if ("text" in result) {
    res.writeHead(result.status, { "Content-Type": "text/plain; charset=utf-8" });
    res.end(result.text);
    return;
  }
  if ("audioPath" in result) {
    const audio = await readFile(result.audioPath);
    res.writeHead(result.status, { "Content-Type": "audio/mpeg", "Content-Length": audio.length });
    res.end(audio);
    return;
  }
  res.writeHead(result.status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(result.json));
}

export function createHttpHandler(deps: HttpDeps): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const url = new URL(req.url || "/", "http://localhost");
    const handle = async () => {
      const rawBody = await readBody(req);
      const result = await routeRequest(deps, {
        method: req.method || "GET",
        path: url.pathname.replace(/\/+$/, "") || "/",
        query: url.searchParams,
        headers: headerMap(req),
        rawBody,
      });
      await writeResult(res, result);
    };

    handle().catch(err => {
      logger.error("Unhandled request error", { path: url.pathname }, err);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: "Internal server error" }));
      } else {
        res.end();
      }
    });
  };
}
