/**
 * Voicemail Bridge MCP Server
 *
 * Exposes the relay's HTTP API to MCP clients over stdio.
 *
 * Tools:
 *   voicemail_list        Recent voicemails with summaries
 *   voicemail_get         One voicemail with transcript and classification
 *   voicemail_sync        Pull new voicemails from Placetel now
 *   voicemail_run_now     Run one full pipeline pass now
 *   voicemail_reprocess   Re-run transcription, summary and email for one voicemail
 *   voicemail_delete      Delete a voicemail and its audio file
 *   voicemail_cutoff      Stop emailing everything received before now
 *   settings_get / settings_update   Runtime settings
 */

import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

const RELAY_URL = (process.env.RELAY_URL || `http://localhost:${process.env.HTTP_PORT || "9000"}`).replace(/\/+$/, "");

// ── Helpers ──────────────────────────────────────────────────

async function relayRequest(method: string, path: string, body?: Record<string, unknown>): Promise<unknown> {
  const res = await fetch(`${RELAY_URL}${path}`, {
    method,
    headers: body ? { "Content-Type": "application/json" } : undefined,
    body: body ? JSON.stringify(body) : undefined,
  });
  const text = await res.text();
  if (!res.ok) {
    throw new Error(`Relay ${method} ${path} returned ${res.status}: ${text}`);
  }
  return text ? JSON.parse(text) : null;
}

function textResult(value: unknown) {
  return {
    content: [{ type: "text" as const, text: typeof value === "string" ? value : JSON.stringify(value, null, 2) }],
  };
}

const listItemSchema = z.object({
  id: z.number(),
  from_number: z.string().nullable(),
  started_at: z.string().nullable(),
  duration: z.number(),
  transcription_status: z.string(),
  email_status: z.string(),
  summary: z.string().nullable(),
  priority: z.string().nullable(),
});

const listSchema = z.object({
  items: z.array(listItemSchema.passthrough()),
  total: z.number(),
});

// ── MCP Server ───────────────────────────────────────────────

const server = new McpServer({
  name: "voicemail-bridge",
  version: "1.0.0",
});

server.tool(
  "voicemail_list",
  "List recent voicemails, newest first, with caller, status and summary.",
  {
    limit: z.number().int().min(1).max(200).optional().describe("Max results (default: 20)"),
    offset: z.number().int().min(0).optional().describe("Skip this many results"),
    transcription_status: z.enum(["pending", "processing", "completed", "failed", "skipped"]).optional(),
    search: z.string().optional().describe("Match transcript, summary or caller number"),
  },
  async ({ limit, offset, transcription_status, search }) => {
    const params = new URLSearchParams({ limit: String(limit ?? 20), offset: String(offset ?? 0) });
    if (transcription_status) params.set("transcription_status", transcription_status);
    if (search) params.set("search", search);

    const parsed = listSchema.safeParse(await relayRequest("GET", `/voicemails?${params.toString()}`));
    if (!parsed.success) return textResult("Unexpected response from relay");
    if (parsed.data.items.length === 0) return textResult("No voicemails found");

    const lines = parsed.data.items.map(vm => {
      const meta = [vm.started_at, vm.from_number ?? "unknown", `${vm.duration}s`, vm.transcription_status, `email:${vm.email_status}`, vm.priority]
        .filter(Boolean).join(" | ");
      return `#${vm.id} [${meta}]\n${vm.summary ?? "(no summary)"}`;
    });
    return textResult(`${parsed.data.total} voicemails total:\n\n${lines.join("\n\n")}`);
  },
);

server.tool(
  "voicemail_get",
  "Get one voicemail including its transcript, summary and classification.",
  { id: z.number().int().describe("Voicemail id") },
  async ({ id }) => textResult(await relayRequest("GET", `/voicemails/${id}`)),
);

server.tool(
  "voicemail_sync",
  "Fetch new voicemails from Placetel now. Without days, looks back to the last sync.",
  { days: z.number().int().min(1).max(365).optional().describe("Days to look back") },
  async ({ days }) => textResult(days
    ? await relayRequest("POST", `/sync?days=${days}`)
    : await relayRequest("POST", "/sync-now")),
);

server.tool(
  "voicemail_run_now",
  "Run one full pass now: sync, retry downloads, transcribe, summarize, notify.",
  {},
  async () => textResult(await relayRequest("POST", "/run-now")),
);

server.tool(
  "voicemail_reprocess",
  "Reset one voicemail and run transcription, summary and notification again. Returns the step trail.",
  { id: z.number().int().describe("Voicemail id") },
  async ({ id }) => textResult(await relayRequest("POST", `/voicemails/${id}/reprocess`)),
);

server.tool(
  "voicemail_delete",
  "Delete one voicemail record and its downloaded audio.",
  { id: z.number().int().describe("Voicemail id") },
  async ({ id }) => textResult(await relayRequest("DELETE", `/voicemails/${id}`)),
);

server.tool(
  "voicemail_cutoff",
  "Mark every pending notification as skipped and only email voicemails received from now on.",
  {},
  async () => textResult(await relayRequest("POST", "/email-cutoff")),
);

server.tool(
  "settings_get",
  "Read runtime settings (sync interval, auto_* toggles, notification address).",
  { key: z.string().optional().describe("One key; omit for all") },
  async ({ key }) => textResult(await relayRequest("GET", key ? `/settings/${encodeURIComponent(key)}` : "/settings")),
);

server.tool(
  "settings_update",
  "Change a runtime setting. Updating sync_interval_minutes reschedules the pipeline.",
  {
    key: z.string().describe("Setting key"),
    value: z.string().describe("New value"),
  },
  async ({ key, value }) => textResult(await relayRequest("PUT", `/settings/${encodeURIComponent(key)}`, { value })),
);

// ── Start ────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
