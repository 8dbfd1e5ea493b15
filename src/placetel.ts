/**
 * Placetel gateway: call listing, single-call lookup and audio download.
 *
 * Audio URLs are signed and expire roughly 20 minutes after the listing
 * that produced them. `download()` recovers from one expiry by asking the
 * API for the call again and retrying with the fresh URL.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { log } from "./logger.ts";
import { RemoteHttpError } from "./resilience.ts";

const logger = log.child("placetel");

const LISTING_TIMEOUT_MS = 30_000;
const DOWNLOAD_TIMEOUT_MS = 60_000;
const PER_PAGE = 100;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export class ProviderHttpError extends RemoteHttpError {
  constructor(
    status: number,
    public url: string,
    body: string,
  ) {
    super("placetel", status, body);
    this.name = "ProviderHttpError";
  }
}

/** A call listing item, normalized from the provider's JSON. */
export interface PlacetelCall {
  id: string;
  from_number: string | null;
  to_number: string | null;
  to_number_name: string | null;
  duration: number;
  received_at: Date | null;
  file_url: string | null;
  unread: boolean;
}

export interface DownloadOpts {
  retryOnExpired?: boolean;
}

export interface VoicemailGateway {
  fetchListing(days: number): Promise<PlacetelCall[]>;
  fetchById(externalId: string): Promise<PlacetelCall | null>;
  /** Downloads audio and returns the local file path. */
  download(externalId: string, fileUrl: string, opts?: DownloadOpts): Promise<string>;
}

// ── Wire schema ─────────────────────────────────────────────

const toNumberSchema = z.union([
  z.string(),
  z.object({
    number: z.string().nullish(),
    name: z.string().nullish(),
  }).passthrough(),
]);

const rawCallSchema = z.object({
  id: z.union([z.number(), z.string()]),
  from_number: z.string().nullish(),
  to_number: toNumberSchema.nullish(),
  duration: z.number().nullish(),
  received_at: z.string().nullish(),
  file_url: z.string().nullish(),
  unread: z.boolean().nullish(),
}).passthrough();

type RawCall = z.infer<typeof rawCallSchema>;

function parseInstant(raw: string | null | undefined): Date | null {
  if (!raw) return null;
  const at = new Date(raw);
  return Number.isNaN(at.getTime()) ? null : at;
}

export function normalizeCall(raw: RawCall): PlacetelCall {
  const to = raw.to_number;
  return {
    id: String(raw.id),
    from_number: raw.from_number ?? null,
    to_number: typeof to === "string" ? to : to?.number ?? null,
    to_number_name: typeof to === "string" ? null : to?.name ?? null,
    duration: raw.duration ?? 0,
    received_at: parseInstant(raw.received_at),
    file_url: raw.file_url || null,
    unread: raw.unread ?? true,
  };
}

/** YYYY-MM-DD in local time, `daysAgo` days before `now`. */
export function listingDate(now: Date, daysAgo: number): string {
  const d = new Date(now.getFullYear(), now.getMonth(), now.getDate() - daysAgo);
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${mm}-${dd}`;
}

/** Strip the signature from a URL before it goes into a log line. */
function redactUrl(url: string): string {
  const q = url.indexOf("?");
  return q === -1 ? url : url.substring(0, q);
}

// ── Gateway ─────────────────────────────────────────────────

export interface PlacetelGatewayOpts {
  apiKey: string;
  baseUrl: string;
  storagePath: string;
  fetch?: FetchLike;
  now?: () => Date;
}

export class PlacetelGateway implements VoicemailGateway {
  private fetchFn: FetchLike;
  private now: () => Date;

  constructor(private opts: PlacetelGatewayOpts) {
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.now = opts.now ?? (() => new Date());
  }

  private get headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.opts.apiKey}`,
      Accept: "application/json",
    };
  }

  async fetchListing(days: number): Promise<PlacetelCall[]> {
    const now = this.now();
    const calls: PlacetelCall[] = [];

    for (let daysAgo = 0; daysAgo < days; daysAgo++) {
      const params = new URLSearchParams({
        "filter[date]": listingDate(now, daysAgo),
        "filter[type]": "voicemail",
        per_page: String(PER_PAGE),
      });
      const url = `${this.opts.baseUrl}/calls?${params.toString()}`;
      const res = await this.fetchFn(url, {
        headers: this.headers,
        signal: AbortSignal.timeout(LISTING_TIMEOUT_MS),
      });
      if (!res.ok) {
        throw new ProviderHttpError(res.status, url, await res.text());
      }

      const body: unknown = await res.json();
      const items = Array.isArray(body) ? body : [];
      for (const item of items) {
        const parsed = rawCallSchema.safeParse(item);
        if (!parsed.success) {
          logger.warn("Dropping malformed listing item", { date: params.get("filter[date]"), issues: parsed.error.issues.length });
          continue;
        }
        const call = normalizeCall(parsed.data);
        if (call.file_url) calls.push(call);
      }
    }

    logger.debug("Listing fetched", { days, count: calls.length });
    return calls;
  }

  async fetchById(externalId: string): Promise<PlacetelCall | null> {
    const url = `${this.opts.baseUrl}/calls/${encodeURIComponent(externalId)}`;
    const res = await this.fetchFn(url, {
      headers: this.headers,
      signal: AbortSignal.timeout(LISTING_TIMEOUT_MS),
    });
    if (res.status === 404) return null;
    if (!res.ok) {
      throw new ProviderHttpError(res.status, url, await res.text());
    }

    const parsed = rawCallSchema.safeParse(await res.json());
    if (!parsed.success) {
      logger.warn("Malformed call payload", { external_id: externalId });
      return null;
    }
    return normalizeCall(parsed.data);
  }

  async download(externalId: string, fileUrl: string, opts: DownloadOpts = {}): Promise<string> {
    const retryOnExpired = opts.retryOnExpired ?? true;
    const res = await this.fetchFn(fileUrl, { signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS) });

    if ((res.status === 400 || res.status === 403) && retryOnExpired) {
      logger.warn("Audio URL rejected, refreshing", { external_id: externalId, status: res.status });
      const fresh = await this.fetchById(externalId);
      if (!fresh?.file_url) {
        throw new ProviderHttpError(res.status, redactUrl(fileUrl), "No fresh audio URL available");
      }
      return this.download(externalId, fresh.file_url, { retryOnExpired: false });
    }

    if (!res.ok) {
      throw new ProviderHttpError(res.status, redactUrl(fileUrl), await res.text());
    }

    const audio = Buffer.from(await res.arrayBuffer());
    await mkdir(this.opts.storagePath, { recursive: true });
    const localPath = join(this.opts.storagePath, `voicemail_${externalId}.mp3`);
    await writeFile(localPath, audio);

    logger.info("Audio downloaded", { external_id: externalId, bytes: audio.length });
    return localPath;
  }
}
