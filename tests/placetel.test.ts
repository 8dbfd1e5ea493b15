import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { PlacetelGateway, ProviderHttpError, listingDate, normalizeCall } from "../src/placetel.ts";

const BASE = "https://api.placetel.test/v2";
const LOCAL_NOW = new Date(2026, 2, 10, 12, 0, 0);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function listingItem(id: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    type: "voicemail",
    from_number: "01761234567",
    to_number: { number: "0301234567", name: "Support" },
    duration: 30,
    received_at: "2026-03-10T09:00:00.000Z",
    file_url: `https://files.placetel.test/${id}.mp3?sig=abc`,
    unread: true,
    ...overrides,
  };
}

let storagePath: string;

beforeEach(async () => {
  storagePath = await mkdtemp(join(tmpdir(), "voicemail-test-"));
});

afterEach(async () => {
  await rm(storagePath, { recursive: true, force: true });
});

function gateway(fetchFn: (url: string, init?: RequestInit) => Promise<Response>): PlacetelGateway {
  return new PlacetelGateway({
    apiKey: "test-key",
    baseUrl: BASE,
    storagePath,
    fetch: fetchFn,
    now: () => LOCAL_NOW,
  });
}

describe("listingDate", () => {
  test("counts back in local calendar days", () => {
    expect(listingDate(LOCAL_NOW, 0)).toBe("2026-03-10");
    expect(listingDate(LOCAL_NOW, 10)).toBe("2026-02-28");
  });
});

describe("normalizeCall", () => {
  test("accepts a plain string destination", () => {
    const call = normalizeCall({ id: 5, to_number: "0301234567", file_url: "" });
    expect(call).toEqual({
      id: "5",
      from_number: null,
      to_number: "0301234567",
      to_number_name: null,
      duration: 0,
      received_at: null,
      file_url: null,
      unread: true,
    });
  });
});

describe("fetchListing", () => {
  test("queries one day per request and keeps items with audio", async () => {
    const fetchFn = vi.fn(async (url: string) => {
      if (url.includes("2026-03-10")) {
        return jsonResponse([listingItem(1), listingItem(2, { file_url: null }), { bogus: true }]);
      }
      return jsonResponse([listingItem(3, { to_number: "0309876543" })]);
    });

    const calls = await gateway(fetchFn).fetchListing(2);

    expect(fetchFn).toHaveBeenCalledTimes(2);
    const firstUrl = new URL(String(fetchFn.mock.calls[0]?.[0]));
    expect(firstUrl.pathname).toBe("/v2/calls");
    expect(firstUrl.searchParams.get("filter[date]")).toBe("2026-03-10");
    expect(firstUrl.searchParams.get("filter[type]")).toBe("voicemail");
    expect(firstUrl.searchParams.get("per_page")).toBe("100");

    expect(calls.map(c => c.id)).toEqual(["1", "3"]);
    expect(calls[0]).toEqual({
      id: "1",
      from_number: "01761234567",
      to_number: "0301234567",
      to_number_name: "Support",
      duration: 30,
      received_at: new Date("2026-03-10T09:00:00.000Z"),
      file_url: "https://files.placetel.test/1.mp3?sig=abc",
      unread: true,
    });
    expect(calls[1]?.to_number).toBe("0309876543");
  });

  test("sends the bearer token", async () => {
    const fetchFn = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse([]));

    await gateway(fetchFn).fetchListing(1);

    expect(fetchFn.mock.calls[0]?.[1]?.headers).toEqual({
      Authorization: "Bearer test-key",
      Accept: "application/json",
    });
  });

  test("a non-2xx response fails the whole listing", async () => {
    const fetchFn = vi.fn(async () => new Response("unavailable", { status: 503 }));

    await expect(gateway(fetchFn).fetchListing(3)).rejects.toThrow("placetel returned 503: unavailable");
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});

describe("fetchById", () => {
  test("returns null for unknown calls", async () => {
    const fetchFn = vi.fn(async (_url: string) => new Response("", { status: 404 }));
    expect(await gateway(fetchFn).fetchById("77")).toBeNull();
    expect(fetchFn.mock.calls[0]?.[0]).toBe(`${BASE}/calls/77`);
  });

  test("normalizes the call", async () => {
    const fetchFn = vi.fn(async () => jsonResponse(listingItem(77)));
    const call = await gateway(fetchFn).fetchById("77");
    expect(call?.id).toBe("77");
    expect(call?.file_url).toBe("https://files.placetel.test/77.mp3?sig=abc");
  });
});

describe("download", () => {
  test("writes the audio under the storage path", async () => {
    const fetchFn = vi.fn(async () => new Response("ID3-audio"));

    const localPath = await gateway(fetchFn).download("42", "https://files.placetel.test/42.mp3?sig=abc");

    expect(localPath).toBe(join(storagePath, "voicemail_42.mp3"));
    expect(await readFile(localPath, "utf-8")).toBe("ID3-audio");
  });

  test("refreshes an expired URL once", async () => {
    const fetchFn = vi.fn(async (url: string) => {
      if (url.endsWith("sig=old")) return new Response("expired", { status: 403 });
      if (url === `${BASE}/calls/42`) return jsonResponse(listingItem(42, { file_url: "https://files.placetel.test/42.mp3?sig=new" }));
      return new Response("fresh");
    });

    const localPath = await gateway(fetchFn).download("42", "https://files.placetel.test/42.mp3?sig=old");

    expect(fetchFn.mock.calls.map(c => c[0])).toEqual([
      "https://files.placetel.test/42.mp3?sig=old",
      `${BASE}/calls/42`,
      "https://files.placetel.test/42.mp3?sig=new",
    ]);
    expect(await readFile(localPath, "utf-8")).toBe("fresh");
  });

  test("a second rejection is not retried again", async () => {
    const fetchFn = vi.fn(async (url: string) => {
      if (url === `${BASE}/calls/42`) return jsonResponse(listingItem(42, { file_url: "https://files.placetel.test/42.mp3?sig=new" }));
      return new Response("expired", { status: 403 });
    });

    const err = await gateway(fetchFn).download("42", "https://files.placetel.test/42.mp3?sig=old").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderHttpError);
    expect(err).toMatchObject({ status: 403, url: "https://files.placetel.test/42.mp3" });
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  test("a server error propagates without refreshing the URL", async () => {
    const fetchFn = vi.fn(async (_url: string) => new Response("upstream down", { status: 500 }));

    const err = await gateway(fetchFn).download("42", "https://files.placetel.test/42.mp3?sig=old").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderHttpError);
    expect(err).toMatchObject({ status: 500, url: "https://files.placetel.test/42.mp3" });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe("https://files.placetel.test/42.mp3?sig=old");
  });

  test("fails when no fresh URL is available", async () => {
    const fetchFn = vi.fn(async (url: string) =>
      url === `${BASE}/calls/42` ? new Response("", { status: 404 }) : new Response("bad", { status: 400 }),
    );

    await expect(gateway(fetchFn).download("42", "https://files.placetel.test/42.mp3?sig=old"))
      .rejects.toThrow("placetel returned 400: No fresh audio URL available");
  });
});
