/**
 * Sync stage: window calculation, record creation rules, idempotence,
 * notification cutoff at creation time.
 */
import { describe, test, expect } from "vitest";
import {
  calculateSyncDays,
  clampManualDays,
  initialProcessingState,
} from "../src/pipeline.ts";
import { NOW, createFixture, localPathFor, makeCall } from "./helpers.ts";

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

describe("calculateSyncDays", () => {
  test("never synced looks back 30 days", () => {
    expect(calculateSyncDays(null, NOW)).toBe(30);
  });

  test("unparsable timestamp falls back to 7 days", () => {
    expect(calculateSyncDays("last tuesday", NOW)).toBe(7);
  });

  test("elapsed whole days plus one", () => {
    const last = new Date(NOW.getTime() - 2.5 * DAY).toISOString();
    expect(calculateSyncDays(last, NOW)).toBe(3);
  });

  test("a sync an hour ago still looks back one day", () => {
    const last = new Date(NOW.getTime() - HOUR).toISOString();
    expect(calculateSyncDays(last, NOW)).toBe(1);
  });

  test("clamped to 30 days after a long gap", () => {
    const last = new Date(NOW.getTime() - 90 * DAY).toISOString();
    expect(calculateSyncDays(last, NOW)).toBe(30);
  });

  test("a timestamp in the future clamps to 1", () => {
    const last = new Date(NOW.getTime() + DAY).toISOString();
    expect(calculateSyncDays(last, NOW)).toBe(1);
  });
});

describe("clampManualDays", () => {
  test("bounds manual windows to [1, 365]", () => {
    expect(clampManualDays(0)).toBe(1);
    expect(clampManualDays(500)).toBe(365);
    expect(clampManualDays(14.7)).toBe(14);
  });
});

describe("initialProcessingState", () => {
  test("zero duration is marked as no audio", () => {
    expect(initialProcessingState(0)).toEqual({
      transcription_status: "skipped",
      transcription_text: "[No audio]",
      email_status: "skipped",
    });
  });

  test("one second is too short", () => {
    expect(initialProcessingState(1)).toEqual({
      transcription_status: "skipped",
      transcription_text: "[Too short]",
      email_status: "skipped",
    });
  });

  test("two seconds is processed", () => {
    expect(initialProcessingState(2)).toEqual({
      transcription_status: "pending",
      transcription_text: null,
      email_status: "pending",
    });
  });
});

describe("runSync", () => {
  test("creates records, applies the noise threshold and downloads eligible audio", async () => {
    const { pipeline, store, gateway } = createFixture();
    gateway.listing = [
      makeCall({ id: "1001", duration: 30 }),
      makeCall({ id: "1002", duration: 1 }),
      makeCall({ id: "1003", duration: 0 }),
    ];

    const result = await pipeline.runSync();

    expect(result).toEqual({ synced: 3, new: 3, updated: 0, downloaded: 1, email_skipped_by_cutoff: 0 });
    expect(gateway.fetchListing).toHaveBeenCalledWith(30);
    expect(gateway.download).toHaveBeenCalledTimes(1);

    const [kept, short, silent] = [...store.records.values()];
    expect(kept?.external_id).toBe("1001");
    expect(kept?.transcription_status).toBe("pending");
    expect(kept?.email_status).toBe("pending");
    expect(kept?.local_file_path).toBe(localPathFor("1001"));

    expect(short?.transcription_status).toBe("skipped");
    expect(short?.transcription_text).toBe("[Too short]");
    expect(short?.email_status).toBe("skipped");
    expect(short?.local_file_path).toBeNull();

    expect(silent?.transcription_text).toBe("[No audio]");
    expect(await store.getSetting("last_sync_at")).toBe(NOW.toISOString());
  });

  test("a second sync over the same listing changes nothing", async () => {
    const { pipeline, store, gateway } = createFixture();
    gateway.listing = [makeCall({ id: "1001" }), makeCall({ id: "1002" })];

    await pipeline.runSync();
    const second = await pipeline.runSync();

    expect(second).toEqual({ synced: 2, new: 0, updated: 0, downloaded: 0, email_skipped_by_cutoff: 0 });
    expect(store.records.size).toBe(2);
    expect(gateway.download).toHaveBeenCalledTimes(2);
    expect(gateway.fetchListing).toHaveBeenLastCalledWith(1);
  });

  test("refreshes a stored audio URL that changed", async () => {
    const { pipeline, store, gateway } = createFixture();
    const existing = store.seed({ external_id: "1001", file_url: "https://files.example.test/old.mp3" });
    gateway.listing = [makeCall({ id: "1001", file_url: "https://files.example.test/new.mp3" })];

    const result = await pipeline.runSync();

    expect(result).toEqual({ synced: 1, new: 0, updated: 1, downloaded: 0, email_skipped_by_cutoff: 0 });
    expect(store.get(existing.id).file_url).toBe("https://files.example.test/new.mp3");
  });

  test("records received before the cutoff start with email skipped", async () => {
    const { pipeline, store, gateway } = createFixture();
    await store.setSetting("email_only_after", "2026-03-10T10:00:00.000Z");
    gateway.listing = [
      makeCall({ id: "early", received_at: new Date("2026-03-10T09:00:00.000Z") }),
      makeCall({ id: "late", received_at: new Date("2026-03-10T11:00:00.000Z") }),
      makeCall({ id: "early-short", duration: 1, received_at: new Date("2026-03-10T08:00:00.000Z") }),
    ];

    const result = await pipeline.runSync();

    expect(result).toEqual({ synced: 3, new: 3, updated: 0, downloaded: 2, email_skipped_by_cutoff: 1 });
    const byExternal = new Map([...store.records.values()].map(r => [r.external_id, r] as const));
    expect(byExternal.get("early")?.email_status).toBe("skipped");
    expect(byExternal.get("early")?.transcription_status).toBe("pending");
    expect(byExternal.get("late")?.email_status).toBe("pending");
    expect(byExternal.get("early-short")?.email_status).toBe("skipped");
  });

  test("a failed listing returns an error and does not stamp last_sync_at", async () => {
    const { pipeline, store, gateway } = createFixture();
    gateway.listingError = new Error("placetel returned 503: unavailable");

    const result = await pipeline.runSync();

    expect(result).toEqual({ error: "placetel returned 503: unavailable" });
    expect(await store.getSetting("last_sync_at")).toBeNull();
  });

  test("a failed download leaves the record without local audio", async () => {
    const { pipeline, store, gateway } = createFixture();
    gateway.listing = [makeCall({ id: "1001" })];
    gateway.failingDownloads.add("1001");

    const result = await pipeline.runSync();

    expect(result).toEqual({ synced: 1, new: 1, updated: 0, downloaded: 0, email_skipped_by_cutoff: 0 });
    const [record] = [...store.records.values()];
    expect(record?.local_file_path).toBeNull();
    expect(record?.transcription_status).toBe("pending");
  });

  test("a manual window is clamped to 365 days", async () => {
    const { pipeline, gateway } = createFixture();

    await pipeline.runSync({ days: 500 });

    expect(gateway.fetchListing).toHaveBeenCalledWith(365);
  });

  test("stamps last_sync_at even when nothing was new", async () => {
    const { pipeline, store } = createFixture();

    const result = await pipeline.runSync({ days: 3 });

    expect(result).toEqual({ synced: 0, new: 0, updated: 0, downloaded: 0, email_skipped_by_cutoff: 0 });
    expect(await store.getSetting("last_sync_at")).toBe(NOW.toISOString());
  });
});
