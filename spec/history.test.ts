import { describe, it, expect } from "vitest";
import {
  loadHistory,
  normalizeHistoryRecord,
  saveHistory,
  toHistoryRecord,
  UnavailableHistoryStore,
  DatabaseUnavailableError,
} from "../src/services/history.js";
import { generationRequestSchema } from "../src/types.js";
import { FailingHistoryStore, MemoryHistoryStore } from "./helpers.js";

describe("normalizeHistoryRecord", () => {
  it("fills defaults for an empty document", () => {
    expect(normalizeHistoryRecord({})).toEqual({
      content: "",
      fill_color: "#111827",
      back_color: "#ffffff",
      box_size: 10,
      border: 4,
      error_correction: "M",
      logo_url: null,
    });
  });

  it("keeps stored values and coerces numeric strings", () => {
    expect(
      normalizeHistoryRecord({
        content: "https://example.com",
        fill_color: "#000000",
        back_color: "#eeeeee",
        box_size: "12",
        border: 2,
        error_correction: "H",
        logo_url: "https://example.com/logo.png",
        created_at: "ignored",
      })
    ).toEqual({
      content: "https://example.com",
      fill_color: "#000000",
      back_color: "#eeeeee",
      box_size: 12,
      border: 2,
      error_correction: "H",
      logo_url: "https://example.com/logo.png",
    });
  });

  it("falls back per field on unusable values", () => {
    const record = normalizeHistoryRecord({
      content: 42,
      box_size: "big",
      border: null,
      logo_url: 7,
    });
    expect(record.content).toBe("");
    expect(record.box_size).toBe(10);
    expect(record.border).toBe(4);
    expect(record.logo_url).toBeNull();
  });
});

describe("toHistoryRecord", () => {
  it("copies the stored fields and drops rounded", () => {
    const request = generationRequestSchema.parse({
      content: "hi",
      error_correction: "x",
      rounded: false,
    });
    expect(toHistoryRecord(request)).toEqual({
      content: "hi",
      fill_color: "#111827",
      back_color: "#ffffff",
      box_size: 10,
      border: 4,
      error_correction: "M",
      logo_url: null,
    });
  });
});

describe("saveHistory / loadHistory", () => {
  const request = generationRequestSchema.parse({ content: "saved" });

  it("round-trips through the store", async () => {
    const store = new MemoryHistoryStore();
    const saved = await saveHistory(store, "qr", request);
    expect(saved.ok).toBe(true);

    const loaded = await loadHistory(store, "qr", 12);
    expect(loaded).toEqual({ ok: true, value: [toHistoryRecord(request)] });
  });

  it("reads from the given collection only", async () => {
    const store = new MemoryHistoryStore();
    await saveHistory(store, "other", request);
    expect(await loadHistory(store, "qr", 12)).toEqual({ ok: true, value: [] });
  });

  it("returns failures instead of throwing", async () => {
    const store = new FailingHistoryStore();

    const saved = await saveHistory(store, "qr", request);
    expect(saved.ok).toBe(false);

    const loaded = await loadHistory(store, "qr", 12);
    expect(loaded.ok).toBe(false);
    if (!loaded.ok) {
      expect(loaded.error).toBeInstanceOf(Error);
    }
  });

  it("reports an unconfigured database", async () => {
    const loaded = await loadHistory(new UnavailableHistoryStore(), "qr", 5);
    expect(loaded.ok).toBe(false);
    if (!loaded.ok) {
      expect(loaded.error).toBeInstanceOf(DatabaseUnavailableError);
    }
  });
});
