import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync, mkdirSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PracticeRepository, loadStatus, saveStatus } from "./repository.js";
import { createEmptyDocument, createItem, parseTimestamp, toTimestamp, validateStatusDocument } from "./schema.js";

let dataDir: string;

beforeEach(() => {
  dataDir = join(mkdtempSync(join(tmpdir(), "status-")), "data");
});

afterEach(() => {
  rmSync(join(dataDir, ".."), { recursive: true, force: true });
});

describe("createEmptyDocument", () => {
  it("fills every default", () => {
    expect(createEmptyDocument()).toEqual({
      schema_version: 1,
      last_updated: null,
      decay_rate_percent_per_day: 1,
      focus_instrument: "bass",
      focus_set_ids: [],
      show_focus_only: false,
      set_instruments: {},
      items: {},
    });
  });
});

describe("createItem", () => {
  it("defaults to a fresh record", () => {
    expect(createItem("tune", { streak: 5, score: 50 })).toEqual({
      type: "tune",
      streak: 5,
      score: 50,
      last_practiced: null,
      last_score_updated: null,
      missing: false,
    });
  });
});

describe("timestamps", () => {
  it("formats UTC with second precision", () => {
    expect(toTimestamp(new Date(Date.UTC(2025, 1, 12, 10, 0, 0, 456)))).toBe("2025-02-12T10:00:00Z");
  });

  it("parses zoned and unzoned stamps as UTC", () => {
    expect(parseTimestamp("2025-02-12T10:00:00Z")?.getTime()).toBe(Date.UTC(2025, 1, 12, 10));
    expect(parseTimestamp("2025-02-12T10:00:00")?.getTime()).toBe(Date.UTC(2025, 1, 12, 10));
    expect(parseTimestamp("2025-02-12T10:00:00+01:00")?.getTime()).toBe(Date.UTC(2025, 1, 12, 9));
    expect(parseTimestamp("yesterday")).toBeNull();
  });
});

describe("validateStatusDocument", () => {
  it("flags a bad item", () => {
    const issues = validateStatusDocument({ items: { a: { type: "song" } } });
    expect(issues).toHaveLength(1);
    expect(issues[0].field).toBe("items.a.type");
  });
});

describe("PracticeRepository", () => {
  it("gets, upserts and reports streaks", () => {
    const repo = new PracticeRepository();
    expect(repo.get("x")).toBeUndefined();
    expect(repo.streakOf("x")).toBe(0);

    repo.upsert("x", createItem("part", { streak: 3 }));

    expect(repo.has("x")).toBe(true);
    expect(repo.streakOf("x")).toBe(3);
    expect(repo.size).toBe(1);
    expect(repo.entriesOfType("tune")).toEqual([]);
  });

  it("toggles focus sets", () => {
    const repo = new PracticeRepository();
    expect(repo.toggleFocus("S|A")).toBe(true);
    expect(repo.focusSetIds).toEqual(["S|A"]);
    expect(repo.toggleFocus("S|A")).toBe(false);
    expect(repo.focusSetIds).toEqual([]);
  });

  it("remembers instruments per set and as the new default", () => {
    const repo = new PracticeRepository();
    expect(repo.instrumentFor("S|A")).toBe("bass");
    repo.setInstrument("S|A", "snare");
    expect(repo.instrumentFor("S|A")).toBe("snare");
    expect(repo.instrumentFor("S|B")).toBe("snare");
    expect(repo.focusInstrument).toBe("snare");
  });

  it("rejects a negative decay rate", () => {
    const repo = new PracticeRepository();
    expect(() => {
      repo.decayRate = -1;
    }).toThrow("Decay rate must be a non-negative number: got -1");
  });

  it("hands out a copy of its document", () => {
    const repo = new PracticeRepository();
    const doc = repo.toDocument();
    doc.items.x = createItem("tune");
    expect(repo.has("x")).toBe(false);
  });
});

describe("loadStatus / saveStatus", () => {
  it("gives an empty repository when there is no file", () => {
    const { repo, warnings } = loadStatus(dataDir);
    expect(repo.size).toBe(0);
    expect(warnings).toEqual([]);
  });

  it("round-trips items and settings", () => {
    const repo = new PracticeRepository();
    repo.upsert("S|A|T", createItem("tune", { streak: 3, score: 30 }));
    repo.toggleFocus("S|A");
    saveStatus(repo, dataDir, new Date(Date.UTC(2025, 1, 12, 10, 0, 0)));

    const { repo: loaded } = loadStatus(dataDir);

    expect(loaded.get("S|A|T")).toEqual(createItem("tune", { streak: 3, score: 30 }));
    expect(loaded.isFocused("S|A")).toBe(true);
    const onDisk = JSON.parse(readFileSync(join(dataDir, "practice_status.json"), "utf8"));
    expect(onDisk.last_updated).toBe("2025-02-12T10:00:00Z");
    expect(onDisk.schema_version).toBe(1);
  });

  it("backs up the previous file before overwriting", () => {
    const repo = new PracticeRepository();
    saveStatus(repo, dataDir, new Date(Date.UTC(2025, 1, 12, 10, 0, 0)));
    expect(existsSync(join(dataDir, "backups"))).toBe(false);

    saveStatus(repo, dataDir, new Date(Date.UTC(2025, 1, 12, 10, 30, 5)));

    expect(readdirSync(join(dataDir, "backups"))).toEqual(["practice_status_20250212_103005.json"]);
  });

  it("keeps every backup taken within the same second", () => {
    const repo = new PracticeRepository();
    const sameSecond = new Date(Date.UTC(2025, 1, 12, 10, 30, 5));
    saveStatus(repo, dataDir, sameSecond);
    repo.upsert("S|A|T", createItem("tune", { streak: 1, score: 10 }));
    saveStatus(repo, dataDir, sameSecond);
    repo.upsert("S|A|T", createItem("tune", { streak: 2, score: 20 }));
    saveStatus(repo, dataDir, sameSecond);

    const backups = readdirSync(join(dataDir, "backups")).sort();
    expect(backups).toEqual([
      "practice_status_20250212_103005.json",
      "practice_status_20250212_103005_1.json",
    ]);
    const first = JSON.parse(readFileSync(join(dataDir, "backups", backups[0]), "utf8"));
    expect(first.items).toEqual({});
  });

  it("fills defaults for missing keys in an older file", () => {
    mkdirSync(dataDir, { recursive: true });
    writeFileSync(
      join(dataDir, "practice_status.json"),
      JSON.stringify({ items: { "S|A|T": { type: "tune", streak: 2, score: 20 } } })
    );

    const { repo, warnings } = loadStatus(dataDir);

    expect(warnings).toEqual([]);
    expect(repo.decayRate).toBe(1);
    expect(repo.get("S|A|T")?.last_practiced).toBeNull();
    expect(repo.get("S|A|T")?.missing).toBe(false);
  });

  it("warns and starts empty on invalid JSON", () => {
    mkdirSync(dataDir, { recursive: true });
    writeFileSync(join(dataDir, "practice_status.json"), "{ broken");

    const { repo, warnings } = loadStatus(dataDir);

    expect(repo.size).toBe(0);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Invalid JSON in practice_status.json/);
  });
});
