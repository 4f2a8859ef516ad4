import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pairParts } from "./pairing.js";
import { INSTRUMENTS, type DiscoveryDiagnostic, type StreakSource } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

function touch(dir: string, ...names: string[]): void {
  for (const name of names) writeFileSync(join(dir, name), "");
}

function streaks(map: Record<string, number> = {}): StreakSource {
  return { streakOf: (id) => map[id] ?? 0 };
}

const SET = { sectionName: "Section 1 - Test", setFolderName: "Set 01 - Medley" };
const SET_ID = "Section 1 - Test|Set 01 - Medley";

let root: string;
let partsDir: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "pairing-"));
  partsDir = join(root, "Parts");
  mkdirSync(partsDir);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("pairParts", () => {
  it("pairs instrument PDFs with the shared WAV", () => {
    const base = "Competition 08 - Prince Charles Welcome to Lochaber";
    touch(
      partsDir,
      `${base} line 1_bagpipes.pdf`,
      `${base} line 1.wav`,
      `${base} line 2_bass.pdf`,
      `${base} line 2.wav`
    );

    const parts = pairParts(partsDir, SET, streaks(), INSTRUMENTS);

    expect(parts.map((p) => p.shortLabel)).toEqual(["line 1", "line 2"]);
    expect(parts[0].partId).toBe(`${base} line 1`);
    expect(parts[0].pdfPath).toBe(join(partsDir, `${base} line 1_bagpipes.pdf`));
    expect(parts[0].wavPath).toBe(join(partsDir, `${base} line 1.wav`));
    expect(parts[0].partFullId).toBe(`${SET_ID}|Parts|${base} line 1`);
  });

  it("keeps one PDF when two instruments collapse to the same key", () => {
    touch(partsDir, "X line 1_bagpipes.pdf", "X line 1_bass.pdf", "X line 1.wav");
    const diagnostics: DiscoveryDiagnostic[] = [];

    const parts = pairParts(partsDir, SET, streaks(), INSTRUMENTS, diagnostics);

    expect(parts).toHaveLength(1);
    expect(parts[0].partId).toBe("X line 1");
    expect(parts[0].label).toBe("line");
    // smallest filename wins
    expect(parts[0].pdfPath).toBe(join(partsDir, "X line 1_bagpipes.pdf"));
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].level).toBe("warn");
    expect(diagnostics[0].location).toBe(join(partsDir, "X line 1_bass.pdf"));
  });

  it("drops keys that lack a PDF or a WAV", () => {
    touch(partsDir, "phrase 1.pdf", "phrase 2.wav", "phrase 3_snare.pdf", "phrase 3.wav");
    const diagnostics: DiscoveryDiagnostic[] = [];

    const parts = pairParts(partsDir, SET, streaks(), INSTRUMENTS, diagnostics);

    expect(parts.map((p) => p.partId)).toEqual(["phrase 3"]);
    expect(diagnostics.map((d) => d.level)).toEqual(["debug", "debug"]);
    expect(diagnostics[0].message).toBe('Part "phrase 1" has no WAV; skipped');
    expect(diagnostics[1].message).toBe('Part "phrase 2" has no PDF; skipped');
  });

  it("ignores files without phrase, line or part", () => {
    touch(partsDir, "other.pdf", "other.wav", "phrase_01.pdf", "phrase_01.wav");

    const parts = pairParts(partsDir, SET, streaks(), INSTRUMENTS);

    expect(parts.map((p) => p.partId)).toEqual(["phrase_01"]);
  });

  it("ignores other extensions and subfolders", () => {
    touch(partsDir, "line 1.pdf", "line 1.wav", "line 1.mp3", "line 1.txt");
    mkdirSync(join(partsDir, "line 9"));

    const parts = pairParts(partsDir, SET, streaks(), INSTRUMENTS);

    expect(parts).toHaveLength(1);
    expect(parts[0].wavPath).toBe(join(partsDir, "line 1.wav"));
  });

  it("orders buckets phrase, line, part", () => {
    touch(partsDir, "part A.pdf", "part A.wav", "line 1.pdf", "line 1.wav", "phrase 1.pdf", "phrase 1.wav");

    const parts = pairParts(partsDir, SET, streaks(), INSTRUMENTS);

    expect(parts.map((p) => p.label)).toEqual(["phrase", "line", "part"]);
  });

  it("puts the lowest streak first within a bucket", () => {
    touch(partsDir, "phrase_a.pdf", "phrase_a.wav", "phrase_b.pdf", "phrase_b.wav");
    const store = streaks({
      [`${SET_ID}|Parts|phrase_a`]: 5,
      [`${SET_ID}|Parts|phrase_b`]: 0,
    });

    const parts = pairParts(partsDir, SET, store, INSTRUMENTS);

    expect(parts.map((p) => p.partId)).toEqual(["phrase_b", "phrase_a"]);
  });

  it("keeps name order for equal streaks", () => {
    touch(partsDir, "line 3.pdf", "line 3.wav", "line 1.pdf", "line 1.wav", "line 2.pdf", "line 2.wav");
    const store = streaks({ [`${SET_ID}|Parts|line 2`]: 4 });

    const parts = pairParts(partsDir, SET, store, INSTRUMENTS);

    expect(parts.map((p) => p.partId)).toEqual(["line 1", "line 3", "line 2"]);
  });

  it("returns nothing for an empty folder", () => {
    expect(pairParts(partsDir, SET, streaks(), INSTRUMENTS)).toEqual([]);
  });
});
