import { describe, it, expect } from "vitest";
import { libraryStats, practiceQueue } from "./summary.js";
import { tuneRef } from "./tunes.js";
import type { SetRecord } from "./types.js";
import { PracticeRepository } from "../store/repository.js";
import { createItem } from "../store/schema.js";

function set(sectionName: string, setFolderName: string, tunes: string[], parts = 0): SetRecord {
  const key = { sectionName, setFolderName };
  return {
    key,
    sectionName,
    setFolderName,
    setPath: `/lib/${sectionName}/${setFolderName}`,
    setId: `${sectionName}|${setFolderName}`,
    tunes: tunes.map((t) => tuneRef(key, t)),
    parts: Array.from({ length: parts }, (_, i) => {
      const partId = `line ${i + 1}`;
      return {
        key: { set: key, partId },
        partId,
        shortLabel: partId,
        label: "line" as const,
        pdfPath: `/p/${partId}.pdf`,
        wavPath: `/p/${partId}.wav`,
        tuneId: `${sectionName}|${setFolderName}|${setFolderName}`,
        tuneName: setFolderName,
        partFullId: `${sectionName}|${setFolderName}|Parts|${partId}`,
      };
    }),
  };
}

const SETS = [set("S1", "A", ["A1", "A2"], 2), set("S1", "B", ["B1"]), set("S2", "C", ["C1"], 1)];

describe("practiceQueue", () => {
  it("orders by score, then streak, then library order", () => {
    const repo = new PracticeRepository();
    repo.upsert("S1|A|A1", createItem("tune", { score: 50, streak: 5 }));
    repo.upsert("S1|A|A2", createItem("tune", { score: 10, streak: 3 }));
    repo.upsert("S1|B|B1", createItem("tune", { score: 10, streak: 1 }));

    const queue = practiceQueue(SETS, repo);

    expect(queue.map((e) => e.tune.tuneName)).toEqual(["C1", "B1", "A2", "A1"]);
  });

  it("limits and filters to focus sets", () => {
    const repo = new PracticeRepository();
    repo.toggleFocus("S1|A");

    expect(practiceQueue(SETS, repo, { focusOnly: true }).map((e) => e.tune.tuneName)).toEqual(["A1", "A2"]);
    expect(practiceQueue(SETS, repo, { limit: 1 })).toHaveLength(1);
  });
});

describe("libraryStats", () => {
  it("counts sections, sets, tunes and parts", () => {
    const repo = new PracticeRepository();
    repo.upsert("S1|A|A1", createItem("tune", { score: 40 }));
    repo.upsert("S2|C|C1", createItem("tune", { score: 25 }));
    repo.toggleFocus("S2|C");

    expect(libraryStats(SETS, repo)).toEqual({
      sections: 2,
      sets: 3,
      tunes: 4,
      parts: 3,
      focusSets: 1,
      averageTuneScore: 16.3,
    });
  });

  it("reports zero average for an empty library", () => {
    expect(libraryStats([], new PracticeRepository()).averageTuneScore).toBe(0);
  });
});
