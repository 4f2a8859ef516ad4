// ─── Library Summary ────────────────────────────────────────────────────────
//
// What to practice next, and how the library looks overall.
// ─────────────────────────────────────────────────────────────────────────────

import type { SetRecord, TuneRef } from "./types.js";
import type { PracticeRepository } from "../store/repository.js";

export interface QueueEntry {
  set: SetRecord;
  tune: TuneRef;
  score: number;
  streak: number;
}

export interface QueueOptions {
  /** Only sets on the focus list. */
  focusOnly?: boolean;
  limit?: number;
}

/**
 * Tunes ordered weakest first: ascending score, then ascending streak,
 * then library order.
 */
export function practiceQueue(
  sets: readonly SetRecord[],
  repo: PracticeRepository,
  options: QueueOptions = {}
): QueueEntry[] {
  const entries: QueueEntry[] = [];
  for (const set of sets) {
    if (options.focusOnly && !repo.isFocused(set.setId)) continue;
    for (const tune of set.tunes) {
      const item = repo.get(tune.tuneId);
      entries.push({ set, tune, score: item?.score ?? 0, streak: item?.streak ?? 0 });
    }
  }
  entries.sort((a, b) => a.score - b.score || a.streak - b.streak);
  return options.limit !== undefined ? entries.slice(0, options.limit) : entries;
}

export interface LibraryStats {
  sections: number;
  sets: number;
  tunes: number;
  parts: number;
  focusSets: number;
  /** Mean tune score, 0 when there are no tunes. */
  averageTuneScore: number;
}

export function libraryStats(sets: readonly SetRecord[], repo: PracticeRepository): LibraryStats {
  const sections = new Set(sets.map((s) => s.sectionName));
  let tunes = 0;
  let parts = 0;
  let scoreSum = 0;
  let focusSets = 0;

  for (const set of sets) {
    if (repo.isFocused(set.setId)) focusSets++;
    parts += set.parts.length;
    for (const tune of set.tunes) {
      tunes++;
      scoreSum += repo.get(tune.tuneId)?.score ?? 0;
    }
  }

  return {
    sections: sections.size,
    sets: sets.length,
    tunes,
    parts,
    focusSets,
    averageTuneScore: tunes > 0 ? Math.round((scoreSum / tunes) * 10) / 10 : 0,
  };
}
