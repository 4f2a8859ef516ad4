// ─── Score Decay ────────────────────────────────────────────────────────────
//
// Tune scores fade when they are not practiced: the decay rate is in
// percentage points per day (rate 1.0: 50 → 49 after one day).
// Only tunes decay. Parts keep their score; sets carry none.
// ─────────────────────────────────────────────────────────────────────────────

import type { PracticeRepository } from "./repository.js";
import { parseTimestamp, toTimestamp } from "./schema.js";

const MS_PER_DAY = 86_400_000;

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/**
 * Apply decay to every tune with a `last_score_updated` in the past.
 * Returns the ids that changed.
 *
 * Scores are kept to one decimal, so a short gap may round to no change.
 * The clock only moves forward by the time the applied decay covers; the
 * remainder carries over to the next call.
 */
export function applyDecay(repo: PracticeRepository, now: Date = new Date()): string[] {
  const rate = repo.decayRate;
  const changed: string[] = [];

  for (const [id, item] of repo.entriesOfType("tune")) {
    if (!item.last_score_updated) continue;
    const last = parseTimestamp(item.last_score_updated);
    if (!last) continue;

    const days = (now.getTime() - last.getTime()) / MS_PER_DAY;
    if (days <= 0) continue;

    const score = round1(Math.max(0, item.score - rate * days));
    if (score === item.score) continue;

    const covered =
      score === 0 ? now : new Date(last.getTime() + ((item.score - score) / rate) * MS_PER_DAY);
    repo.upsert(id, { ...item, score, last_score_updated: toTimestamp(covered) });
    changed.push(id);
  }

  return changed;
}
