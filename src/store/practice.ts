// ─── Practice Bookkeeping ───────────────────────────────────────────────────
//
// A session counts clean repetitions: each success extends the streak and
// raises the score by 10 points (capped at 100); a fail wipes both.
// Starting a session starts a fresh streak.
// ─────────────────────────────────────────────────────────────────────────────

import type { PracticeRepository } from "./repository.js";
import { createItem, toTimestamp, type ItemType, type PracticeItem } from "./schema.js";

/** Streak length that reaches a full score. */
export const MASTERY_STREAK = 10;

export function scoreForStreak(streak: number): number {
  return Math.min(100, streak * (100 / MASTERY_STREAK));
}

function current(repo: PracticeRepository, id: string, type: ItemType): PracticeItem {
  const item = repo.get(id);
  if (!item) return createItem(type);
  if (item.type !== type) {
    throw new Error(`Item "${id}" is a ${item.type}, not a ${type}`);
  }
  return item;
}

function resetStreak(repo: PracticeRepository, id: string, type: ItemType): PracticeItem {
  const next: PracticeItem = { ...current(repo, id, type), streak: 0, score: 0 };
  repo.upsert(id, next);
  return next;
}

/** Begin a session on an item: streak and score restart from zero. */
export function startPractice(repo: PracticeRepository, id: string, type: ItemType): PracticeItem {
  return resetStreak(repo, id, type);
}

/** One clean repetition. */
export function recordSuccess(
  repo: PracticeRepository,
  id: string,
  type: ItemType,
  now: Date = new Date()
): PracticeItem {
  const item = current(repo, id, type);
  const streak = item.streak + 1;
  const stamp = toTimestamp(now);
  const next: PracticeItem = {
    ...item,
    streak,
    score: scoreForStreak(streak),
    last_practiced: stamp,
    last_score_updated: stamp,
  };
  repo.upsert(id, next);
  return next;
}

/** A mistake: the streak is broken. */
export function recordFail(repo: PracticeRepository, id: string, type: ItemType): PracticeItem {
  return resetStreak(repo, id, type);
}

/** Clear an item's progress, e.g. after a part's score was re-arranged. */
export function resetItem(repo: PracticeRepository, id: string, type: ItemType): PracticeItem {
  return resetStreak(repo, id, type);
}
