// ─── Status Merge ───────────────────────────────────────────────────────────
//
// Adds default practice records for tunes and parts that discovery found
// and the store does not know yet. Existing records are never touched, and
// sets get no record (they only organise tunes).
// ─────────────────────────────────────────────────────────────────────────────

import type { SetRecord } from "../library/types.js";
import type { PracticeRepository } from "./repository.js";
import { createItem, type PracticeItem } from "./schema.js";

export interface PlannedItem {
  id: string;
  item: PracticeItem;
}

/**
 * The records a merge would add. Pure: reads `has` only.
 * Ids appearing more than once in the discovery result are planned once.
 */
export function planMerge(
  store: Pick<PracticeRepository, "has">,
  sets: readonly SetRecord[]
): PlannedItem[] {
  const planned = new Map<string, PlannedItem>();
  const add = (id: string, type: "tune" | "part") => {
    if (store.has(id) || planned.has(id)) return;
    planned.set(id, { id, item: createItem(type) });
  };

  for (const set of sets) {
    for (const tune of set.tunes) add(tune.tuneId, "tune");
    for (const part of set.parts) add(part.partFullId, "part");
  }
  return [...planned.values()];
}

/**
 * Insert the planned defaults into the repository. Returns the added ids;
 * a second run over the same discovery result adds nothing.
 */
export function mergeDiscovered(repo: PracticeRepository, sets: readonly SetRecord[]): string[] {
  const planned = planMerge(repo, sets);
  for (const { id, item } of planned) {
    repo.upsert(id, item);
  }
  return planned.map((p) => p.id);
}
