// ─── Item IDs ───────────────────────────────────────────────────────────────
//
// Keys live as structured values inside the library; the "|"-joined strings
// are only produced here, for the practice store and for display.
// ─────────────────────────────────────────────────────────────────────────────

import type { SetKey, TuneKey, PartKey } from "./types.js";
import { PARTS_FOLDER } from "./types.js";

const SEP = "|";

export function formatSetId(key: SetKey): string {
  return `${key.sectionName}${SEP}${key.setFolderName}`;
}

export function formatTuneId(key: TuneKey): string {
  return `${formatSetId(key.set)}${SEP}${key.tuneName}`;
}

export function formatPartId(key: PartKey): string {
  return `${formatSetId(key.set)}${SEP}${PARTS_FOLDER}${SEP}${key.partId}`;
}

export function setKey(sectionName: string, setFolderName: string): SetKey {
  return { sectionName, setFolderName };
}

/** The tune used when a set has no tunes of its own: the set folder itself. */
export function setFolderTuneKey(set: SetKey): TuneKey {
  return { set, tuneName: set.setFolderName };
}

/**
 * Split a stored id back into its set and the remainder.
 * Only used for display ("Section 1 - Comp | Competition 08"); returns
 * null for ids that are not at least section + set.
 */
export function parseItemId(id: string): { set: SetKey; rest: string[] } | null {
  const segments = id.split(SEP);
  if (segments.length < 2) return null;
  const [sectionName, setFolderName, ...rest] = segments;
  return { set: { sectionName, setFolderName }, rest };
}

/** "Section | Set" label for an item, or the id itself. */
export function parentContext(id: string): string {
  const parsed = parseItemId(id);
  if (!parsed) return id;
  return `${parsed.set.sectionName} | ${parsed.set.setFolderName}`;
}
