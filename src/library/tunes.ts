// ─── Tunes ──────────────────────────────────────────────────────────────────
//
// Where a set's tunes come from, tried in order until one yields names:
//   1. the structure map          (book order, verbatim)
//   2. files in the set folder    ("Set 01a - March.pdf")
//   3. the set folder itself      (single-tune sets, e.g. competition pieces)
//
// Parts are then assigned to the longest tune name that prefixes their key.
// ─────────────────────────────────────────────────────────────────────────────

import { readdirSync } from "node:fs";
import { isFileEntry } from "./entries.js";
import type { SetKey, TuneRef, TuneKey } from "./types.js";
import type { StructureMap } from "./structure/schema.js";
import { tunesFor } from "./structure/schema.js";
import {
  compareNames,
  extensionOf,
  hasInstrumentSuffix,
  stemOf,
  TUNE_STEM_PATTERN,
} from "./naming.js";
import { formatTuneId, setFolderTuneKey } from "./ids.js";

// ─── Sources ────────────────────────────────────────────────────────────────

export interface TuneSourceContext {
  set: SetKey;
  setPath: string;
  structure: StructureMap | null;
  instruments: readonly string[];
}

/** One way of finding a set's tune names. An empty result means "try the next". */
export interface TuneSource {
  readonly name: string;
  resolve(ctx: TuneSourceContext): string[];
}

export const structureMapSource: TuneSource = {
  name: "structure-map",
  resolve(ctx) {
    if (!ctx.structure) return [];
    return tunesFor(ctx.structure, ctx.set.sectionName, ctx.set.setFolderName) ?? [];
  },
};

export const inferredSource: TuneSource = {
  name: "inferred",
  resolve(ctx) {
    return inferTunesFromSetFolder(ctx.setPath, ctx.instruments);
  },
};

export const singleTuneSource: TuneSource = {
  name: "set-folder",
  resolve(ctx) {
    return [ctx.set.setFolderName];
  },
};

export const DEFAULT_TUNE_SOURCES: readonly TuneSource[] = [
  structureMapSource,
  inferredSource,
  singleTuneSource,
];

/**
 * Run the sources in order and return the first non-empty tune list,
 * along with the name of the source that produced it.
 */
export function resolveTunes(
  ctx: TuneSourceContext,
  sources: readonly TuneSource[] = DEFAULT_TUNE_SOURCES
): { source: string; tunes: TuneRef[] } {
  for (const source of sources) {
    const names = source.resolve(ctx);
    if (names.length > 0) {
      return { source: source.name, tunes: names.map((n) => tuneRef(ctx.set, n)) };
    }
  }
  // Only reachable with a custom source list lacking a final fallback.
  return { source: singleTuneSource.name, tunes: [tuneRef(ctx.set, ctx.set.setFolderName)] };
}

export function tuneRef(set: SetKey, tuneName: string): TuneRef {
  const key: TuneKey = { set, tuneName };
  return { key, tuneName, tuneId: formatTuneId(key) };
}

/**
 * Complete-tune stems in a set folder: PDF or WAV, no instrument suffix,
 * named "Set NN[a] - Title". Deduplicated and sorted.
 */
export function inferTunesFromSetFolder(setPath: string, instruments: readonly string[]): string[] {
  const names = new Set<string>();
  for (const entry of readdirSync(setPath, { withFileTypes: true })) {
    if (!isFileEntry(setPath, entry)) continue;
    const ext = extensionOf(entry.name);
    if (ext !== "pdf" && ext !== "wav") continue;
    const stem = stemOf(entry.name);
    if (hasInstrumentSuffix(stem, instruments)) continue;
    if (TUNE_STEM_PATTERN.test(stem)) names.add(stem);
  }
  return [...names].sort(compareNames);
}

// ─── Assignment ─────────────────────────────────────────────────────────────

/**
 * Tune a part belongs to: the longest tune name that is a prefix of the
 * part's key ("Set 01b - Strathspey line 1" → "Set 01b - Strathspey").
 * Falls back to the set folder when nothing matches.
 */
export function assignPartToTune(
  partKey: string,
  tuneNames: readonly string[],
  set: SetKey
): { tuneId: string; tuneName: string } {
  let best: string | null = null;
  for (const name of tuneNames) {
    if (!partKey.startsWith(name)) continue;
    if (best === null || name.length > best.length) best = name;
  }

  const key = best === null ? setFolderTuneKey(set) : { set, tuneName: best };
  return { tuneId: formatTuneId(key), tuneName: key.tuneName };
}
