// ─── Library Discovery ──────────────────────────────────────────────────────
//
// Walks <root>/Section N - Name/<set>/ and builds one SetRecord per set
// folder: its tunes (structure map → filenames → set folder) and the parts
// paired from its Parts/ folder.
//
// Discovery only reads the filesystem. A folder that cannot be read is
// skipped with a diagnostic; only an unreadable root throws.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import { isDirectoryEntry } from "./entries.js";
import type {
  DiscoveryDiagnostic,
  DiscoveryResult,
  PartRecord,
  SetKey,
  SetRecord,
  StreakSource,
} from "./types.js";
import { INSTRUMENTS, PARTS_FOLDER, RESERVED_RESOURCE_FOLDER } from "./types.js";
import { compareNames, SECTION_FOLDER_PATTERN } from "./naming.js";
import { formatSetId, setKey } from "./ids.js";
import { pairParts } from "./pairing.js";
import { assignPartToTune, resolveTunes, DEFAULT_TUNE_SOURCES, type TuneSource } from "./tunes.js";
import { loadStructureMap } from "./structure/loader.js";
import type { StructureMap } from "./structure/schema.js";

export interface DiscoveryOptions {
  /** Instrument suffixes recognised on PDF names. */
  instruments?: readonly string[];
  /** Tune resolvers, tried in order. */
  tuneSources?: readonly TuneSource[];
}

/** True for library-level folders that can never be a section. */
export function isExcludedFolder(name: string): boolean {
  return name.startsWith("#") || name.startsWith(".") || name === RESERVED_RESOURCE_FOLDER;
}

export function isSectionFolder(name: string): boolean {
  return !isExcludedFolder(name) && SECTION_FOLDER_PATTERN.test(name);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Subdirectory names of `dir`, sorted. */
function listDirs(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((d) => isDirectoryEntry(dir, d))
    .map((d) => d.name)
    .sort(compareNames);
}

/**
 * Discover all sets with their tunes and parts.
 *
 * @param libraryRoot - Root of the score library
 * @param dataDir - Directory that may hold the structure map
 * @param streaks - Current practice streaks, used to order parts
 */
export function discoverLibrary(
  libraryRoot: string,
  dataDir: string,
  streaks: StreakSource,
  options: DiscoveryOptions = {}
): DiscoveryResult {
  const instruments = options.instruments ?? INSTRUMENTS;
  const tuneSources = options.tuneSources ?? DEFAULT_TUNE_SOURCES;
  const diagnostics: DiscoveryDiagnostic[] = [];

  const structure = loadStructureMap(dataDir, diagnostics);

  let sectionNames: string[];
  try {
    sectionNames = listDirs(libraryRoot).filter(isSectionFolder);
  } catch (err) {
    throw new Error(`Cannot read library root ${libraryRoot}: ${errorMessage(err)}`);
  }

  const sets: SetRecord[] = [];

  for (const sectionName of sectionNames) {
    const sectionPath = join(libraryRoot, sectionName);
    let setFolders: string[];
    try {
      setFolders = listDirs(sectionPath).filter((name) => !name.startsWith("."));
    } catch (err) {
      diagnostics.push({
        level: "warn",
        location: sectionPath,
        message: `Section skipped: ${errorMessage(err)}`,
      });
      continue;
    }

    for (const setFolderName of setFolders) {
      const setPath = join(sectionPath, setFolderName);
      try {
        sets.push(
          discoverSet(setKey(sectionName, setFolderName), setPath, {
            structure,
            streaks,
            instruments,
            tuneSources,
            diagnostics,
          })
        );
      } catch (err) {
        diagnostics.push({
          level: "warn",
          location: setPath,
          message: `Set skipped: ${errorMessage(err)}`,
        });
      }
    }
  }

  sets.sort(
    (a, b) =>
      compareNames(a.sectionName, b.sectionName) ||
      compareNames(a.setFolderName, b.setFolderName)
  );

  return { sets, diagnostics };
}

interface SetContext {
  structure: StructureMap | null;
  streaks: StreakSource;
  instruments: readonly string[];
  tuneSources: readonly TuneSource[];
  diagnostics: DiscoveryDiagnostic[];
}

/** Build the record for a single set folder. Throws if the folder cannot be read. */
export function discoverSet(key: SetKey, setPath: string, ctx: SetContext): SetRecord {
  const { tunes } = resolveTunes(
    { set: key, setPath, structure: ctx.structure, instruments: ctx.instruments },
    ctx.tuneSources
  );
  const tuneNames = tunes.map((t) => t.tuneName);

  let parts: PartRecord[] = [];
  const partsDir = join(setPath, PARTS_FOLDER);
  if (existsSync(partsDir) && statSync(partsDir).isDirectory()) {
    try {
      parts = pairParts(partsDir, key, ctx.streaks, ctx.instruments, ctx.diagnostics).map(
        (p) => ({ ...p, ...assignPartToTune(p.partId, tuneNames, key) })
      );
    } catch (err) {
      ctx.diagnostics.push({
        level: "warn",
        location: partsDir,
        message: `Parts skipped: ${errorMessage(err)}`,
      });
    }
  }

  return {
    key,
    sectionName: key.sectionName,
    setFolderName: key.setFolderName,
    setPath,
    setId: formatSetId(key),
    tunes,
    parts,
  };
}

/** Every tune and part id in a discovery result, in record order. */
export function discoveredItemIds(sets: readonly SetRecord[]): { tunes: string[]; parts: string[] } {
  const tunes: string[] = [];
  const parts: string[] = [];
  for (const set of sets) {
    for (const t of set.tunes) tunes.push(t.tuneId);
    for (const p of set.parts) parts.push(p.partFullId);
  }
  return { tunes, parts };
}
