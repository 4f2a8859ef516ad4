// ─── Structure Map Loader ───────────────────────────────────────────────────
//
// Reads the music manager's otpd_music_book_structure.json from the data
// directory (a bare music_book_structure.json is accepted too). A missing,
// unreadable, or malformed file degrades to "no map" so that discovery
// falls back to inferring tunes from filenames.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { StructureMapSchema, type StructureMap } from "./schema.js";
import type { DiscoveryDiagnostic } from "../types.js";

export const STRUCTURE_MAP_FILE = "otpd_music_book_structure.json";
const STRUCTURE_MAP_ALIAS = "music_book_structure.json";

/** Path of the structure map: the manager's name, else the alias, when present. */
export function structureMapPath(dataDir: string): string {
  const alias = join(dataDir, STRUCTURE_MAP_ALIAS);
  const primary = join(dataDir, STRUCTURE_MAP_FILE);
  return !existsSync(primary) && existsSync(alias) ? alias : primary;
}

/**
 * Load and validate the structure map. Returns null when absent or invalid;
 * problems with a file that does exist are recorded as warnings.
 */
export function loadStructureMap(
  dataDir: string,
  diagnostics: DiscoveryDiagnostic[] = []
): StructureMap | null {
  const filePath = structureMapPath(dataDir);
  if (!existsSync(filePath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    diagnostics.push({
      level: "warn",
      location: filePath,
      message: `Could not read structure map: ${err instanceof Error ? err.message : String(err)}`,
    });
    return null;
  }

  const result = StructureMapSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "root"}: ${i.message}`)
      .join("; ");
    diagnostics.push({
      level: "warn",
      location: filePath,
      message: `Invalid structure map, inferring tunes instead (${issues})`,
    });
    return null;
  }

  return result.data;
}
