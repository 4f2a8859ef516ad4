// ─── Structure Map Schema ───────────────────────────────────────────────────
//
// Optional file produced by the companion music manager, listing the tunes
// of every set in book order:
//
//   [{ "section_name": "Section 1 - Medleys",
//      "sets": [{ "folder_name": "Set 01 - Medley",
//                 "tunes": [{ "tune_name": "Set 01a - March" }] }] }]
//
// Extra keys are tolerated; anything else that does not fit is "no map".
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const StructureTuneSchema = z.object({
  tune_name: z.string(),
});

export const StructureSetSchema = z.object({
  folder_name: z.string(),
  tunes: z.array(StructureTuneSchema),
});

export const StructureSectionSchema = z.object({
  section_name: z.string(),
  sets: z.array(StructureSetSchema),
});

export const StructureMapSchema = z.array(StructureSectionSchema);

// ─── Derived Types ───────────────────────────────────────────────────────────

export type StructureMap = z.infer<typeof StructureMapSchema>;
export type StructureSection = z.infer<typeof StructureSectionSchema>;
export type StructureSet = z.infer<typeof StructureSetSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface SchemaIssue {
  field: string;
  message: string;
}

/**
 * Validate a parsed structure map. Returns an empty array if valid.
 */
export function validateStructureMap(raw: unknown): SchemaIssue[] {
  const result = StructureMapSchema.safeParse(raw);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Tune names listed for one section + set folder, or null when the map has
 * no entry for it. Blank names are dropped.
 */
export function tunesFor(
  map: StructureMap,
  sectionName: string,
  setFolderName: string
): string[] | null {
  const section = map.find((s) => s.section_name === sectionName);
  if (!section) return null;
  const set = section.sets.find((s) => s.folder_name === setFolderName);
  if (!set) return null;
  return set.tunes.map((t) => t.tune_name).filter((name) => name.length > 0);
}
