// ─── Library Types ──────────────────────────────────────────────────────────
//
// The practice library is a folder tree:
//   <root>/Section <N> - <Name>/<set folder>/[Parts/]
//
// Sets hold tunes (from the structure map, inferred from filenames, or the
// set folder itself) and parts (phrase/line/part fragments with a PDF + WAV).
// Everything here is recomputed on each discovery pass.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Enums ──────────────────────────────────────────────────────────────────

/** Part labels, in the priority order used for detection and ordering. */
export const PART_LABELS = ["phrase", "line", "part"] as const;
export type PartLabel = (typeof PART_LABELS)[number];

/** Instruments whose names appear as PDF suffixes (`Tune_bass.pdf`). */
export const INSTRUMENTS = ["bagpipes", "seconds", "bass", "snare", "tenor"] as const;

/** Folder under a set that holds phrase/line/part fragments. */
export const PARTS_FOLDER = "Parts";

/** Library-level folder that is never a section. */
export const RESERVED_RESOURCE_FOLDER = "Tune Resources";

// ─── Keys ───────────────────────────────────────────────────────────────────

/** Identity of a set: section folder + set folder. */
export interface SetKey {
  sectionName: string;
  setFolderName: string;
}

/** Identity of a tune within a set. */
export interface TuneKey {
  set: SetKey;
  tuneName: string;
}

/** Identity of a part within a set's Parts folder. */
export interface PartKey {
  set: SetKey;
  partId: string;
}

// ─── Records ────────────────────────────────────────────────────────────────

export interface TuneRef {
  key: TuneKey;
  tuneName: string;
  /** `<set_id>|<tune_name>` */
  tuneId: string;
}

export interface PartRecord {
  key: PartKey;
  /** Shared stem of the PDF and WAV after instrument-suffix stripping. */
  partId: string;
  /** Display label, e.g. "line 1". */
  shortLabel: string;
  label: PartLabel;
  pdfPath: string;
  wavPath: string;
  tuneId: string;
  tuneName: string;
  /** `<set_id>|Parts|<part_id>` — the key in the practice store. */
  partFullId: string;
}

export interface SetRecord {
  key: SetKey;
  sectionName: string;
  setFolderName: string;
  setPath: string;
  /** `<section_name>|<set_folder_name>` */
  setId: string;
  tunes: TuneRef[];
  parts: PartRecord[];
}

// ─── Diagnostics ────────────────────────────────────────────────────────────

/**
 * Something discovery skipped or resolved on its own. Never fatal.
 * `debug` covers the common cases (orphaned files); `warn` the rest.
 */
export interface DiscoveryDiagnostic {
  level: "debug" | "warn";
  /** Path or id the note is about. */
  location: string;
  message: string;
}

export interface DiscoveryResult {
  sets: SetRecord[];
  diagnostics: DiscoveryDiagnostic[];
}

/** Streak lookup used to order parts; satisfied by the practice repository. */
export interface StreakSource {
  streakOf(itemId: string): number;
}
