// ─── Naming Conventions ─────────────────────────────────────────────────────
//
// Filename rules shared by the pairing engine and tune inference:
//   "Set 01a - March line 2_bass.pdf"   → instrument PDF of a line
//   "Set 01a - March line 2.wav"        → the recording it pairs with
//   "Set 01a - March.pdf"               → a complete tune score
// ─────────────────────────────────────────────────────────────────────────────

import { PART_LABELS, type PartLabel } from "./types.js";

/** Matches complete-tune stems: "Set 01 - Title", "Set 12b - Title". */
export const TUNE_STEM_PATTERN = /^Set\s+\d+[a-z]?\s+-\s+.+/i;

/** Matches section folders: "Section 2 - Competition". */
export const SECTION_FOLDER_PATTERN = /^Section\s+\d+\s+-/i;

/**
 * Which part label a filename carries, checked in priority order
 * (phrase, line, part). Case-insensitive substring match.
 */
export function detectLabel(filename: string): PartLabel | null {
  const lower = filename.toLowerCase();
  for (const label of PART_LABELS) {
    if (lower.includes(label)) return label;
  }
  return null;
}

/** Plain code-unit ordering, the same everywhere in discovery. */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Lower-cased extension without the dot ("pdf"), or "" when there is none. */
export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf(".");
  return dot <= 0 ? "" : filename.slice(dot + 1).toLowerCase();
}

/** Filename without its final extension. */
export function stemOf(filename: string): string {
  const dot = filename.lastIndexOf(".");
  return dot <= 0 ? filename : filename.slice(0, dot);
}

function matchInstrumentSuffix(stem: string, instruments: readonly string[]): string | null {
  const lower = stem.toLowerCase();
  for (const instrument of instruments) {
    const suffix = instrument.toLowerCase();
    if (lower.length <= suffix.length + 1) continue;
    if (!lower.endsWith(suffix)) continue;
    const sep = lower[lower.length - suffix.length - 1];
    if (sep === "_" || sep === " ") return instrument;
  }
  return null;
}

/** True if the stem ends in `_<instrument>` or ` <instrument>`. */
export function hasInstrumentSuffix(stem: string, instruments: readonly string[]): boolean {
  return matchInstrumentSuffix(stem, instruments) !== null;
}

/**
 * Pairing key for a file stem. PDFs are per-instrument and lose their
 * instrument suffix; recordings are already instrument-free and pass through.
 */
export function stripInstrumentSuffix(
  stem: string,
  instruments: readonly string[],
  extension = "pdf"
): string {
  if (extension.toLowerCase() !== "pdf") return stem;
  const instrument = matchInstrumentSuffix(stem, instruments);
  if (!instrument) return stem;
  return stem.slice(0, stem.length - instrument.length - 1);
}

/**
 * Short display label for a long part id:
 * "Competition 08 - Welcome line 1" → "line 1".
 * Looks for " phrase", " line", " part" in that order; returns the id
 * unchanged when none is present.
 */
export function shortLabel(fullId: string): string {
  const lower = fullId.toLowerCase();
  for (const label of PART_LABELS) {
    const idx = lower.indexOf(` ${label}`);
    if (idx !== -1) return fullId.slice(idx + 1);
  }
  return fullId;
}
