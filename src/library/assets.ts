// ─── Session Assets ─────────────────────────────────────────────────────────
//
// Picks the score and recording to open for a practice session. Scores are
// per instrument ("<tune>_bass.pdf"); recordings are the full band
// ("<tune>.wav").
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import type { PartRecord, SetRecord } from "./types.js";

export interface SessionAssets {
  pdfPath: string | null;
  wavPath: string | null;
  /** Fallbacks taken while resolving, for display. */
  notes: string[];
}

function firstExisting(candidates: string[]): string | null {
  return candidates.find((p) => existsSync(p)) ?? null;
}

function resolveByName(dir: string, name: string, instrument: string, notes: string[]) {
  let wavPath = firstExisting([join(dir, `${name}.wav`)]);
  if (!wavPath) {
    wavPath = firstExisting([join(dir, `${name}_${instrument}.wav`)]);
    if (wavPath) notes.push(`No complete WAV for "${name}", using the ${instrument} WAV`);
  }
  const pdfPath = firstExisting([join(dir, `${name}_${instrument}.pdf`), join(dir, `${name}.pdf`)]);
  return { pdfPath, wavPath };
}

/**
 * Assets for one tune in a set folder. When the tune name (from the structure
 * map) does not match the files, retries with the set folder name.
 */
export function getTuneAssets(
  setPath: string,
  tuneName: string,
  instrument: string,
  setFolderName?: string
): SessionAssets {
  const notes: string[] = [];
  let { pdfPath, wavPath } = resolveByName(setPath, tuneName, instrument, notes);

  if ((!pdfPath || !wavPath) && setFolderName && setFolderName !== tuneName) {
    const fallback = resolveByName(setPath, setFolderName, instrument, notes);
    pdfPath ??= fallback.pdfPath;
    wavPath ??= fallback.wavPath;
    if (fallback.pdfPath || fallback.wavPath) {
      notes.push(`Used set folder name "${setFolderName}" for "${tuneName}"`);
    }
  }

  return { pdfPath, wavPath, notes };
}

/** A set opens on its first tune. */
export function getSetAssets(set: SetRecord, instrument: string): SessionAssets {
  const first = set.tunes[0];
  if (!first) return { pdfPath: null, wavPath: null, notes: [] };
  return getTuneAssets(set.setPath, first.tuneName, instrument, set.setFolderName);
}

/**
 * Assets for a part: the chosen instrument's PDF when the Parts folder has
 * one, otherwise the PDF discovery paired.
 */
export function getPartAssets(part: PartRecord, instrument: string): SessionAssets {
  const instrumentPdf = join(dirname(part.pdfPath), `${part.partId}_${instrument}.pdf`);
  return {
    pdfPath: existsSync(instrumentPdf) ? instrumentPdf : part.pdfPath,
    wavPath: part.wavPath,
    notes: [],
  };
}
