// ─── Part Pairing ───────────────────────────────────────────────────────────
//
// Pairs the PDFs and WAVs of one Parts/ folder into practice fragments.
// PDFs come per instrument ("X line 1_bass.pdf"), the recording does not
// ("X line 1.wav"); both reduce to the pairing key "X line 1".
//
// Output order: phrase bucket, then line, then part; inside each bucket the
// lowest-streak fragment comes first so weak spots get practiced first.
// ─────────────────────────────────────────────────────────────────────────────

import { readdirSync } from "node:fs";
import { join } from "node:path";
import { isFileEntry } from "./entries.js";
import type { DiscoveryDiagnostic, PartKey, PartLabel, SetKey, StreakSource } from "./types.js";
import { PART_LABELS } from "./types.js";
import {
  compareNames,
  detectLabel,
  extensionOf,
  shortLabel,
  stemOf,
  stripInstrumentSuffix,
} from "./naming.js";
import { formatPartId } from "./ids.js";

/** A paired fragment before tune assignment. */
export interface PairedPart {
  key: PartKey;
  partId: string;
  shortLabel: string;
  label: PartLabel;
  pdfPath: string;
  wavPath: string;
  partFullId: string;
}

type Side = "pdf" | "wav";

/**
 * Pair the files directly inside `partsDir`.
 *
 * Files without phrase/line/part in their name are ignored. When two files
 * on the same side collapse to one key, the lexicographically smallest
 * filename wins and a warning is recorded.
 */
export function pairParts(
  partsDir: string,
  set: SetKey,
  streaks: StreakSource,
  instruments: readonly string[],
  diagnostics: DiscoveryDiagnostic[] = []
): PairedPart[] {
  const files = readdirSync(partsDir, { withFileTypes: true })
    .filter((d) => isFileEntry(partsDir, d))
    .map((d) => d.name)
    .sort(compareNames);

  const sides: Record<Side, Map<string, string>> = { pdf: new Map(), wav: new Map() };
  const keyOrder = new Set<string>();

  for (const file of files) {
    if (detectLabel(file) === null) continue;

    const ext = extensionOf(file);
    if (ext !== "pdf" && ext !== "wav") continue;

    const key = stripInstrumentSuffix(stemOf(file), instruments, ext);
    const side = sides[ext];
    const kept = side.get(key);
    if (kept !== undefined) {
      diagnostics.push({
        level: "warn",
        location: join(partsDir, file),
        message: `Ambiguous ${ext.toUpperCase()} for "${key}": keeping ${kept}`,
      });
      continue;
    }
    side.set(key, file);
    keyOrder.add(key);
  }

  const buckets: Record<PartLabel, PairedPart[]> = { phrase: [], line: [], part: [] };

  for (const key of keyOrder) {
    const pdf = sides.pdf.get(key);
    const wav = sides.wav.get(key);
    if (pdf === undefined || wav === undefined) {
      diagnostics.push({
        level: "debug",
        location: join(partsDir, pdf ?? wav ?? key),
        message: `Part "${key}" has no ${pdf === undefined ? "PDF" : "WAV"}; skipped`,
      });
      continue;
    }

    const label = detectLabel(key);
    if (label === null) continue;

    const partKey: PartKey = { set, partId: key };
    buckets[label].push({
      key: partKey,
      partId: key,
      shortLabel: shortLabel(key),
      label,
      pdfPath: join(partsDir, pdf),
      wavPath: join(partsDir, wav),
      partFullId: formatPartId(partKey),
    });
  }

  const ordered: PairedPart[] = [];
  for (const label of PART_LABELS) {
    // Array.prototype.sort is stable, so equal streaks keep discovery order.
    const bucket = [...buckets[label]].sort(
      (a, b) => streaks.streakOf(a.partFullId) - streaks.streakOf(b.partFullId)
    );
    ordered.push(...bucket);
  }
  return ordered;
}
