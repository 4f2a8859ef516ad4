// ─── Practice Repository ────────────────────────────────────────────────────
//
// Owns the practice status document: item records keyed by item id, plus
// the per-user settings (decay rate, focus sets, instruments).
//
// Persistence: <dataDir>/practice_status.json, with the previous file copied
// to <dataDir>/backups/practice_status_YYYYMMDD_HHMMSS.json before each save.
// ─────────────────────────────────────────────────────────────────────────────

import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { StreakSource } from "../library/types.js";
import {
  SCHEMA_VERSION,
  StatusDocumentSchema,
  createEmptyDocument,
  toTimestamp,
  type ItemType,
  type PracticeItem,
  type StatusDocument,
} from "./schema.js";

export const STATUS_FILE = "practice_status.json";
export const BACKUP_DIR = "backups";

export class PracticeRepository implements StreakSource {
  constructor(private readonly doc: StatusDocument = createEmptyDocument()) {}

  // ─── Items ────────────────────────────────────────────────────────────────

  get(id: string): PracticeItem | undefined {
    return this.doc.items[id];
  }

  has(id: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.doc.items, id);
  }

  /** Insert or replace an item. */
  upsert(id: string, item: PracticeItem): void {
    this.doc.items[id] = item;
  }

  ids(): string[] {
    return Object.keys(this.doc.items);
  }

  entries(): Array<[string, PracticeItem]> {
    return Object.entries(this.doc.items);
  }

  entriesOfType(type: ItemType): Array<[string, PracticeItem]> {
    return this.entries().filter(([, item]) => item.type === type);
  }

  get size(): number {
    return this.ids().length;
  }

  streakOf(id: string): number {
    return this.get(id)?.streak ?? 0;
  }

  // ─── Settings ─────────────────────────────────────────────────────────────

  get decayRate(): number {
    return this.doc.decay_rate_percent_per_day;
  }

  set decayRate(rate: number) {
    if (!Number.isFinite(rate) || rate < 0) {
      throw new Error(`Decay rate must be a non-negative number: got ${rate}`);
    }
    this.doc.decay_rate_percent_per_day = rate;
  }

  get focusInstrument(): string {
    return this.doc.focus_instrument;
  }

  /** Instrument chosen for a set, or the default focus instrument. */
  instrumentFor(setId: string): string {
    return this.doc.set_instruments[setId] ?? this.doc.focus_instrument;
  }

  /** Remember the instrument for a set; it also becomes the default for new sets. */
  setInstrument(setId: string, instrument: string): void {
    this.doc.set_instruments[setId] = instrument;
    this.doc.focus_instrument = instrument;
  }

  get focusSetIds(): readonly string[] {
    return this.doc.focus_set_ids;
  }

  isFocused(setId: string): boolean {
    return this.doc.focus_set_ids.includes(setId);
  }

  /** Add or remove a set from the focus list. Returns the new state. */
  toggleFocus(setId: string): boolean {
    if (this.isFocused(setId)) {
      this.doc.focus_set_ids = this.doc.focus_set_ids.filter((id) => id !== setId);
      return false;
    }
    this.doc.focus_set_ids = [...this.doc.focus_set_ids, setId];
    return true;
  }

  get showFocusOnly(): boolean {
    return this.doc.show_focus_only;
  }

  set showFocusOnly(value: boolean) {
    this.doc.show_focus_only = value;
  }

  /** Copy of the document, for serialization. */
  toDocument(): StatusDocument {
    return structuredClone(this.doc);
  }
}

// ─── Persistence ────────────────────────────────────────────────────────────

export interface LoadedStatus {
  repo: PracticeRepository;
  /** Why the file was ignored, when it was. */
  warnings: string[];
}

/**
 * Load practice status from a data directory. A missing file gives an empty
 * repository; an unreadable or invalid one gives an empty repository and a
 * warning (the file stays on disk until the next save backs it up).
 */
export function loadStatus(dataDir: string): LoadedStatus {
  const filePath = join(dataDir, STATUS_FILE);
  if (!existsSync(filePath)) return { repo: new PracticeRepository(), warnings: [] };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    return {
      repo: new PracticeRepository(),
      warnings: [`Invalid JSON in ${STATUS_FILE}: ${err instanceof Error ? err.message : String(err)}`],
    };
  }

  const result = StatusDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "root"}: ${i.message}`)
      .join("; ");
    return {
      repo: new PracticeRepository(),
      warnings: [`Invalid ${STATUS_FILE} (${issues})`],
    };
  }

  return { repo: new PracticeRepository(result.data), warnings: [] };
}

function backupStamp(now: Date): string {
  // 20250212_100000
  return toTimestamp(now).replace(/[-:]/g, "").replace("T", "_").replace("Z", "");
}

/** A backup name not yet taken: saves within one second get a counter. */
function backupPath(backupDir: string, now: Date): string {
  const base = `practice_status_${backupStamp(now)}`;
  let candidate = join(backupDir, `${base}.json`);
  for (let n = 1; existsSync(candidate); n++) {
    candidate = join(backupDir, `${base}_${n}.json`);
  }
  return candidate;
}

/**
 * Save practice status, backing up the previous file first.
 * Returns the path written.
 */
export function saveStatus(repo: PracticeRepository, dataDir: string, now: Date = new Date()): string {
  mkdirSync(dataDir, { recursive: true });
  const filePath = join(dataDir, STATUS_FILE);

  if (existsSync(filePath)) {
    const backupDir = join(dataDir, BACKUP_DIR);
    mkdirSync(backupDir, { recursive: true });
    copyFileSync(filePath, backupPath(backupDir, now));
  }

  const doc = repo.toDocument();
  doc.last_updated = toTimestamp(now);
  doc.schema_version = SCHEMA_VERSION;
  writeFileSync(filePath, JSON.stringify(doc, null, 2) + "\n", "utf8");
  return filePath;
}
