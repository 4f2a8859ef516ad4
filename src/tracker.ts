// ─── Tracker ────────────────────────────────────────────────────────────────
//
// Ties the pieces together the way both entry points use them:
//   resolve library → load status → decay → discover → merge → save
//
// Holds the discovered sets and the repository for one process. Callers
// serialize access; nothing here locks.
// ─────────────────────────────────────────────────────────────────────────────

import type { DiscoveryDiagnostic, PartRecord, SetRecord, TuneRef } from "./library/types.js";
import { discoverLibrary } from "./library/discovery.js";
import { getPartAssets, getSetAssets, getTuneAssets, type SessionAssets } from "./library/assets.js";
import { PracticeRepository, loadStatus, saveStatus } from "./store/repository.js";
import { mergeDiscovered } from "./store/merge.js";
import { applyDecay } from "./store/decay.js";
import {
  recordFail,
  recordSuccess,
  resetItem,
  startPractice,
} from "./store/practice.js";
import type { ItemType, PracticeItem } from "./store/schema.js";
import { resolveLibrary, type ResolveOptions, type ResolvedLibrary } from "./config.js";

/** An id from the store, matched back to what discovery found. */
export type ItemRef =
  | { type: "set"; id: string; set: SetRecord }
  | { type: "tune"; id: string; set: SetRecord; tune: TuneRef }
  | { type: "part"; id: string; set: SetRecord; part: PartRecord };

export interface OpenOptions extends ResolveOptions {
  /** Use this library instead of resolving one from config. */
  library?: ResolvedLibrary;
  now?: Date;
}

export class PracticeTracker {
  private sets: SetRecord[] = [];
  /** Diagnostics from the last discovery pass. */
  diagnostics: DiscoveryDiagnostic[] = [];
  /** Warnings from loading the status file. */
  readonly loadWarnings: string[];

  private constructor(
    readonly library: ResolvedLibrary,
    readonly repo: PracticeRepository,
    loadWarnings: string[]
  ) {
    this.loadWarnings = loadWarnings;
  }

  /**
   * Open the library: load status, apply decay, discover, merge, save.
   */
  static open(options: OpenOptions = {}): PracticeTracker {
    const library = options.library ?? resolveLibrary(options);
    const { repo, warnings } = loadStatus(library.dataDir);
    const tracker = new PracticeTracker(library, repo, warnings);
    const now = options.now ?? new Date();

    applyDecay(repo, now);
    tracker.refresh();
    tracker.save(now);
    return tracker;
  }

  /** Re-run discovery and add defaults for new items. Returns the added ids. */
  refresh(): string[] {
    const result = discoverLibrary(this.library.libraryRoot, this.library.dataDir, this.repo, {
      instruments: this.library.instruments,
    });
    this.sets = result.sets;
    this.diagnostics = result.diagnostics;
    return mergeDiscovered(this.repo, this.sets);
  }

  save(now: Date = new Date()): string {
    return saveStatus(this.repo, this.library.dataDir, now);
  }

  allSets(): readonly SetRecord[] {
    return this.sets;
  }

  /** Sets, restricted to focus sets when the store asks for it. */
  visibleSets(): SetRecord[] {
    if (!this.repo.showFocusOnly) return [...this.sets];
    return this.sets.filter((s) => this.repo.isFocused(s.setId));
  }

  /** Find a set by id or by folder name. */
  findSet(query: string): SetRecord | undefined {
    return (
      this.sets.find((s) => s.setId === query) ??
      this.sets.find((s) => s.setFolderName === query)
    );
  }

  findItem(id: string): ItemRef | undefined {
    for (const set of this.sets) {
      if (set.setId === id) return { type: "set", id, set };
      const tune = set.tunes.find((t) => t.tuneId === id);
      if (tune) return { type: "tune", id, set, tune };
      const part = set.parts.find((p) => p.partFullId === id);
      if (part) return { type: "part", id, set, part };
    }
    return undefined;
  }

  private requireItem(id: string, allowed: readonly ItemType[]): ItemRef {
    const ref = this.findItem(id);
    if (!ref) throw new Error(`Unknown item: "${id}"`);
    if (!allowed.includes(ref.type)) {
      throw new Error(`"${id}" is a ${ref.type}; expected ${allowed.join(" or ")}`);
    }
    return ref;
  }

  private requireInstrument(instrument: string): void {
    if (!this.library.instruments.includes(instrument)) {
      throw new Error(`Unknown instrument: "${instrument}". Available: ${this.library.instruments.join(", ")}`);
    }
  }

  /** Score and recording for an item, with the set's chosen instrument. */
  assetsFor(ref: ItemRef, instrument?: string): SessionAssets {
    const inst = instrument ?? this.repo.instrumentFor(ref.set.setId);
    switch (ref.type) {
      case "set":
        return getSetAssets(ref.set, inst);
      case "tune":
        return getTuneAssets(ref.set.setPath, ref.tune.tuneName, inst, ref.set.setFolderName);
      case "part":
        return getPartAssets(ref.part, inst);
    }
  }

  // ─── Practice ─────────────────────────────────────────────────────────────

  /** Start a session on a tune or part; remembers the instrument for its set. */
  start(id: string, instrument?: string, now: Date = new Date()): { item: PracticeItem; assets: SessionAssets } {
    const ref = this.requireItem(id, ["tune", "part"]);
    if (instrument !== undefined) {
      this.requireInstrument(instrument);
      this.repo.setInstrument(ref.set.setId, instrument);
    }
    const assets = this.assetsFor(ref, instrument);
    const item = startPractice(this.repo, id, ref.type);
    this.save(now);
    return { item, assets };
  }

  success(id: string, now: Date = new Date()): PracticeItem {
    const ref = this.requireItem(id, ["tune", "part"]);
    const item = recordSuccess(this.repo, id, ref.type, now);
    this.save(now);
    return item;
  }

  fail(id: string, now: Date = new Date()): PracticeItem {
    const ref = this.requireItem(id, ["tune", "part"]);
    const item = recordFail(this.repo, id, ref.type);
    this.save(now);
    return item;
  }

  reset(id: string, now: Date = new Date()): PracticeItem {
    const ref = this.requireItem(id, ["tune", "part"]);
    const item = resetItem(this.repo, id, ref.type);
    this.save(now);
    return item;
  }

  toggleFocus(setQuery: string, now: Date = new Date()): { set: SetRecord; focused: boolean } {
    const set = this.findSet(setQuery);
    if (!set) throw new Error(`Unknown set: "${setQuery}"`);
    const focused = this.repo.toggleFocus(set.setId);
    this.save(now);
    return { set, focused };
  }

  setInstrument(setQuery: string, instrument: string, now: Date = new Date()): SetRecord {
    const set = this.findSet(setQuery);
    if (!set) throw new Error(`Unknown set: "${setQuery}"`);
    this.requireInstrument(instrument);
    this.repo.setInstrument(set.setId, instrument);
    this.save(now);
    return set;
  }
}
