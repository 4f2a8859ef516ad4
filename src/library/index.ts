// ─── Library Subsystem ──────────────────────────────────────────────────────
//
// Everything for reading the score library: types, naming rules, part
// pairing, tune sources, discovery, session assets, structure map.
// ─────────────────────────────────────────────────────────────────────────────

// Types
export type {
  SetKey,
  TuneKey,
  PartKey,
  TuneRef,
  PartRecord,
  SetRecord,
  PartLabel,
  DiscoveryDiagnostic,
  DiscoveryResult,
  StreakSource,
} from "./types.js";

export { PART_LABELS, INSTRUMENTS, PARTS_FOLDER, RESERVED_RESOURCE_FOLDER } from "./types.js";

// IDs
export {
  formatSetId,
  formatTuneId,
  formatPartId,
  setKey,
  setFolderTuneKey,
  parseItemId,
  parentContext,
} from "./ids.js";

// Naming
export {
  detectLabel,
  stripInstrumentSuffix,
  hasInstrumentSuffix,
  shortLabel,
  compareNames,
  extensionOf,
  stemOf,
  TUNE_STEM_PATTERN,
  SECTION_FOLDER_PATTERN,
} from "./naming.js";

// Pairing + tunes
export { pairParts } from "./pairing.js";
export type { PairedPart } from "./pairing.js";
export {
  assignPartToTune,
  resolveTunes,
  inferTunesFromSetFolder,
  tuneRef,
  structureMapSource,
  inferredSource,
  singleTuneSource,
  DEFAULT_TUNE_SOURCES,
} from "./tunes.js";
export type { TuneSource, TuneSourceContext } from "./tunes.js";

// Discovery
export {
  discoverLibrary,
  discoverSet,
  discoveredItemIds,
  isExcludedFolder,
  isSectionFolder,
} from "./discovery.js";
export type { DiscoveryOptions } from "./discovery.js";

// Assets
export { getTuneAssets, getSetAssets, getPartAssets } from "./assets.js";
export type { SessionAssets } from "./assets.js";

// Summary
export { practiceQueue, libraryStats } from "./summary.js";
export type { QueueEntry, QueueOptions, LibraryStats } from "./summary.js";

// Structure map
export {
  StructureMapSchema,
  StructureSectionSchema,
  StructureSetSchema,
  StructureTuneSchema,
  validateStructureMap,
  tunesFor,
} from "./structure/schema.js";
export type { StructureMap, StructureSection, StructureSet, SchemaIssue } from "./structure/schema.js";
export { loadStructureMap, structureMapPath, STRUCTURE_MAP_FILE } from "./structure/loader.js";
