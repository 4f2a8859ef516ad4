// ─── Store Subsystem ────────────────────────────────────────────────────────
//
// Practice status: schema, repository + JSON persistence, merge of
// discovered items, decay, and session bookkeeping.
// ─────────────────────────────────────────────────────────────────────────────

export {
  PracticeItemSchema,
  StatusDocumentSchema,
  ITEM_TYPES,
  SCHEMA_VERSION,
  DEFAULT_DECAY_RATE,
  DEFAULT_FOCUS_INSTRUMENT,
  createItem,
  createEmptyDocument,
  validateStatusDocument,
  toTimestamp,
  parseTimestamp,
} from "./schema.js";
export type { ItemType, PracticeItem, StatusDocument, DocumentIssue } from "./schema.js";

export { PracticeRepository, loadStatus, saveStatus, STATUS_FILE, BACKUP_DIR } from "./repository.js";
export type { LoadedStatus } from "./repository.js";

export { planMerge, mergeDiscovered } from "./merge.js";
export type { PlannedItem } from "./merge.js";

export { applyDecay } from "./decay.js";

export {
  startPractice,
  recordSuccess,
  recordFail,
  resetItem,
  scoreForStreak,
  MASTERY_STREAK,
} from "./practice.js";
