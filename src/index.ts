// ─── practice-tracker ───────────────────────────────────────────────────────
//
// Practice streaks and mastery scores for a folder library of scores and
// recordings.
//
// Usage:
//   import { PracticeTracker } from "practice-tracker";
//   const tracker = PracticeTracker.open({ configPath });
//   tracker.success(tracker.allSets()[0].tunes[0].tuneId);
// ─────────────────────────────────────────────────────────────────────────────

export * from "./library/index.js";
export * from "./store/index.js";

export {
  resolveLibrary,
  loadTrackerConfig,
  dataDirFor,
  expandHome,
  defaultTrackerConfigPath,
  TrackerConfigSchema,
  SCRIPT_RESOURCES_FOLDER,
  TRACKER_CONFIG_FILE,
} from "./config.js";
export type { TrackerConfig, ResolveOptions, ResolvedLibrary } from "./config.js";

export { PracticeTracker } from "./tracker.js";
export type { ItemRef, OpenOptions } from "./tracker.js";
