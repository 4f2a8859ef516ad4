// ─── Configuration ──────────────────────────────────────────────────────────
//
// Finds the score library. Sources, in order:
//   1. the companion music manager (otpd_manager_path): paths.scores_dir in
//      data/preferences.json, else in config/default.yaml. The library's own
//      "#Script Resources/config.json" (otpd_scores_directory) may redirect it.
//   2. library_root in tracker-config.json
//
// tracker-config.json lives at ~/.practice-tracker/ unless a path is given.
// The manager's keys are also accepted without the "otpd_" prefix.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { INSTRUMENTS } from "./library/types.js";

export const SCRIPT_RESOURCES_FOLDER = "#Script Resources";
export const TRACKER_CONFIG_FILE = "tracker-config.json";

// ─── Schemas ────────────────────────────────────────────────────────────────

export const TrackerConfigSchema = z.object({
  library_root: z.string().min(1).optional(),
  otpd_manager_path: z.string().min(1).optional(),
  manager_path: z.string().min(1).optional(),
  instruments: z.array(z.string().min(1)).min(1).optional(),
});

const ManagerPreferencesSchema = z.object({
  paths: z.object({ scores_dir: z.string().min(1).optional() }).optional(),
});

const ScriptResourcesConfigSchema = z.object({
  otpd_scores_directory: z.string().min(1).optional(),
  scores_directory: z.string().min(1).optional(),
});

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Expand a leading "~" to the home directory. */
export function expandHome(p: string, home: string = homedir()): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return join(home, p.slice(2));
  return p;
}

export function defaultTrackerConfigPath(home: string = homedir()): string {
  return join(home, ".practice-tracker", TRACKER_CONFIG_FILE);
}

/**
 * Read and validate a JSON (or YAML) file. Returns null when the file is
 * missing, unparseable, or does not fit the schema.
 */
function readConfigFile<T>(
  filePath: string,
  schema: z.ZodType<T>,
  parse: (text: string) => unknown = JSON.parse
): T | null {
  if (!existsSync(filePath)) return null;
  try {
    const result = schema.safeParse(parse(readFileSync(filePath, "utf8")));
    return result.success ? result.data : null;
  } catch {
    // Unreadable config behaves like absent config; the next source is tried.
    return null;
  }
}

function existingDir(p: string | undefined, home: string): string | null {
  if (!p) return null;
  const expanded = expandHome(p, home);
  return existsSync(expanded) ? expanded : null;
}

export function loadTrackerConfig(configPath: string): TrackerConfig {
  return readConfigFile(configPath, TrackerConfigSchema) ?? {};
}

// ─── Resolution ─────────────────────────────────────────────────────────────

export interface ResolveOptions {
  /** Path to tracker-config.json. */
  configPath?: string;
  home?: string;
}

export interface ResolvedLibrary {
  libraryRoot: string;
  dataDir: string;
  /** Which source supplied the root. */
  source: "manager" | "script-resources" | "tracker-config";
  instruments: readonly string[];
}

function fromManager(managerPath: string | undefined, home: string): string | null {
  const manager = existingDir(managerPath, home);
  if (!manager) return null;
  const prefs = readConfigFile(join(manager, "data", "preferences.json"), ManagerPreferencesSchema);
  const fromPrefs = existingDir(prefs?.paths?.scores_dir, home);
  if (fromPrefs) return fromPrefs;

  const defaults = readConfigFile(join(manager, "config", "default.yaml"), ManagerPreferencesSchema, parseYaml);
  return existingDir(defaults?.paths?.scores_dir, home);
}

function fromScriptResources(candidateRoot: string, home: string): string | null {
  const cfg = readConfigFile(
    join(candidateRoot, SCRIPT_RESOURCES_FOLDER, "config.json"),
    ScriptResourcesConfigSchema
  );
  return existingDir(cfg?.otpd_scores_directory ?? cfg?.scores_directory, home);
}

/** Data directory for a library: practice status and the structure map. */
export function dataDirFor(libraryRoot: string): string {
  return join(libraryRoot, SCRIPT_RESOURCES_FOLDER, "data");
}

/**
 * Resolve the library root and data directory.
 * Throws if no source yields an existing directory.
 */
export function resolveLibrary(options: ResolveOptions = {}): ResolvedLibrary {
  const home = options.home ?? homedir();
  const configPath = options.configPath ?? defaultTrackerConfigPath(home);
  const config = loadTrackerConfig(configPath);
  const instruments = config.instruments ?? INSTRUMENTS;

  const resolved = (libraryRoot: string, source: ResolvedLibrary["source"]): ResolvedLibrary => ({
    libraryRoot,
    dataDir: dataDirFor(libraryRoot),
    source,
    instruments,
  });

  const managerRoot = fromManager(config.otpd_manager_path ?? config.manager_path, home);
  if (managerRoot) {
    const override = fromScriptResources(managerRoot, home);
    return override ? resolved(override, "script-resources") : resolved(managerRoot, "manager");
  }

  const trackerRoot = existingDir(config.library_root, home);
  if (trackerRoot) return resolved(trackerRoot, "tracker-config");

  throw new Error(
    `Could not find the score library. Create ${configPath} with "library_root" ` +
      `(and optionally "otpd_manager_path").`
  );
}
