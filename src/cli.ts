#!/usr/bin/env node
// ─── practice-tracker: CLI Entry Point ───────────────────────────────────
//
// Usage:
//   practice-tracker                          # Show help
//   practice-tracker list [--focus]           # List sets with scores
//   practice-tracker info <set>               # Tunes and parts of a set
//   practice-tracker queue [--limit N]        # Weakest tunes first
//   practice-tracker start <item-id> [--instrument NAME]
//   practice-tracker success <item-id>        # One clean repetition
//   practice-tracker fail <item-id>           # Streak broken
//   practice-tracker reset <item-id>          # Clear a tune or part
//   practice-tracker focus <set>              # Toggle a focus set
//   practice-tracker instrument <set> <name>  # Instrument for a set
//   practice-tracker decay-rate <N>           # Points per day
//   practice-tracker stats                    # Library summary
//
// Global flags: --config <tracker-config.json>, --verbose
// ─────────────────────────────────────────────────────────────────────────────

import { PracticeTracker } from "./tracker.js";
import type { SetRecord } from "./library/types.js";
import type { PracticeItem } from "./store/schema.js";
import type { SessionAssets } from "./library/assets.js";
import { practiceQueue, libraryStats } from "./library/summary.js";
import { parentContext } from "./library/ids.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function padRight(s: string, len: number): string {
  return s.length >= len ? s.substring(0, len) : s + " ".repeat(len - s.length);
}

function truncate(s: string, max: number): string {
  return s.length <= max ? s : s.substring(0, max - 1) + "…";
}

function formatStatus(item: PracticeItem | undefined): string {
  const score = item?.score ?? 0;
  const streak = item?.streak ?? 0;
  return `${score.toFixed(0)}% | ${streak}`;
}

function printSetTable(tracker: PracticeTracker, sets: SetRecord[]): void {
  console.log("\n" + padRight("Section", 26) + padRight("Set", 44) + padRight("Tunes", 7) + "Parts");
  console.log("─".repeat(84));
  for (const s of sets) {
    const marker = tracker.repo.isFocused(s.setId) ? "★ " : "  ";
    console.log(
      padRight(truncate(s.sectionName, 24), 26) +
        marker +
        padRight(truncate(s.setFolderName, 40), 42) +
        padRight(String(s.tunes.length), 7) +
        String(s.parts.length)
    );
  }
  console.log(`\n${sets.length} set(s).\n`);
}

function printSetInfo(tracker: PracticeTracker, set: SetRecord): void {
  const instrument = tracker.repo.instrumentFor(set.setId);
  console.log(`\n${"═".repeat(60)}`);
  console.log(`  ${set.setFolderName}`);
  console.log(`  ${set.sectionName} | instrument: ${instrument}${tracker.repo.isFocused(set.setId) ? " | focus" : ""}`);
  console.log(`${"═".repeat(60)}`);
  console.log("\nTunes:");
  for (const t of set.tunes) {
    console.log(`  • ${t.tuneName}  [${formatStatus(tracker.repo.get(t.tuneId))}]`);
    console.log(`      ${t.tuneId}`);
  }
  if (set.parts.length > 0) {
    console.log("\nParts:");
    for (const p of set.parts) {
      console.log(`  • ${p.shortLabel} (${p.label}, ${p.tuneName})  [${formatStatus(tracker.repo.get(p.partFullId))}]`);
      console.log(`      ${p.partFullId}`);
    }
  }
  console.log();
}

function printAssets(assets: SessionAssets): void {
  console.log(`  Score:     ${assets.pdfPath ?? "(none found)"}`);
  console.log(`  Recording: ${assets.wavPath ?? "(none found)"}`);
  for (const note of assets.notes) {
    console.log(`  ⚠ ${note}`);
  }
}

function printItem(id: string, item: PracticeItem): void {
  console.log(`\n  ${id}`);
  console.log(`  ${parentContext(id)}`);
  console.log(`  Streak: ${item.streak} | Score: ${item.score.toFixed(0)}%\n`);
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Positional arguments, with flags and their values removed. */
function positional(args: string[], valueFlags: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i++;
      continue;
    }
    if (args[i].startsWith("--")) continue;
    out.push(args[i]);
  }
  return out;
}

function requireArg(value: string | undefined, usage: string): string {
  if (!value) {
    console.error(`Usage: ${usage}`);
    process.exit(1);
  }
  return value;
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdList(tracker: PracticeTracker, args: string[]): void {
  const sets = hasFlag(args, "--focus")
    ? tracker.allSets().filter((s) => tracker.repo.isFocused(s.setId))
    : tracker.visibleSets();
  printSetTable(tracker, sets);
}

function cmdInfo(tracker: PracticeTracker, args: string[]): void {
  const query = requireArg(args[0], "practice-tracker info <set-id | set folder>");
  const set = tracker.findSet(query);
  if (!set) {
    console.error(`Set not found: "${query}". Run 'practice-tracker list' to see available sets.`);
    process.exit(1);
  }
  printSetInfo(tracker, set);
}

function cmdQueue(tracker: PracticeTracker, args: string[]): void {
  const limitStr = getFlag(args, "--limit");
  const limit = limitStr ? parseInt(limitStr, 10) : 10;
  if (isNaN(limit) || limit < 1) {
    console.error(`Invalid limit: "${limitStr}". Must be a positive integer.`);
    process.exit(1);
  }
  const queue = practiceQueue(tracker.allSets(), tracker.repo, {
    focusOnly: tracker.repo.showFocusOnly || hasFlag(args, "--focus"),
    limit,
  });
  console.log();
  for (const e of queue) {
    console.log(`  ${padRight(`${e.score.toFixed(0)}%`, 6)}${padRight(String(e.streak), 4)}${e.tune.tuneName}`);
    console.log(`        ${e.tune.tuneId}`);
  }
  console.log(`\n${queue.length} tune(s) queued.\n`);
}

function cmdStart(tracker: PracticeTracker, args: string[]): void {
  const [id] = positional(args, ["--instrument"]);
  const itemId = requireArg(id, "practice-tracker start <item-id> [--instrument NAME]");
  const instrument = getFlag(args, "--instrument") ?? undefined;
  const { item, assets } = tracker.start(itemId, instrument);
  console.log(`\nStarting session`);
  printItem(itemId, item);
  printAssets(assets);
  console.log();
}

function cmdSuccess(tracker: PracticeTracker, args: string[]): void {
  const id = requireArg(args[0], "practice-tracker success <item-id>");
  printItem(id, tracker.success(id));
}

function cmdFail(tracker: PracticeTracker, args: string[]): void {
  const id = requireArg(args[0], "practice-tracker fail <item-id>");
  printItem(id, tracker.fail(id));
}

function cmdReset(tracker: PracticeTracker, args: string[]): void {
  const id = requireArg(args[0], "practice-tracker reset <item-id>");
  printItem(id, tracker.reset(id));
}

function cmdFocus(tracker: PracticeTracker, args: string[]): void {
  const query = requireArg(args[0], "practice-tracker focus <set-id | set folder>");
  const { set, focused } = tracker.toggleFocus(query);
  console.log(`${focused ? "★ Focused" : "Unfocused"}: ${set.setId}`);
}

function cmdInstrument(tracker: PracticeTracker, args: string[]): void {
  const usage = "practice-tracker instrument <set-id | set folder> <instrument>";
  const query = requireArg(args[0], usage);
  const instrument = requireArg(args[1], usage);
  const set = tracker.setInstrument(query, instrument);
  console.log(`${set.setId}: ${instrument}`);
}

function cmdDecayRate(tracker: PracticeTracker, args: string[]): void {
  const rateStr = requireArg(args[0], "practice-tracker decay-rate <points-per-day>");
  const rate = parseFloat(rateStr);
  if (isNaN(rate) || rate < 0) {
    console.error(`Invalid decay rate: "${rateStr}". Must be a non-negative number.`);
    process.exit(1);
  }
  tracker.repo.decayRate = rate;
  tracker.save();
  console.log(`Decay rate: ${rate} point(s) per day`);
}

function cmdStats(tracker: PracticeTracker): void {
  const stats = libraryStats(tracker.allSets(), tracker.repo);
  console.log(`\n  Practice Library`);
  console.log(`  ${"═".repeat(40)}`);
  console.log(`  Root:       ${tracker.library.libraryRoot} (${tracker.library.source})`);
  console.log(`  Sections:   ${stats.sections}`);
  console.log(`  Sets:       ${stats.sets} (${stats.focusSets} in focus)`);
  console.log(`  Tunes:      ${stats.tunes}, average score ${stats.averageTuneScore}%`);
  console.log(`  Parts:      ${stats.parts}`);
  console.log(`  Decay:      ${tracker.repo.decayRate} point(s) per day\n`);
}

function cmdHelp(): void {
  console.log(`
practice-tracker — practice streaks and scores for a score library

Commands:
  list [--focus]                  List sets
  info <set>                      Tunes and parts of a set, with ids
  queue [--limit N] [--focus]     Weakest tunes first
  start <item-id> [--instrument NAME]
                                  Start a session: reset the streak, show assets
  success <item-id>               Record a clean repetition
  fail <item-id>                  Record a mistake (streak back to 0)
  reset <item-id>                 Clear a tune or part
  focus <set>                     Toggle a set on the focus list
  instrument <set> <name>         Choose the score instrument for a set
  decay-rate <N>                  Score points lost per day without practice
  stats                           Library summary

Flags:
  --config <path>                 tracker-config.json (default ~/.practice-tracker/)
  --verbose                       Also print low-level discovery notes
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

function printDiagnostics(tracker: PracticeTracker, verbose: boolean): void {
  for (const w of tracker.loadWarnings) {
    console.error(`  ⚠ ${w}`);
  }
  for (const d of tracker.diagnostics) {
    if (d.level === "debug" && !verbose) continue;
    console.error(`  ${d.level === "warn" ? "⚠" : "·"} ${d.location}: ${d.message}`);
  }
}

function main(): void {
  const argv = process.argv.slice(2);
  const configPath = getFlag(argv, "--config") ?? undefined;
  const verbose = hasFlag(argv, "--verbose");
  const args = argv.filter((a, i) => a !== "--verbose" && a !== "--config" && argv[i - 1] !== "--config");
  const command = args[0] ?? "help";

  if (command === "help" || command === "--help" || command === "-h") {
    cmdHelp();
    return;
  }

  const tracker = PracticeTracker.open({ configPath });
  printDiagnostics(tracker, verbose);
  const rest = args.slice(1);

  switch (command) {
    case "list":
      cmdList(tracker, rest);
      break;
    case "info":
      cmdInfo(tracker, rest);
      break;
    case "queue":
      cmdQueue(tracker, rest);
      break;
    case "start":
      cmdStart(tracker, rest);
      break;
    case "success":
      cmdSuccess(tracker, rest);
      break;
    case "fail":
      cmdFail(tracker, rest);
      break;
    case "reset":
      cmdReset(tracker, rest);
      break;
    case "focus":
      cmdFocus(tracker, rest);
      break;
    case "instrument":
      cmdInstrument(tracker, rest);
      break;
    case "decay-rate":
      cmdDecayRate(tracker, rest);
      break;
    case "stats":
      cmdStats(tracker);
      break;
    default:
      console.error(`Unknown command: "${command}". Run 'practice-tracker help' for usage.`);
      process.exit(1);
  }
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
