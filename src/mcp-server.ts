#!/usr/bin/env node
// ─── practice-tracker: MCP Server ────────────────────────────────────────────
//
// Exposes the practice library and its bookkeeping as MCP tools, so an
// assistant can pick what to practice and log repetitions during a session.
//
// Usage:
//   node dist/mcp-server.js [--config <tracker-config.json>]   # stdio transport
//
// Tools:
//   list_sets         sets with tune/part counts (optionally focus only)
//   set_info          tunes and parts of one set, with ids and scores
//   practice_queue    weakest tunes first
//   start_practice    begin a session on a tune or part, get its assets
//   record_result     log a success or fail for a tune or part
//   reset_item        clear a tune or part
//   toggle_focus      add/remove a set from the focus list
//   library_stats     summary counts and average score
//   rescan_library    re-run discovery and add new items
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { PracticeTracker } from "./tracker.js";
import type { SetRecord } from "./library/types.js";
import type { PracticeItem } from "./store/schema.js";
import { practiceQueue, libraryStats } from "./library/summary.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function status(item: PracticeItem | undefined): string {
  return `${(item?.score ?? 0).toFixed(0)}%, streak ${item?.streak ?? 0}`;
}

function describeSet(tracker: PracticeTracker, set: SetRecord): string {
  const lines = [
    `${set.setFolderName} (${set.sectionName})`,
    `id: ${set.setId}`,
    `instrument: ${tracker.repo.instrumentFor(set.setId)}${tracker.repo.isFocused(set.setId) ? ", in focus" : ""}`,
    "",
    "Tunes:",
    ...set.tunes.map((t) => `  ${t.tuneName} [${status(tracker.repo.get(t.tuneId))}] — ${t.tuneId}`),
  ];
  if (set.parts.length > 0) {
    lines.push("", "Parts:");
    for (const p of set.parts) {
      lines.push(`  ${p.shortLabel} (${p.label}, ${p.tuneName}) [${status(tracker.repo.get(p.partFullId))}] — ${p.partFullId}`);
    }
  }
  return lines.join("\n");
}

function text(t: string) {
  return { content: [{ type: "text" as const, text: t }] };
}

function errorText(err: unknown) {
  return {
    content: [{ type: "text" as const, text: err instanceof Error ? err.message : String(err) }],
    isError: true,
  };
}

// ─── Server ─────────────────────────────────────────────────────────────────

function createServer(tracker: PracticeTracker): McpServer {
  const server = new McpServer({
    name: "practice-tracker",
    version: "0.1.0",
  });

  // ─── Tool: list_sets ──────────────────────────────────────────────────────

  server.tool(
    "list_sets",
    "List the sets in the practice library with their tune and part counts.",
    {
      focusOnly: z.boolean().optional().describe("Only sets on the focus list"),
    },
    async (params) => {
      const sets = params.focusOnly
        ? tracker.allSets().filter((s) => tracker.repo.isFocused(s.setId))
        : tracker.visibleSets();
      if (sets.length === 0) return text("No sets found.");
      return text(
        sets
          .map((s) => `${s.setId} — ${s.tunes.length} tune(s), ${s.parts.length} part(s)`)
          .join("\n")
      );
    }
  );

  // ─── Tool: set_info ───────────────────────────────────────────────────────

  server.tool(
    "set_info",
    "Show the tunes and parts of a set, with their ids, scores, and streaks.",
    {
      set: z.string().describe("Set id (\"Section|Set folder\") or set folder name"),
    },
    async ({ set }) => {
      const record = tracker.findSet(set);
      if (!record) return errorText(new Error(`Set not found: "${set}"`));
      return text(describeSet(tracker, record));
    }
  );

  // ─── Tool: practice_queue ─────────────────────────────────────────────────

  server.tool(
    "practice_queue",
    "Suggest what to practice: tunes ordered by lowest score, then lowest streak.",
    {
      limit: z.number().int().min(1).max(100).optional().describe("How many tunes (default 10)"),
      focusOnly: z.boolean().optional().describe("Only tunes from focus sets"),
    },
    async ({ limit, focusOnly }) => {
      const queue = practiceQueue(tracker.allSets(), tracker.repo, {
        focusOnly: focusOnly ?? tracker.repo.showFocusOnly,
        limit: limit ?? 10,
      });
      if (queue.length === 0) return text("Nothing to practice.");
      return text(queue.map((e, i) => `${i + 1}. ${e.tune.tuneName} [${e.score.toFixed(0)}%, streak ${e.streak}] — ${e.tune.tuneId}`).join("\n"));
    }
  );

  // ─── Tool: start_practice ─────────────────────────────────────────────────

  server.tool(
    "start_practice",
    "Start a practice session on a tune or part. Resets its streak and returns the score and recording paths.",
    {
      id: z.string().describe("Tune id or part id"),
      instrument: z.string().optional().describe("Instrument score to use; remembered for the set"),
    },
    async ({ id, instrument }) => {
      try {
        const { item, assets } = tracker.start(id, instrument);
        return text(
          [
            `Session started: ${id}`,
            `Streak: ${item.streak}`,
            `Score PDF: ${assets.pdfPath ?? "(none found)"}`,
            `Recording: ${assets.wavPath ?? "(none found)"}`,
            ...assets.notes,
          ].join("\n")
        );
      } catch (err) {
        return errorText(err);
      }
    }
  );

  // ─── Tool: record_result ──────────────────────────────────────────────────

  server.tool(
    "record_result",
    "Record one repetition of a tune or part: success extends the streak, fail resets it.",
    {
      id: z.string().describe("Tune id or part id"),
      result: z.enum(["success", "fail"]),
    },
    async ({ id, result }) => {
      try {
        const item = result === "success" ? tracker.success(id) : tracker.fail(id);
        return text(`${id}: ${status(item)}`);
      } catch (err) {
        return errorText(err);
      }
    }
  );

  // ─── Tool: reset_item ─────────────────────────────────────────────────────

  server.tool(
    "reset_item",
    "Clear the streak and score of a tune or part.",
    {
      id: z.string().describe("Tune id or part id"),
    },
    async ({ id }) => {
      try {
        return text(`${id}: ${status(tracker.reset(id))}`);
      } catch (err) {
        return errorText(err);
      }
    }
  );

  // ─── Tool: toggle_focus ───────────────────────────────────────────────────

  server.tool(
    "toggle_focus",
    "Add a set to the focus list, or remove it if already there.",
    {
      set: z.string().describe("Set id or set folder name"),
    },
    async ({ set }) => {
      try {
        const { set: record, focused } = tracker.toggleFocus(set);
        return text(`${record.setId}: ${focused ? "in focus" : "not in focus"}`);
      } catch (err) {
        return errorText(err);
      }
    }
  );

  // ─── Tool: library_stats ──────────────────────────────────────────────────

  server.tool(
    "library_stats",
    "Summary of the practice library.",
    {},
    async () => {
      const s = libraryStats(tracker.allSets(), tracker.repo);
      return text(
        [
          `Sections: ${s.sections}`,
          `Sets: ${s.sets} (${s.focusSets} in focus)`,
          `Tunes: ${s.tunes}, average score ${s.averageTuneScore}%`,
          `Parts: ${s.parts}`,
          `Decay: ${tracker.repo.decayRate} point(s) per day`,
        ].join("\n")
      );
    }
  );

  // ─── Tool: rescan_library ─────────────────────────────────────────────────

  server.tool(
    "rescan_library",
    "Re-scan the library folders and add records for new tunes and parts.",
    {},
    async () => {
      try {
        const added = tracker.refresh();
        tracker.save();
        const warnings = tracker.diagnostics.filter((d) => d.level === "warn");
        const lines = [`${tracker.allSets().length} set(s), ${added.length} new item(s).`];
        for (const w of warnings) lines.push(`⚠ ${w.location}: ${w.message}`);
        return text(lines.join("\n"));
      } catch (err) {
        return errorText(err);
      }
    }
  );

  return server;
}

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const idx = args.indexOf("--config");
  const configPath = idx !== -1 && idx + 1 < args.length ? args[idx + 1] : undefined;

  const tracker = PracticeTracker.open({ configPath });
  for (const w of tracker.loadWarnings) console.error(`⚠ ${w}`);
  for (const d of tracker.diagnostics) {
    if (d.level === "warn") console.error(`⚠ ${d.location}: ${d.message}`);
  }

  const server = createServer(tracker);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("practice-tracker MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
