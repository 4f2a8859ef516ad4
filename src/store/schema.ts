// ─── Practice Status Schema ─────────────────────────────────────────────────
//
// practice_status.json, as written to disk (snake_case keys). Absent
// top-level keys and item fields are filled with defaults on load, so files
// from older versions keep loading.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

export const SCHEMA_VERSION = 1;
export const DEFAULT_DECAY_RATE = 1.0;
export const DEFAULT_FOCUS_INSTRUMENT = "bass";

export const ITEM_TYPES = ["set", "tune", "part"] as const;
export type ItemType = (typeof ITEM_TYPES)[number];

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const PracticeItemSchema = z.object({
  type: z.enum(ITEM_TYPES),
  streak: z.number().int().min(0).default(0),
  score: z.number().min(0).max(100).default(0),
  last_practiced: z.string().nullable().default(null),
  last_score_updated: z.string().nullable().default(null),
  missing: z.boolean().default(false),
});

export const StatusDocumentSchema = z.object({
  schema_version: z.number().int().default(SCHEMA_VERSION),
  last_updated: z.string().nullable().default(null),
  decay_rate_percent_per_day: z.number().min(0).default(DEFAULT_DECAY_RATE),
  focus_instrument: z.string().min(1).default(DEFAULT_FOCUS_INSTRUMENT),
  focus_set_ids: z.array(z.string()).default([]),
  show_focus_only: z.boolean().default(false),
  set_instruments: z.record(z.string(), z.string()).default({}),
  items: z.record(z.string(), PracticeItemSchema).default({}),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type PracticeItem = z.infer<typeof PracticeItemSchema>;
export type StatusDocument = z.infer<typeof StatusDocumentSchema>;

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function createItem(type: ItemType, fields: Partial<Omit<PracticeItem, "type">> = {}): PracticeItem {
  return {
    type,
    streak: fields.streak ?? 0,
    score: fields.score ?? 0,
    last_practiced: fields.last_practiced ?? null,
    last_score_updated: fields.last_score_updated ?? null,
    missing: fields.missing ?? false,
  };
}

export function createEmptyDocument(): StatusDocument {
  return StatusDocumentSchema.parse({});
}

export interface DocumentIssue {
  field: string;
  message: string;
}

/**
 * Validate a parsed status document. Returns an empty array if valid.
 */
export function validateStatusDocument(raw: unknown): DocumentIssue[] {
  const result = StatusDocumentSchema.safeParse(raw);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/** ISO-8601 UTC with second precision: "2025-02-12T10:00:00Z". */
export function toTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Parse a stored timestamp; one without a zone is taken as UTC.
 * Returns null when it is not a valid date.
 */
export function parseTimestamp(value: string): Date | null {
  const zoned = /(Z|[+-]\d{2}:?\d{2})$/i.test(value) ? value : `${value}Z`;
  const date = new Date(zoned);
  return Number.isNaN(date.getTime()) ? null : date;
}
