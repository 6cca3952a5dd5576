/**
 * JSON entry files.
 *
 * Accepted shapes: an array of rows, or `{ "entries": [...] }`. A row is either
 * a direct entry `{ scope, category, amount }` (kg CO₂e) or an activity row
 * `{ scope, activity, quantity, unit, emissionFactor? }`.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { EntryFileError } from "../errors.js";
import { calculateActivityEmissions } from "../emissions/activity.js";
import { parseScope } from "../emissions/scope.js";
import type { EmissionEntry } from "../emissions/types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { EntryLoader } from "./types.js";

const log = createSubsystemLogger("loaders").child("json");

const ScopeField = z.union([z.number(), z.string()]);
const NonNegative = z.number().finite().nonnegative();

const DirectRowSchema = z
  .object({
    scope: ScopeField,
    category: z.string().min(1),
    amount: NonNegative,
  })
  .strict();

const ActivityRowSchema = z
  .object({
    scope: ScopeField,
    activity: z.string().min(1),
    quantity: NonNegative,
    unit: z.string().min(1),
    emissionFactor: NonNegative.optional(),
    date: z.string().optional(),
  })
  .strict();

const DocumentSchema = z.union([
  z.array(z.unknown()),
  z.object({ entries: z.array(z.unknown()) }).passthrough(),
]);

export type DirectRow = z.infer<typeof DirectRowSchema>;
export type ActivityRow = z.infer<typeof ActivityRowSchema>;
export type EntryRow = DirectRow | ActivityRow;

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/** Validate one row; activity rows are recognized by their "activity" key. */
export function parseEntryRow(source: string, row: unknown, index: number): EntryRow {
  const isActivity = typeof row === "object" && row !== null && "activity" in row;
  const parsed = isActivity ? ActivityRowSchema.safeParse(row) : DirectRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new EntryFileError(source, `row ${index}, ${formatIssue(parsed.error.issues[0])}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Convert validated rows to entries; scope labels go through parseScope. */
export function rowsToEntries(rows: EntryRow[]): EmissionEntry[] {
  return rows.map((row, index) => {
    const scope = parseScope(row.scope, index);
    if ("amount" in row) {
      return { scope, category: row.category, amount: row.amount };
    }
    return calculateActivityEmissions({
      scope,
      activity: row.activity,
      quantity: row.quantity,
      unit: row.unit,
      emissionFactor: row.emissionFactor,
    });
  });
}

export function parseEntryDocument(source: string, raw: unknown): EmissionEntry[] {
  const doc = DocumentSchema.safeParse(raw);
  if (!doc.success) {
    throw new EntryFileError(source, 'expected an array of rows or an object with "entries"', {
      cause: doc.error,
    });
  }
  const rawRows = Array.isArray(doc.data) ? doc.data : doc.data.entries;
  return rowsToEntries(rawRows.map((row, i) => parseEntryRow(source, row, i)));
}

export class JsonEntryLoader implements EntryLoader {
  async load(source: string): Promise<EmissionEntry[]> {
    let text: string;
    try {
      text = await readFile(source, "utf-8");
    } catch (err) {
      throw new EntryFileError(source, "file could not be read", { cause: err });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new EntryFileError(source, "not valid JSON", { cause: err });
    }

    const entries = parseEntryDocument(source, raw);
    log.debug(`loaded ${entries.length} entries from ${source}`);
    return entries;
  }
}
