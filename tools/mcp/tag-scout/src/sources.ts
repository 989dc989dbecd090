/**
 * Table sources — where raw game rows come from.
 *
 * Any source works as long as it yields RawGameRecord rows. The file source
 * reads a JSON array or JSON Lines export; each field is validated on its
 * own, so one malformed field empties that field instead of the row.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { z } from "zod";
import { log } from "./logger.js";
import type { RawGameRecord } from "./normalize.js";

// ─── Types ──────────────────────────────────────────────

export interface RecordSource {
  /** Human-readable origin, used in logs and build state */
  describe(): string;
  read(): Promise<RawGameRecord[]>;
}

export interface ParsedRows {
  records: RawGameRecord[];
  skipped: number;
}

// ─── Row Validation ─────────────────────────────────────

const idField = z.union([z.string(), z.number()]).nullish().catch(null);

const RawRowSchema = z.object({
  id: idField,
  steam_appid: idField,
  name: z.string().nullish().catch(null),
  tags: z.union([z.string(), z.array(z.unknown())]).nullish().catch(null),
  release_date: z.string().nullish().catch(null),
  total_reviews: z.union([z.number(), z.string()]).nullish().catch(null),
});

/** Keep object rows (bad fields nulled), count anything else as skipped */
export function parseRawRows(rows: readonly unknown[]): ParsedRows {
  const records: RawGameRecord[] = [];
  let skipped = 0;
  for (const row of rows) {
    const parsed = RawRowSchema.safeParse(row);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      skipped++;
    }
  }
  return { records, skipped };
}

// ─── File Source ────────────────────────────────────────

const JSON_LINES_EXTENSIONS = new Set([".jsonl", ".ndjson"]);

function parseJsonLines(content: string): { rows: unknown[]; badLines: number } {
  const rows: unknown[] = [];
  let badLines = 0;
  for (const line of content.split(/\r?\n/)) {
    if (!line.trim()) continue;
    try {
      rows.push(JSON.parse(line));
    } catch {
      badLines++;
    }
  }
  return { rows, badLines };
}

export function jsonFileSource(path: string): RecordSource {
  return {
    describe: () => path,
    async read() {
      const content = await readFile(path, "utf-8");
      let rows: unknown[];
      let skipped = 0;

      if (JSON_LINES_EXTENSIONS.has(extname(path).toLowerCase())) {
        const lines = parseJsonLines(content);
        rows = lines.rows;
        skipped += lines.badLines;
      } else {
        const parsed: unknown = JSON.parse(content);
        if (!Array.isArray(parsed)) {
          throw new Error(`Expected a JSON array of game records in ${path}`);
        }
        rows = parsed;
      }

      const result = parseRawRows(rows);
      skipped += result.skipped;
      if (skipped > 0) {
        log("warn", `Skipped ${skipped} unreadable rows`, { source: path });
      }
      return result.records;
    },
  };
}

/** Rows already in memory (tests, or callers with their own reader) */
export function memorySource(rows: readonly RawGameRecord[], label = "memory"): RecordSource {
  return {
    describe: () => label,
    read: async () => [...rows],
  };
}
