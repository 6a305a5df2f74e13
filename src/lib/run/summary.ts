import fs from "node:fs";
import path from "node:path";
import type { PublicationDate } from "@/lib/catalog/types";

export const SUMMARY_FILENAME = "publication_dates.json";

export type SummaryRecord = Map<string, PublicationDate>;

/**
 * Pretty-printed JSON object in insertion order. A plain object would hoist
 * integer-like titles ("1984") to the front.
 */
export function serializeSummary(summary: SummaryRecord): string {
  if (summary.size === 0) return "{}\n";
  const lines = Array.from(
    summary,
    ([title, date]) => `  ${JSON.stringify(title)}: ${JSON.stringify(date)}`
  );
  return `{\n${lines.join(",\n")}\n}\n`;
}

export function writeSummary(dataDir: string, summary: SummaryRecord): string {
  const outPath = path.join(dataDir, SUMMARY_FILENAME);
  fs.writeFileSync(outPath, serializeSummary(summary), "utf8");
  return outPath;
}
