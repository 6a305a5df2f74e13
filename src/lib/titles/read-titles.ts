import fs from "node:fs";
import { TitleSourceError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

/**
 * Titles file format: entries separated by blank lines. The first non-blank
 * line of an entry is its title; the rest (publisher, formats, sizes) is
 * skipped.
 */
export function parseTitles(text: string): string[] {
  const titles: string[] = [];
  let inEntry = false;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) {
      inEntry = false;
      continue;
    }
    if (inEntry) continue;
    titles.push(trimmed);
    inEntry = true;
  }

  return titles;
}

export function readTitles(filePath: string, logger?: Logger): string[] {
  logger?.debug({ filePath }, "Reading titles from file");

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new TitleSourceError(filePath, error);
  }

  const titles = parseTitles(text);
  logger?.debug({ filePath, count: titles.length }, "Read titles from file");
  return titles;
}
