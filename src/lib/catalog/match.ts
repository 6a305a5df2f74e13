/**
 * Best-match selection
 *
 * Given the raw catalog payload for a title:
 * 1. keep only results whose format is "book"
 * 2. order them newest first by the date part of `issued`
 * 3. take the first
 *
 * Results with a missing or unparsable `issued` sort as 1900-01-01, so they
 * never outrank a dated result. Equal dates keep catalog order. There is no
 * secondary ranking by title similarity.
 */

import { isValid, parse } from "date-fns";
import type { Logger } from "@/lib/logger";
import {
  SearchResponseSchema,
  SearchResultSchema,
  type PublicationDate,
  type SearchResponse,
  type SearchResult,
} from "./types";

export const NOT_FOUND = "Not found";
export const BOOK_FORMAT = "book";

const ISSUED_DATE_FORMAT = "yyyy-MM-dd";
const REFERENCE_DATE = new Date(2000, 0, 1);
const OLDEST_SORT_KEY = parse("1900-01-01", ISSUED_DATE_FORMAT, REFERENCE_DATE).getTime();

/** Text before the first `T`, i.e. the date part of an ISO date-time. */
export function issuedDatePart(issued: string): string {
  return issued.split("T")[0] ?? "";
}

export function issuedSortKey(issued: unknown): number {
  if (typeof issued !== "string") return OLDEST_SORT_KEY;
  const parsed = parse(issuedDatePart(issued), ISSUED_DATE_FORMAT, REFERENCE_DATE);
  return isValid(parsed) ? parsed.getTime() : OLDEST_SORT_KEY;
}

function bookCandidates(results: unknown[]): SearchResult[] {
  const candidates: SearchResult[] = [];
  for (const row of results) {
    const result = SearchResultSchema.safeParse(row);
    if (!result.success) continue;
    if (result.data.format !== BOOK_FORMAT) continue;
    candidates.push(result.data);
  }
  return candidates;
}

export function selectBestMatch(
  title: string,
  response: unknown,
  logger?: Logger
): SearchResult | null {
  const parsed = SearchResponseSchema.safeParse(response);
  if (!parsed.success || parsed.data.results.length === 0) {
    logger?.debug({ title }, "No book data or results found");
    return null;
  }

  const { results }: SearchResponse = parsed.data;
  logger?.debug({ title, count: results.length }, "Considering results");

  const candidates = bookCandidates(results);
  if (candidates.length === 0) {
    logger?.debug({ title }, "No book format results found");
    return null;
  }

  // Array.prototype.sort is stable, so equal dates keep catalog order.
  const ranked = candidates
    .map((candidate) => ({ candidate, key: issuedSortKey(candidate.issued) }))
    .sort((a, b) => b.key - a.key);

  const best = ranked[0]?.candidate ?? null;
  logger?.debug(
    { title, candidates: candidates.length, matchTitle: best?.title, issued: best?.issued },
    "Selected best match"
  );
  return best;
}

/** Date part of the best match's `issued`, or {@link NOT_FOUND}. */
export function extractPublicationDate(
  title: string,
  response: unknown,
  logger?: Logger
): PublicationDate {
  const best = selectBestMatch(title, response, logger);
  if (!best || typeof best.issued !== "string") {
    logger?.debug({ title }, "No publication date found in book data");
    return NOT_FOUND;
  }

  const date = issuedDatePart(best.issued);
  logger?.debug({ title, date }, "Found publication date");
  return date;
}
