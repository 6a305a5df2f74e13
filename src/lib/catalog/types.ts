import { z } from "zod";

/**
 * A single catalog hit. Only the fields the selector reads are named;
 * anything else the catalog returns is kept as-is.
 */
export const SearchResultSchema = z
  .object({
    title: z.unknown().optional(),
    format: z.unknown().optional(),
    issued: z.unknown().optional(),
  })
  .passthrough();

export type SearchResult = z.infer<typeof SearchResultSchema>;

export const SearchResponseSchema = z
  .object({
    results: z.array(z.unknown()),
  })
  .passthrough();

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export type FetchSuccess = { ok: true; data: unknown };
export type FetchFailure = { ok: false; status: number | null; error: string };
export type FetchResult = FetchSuccess | FetchFailure;

export type PublicationDate = string;
