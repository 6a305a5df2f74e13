import { createHash } from "node:crypto";
import type { CacheKeyStrategy } from "@/lib/config";

export const CACHE_EXTENSION = ".json";
export const EMPTY_BASENAME = "untitled";

const NON_ALPHANUMERIC_RUN = /[^\p{L}\p{N}]+/gu;

/**
 * Map a title to a cache filename: every run of non-alphanumeric characters
 * becomes a single dash, with no dash at either end.
 *
 * Lossy. "C++ Primer" and "C Primer" share `C-Primer.json`; use
 * {@link hashedFilename} when distinct titles must not share a slot.
 */
export function sanitizeFilename(title: string): string {
  return `${sanitizeBasename(title)}${CACHE_EXTENSION}`;
}

function sanitizeBasename(title: string): string {
  const base = title.replace(NON_ALPHANUMERIC_RUN, "-").replace(/^-+|-+$/g, "");
  return base || EMPTY_BASENAME;
}

/** Sanitized name plus a short SHA-256 of the exact title. */
export function hashedFilename(title: string): string {
  const digest = createHash("sha256").update(title, "utf8").digest("hex").slice(0, 12);
  return `${sanitizeBasename(title)}-${digest}${CACHE_EXTENSION}`;
}

export function cacheFilename(title: string, strategy: CacheKeyStrategy = "sanitized"): string {
  return strategy === "hashed" ? hashedFilename(title) : sanitizeFilename(title);
}
