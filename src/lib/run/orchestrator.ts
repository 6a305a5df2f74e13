/**
 * Lookup run
 *
 * Titles are processed strictly one after another. Each one is served from
 * the cache (cache-first mode) or fetched live, reduced to a publication
 * date, reported, and added to the summary. A fixed delay follows every
 * live fetch; cache hits go straight to the next title.
 */

import type { ResponseCache } from "@/lib/cache/response-cache";
import type { CatalogClient } from "@/lib/catalog/client";
import { extractPublicationDate, NOT_FOUND } from "@/lib/catalog/match";
import type { PublicationDate } from "@/lib/catalog/types";
import type { Logger } from "@/lib/logger";
import type { SummaryRecord } from "./summary";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type TitleOutcome = {
  title: string;
  date: PublicationDate;
  source: "cache" | "catalog" | "none";
};

export interface LookupRunOptions {
  titles: readonly string[];
  cache: Pick<ResponseCache, "load">;
  client: Pick<CatalogClient, "search">;
  logger: Logger;
  useCache?: boolean;
  /** Never touch the network; a cache miss resolves to "Not found". */
  offline?: boolean;
  delayMs?: number;
  sleep?: Sleep;
  onProgress?: (outcome: TitleOutcome) => void;
}

export interface LookupRunStats {
  processed: number;
  fromCache: number;
  fetched: number;
  failed: number;
  notFound: number;
}

export interface LookupRunResult {
  summary: SummaryRecord;
  stats: LookupRunStats;
}

export function formatProgressLine(title: string, date: PublicationDate): string {
  return `${title}: ${date}`;
}

export async function runLookup(options: LookupRunOptions): Promise<LookupRunResult> {
  const {
    titles,
    cache,
    client,
    useCache = false,
    offline = false,
    delayMs = 1000,
    onProgress,
  } = options;
  const wait = options.sleep ?? sleep;
  const logger = options.logger.child({ component: "lookup-run" });

  const summary: SummaryRecord = new Map();
  const stats: LookupRunStats = { processed: 0, fromCache: 0, fetched: 0, failed: 0, notFound: 0 };

  for (const title of titles) {
    logger.debug({ title }, "Processing title");

    let response: unknown = null;
    let source: TitleOutcome["source"] = "none";
    let fetchedLive = false;

    if (useCache || offline) {
      const cached = cache.load(title);
      if (cached.hit) {
        response = cached.response;
        source = "cache";
        stats.fromCache += 1;
      }
    }

    if (source !== "cache") {
      if (offline) {
        logger.debug({ title }, "Offline and not cached; skipping catalog");
      } else {
        fetchedLive = true;
        stats.fetched += 1;
        const result = await client.search(title);
        if (result.ok) {
          response = result.data;
          source = "catalog";
        } else {
          stats.failed += 1;
        }
      }
    }

    const date = extractPublicationDate(title, response, logger);
    if (date === NOT_FOUND) stats.notFound += 1;
    stats.processed += 1;

    // Duplicate titles keep their first position and the latest date.
    summary.set(title, date);
    onProgress?.({ title, date, source });

    if (fetchedLive && delayMs > 0) {
      logger.debug({ delayMs }, "Waiting before next request");
      await wait(delayMs);
    }
  }

  return { summary, stats };
}
