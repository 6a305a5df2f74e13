import { ensureDataDir, ResponseCache } from "@/lib/cache/response-cache";
import { createCatalogDispatcher, createCatalogFetch, type FetchLike } from "@/lib/catalog/catalog-fetch";
import { CatalogClient } from "@/lib/catalog/client";
import type { LookupConfig } from "@/lib/config";
import type { Logger } from "@/lib/logger";
import { readTitles } from "@/lib/titles/read-titles";
import { runLookup, type LookupRunResult, type Sleep, type TitleOutcome } from "./orchestrator";
import { writeSummary } from "./summary";

export interface LookupDeps {
  logger: Logger;
  fetch?: FetchLike;
  sleep?: Sleep;
  onProgress?: (outcome: TitleOutcome) => void;
}

export type LookupResult = LookupRunResult & { summaryPath: string };

/**
 * Full run: data directory, titles, per-title lookup, summary file. Throws
 * only for the fatal cases (titles unreadable, data directory or summary
 * not writable).
 */
export async function lookupPublicationDates(
  config: Readonly<LookupConfig>,
  deps: LookupDeps
): Promise<LookupResult> {
  const { logger } = deps;
  logger.debug({ useCache: config.useCache, offline: config.offline }, "Starting book search");

  ensureDataDir(config.dataDir, logger);
  const titles = readTitles(config.titlesFile, logger);

  const cache = new ResponseCache({
    dataDir: config.dataDir,
    keyStrategy: config.cacheKeys,
    logger,
  });
  const client = new CatalogClient({
    searchUrl: config.searchUrl,
    fetch: deps.fetch ?? createCatalogFetch(createCatalogDispatcher(config.caFile, logger)),
    logger,
    cache,
    apiToken: config.apiToken,
    timeoutMs: config.requestTimeoutMs,
  });

  const result = await runLookup({
    titles,
    cache,
    client,
    logger,
    useCache: config.useCache,
    offline: config.offline,
    delayMs: config.requestDelayMs,
    sleep: deps.sleep,
    onProgress: deps.onProgress,
  });

  const summaryPath = writeSummary(config.dataDir, result.summary);
  logger.debug({ summaryPath }, "Results saved");

  return { ...result, summaryPath };
}
