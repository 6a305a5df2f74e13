import fs from "node:fs";
import path from "node:path";
import type { CacheKeyStrategy } from "@/lib/config";
import { DataDirectoryError, errorMessage } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { cacheFilename } from "./filename";

export type CacheLookup = { hit: true; response: unknown; filePath: string } | { hit: false };

export interface ResponseCacheOptions {
  dataDir: string;
  keyStrategy?: CacheKeyStrategy;
  logger: Logger;
}

/**
 * Create the data directory (and parents) if missing. The run cannot do
 * anything useful without it, so failure is fatal.
 */
export function ensureDataDir(dataDir: string, logger?: Logger): string {
  logger?.debug({ dataDir }, "Creating data directory");
  try {
    fs.mkdirSync(dataDir, { recursive: true });
  } catch (error) {
    throw new DataDirectoryError(dataDir, error);
  }
  return dataDir;
}

/**
 * One raw catalog response per title, stored as pretty-printed JSON in the
 * data directory. There is no locking: the run is sequential and reads then
 * writes one title at a time.
 */
export class ResponseCache {
  readonly dataDir: string;
  readonly keyStrategy: CacheKeyStrategy;
  private readonly logger: Logger;

  constructor(options: ResponseCacheOptions) {
    this.dataDir = options.dataDir;
    this.keyStrategy = options.keyStrategy ?? "sanitized";
    this.logger = options.logger.child({ component: "response-cache" });
  }

  pathFor(title: string): string {
    return path.join(this.dataDir, cacheFilename(title, this.keyStrategy));
  }

  /**
   * Cached response for a title. Unreadable or unparsable files count as
   * a miss.
   */
  load(title: string): CacheLookup {
    const filePath = this.pathFor(title);

    if (!fs.existsSync(filePath)) {
      this.logger.debug({ title, filePath }, "No cached result found");
      return { hit: false };
    }

    let raw: string;
    try {
      raw = fs.readFileSync(filePath, "utf8");
    } catch (error) {
      this.logger.warn(
        { title, filePath, err: errorMessage(error) },
        "Error reading cached file, treating as a miss"
      );
      return { hit: false };
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      this.logger.debug({ title, filePath }, "Loaded cached result");
      return { hit: true, response: parsed, filePath };
    } catch (error) {
      this.logger.warn(
        { title, filePath, err: errorMessage(error) },
        "Failed to parse cached file, treating as a miss"
      );
      return { hit: false };
    }
  }

  /**
   * Persist a response verbatim, replacing whatever the slot held. Returns
   * the path written, or null when the write failed.
   */
  store(title: string, response: unknown): string | null {
    const filePath = this.pathFor(title);
    try {
      fs.writeFileSync(filePath, JSON.stringify(response, null, 2) + "\n", "utf8");
    } catch (error) {
      this.logger.error({ title, filePath, err: errorMessage(error) }, "Failed to save result");
      return null;
    }
    this.logger.debug({ title, filePath }, "Saved result");
    return filePath;
  }
}
