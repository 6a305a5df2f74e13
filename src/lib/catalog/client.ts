/**
 * Catalog search client
 *
 * One GET per title against the configured search endpoint, restricted to
 * the title field. Failures are returned, not thrown, and never retried:
 * rerunning with the cache enabled is the retry path.
 */

import type { ResponseCache } from "@/lib/cache/response-cache";
import { errorMessage } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import type { FetchLike } from "./catalog-fetch";
import type { FetchResult } from "./types";

/**
 * Percent-encode a query value the way RFC 3986 tooling usually does:
 * `/` stays literal, `!'()*` are escaped.
 */
export function encodeQueryValue(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, "/");
}

export function buildSearchUrl(baseUrl: string, title: string): string {
  return `${baseUrl}?query=${encodeQueryValue(title)}&field=title`;
}

export interface CatalogClientOptions {
  searchUrl: string;
  fetch: FetchLike;
  logger: Logger;
  /** Successful responses are written here, overwriting any previous entry. */
  cache?: ResponseCache;
  apiToken?: string;
  timeoutMs?: number;
}

export class CatalogClient {
  private readonly options: CatalogClientOptions;
  private readonly logger: Logger;

  constructor(options: CatalogClientOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: "catalog-client" });
  }

  async search(title: string): Promise<FetchResult> {
    const url = buildSearchUrl(this.options.searchUrl, title);
    this.logger.debug({ title, url }, "Searching for book");

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.apiToken) headers.Authorization = `Bearer ${this.options.apiToken}`;

    const init: RequestInit = { method: "GET", headers };
    if (this.options.timeoutMs) init.signal = AbortSignal.timeout(this.options.timeoutMs);

    let response: Response;
    try {
      response = await this.options.fetch(url, init);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ title, err: message }, "Catalog request failed");
      return { ok: false, status: null, error: message };
    }

    if (response.status !== 200) {
      this.logger.error({ title, status: response.status }, `Error searching for ${title}`);
      // Release the connection now rather than when the response is collected.
      await response.body?.cancel().catch((error: unknown) => {
        this.logger.debug({ title, err: errorMessage(error) }, "Failed to discard response body");
      });
      return { ok: false, status: response.status, error: `HTTP ${response.status}` };
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ title, err: message }, "Catalog returned a body that is not JSON");
      return { ok: false, status: response.status, error: message };
    }

    this.logger.debug({ title }, "Successfully retrieved data");
    this.options.cache?.store(title, data);
    return { ok: true, data };
  }
}
