import fs from "node:fs";
import { Agent } from "undici";
import { errorMessage } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

type UndiciRequestInit = RequestInit & { dispatcher?: unknown };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Dispatcher trusting an extra CA bundle, or null to use the default TLS
 * settings. An unreadable bundle is logged and ignored.
 */
export function createCatalogDispatcher(caPath: string | undefined, logger: Logger): Agent | null {
  if (!caPath) return null;

  try {
    const ca = fs.readFileSync(caPath);
    return new Agent({ connect: { ca } });
  } catch (error) {
    logger.warn({ err: errorMessage(error), caPath }, "Failed to load catalog CA bundle; using default TLS");
    return null;
  }
}

export function createCatalogFetch(dispatcher: Agent | null): FetchLike {
  return async (input, init = {}) => {
    const requestInit: UndiciRequestInit = dispatcher ? { ...init, dispatcher } : init;
    return fetch(input, requestInit);
  };
}
