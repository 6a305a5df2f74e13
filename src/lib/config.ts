/**
 * Run configuration
 *
 * Reads the environment with Zod, then layers CLI overrides on top. The
 * result is passed explicitly to every component, which never read run
 * settings from process.env themselves. The logger's default level is the
 * one exception: it checks whether it is running under the test runner.
 */

import { z } from "zod";
import { ConfigError } from "@/lib/errors";
import { isLogLevel, type LogLevel } from "@/lib/logger";

export const DEFAULT_SEARCH_URL = "https://learning.oreilly.com/api/v2/search/";
export const DEFAULT_TITLES_FILE = "titles.txt";
export const DEFAULT_DATA_DIR = "./data";
export const DEFAULT_REQUEST_DELAY_MS = 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export type CacheKeyStrategy = "sanitized" | "hashed";

export function envEnabled(value: string | undefined): boolean {
  const raw = String(value || "")
    .trim()
    .toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes" || raw === "on";
}

function nonNegativeInt(name: string, fallback: number) {
  return z
    .string()
    .optional()
    .transform((val, ctx) => {
      if (!val || val.trim() === "") return fallback;
      const parsed = Number(val.trim());
      if (!Number.isInteger(parsed) || parsed < 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name} must be a non-negative integer`,
        });
        return z.NEVER;
      }
      return parsed;
    });
}

function optionalTrimmed() {
  return z
    .string()
    .optional()
    .transform((val) => {
      const trimmed = val?.trim();
      return trimmed ? trimmed : undefined;
    });
}

const envSchema = z.object({
  DEBUG: z.string().optional().transform(envEnabled),
  USE_CACHE: z.string().optional().transform(envEnabled),
  PUBDATES_OFFLINE: z.string().optional().transform(envEnabled),
  PUBDATES_TITLES_FILE: optionalTrimmed(),
  PUBDATES_DATA_DIR: optionalTrimmed(),
  PUBDATES_SEARCH_URL: z
    .string()
    .url("PUBDATES_SEARCH_URL must be a valid URL")
    .optional()
    .default(DEFAULT_SEARCH_URL),
  PUBDATES_REQUEST_DELAY_MS: nonNegativeInt("PUBDATES_REQUEST_DELAY_MS", DEFAULT_REQUEST_DELAY_MS),
  PUBDATES_REQUEST_TIMEOUT_MS: nonNegativeInt(
    "PUBDATES_REQUEST_TIMEOUT_MS",
    DEFAULT_REQUEST_TIMEOUT_MS
  ),
  PUBDATES_CACHE_KEYS: z.enum(["sanitized", "hashed"]).optional().default("sanitized"),
  PUBDATES_API_TOKEN: optionalTrimmed(),
  PUBDATES_CA_FILE: optionalTrimmed(),
  PUBDATES_LOG_LEVEL: z
    .string()
    .optional()
    .transform((val, ctx) => {
      const raw = String(val || "")
        .trim()
        .toLowerCase();
      if (!raw) return undefined;
      if (!isLogLevel(raw)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "PUBDATES_LOG_LEVEL must be one of debug, info, warn, error",
        });
        return z.NEVER;
      }
      return raw;
    }),
});

export interface LookupConfig {
  titlesFile: string;
  dataDir: string;
  searchUrl: string;
  useCache: boolean;
  offline: boolean;
  verbose: boolean;
  logLevel: LogLevel;
  requestDelayMs: number;
  requestTimeoutMs: number;
  cacheKeys: CacheKeyStrategy;
  apiToken?: string;
  caFile?: string;
}

/** Values supplied on the command line; they win over the environment. */
export type ConfigOverrides = Partial<
  Pick<
    LookupConfig,
    "titlesFile" | "dataDir" | "useCache" | "offline" | "verbose" | "requestDelayMs" | "cacheKeys"
  >
>;

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): Readonly<LookupConfig> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const verbose = overrides.verbose ?? parsed.DEBUG;
  const offline = overrides.offline ?? parsed.PUBDATES_OFFLINE;

  let logLevel: LogLevel = parsed.PUBDATES_LOG_LEVEL ?? (verbose ? "debug" : "info");
  if (overrides.verbose) logLevel = "debug";

  return Object.freeze({
    titlesFile: overrides.titlesFile ?? parsed.PUBDATES_TITLES_FILE ?? DEFAULT_TITLES_FILE,
    dataDir: overrides.dataDir ?? parsed.PUBDATES_DATA_DIR ?? DEFAULT_DATA_DIR,
    searchUrl: parsed.PUBDATES_SEARCH_URL,
    // Offline runs can only ever read the cache.
    useCache: offline || (overrides.useCache ?? parsed.USE_CACHE),
    offline,
    verbose,
    logLevel,
    requestDelayMs: overrides.requestDelayMs ?? parsed.PUBDATES_REQUEST_DELAY_MS,
    requestTimeoutMs: parsed.PUBDATES_REQUEST_TIMEOUT_MS,
    cacheKeys: overrides.cacheKeys ?? parsed.PUBDATES_CACHE_KEYS,
    apiToken: parsed.PUBDATES_API_TOKEN,
    caFile: parsed.PUBDATES_CA_FILE,
  });
}
