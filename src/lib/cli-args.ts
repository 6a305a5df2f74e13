import type { CacheKeyStrategy, ConfigOverrides } from "@/lib/config";
import { ConfigError } from "@/lib/errors";

export type Args = Record<string, string | boolean>;

export function parseArgs(argv: string[]): Args {
  const args: Args = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a || !a.startsWith("--")) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      args[key] = true;
    } else {
      args[key] = next;
      i++;
    }
  }
  return args;
}

function optionalString(args: Args, key: string): string | undefined {
  const v = args[key];
  if (typeof v !== "string") return undefined;
  const trimmed = v.trim();
  return trimmed || undefined;
}

function optionalFlag(args: Args, key: string): boolean | undefined {
  return args[key] === true ? true : undefined;
}

/** CLI flags as config overrides. Invalid values raise ConfigError. */
export function toOverrides(args: Args): ConfigOverrides {
  const issues: string[] = [];

  const delayRaw = optionalString(args, "delay-ms");
  const delay = delayRaw ? Number(delayRaw) : NaN;
  if (delayRaw && (!Number.isInteger(delay) || delay < 0)) {
    issues.push("--delay-ms must be a non-negative integer");
  }

  const cacheKeysRaw = optionalString(args, "cache-keys");
  let cacheKeys: CacheKeyStrategy | undefined;
  if (cacheKeysRaw === "sanitized" || cacheKeysRaw === "hashed") {
    cacheKeys = cacheKeysRaw;
  } else if (cacheKeysRaw) {
    issues.push("--cache-keys must be sanitized or hashed");
  }

  if (issues.length > 0) throw new ConfigError(issues);

  return {
    titlesFile: optionalString(args, "titles"),
    dataDir: optionalString(args, "data-dir"),
    useCache: optionalFlag(args, "use-cache"),
    offline: optionalFlag(args, "offline"),
    verbose: optionalFlag(args, "verbose"),
    requestDelayMs: delayRaw ? delay : undefined,
    cacheKeys,
  };
}
