import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createLogger, type LogLevel, type Logger } from "@/lib/logger";

export function makeTempDir(prefix = "pubdates-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export type CapturedLog = { level: LogLevel; record: Record<string, unknown> };

/** Logger that keeps parsed records in memory instead of writing to stderr. */
export function captureLogger(level: LogLevel = "debug"): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = createLogger({
    level,
    sink: (line, lineLevel) => {
      const record: Record<string, unknown> = JSON.parse(line);
      lines.push({ level: lineLevel, record });
    },
  });
  return { logger, lines };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}
