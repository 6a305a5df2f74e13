/**
 * Catalog Transport Tests
 *
 * Global fetch is stubbed; no request leaves the process.
 */

import fs from "node:fs";
import path from "node:path";
import { Agent } from "undici";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createCatalogDispatcher, createCatalogFetch } from "@/lib/catalog/catalog-fetch";
import { captureLogger, jsonResponse, makeTempDir, removeDir } from "./helpers";

describe("createCatalogDispatcher", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("returns null without a CA file", () => {
    const { logger, lines } = captureLogger();
    expect(createCatalogDispatcher(undefined, logger)).toBeNull();
    expect(lines).toHaveLength(0);
  });

  it("falls back to default TLS and warns when the CA file is unreadable", () => {
    const { logger, lines } = captureLogger();
    const caPath = path.join(dir, "missing-ca.pem");

    expect(createCatalogDispatcher(caPath, logger)).toBeNull();

    const warnings = lines.filter((line) => line.level === "warn");
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.record.msg).toBe("Failed to load catalog CA bundle; using default TLS");
    expect(warnings[0]?.record.caPath).toBe(caPath);
  });

  it("builds an Agent from a readable CA file", async () => {
    const { logger } = captureLogger();
    const caPath = path.join(dir, "ca.pem");
    fs.writeFileSync(caPath, "-----BEGIN CERTIFICATE-----\ntest\n-----END CERTIFICATE-----\n");

    const dispatcher = createCatalogDispatcher(caPath, logger);

    expect(dispatcher).toBeInstanceOf(Agent);
    await dispatcher?.close();
  });
});

describe("createCatalogFetch", () => {
  const fetchStub = vi.fn(async (_input: string, _init?: RequestInit) => jsonResponse({ results: [] }));

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchStub);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("adds the dispatcher to the request init", async () => {
    const dispatcher = new Agent();
    const catalogFetch = createCatalogFetch(dispatcher);

    await catalogFetch("https://catalog.example.com/search/", { method: "GET" });

    expect(fetchStub).toHaveBeenCalledWith("https://catalog.example.com/search/", {
      method: "GET",
      dispatcher,
    });
    await dispatcher.close();
  });

  it("passes the init through untouched without a dispatcher", async () => {
    const catalogFetch = createCatalogFetch(null);
    const init: RequestInit = { method: "GET" };

    await catalogFetch("https://catalog.example.com/search/", init);

    expect(fetchStub.mock.calls[0]?.[1]).toBe(init);
  });
});
