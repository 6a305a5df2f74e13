/**
 * Titles File Tests
 */

import fs from "node:fs";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { TitleSourceError } from "@/lib/errors";
import { parseTitles, readTitles } from "@/lib/titles/read-titles";
import { makeTempDir, removeDir } from "./helpers";

describe("parseTitles", () => {
  it("keeps only the first line of an entry", () => {
    const text = "Head First Software Architecture\nPublisher Name\nEPUB\n12.8 MB\nPDF\n14.6 MB\n\n";
    expect(parseTitles(text)).toEqual(["Head First Software Architecture"]);
  });

  it("reads several entries in order", () => {
    const text = [
      "Learning TypeScript",
      "EPUB",
      "",
      "Designing Data-Intensive Applications",
      "PDF",
      "3.1 MB",
      "",
      "Refactoring",
    ].join("\n");
    expect(parseTitles(text)).toEqual([
      "Learning TypeScript",
      "Designing Data-Intensive Applications",
      "Refactoring",
    ]);
  });

  it("trims titles and treats whitespace-only lines as blank", () => {
    const text = "   Clean Code  \r\nEPUB\r\n   \r\n\r\n  Working Effectively  \r\n";
    expect(parseTitles(text)).toEqual(["Clean Code", "Working Effectively"]);
  });

  it("keeps duplicates", () => {
    expect(parseTitles("Refactoring\n\nRefactoring\n")).toEqual(["Refactoring", "Refactoring"]);
  });

  it("returns an empty list for an empty file", () => {
    expect(parseTitles("")).toEqual([]);
    expect(parseTitles("\n\n  \n")).toEqual([]);
  });
});

describe("readTitles", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("reads titles from disk", () => {
    const file = path.join(dir, "titles.txt");
    fs.writeFileSync(file, "Sample Title\nEPUB\n\n", "utf8");
    expect(readTitles(file)).toEqual(["Sample Title"]);
  });

  it("throws TitleSourceError for a missing file", () => {
    const file = path.join(dir, "missing.txt");
    expect(() => readTitles(file)).toThrow(TitleSourceError);
    expect(() => readTitles(file)).toThrow(`Unable to read titles from ${file}`);
  });
});
