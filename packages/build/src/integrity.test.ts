import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { filterEmptySequences } from "./integrity";

describe("filterEmptySequences", () => {
  let root: string;
  let genomesDir: string;
  let manifestPath: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "refseq-integrity-"));
    genomesDir = join(root, "genomes");
    manifestPath = join(genomesDir, "empty_list.txt");
    mkdirSync(genomesDir);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("quarantines zero-length sequence files", async () => {
    writeFileSync(join(genomesDir, "A1.fna"), "");
    writeFileSync(join(genomesDir, "A2.fna"), ">a2\nACGT\n");

    const report = await filterEmptySequences(genomesDir, manifestPath);

    expect(report).toEqual({ removed: ["A1"], kept: ["A2"] });
    expect(readFileSync(manifestPath, "utf8")).toBe("A1\n");
    expect(existsSync(join(genomesDir, "A1.fna"))).toBe(false);
    expect(existsSync(join(genomesDir, "A2.fna"))).toBe(true);
  });

  test("records bare accessions sorted", async () => {
    writeFileSync(join(genomesDir, "GCF_000009.1.fna"), "");
    writeFileSync(join(genomesDir, "GCF_000001.1.fna"), "");

    await filterEmptySequences(genomesDir, manifestPath);

    expect(readFileSync(manifestPath, "utf8")).toBe("GCF_000001.1\nGCF_000009.1\n");
  });

  test("writes an empty manifest when every file has content", async () => {
    writeFileSync(join(genomesDir, "A2.fna"), ">a2\nA\n");

    const report = await filterEmptySequences(genomesDir, manifestPath);

    expect(report.removed).toEqual([]);
    expect(readFileSync(manifestPath, "utf8")).toBe("");
  });

  test("replaces the manifest of a previous run", async () => {
    writeFileSync(manifestPath, "STALE\n");
    writeFileSync(join(genomesDir, "A3.fna"), "");

    await filterEmptySequences(genomesDir, manifestPath);

    expect(readFileSync(manifestPath, "utf8")).toBe("A3\n");
  });

  test("ignores archives and other files", async () => {
    writeFileSync(join(genomesDir, "A4.zip"), "");

    const report = await filterEmptySequences(genomesDir, manifestPath);

    expect(report).toEqual({ removed: [], kept: [] });
    expect(existsSync(join(genomesDir, "A4.zip"))).toBe(true);
  });
});
