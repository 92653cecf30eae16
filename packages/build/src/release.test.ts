import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { computeChecksum, generateManifest, writeManifest } from "./release";

describe("release manifest", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "refseq-release-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("computes the sha256 of a file", async () => {
    const path = join(root, "abc.txt");
    writeFileSync(path, "abc");

    expect(await computeChecksum(path)).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  test("describes each artifact by name, size and checksum", async () => {
    const path = join(root, "refseq_database_v3.fa.gz");
    writeFileSync(path, "abc");

    const manifest = await generateManifest("v3", 2, [path], new Date("2025-12-05T00:00:00.000Z"));

    expect(manifest).toEqual({
      version: "v3",
      buildDate: "2025-12-05T00:00:00.000Z",
      genomeCount: 2,
      artifacts: [
        {
          filename: "refseq_database_v3.fa.gz",
          size: 3,
          sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
        },
      ],
    });
  });

  test("writes the manifest as JSON", async () => {
    const outputPath = join(root, "manifest.json");
    const manifest = { version: "v3", buildDate: "2025-12-05T00:00:00.000Z", genomeCount: null, artifacts: [] };

    await writeManifest(manifest, outputPath);

    expect(JSON.parse(readFileSync(outputPath, "utf8"))).toEqual(manifest);
  });
});
