import { describe, test, expect } from "vitest";
import { join } from "node:path";
import { backupArchivePath, backupSequencePath, createLayout } from "./layout";

describe("createLayout", () => {
  const layout = createLayout("/data/refdata");

  test("places per-genome files under genomes/", () => {
    expect(layout.archivePath("GCF_1.1")).toBe(join("/data/refdata", "genomes", "GCF_1.1.zip"));
    expect(layout.sequencePath("GCF_1.1")).toBe(join("/data/refdata", "genomes", "GCF_1.1.fna"));
  });

  test("tags artifacts with the version unmodified", () => {
    expect(layout.artifactPath("2025.12-beta")).toBe(
      join("/data/refdata", "refseq_database_2025.12-beta.fa")
    );
    expect(layout.compressedArtifactPath("v2")).toBe(
      join("/data/refdata", "refseq_database_v2.fa.gz")
    );
  });

  test("keeps reports at their fixed locations", () => {
    expect(layout.emptyManifestPath).toBe(join("/data/refdata", "genomes", "empty_list.txt"));
    expect(layout.missingReportPath).toBe(join("/data/refdata", "missing_fna.txt"));
    expect(layout.downloadFailuresPath).toBe(join("/data/refdata", "logs", "failed_downloads.txt"));
  });

  test("defaults the state database into the output root", () => {
    expect(layout.stateDbPath).toBe(join("/data/refdata", "state.sqlite"));
    expect(createLayout("/out", "/tmp/state.sqlite").stateDbPath).toBe("/tmp/state.sqlite");
  });
});

describe("backup paths", () => {
  test("look inside the backup genomes/ directory", () => {
    expect(backupArchivePath("/backup", "GCA_2.1")).toBe(join("/backup", "genomes", "GCA_2.1.zip"));
    expect(backupSequencePath("/backup", "GCA_2.1")).toBe(join("/backup", "genomes", "GCA_2.1.fna"));
  });
});
