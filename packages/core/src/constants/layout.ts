import { join } from "node:path";

export const ARCHIVE_EXTENSION = ".zip";
export const SEQUENCE_EXTENSION = ".fna";
export const PARTIAL_SUFFIX = ".part";
export const ARTIFACT_PREFIX = "refseq_database_";

export interface OutputLayout {
  root: string;
  genomesDir: string;
  logsDir: string;
  stateDbPath: string;
  emptyManifestPath: string;
  resolverMissingManifestPath: string;
  missingReportPath: string;
  downloadFailuresPath: string;
  extractionFailuresPath: string;
  archivePath(accession: string): string;
  sequencePath(accession: string): string;
  artifactPath(version: string): string;
  compressedArtifactPath(version: string): string;
  releaseManifestPath(version: string): string;
}

/**
 * Paths of every file the pipeline reads or writes, relative to one output root.
 */
export function createLayout(root: string, stateDbPath?: string): OutputLayout {
  const genomesDir = join(root, "genomes");
  const logsDir = join(root, "logs");

  return {
    root,
    genomesDir,
    logsDir,
    stateDbPath: stateDbPath ?? join(root, "state.sqlite"),
    emptyManifestPath: join(genomesDir, "empty_list.txt"),
    resolverMissingManifestPath: join(genomesDir, "empty_list2.txt"),
    missingReportPath: join(root, "missing_fna.txt"),
    downloadFailuresPath: join(logsDir, "failed_downloads.txt"),
    extractionFailuresPath: join(logsDir, "failed_extractions.txt"),
    archivePath: (accession) => join(genomesDir, `${accession}${ARCHIVE_EXTENSION}`),
    sequencePath: (accession) => join(genomesDir, `${accession}${SEQUENCE_EXTENSION}`),
    artifactPath: (version) => join(root, `${ARTIFACT_PREFIX}${version}.fa`),
    compressedArtifactPath: (version) => join(root, `${ARTIFACT_PREFIX}${version}.fa.gz`),
    releaseManifestPath: (version) => join(root, `${ARTIFACT_PREFIX}${version}.manifest.json`),
  };
}

export function backupArchivePath(backupDir: string, accession: string): string {
  return join(backupDir, "genomes", `${accession}${ARCHIVE_EXTENSION}`);
}

export function backupSequencePath(backupDir: string, accession: string): string {
  return join(backupDir, "genomes", `${accession}${SEQUENCE_EXTENSION}`);
}
