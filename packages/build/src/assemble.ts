import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { pipeline } from "node:stream/promises";
import {
  PARTIAL_SUFFIX,
  SEQUENCE_EXTENSION,
  StageFailure,
  fileSize,
  isNotFound,
  listFilesWithExtension,
  toBareAccession,
} from "@refseq-db/core";

export interface AssemblyResult {
  path: string;
  files: string[];
  bytes: number;
}

async function readLines(path: string): Promise<string[]> {
  try {
    return (await readFile(path, "utf8")).split(/\r?\n/);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
}

/**
 * Merges missing-genome manifests into one report. Absent sources count as
 * empty; blank lines and repeats are dropped, first occurrence wins.
 */
export async function mergeMissingManifests(sources: string[], destPath: string): Promise<string[]> {
  const seen = new Set<string>();

  for (const source of sources) {
    for (const line of await readLines(source)) {
      const accession = line.trim();
      if (accession) seen.add(accession);
    }
  }

  const merged = [...seen];
  await mkdir(dirname(destPath), { recursive: true });
  await writeFile(destPath, merged.map((accession) => `${accession}\n`).join(""));
  return merged;
}

async function* concatenate(paths: string[]): AsyncGenerator<Buffer> {
  for (const path of paths) {
    yield* createReadStream(path);
  }
}

/**
 * Concatenates every sequence file in `genomesDir`, sorted by accession, into
 * `artifactPath`. Bytes are copied unchanged, so the artifact size is the sum
 * of the input sizes.
 */
export async function assembleDatabase(genomesDir: string, artifactPath: string): Promise<AssemblyResult> {
  const names = await listFilesWithExtension(genomesDir, SEQUENCE_EXTENSION);
  if (names.length === 0) {
    throw new StageFailure("assemble", `No sequence files found in ${genomesDir}`);
  }

  const partialPath = `${artifactPath}${PARTIAL_SUFFIX}`;

  try {
    await pipeline(
      concatenate(names.map((name) => join(genomesDir, name))),
      createWriteStream(partialPath)
    );
  } catch (error) {
    await rm(partialPath, { force: true });
    throw error;
  }

  await rename(partialPath, artifactPath);

  return {
    path: artifactPath,
    files: names.map(toBareAccession),
    bytes: (await fileSize(artifactPath)) ?? 0,
  };
}
