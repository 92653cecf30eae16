import { mkdir, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { SEQUENCE_EXTENSION, fileSize, listFilesWithExtension, toBareAccession } from "@refseq-db/core";

export interface IntegrityReport {
  removed: string[];
  kept: string[];
}

/**
 * Quarantines zero-length sequence files: their accessions are written to the
 * empty manifest and the files are deleted. Run once per batch, after extraction.
 */
export async function filterEmptySequences(
  genomesDir: string,
  emptyManifestPath: string
): Promise<IntegrityReport> {
  const removed: string[] = [];
  const kept: string[] = [];

  for (const name of await listFilesWithExtension(genomesDir, SEQUENCE_EXTENSION)) {
    const path = join(genomesDir, name);
    const size = await fileSize(path);
    if (size === null) continue;

    if (size === 0) {
      removed.push(toBareAccession(name));
    } else {
      kept.push(toBareAccession(name));
    }
  }

  await mkdir(dirname(emptyManifestPath), { recursive: true });
  await writeFile(emptyManifestPath, removed.map((accession) => `${accession}\n`).join(""));

  for (const accession of removed) {
    await rm(join(genomesDir, `${accession}${SEQUENCE_EXTENSION}`), { force: true });
  }

  return { removed, kept };
}
