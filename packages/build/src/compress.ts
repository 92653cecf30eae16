import { createReadStream, createWriteStream } from "node:fs";
import { rename, rm } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import { PARTIAL_SUFFIX, StageFailure, fileSize } from "@refseq-db/core";

export interface CompressionResult {
  path: string;
  inputBytes: number;
  outputBytes: number;
}

/**
 * Gzips `artifactPath` to `<artifactPath>.gz` and removes the original. Safe
 * to re-run after an interruption: a stale partial output is overwritten.
 */
export async function compressArtifact(artifactPath: string): Promise<CompressionResult> {
  const inputBytes = await fileSize(artifactPath);
  if (inputBytes === null) {
    throw new StageFailure("compress", `Assembled database not found: ${artifactPath}`);
  }

  const gzPath = `${artifactPath}.gz`;
  const partialPath = `${gzPath}${PARTIAL_SUFFIX}`;

  try {
    await pipeline(createReadStream(artifactPath), createGzip(), createWriteStream(partialPath));
  } catch (error) {
    await rm(partialPath, { force: true });
    throw error;
  }

  await rename(partialPath, gzPath);
  await rm(artifactPath);

  return { path: gzPath, inputBytes, outputBytes: (await fileSize(gzPath)) ?? 0 };
}
