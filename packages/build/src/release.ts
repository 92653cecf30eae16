import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat, writeFile } from "node:fs/promises";
import { basename } from "node:path";

export interface Artifact {
  filename: string;
  size: number;
  sha256: string;
}

export interface ReleaseManifest {
  version: string;
  buildDate: string;
  genomeCount: number | null;
  artifacts: Artifact[];
}

export async function computeChecksum(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export async function getArtifact(filePath: string): Promise<Artifact> {
  const stats = await stat(filePath);
  const sha256 = await computeChecksum(filePath);

  return {
    filename: basename(filePath),
    size: stats.size,
    sha256,
  };
}

export async function generateManifest(
  version: string,
  genomeCount: number | null,
  artifactPaths: string[],
  buildDate: Date = new Date()
): Promise<ReleaseManifest> {
  const artifacts: Artifact[] = [];

  for (const path of artifactPaths) {
    artifacts.push(await getArtifact(path));
  }

  return {
    version,
    buildDate: buildDate.toISOString(),
    genomeCount,
    artifacts,
  };
}

export async function writeManifest(manifest: ReleaseManifest, outputPath: string): Promise<void> {
  await writeFile(outputPath, `${JSON.stringify(manifest, null, 2)}\n`);
}
