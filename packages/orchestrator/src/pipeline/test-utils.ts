import { writeFile } from "node:fs/promises";
import pino from "pino";
import yazl from "yazl";
import { TransientFetchError, createLayout } from "@refseq-db/core";
import type { ArchiveFetcher } from "@refseq-db/ingest";
import { createStateDatabase } from "../state/index";
import type { PipelineConfig } from "./stages";

export type FetchOutcome = string | Buffer | Error;

/**
 * Serves archives from memory. Each accession consumes its outcomes in order;
 * the last one repeats. Unknown accessions get a 404.
 */
export class FakeFetcher implements ArchiveFetcher {
  readonly name = "fake";
  readonly calls: string[] = [];
  private readonly outcomes: Map<string, FetchOutcome[]>;

  constructor(outcomes: Record<string, FetchOutcome[]> = {}) {
    this.outcomes = new Map(Object.entries(outcomes));
  }

  async fetchArchive(accession: string, destPath: string): Promise<void> {
    this.calls.push(accession);
    const queue = this.outcomes.get(accession) ?? [];
    const next = queue.length > 1 ? queue.shift() : queue[0];

    if (next === undefined) {
      throw new TransientFetchError(accession, "NCBI Datasets error: 404", 404);
    }
    if (next instanceof Error) throw next;
    await writeFile(destPath, next);
  }
}

export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

export async function zipBuffer(files: Record<string, string>): Promise<Buffer> {
  const zip = new yazl.ZipFile();
  for (const [name, content] of Object.entries(files)) {
    zip.addBuffer(Buffer.from(content), name);
  }
  zip.end();

  const chunks: Buffer[] = [];
  for await (const chunk of zip.outputStream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/** A datasets-style archive holding one genomic FASTA. */
export function genomeArchive(accession: string, fasta: string): Promise<Buffer> {
  return zipBuffer({
    "README.md": "NCBI Datasets",
    [`ncbi_dataset/data/${accession}/${accession}_genomic.fna`]: fasta,
  });
}

export function createTestConfig(
  root: string,
  overrides: Partial<PipelineConfig> & { backupDir?: string | null; version?: string } = {}
): PipelineConfig {
  const { backupDir = null, version = "v2", ...rest } = overrides;

  return {
    stateDb: createStateDatabase(":memory:"),
    layout: createLayout(root),
    run: { runId: "run-1", version, backupDir, startedAt: new Date(2025, 0, 1) },
    fetcher: new FakeFetcher(),
    logger: pino({ level: "silent" }),
    ...rest,
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
