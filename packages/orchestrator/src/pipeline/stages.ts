import type { Logger } from "pino";
import type {
  DownloadStatus,
  ExtractStatus,
  GenomeManifestEntry,
  OutputLayout,
  PipelineRun,
  PipelineStats,
} from "@refseq-db/core";
import type { ArchiveFetcher, RetryPolicy, Sleep } from "@refseq-db/ingest";
import type { StateDatabase } from "../state/index";

export interface RunContext {
  stateDb: StateDatabase;
  layout: OutputLayout;
  run: PipelineRun;
  logger: Logger;
  signal?: AbortSignal;
}

export interface PipelineConfig extends RunContext {
  fetcher: ArchiveFetcher;
  sleep?: Sleep;
  downloadRetry?: RetryPolicy;
  extractRetry?: RetryPolicy;
  /** Log a progress line every N processed genomes. */
  progressInterval?: number;
}

export interface Stage<C extends RunContext = PipelineConfig> {
  name: string;
  run(context: C, stats: PipelineStats): Promise<void>;
}

export interface AcquisitionResult extends GenomeManifestEntry {
  status: Exclude<DownloadStatus, "pending">;
  attempts: number;
  bytes: number | null;
  error?: string;
}

export interface ExtractionResult {
  accession: string;
  status: Exclude<ExtractStatus, "pending" | "empty">;
  attempts: number;
  bytes: number | null;
  error?: string;
}

export const STAGES = {
  ACQUIRE: "acquire",
  EXTRACT: "extract",
  INTEGRITY: "integrity",
  ASSEMBLE: "assemble",
  COMPRESS: "compress",
} as const;

export const DEFAULT_PROGRESS_INTERVAL = 100;
