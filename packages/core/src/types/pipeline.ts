export type DownloadStatus = "pending" | "cached" | "restored_from_backup" | "downloaded" | "failed";

export type ExtractStatus =
  | "pending"
  | "cached"
  | "restored_from_backup"
  | "extracted"
  | "failed"
  | "empty";

export interface GenomeManifestEntry {
  accession: string;
  status: DownloadStatus;
}

export type RunType = "build" | "compress";

export type RunStatus = "running" | "completed" | "failed";

export interface PipelineRun {
  runId: string;
  version: string;
  backupDir: string | null;
  startedAt: Date;
}

export interface PipelineStats {
  totalGenomes: number;
  cached: number;
  restoredFromBackup: number;
  downloaded: number;
  downloadFailed: number;
  extracted: number;
  extractionFailed: number;
  empty: number;
  assembledFiles: number;
  assembledBytes: number;
}

export function emptyStats(): PipelineStats {
  return {
    totalGenomes: 0,
    cached: 0,
    restoredFromBackup: 0,
    downloaded: 0,
    downloadFailed: 0,
    extracted: 0,
    extractionFailed: 0,
    empty: 0,
    assembledFiles: 0,
    assembledBytes: 0,
  };
}
