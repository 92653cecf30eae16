import Database from "better-sqlite3";
import { z } from "zod";
import type { DownloadStatus, ExtractStatus, PipelineStats, RunStatus, RunType } from "@refseq-db/core";
import { STATE_SCHEMA } from "./schema";

export type StateDatabase = Database.Database;

const DownloadStatusSchema = z.enum(["pending", "cached", "restored_from_backup", "downloaded", "failed"]);
const ExtractStatusSchema = z.enum([
  "pending",
  "cached",
  "restored_from_backup",
  "extracted",
  "failed",
  "empty",
]);

const GenomeRowSchema = z.object({
  accession: z.string(),
  version: z.string(),
  download_status: DownloadStatusSchema,
  extract_status: ExtractStatusSchema,
  archive_bytes: z.number().nullable(),
  sequence_bytes: z.number().nullable(),
  error_log: z.string().nullable(),
  last_updated: z.string(),
});

const PipelineStatsSchema = z.object({
  totalGenomes: z.number(),
  cached: z.number(),
  restoredFromBackup: z.number(),
  downloaded: z.number(),
  downloadFailed: z.number(),
  extracted: z.number(),
  extractionFailed: z.number(),
  empty: z.number(),
  assembledFiles: z.number(),
  assembledBytes: z.number(),
});

const RunRowSchema = z.object({
  run_id: z.string(),
  run_type: z.enum(["build", "compress"]),
  version: z.string(),
  backup_dir: z.string().nullable(),
  started_at: z.string(),
  completed_at: z.string().nullable(),
  status: z.enum(["running", "completed", "failed"]),
  failed_stage: z.string().nullable(),
  stats: z.string().nullable(),
});

const StatusCountSchema = z.object({ status: z.string(), count: z.number() });

export interface StateEntry {
  accession: string;
  version: string;
  downloadStatus: DownloadStatus;
  extractStatus: ExtractStatus;
  archiveBytes: number | null;
  sequenceBytes: number | null;
  errorLog: string | null;
  lastUpdated: string;
}

export interface RunEntry {
  runId: string;
  runType: RunType;
  version: string;
  backupDir: string | null;
  startedAt: string;
  completedAt: string | null;
  status: RunStatus;
  failedStage: string | null;
  stats: PipelineStats | null;
}

export type StatusField = "download_status" | "extract_status";

export function createStateDatabase(path: string): StateDatabase {
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.exec(STATE_SCHEMA);
  return db;
}

export function getEntry(db: StateDatabase, accession: string): StateEntry | null {
  const row = db.prepare("SELECT * FROM genome_state WHERE accession = ?").get(accession);
  if (row === undefined) return null;

  return rowToEntry(row);
}

export function getEntriesByStatus(
  db: StateDatabase,
  field: StatusField,
  status: DownloadStatus | ExtractStatus
): StateEntry[] {
  const rows = db.prepare(`SELECT * FROM genome_state WHERE ${field} = ? ORDER BY accession`).all(status);
  return rows.map(rowToEntry);
}

export function upsertEntry(db: StateDatabase, entry: Partial<StateEntry> & { accession: string }): void {
  const existing = getEntry(db, entry.accession);

  if (existing) {
    db.prepare(`
      UPDATE genome_state SET
        version = ?,
        download_status = ?,
        extract_status = ?,
        archive_bytes = ?,
        sequence_bytes = ?,
        error_log = ?,
        last_updated = datetime('now')
      WHERE accession = ?
    `).run(
      entry.version ?? existing.version,
      entry.downloadStatus ?? existing.downloadStatus,
      entry.extractStatus ?? existing.extractStatus,
      entry.archiveBytes !== undefined ? entry.archiveBytes : existing.archiveBytes,
      entry.sequenceBytes !== undefined ? entry.sequenceBytes : existing.sequenceBytes,
      entry.errorLog !== undefined ? entry.errorLog : existing.errorLog,
      entry.accession
    );
  } else {
    db.prepare(`
      INSERT INTO genome_state (
        accession, version, download_status, extract_status,
        archive_bytes, sequence_bytes, error_log
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.accession,
      entry.version ?? "",
      entry.downloadStatus ?? "pending",
      entry.extractStatus ?? "pending",
      entry.archiveBytes ?? null,
      entry.sequenceBytes ?? null,
      entry.errorLog ?? null
    );
  }
}

export function countByStatus(db: StateDatabase, field: StatusField): Record<string, number> {
  const rows = db
    .prepare(`SELECT ${field} AS status, COUNT(*) AS count FROM genome_state GROUP BY ${field}`)
    .all();

  const counts: Record<string, number> = {};
  for (const row of rows) {
    const { status, count } = StatusCountSchema.parse(row);
    counts[status] = count;
  }
  return counts;
}

export function createRun(
  db: StateDatabase,
  run: { runId: string; runType: RunType; version: string; backupDir: string | null; startedAt: Date }
): void {
  db.prepare(`
    INSERT INTO pipeline_runs (run_id, run_type, version, backup_dir, started_at, status)
    VALUES (?, ?, ?, ?, ?, 'running')
  `).run(run.runId, run.runType, run.version, run.backupDir, run.startedAt.toISOString());
}

export function completeRun(
  db: StateDatabase,
  runId: string,
  stats: PipelineStats | null,
  status: "completed" | "failed" = "completed",
  failedStage: string | null = null
): void {
  db.prepare(`
    UPDATE pipeline_runs SET
      completed_at = ?,
      status = ?,
      failed_stage = ?,
      stats = ?
    WHERE run_id = ?
  `).run(new Date().toISOString(), status, failedStage, stats ? JSON.stringify(stats) : null, runId);
}

export function getRun(db: StateDatabase, runId: string): RunEntry | null {
  const row = db.prepare("SELECT * FROM pipeline_runs WHERE run_id = ?").get(runId);
  return row === undefined ? null : rowToRun(row);
}

export function getLastRun(db: StateDatabase): RunEntry | null {
  const row = db.prepare("SELECT * FROM pipeline_runs ORDER BY started_at DESC, rowid DESC LIMIT 1").get();
  return row === undefined ? null : rowToRun(row);
}

function rowToEntry(raw: unknown): StateEntry {
  const row = GenomeRowSchema.parse(raw);
  return {
    accession: row.accession,
    version: row.version,
    downloadStatus: row.download_status,
    extractStatus: row.extract_status,
    archiveBytes: row.archive_bytes,
    sequenceBytes: row.sequence_bytes,
    errorLog: row.error_log,
    lastUpdated: row.last_updated,
  };
}

function rowToRun(raw: unknown): RunEntry {
  const row = RunRowSchema.parse(raw);
  return {
    runId: row.run_id,
    runType: row.run_type,
    version: row.version,
    backupDir: row.backup_dir,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    status: row.status,
    failedStage: row.failed_stage,
    stats: row.stats ? PipelineStatsSchema.parse(JSON.parse(row.stats)) : null,
  };
}
