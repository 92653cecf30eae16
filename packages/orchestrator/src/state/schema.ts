export const STATE_SCHEMA = `
CREATE TABLE IF NOT EXISTS genome_state (
  accession TEXT PRIMARY KEY,
  version TEXT NOT NULL,
  download_status TEXT NOT NULL DEFAULT 'pending',
  extract_status TEXT NOT NULL DEFAULT 'pending',
  archive_bytes INTEGER,
  sequence_bytes INTEGER,
  error_log TEXT,
  last_updated TEXT DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS pipeline_runs (
  run_id TEXT PRIMARY KEY,
  run_type TEXT NOT NULL,
  version TEXT NOT NULL,
  backup_dir TEXT,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  status TEXT NOT NULL DEFAULT 'running',
  failed_stage TEXT,
  stats TEXT
);

CREATE INDEX IF NOT EXISTS idx_state_download ON genome_state(download_status);
CREATE INDEX IF NOT EXISTS idx_state_extract ON genome_state(extract_status);
`;
