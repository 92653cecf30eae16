#!/usr/bin/env tsx
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { ConfigurationError, createLayout } from "@refseq-db/core";
import { runPipelineCommand } from "./commands";
import { type OrchestratorConfig, getConfig, parseCliArgs, resolvePaths } from "./config";
import { countByStatus, createStateDatabase, getEntriesByStatus, getLastRun } from "./state/index";

const EXIT_INTERRUPTED = 130;

function printUsage(): void {
  console.log(`
refseq-db <command> [options]

Commands:
  run         Acquire, extract, filter, assemble and compress a database version
  compress    Compress an already assembled database version
  status      Show per-genome state and the last run

Options:
  --version <v>       Database version label (required for run and compress)
  --backup-dir <dir>  Earlier output directory to copy archives and sequences from
  --manifest <path>   Genome manifest TSV (run only)
  --output-dir <dir>  Output directory
  --skip-compress     Stop after assembly (run only)
  -h, --help          Show this message

Environment:
  REFSEQ_OUTPUT_DIR   Output directory (default: ./data)
  REFSEQ_MANIFEST     Genome manifest TSV (default: ./data/ftp_reference_genomes.tsv)
  STATE_DB_PATH       State database (default: <output-dir>/state.sqlite)
  BACKUP_DIR          Default for --backup-dir
  NCBI_DATASETS_URL   NCBI Datasets API base URL
  NCBI_API_KEY        NCBI API key (raises the request rate limit)
  FETCH_TIMEOUT_MS    Per-download timeout (default: 600000)
  LOG_LEVEL           fatal, error, warn, info, debug or trace (default: info)
`);
}

function printStatus(config: OrchestratorConfig, outputDir: string | null): void {
  const paths = resolvePaths(config, { outputDir });
  const layout = createLayout(paths.outputDir, paths.stateDbPath);
  mkdirSync(dirname(layout.stateDbPath), { recursive: true });

  const db = createStateDatabase(layout.stateDbPath);
  try {
    console.log("Download status:");
    for (const [status, count] of Object.entries(countByStatus(db, "download_status"))) {
      console.log(`  ${status}: ${count}`);
    }

    console.log("Extraction status:");
    for (const [status, count] of Object.entries(countByStatus(db, "extract_status"))) {
      console.log(`  ${status}: ${count}`);
    }

    const failed = getEntriesByStatus(db, "download_status", "failed");
    if (failed.length > 0) {
      console.log(`Failed downloads: ${failed.map((entry) => entry.accession).join(", ")}`);
    }

    const last = getLastRun(db);
    if (last) {
      console.log(`Last run: ${last.runType} ${last.version} (${last.status}), started ${last.startedAt}`);
      if (last.failedStage) console.log(`  failed stage: ${last.failedStage}`);
    } else {
      console.log("No runs recorded.");
    }
  } finally {
    db.close();
  }
}

async function main(): Promise<void> {
  const config = getConfig();
  const cli = parseCliArgs(process.argv.slice(2), config);

  const controller = new AbortController();
  const interrupt = (): void => controller.abort();
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  switch (cli.command) {
    case "help":
      printUsage();
      return;

    case "status":
      printStatus(config, cli.outputDir);
      return;

    case "run":
    case "compress": {
      const result = await runPipelineCommand(cli, config, controller.signal);

      if (controller.signal.aborted) {
        process.exitCode = EXIT_INTERRUPTED;
      } else if (!result.success) {
        process.exitCode = 1;
      }
      return;
    }
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`Error: ${err.message}`);
    console.error("Run `refseq-db --help` for usage.");
  } else {
    console.error("Error:", err);
  }
  process.exit(1);
});
