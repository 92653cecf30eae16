import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { type PipelineRun, createLayout } from "@refseq-db/core";
import { createFetcher, readManifest } from "@refseq-db/ingest";
import { type CliCommand, type OrchestratorConfig, resolvePaths } from "./config";
import { withRunLog } from "./logging";
import { type RunResult, runBuildPipeline, runCompression } from "./pipeline/index";
import { createStateDatabase } from "./state/index";

export type PipelineCommand = Extract<CliCommand, { command: "run" | "compress" }>;

export interface CommandOptions {
  /** Mirror run logs to the terminal. Defaults to true. */
  console?: boolean;
}

async function loadAccessions(path: string, logger: Logger): Promise<string[]> {
  try {
    return await readManifest(path, logger);
  } catch (error) {
    logger.error({ err: error, manifest: path }, "Genome manifest rejected");
    throw error;
  }
}

function logResult(logger: Logger, label: string, result: RunResult): void {
  if (result.success) {
    logger.info({ runId: result.runId, stats: result.stats }, `${label} complete`);
  } else {
    logger.error(
      { runId: result.runId, stage: result.failedStage ?? null, error: result.error, stats: result.stats },
      `${label} failed`
    );
  }
}

/**
 * Runs `run` or `compress` inside its own run log. Every outcome, including a
 * rejected manifest, is written to the log before it closes.
 */
export async function runPipelineCommand(
  cli: PipelineCommand,
  config: OrchestratorConfig,
  signal: AbortSignal,
  options: CommandOptions = {}
): Promise<RunResult> {
  const paths = resolvePaths(config, {
    outputDir: cli.outputDir,
    manifestPath: cli.command === "run" ? cli.manifestPath : null,
  });
  const layout = createLayout(paths.outputDir, paths.stateDbPath);
  mkdirSync(layout.logsDir, { recursive: true });
  mkdirSync(dirname(layout.stateDbPath), { recursive: true });

  const run: PipelineRun = {
    runId: randomUUID(),
    version: cli.options.version,
    backupDir: cli.options.backupDir,
    startedAt: new Date(),
  };

  return withRunLog(
    {
      logsDir: layout.logsDir,
      label: cli.command === "run" ? "job" : "compress",
      version: run.version,
      level: config.logLevel,
      console: options.console,
      now: run.startedAt,
    },
    async (logger, log) => {
      logger.info({ runId: run.runId, outPath: log.outPath, errPath: log.errPath }, "Logging run output");

      const accessions = cli.command === "run" ? await loadAccessions(paths.manifestPath, logger) : [];
      const db = createStateDatabase(layout.stateDbPath);

      try {
        if (cli.command === "compress") {
          const result = await runCompression({ stateDb: db, layout, run, logger, signal });
          logResult(logger, "Compression", result);
          return result;
        }

        const fetcher = createFetcher("ncbi-datasets", {
          baseUrl: config.datasetsUrl,
          apiKey: config.apiKey,
          timeoutMs: config.fetchTimeoutMs,
        });
        const result = await runBuildPipeline(
          { stateDb: db, layout, run, logger, signal, fetcher },
          { accessions, compress: cli.compress }
        );
        logResult(logger, "Build", result);
        return result;
      } finally {
        db.close();
      }
    }
  );
}
