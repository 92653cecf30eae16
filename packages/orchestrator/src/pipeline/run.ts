import { appendFile, mkdir } from "node:fs/promises";
import {
  type PipelineStats,
  type RunType,
  StageFailure,
  emptyStats,
  errorMessage,
  fileSize,
} from "@refseq-db/core";
import {
  assembleDatabase,
  compressArtifact,
  filterEmptySequences,
  generateManifest,
  mergeMissingManifests,
  writeManifest,
} from "@refseq-db/build";
import { completeRun, createRun, upsertEntry } from "../state/index";
import { runAcquisitionStage } from "./acquire";
import { runExtractionStage } from "./extract";
import { type PipelineConfig, type RunContext, STAGES, type Stage } from "./stages";

export interface RunResult {
  success: boolean;
  runId: string;
  stats: PipelineStats;
  failedStage?: string;
  error?: string;
}

export interface BuildOptions {
  accessions: string[];
  /** Fill gaps left by failed downloads. Run between acquisition and extraction. */
  resolvers?: Stage[];
  compress?: boolean;
}

function acquireStage(accessions: string[]): Stage {
  return {
    name: STAGES.ACQUIRE,
    async run(config, stats) {
      for await (const result of runAcquisitionStage(config, accessions)) {
        switch (result.status) {
          case "cached":
            stats.cached++;
            break;
          case "restored_from_backup":
            stats.restoredFromBackup++;
            break;
          case "downloaded":
            stats.downloaded++;
            break;
          case "failed":
            stats.downloadFailed++;
            break;
        }
      }
    },
  };
}

const extractStage: Stage = {
  name: STAGES.EXTRACT,
  async run(config, stats) {
    for await (const result of runExtractionStage(config)) {
      if (result.status === "failed") {
        stats.extractionFailed++;
      } else {
        stats.extracted++;
      }
    }
    config.logger.info({ extracted: stats.extracted, failed: stats.extractionFailed }, "Extraction complete");
  },
};

const integrityStage: Stage<RunContext> = {
  name: STAGES.INTEGRITY,
  async run(context, stats) {
    const { layout, logger } = context;
    const report = await filterEmptySequences(layout.genomesDir, layout.emptyManifestPath);

    for (const accession of report.removed) {
      upsertEntry(context.stateDb, { accession, extractStatus: "empty", sequenceBytes: 0 });
    }
    stats.empty = report.removed.length;

    logger.info({ removed: report.removed.length, kept: report.kept.length }, "Removed empty sequence files");
  },
};

const assembleStage: Stage<RunContext> = {
  name: STAGES.ASSEMBLE,
  async run(context, stats) {
    const { layout, logger, run } = context;

    // Resolvers may leave no manifest of their own.
    await appendFile(layout.resolverMissingManifestPath, "");
    const missing = await mergeMissingManifests(
      [layout.emptyManifestPath, layout.resolverMissingManifestPath],
      layout.missingReportPath
    );
    logger.info({ missing: missing.length, path: layout.missingReportPath }, "Wrote missing genome report");

    const result = await assembleDatabase(layout.genomesDir, layout.artifactPath(run.version));
    stats.assembledFiles = result.files.length;
    stats.assembledBytes = result.bytes;

    logger.info({ files: result.files.length, bytes: result.bytes, path: result.path }, "Assembled reference database");
  },
};

/** Gzips the artifact, then writes the release manifest beside it. */
const compressStage: Stage<RunContext> = {
  name: STAGES.COMPRESS,
  async run(context, stats) {
    const { layout, logger, run } = context;
    const artifactPath = layout.artifactPath(run.version);

    if ((await fileSize(artifactPath)) === null) {
      throw new StageFailure(STAGES.COMPRESS, `Artifact not found: ${artifactPath}`);
    }

    const result = await compressArtifact(artifactPath);
    logger.info(
      { path: result.path, inputBytes: result.inputBytes, outputBytes: result.outputBytes },
      "Compressed reference database"
    );

    const genomeCount = stats.assembledFiles > 0 ? stats.assembledFiles : null;
    const manifest = await generateManifest(run.version, genomeCount, [result.path]);
    await writeManifest(manifest, layout.releaseManifestPath(run.version));
    logger.info({ path: layout.releaseManifestPath(run.version) }, "Wrote release manifest");
  },
};

async function runStages<C extends RunContext>(
  context: C,
  runType: RunType,
  stages: Stage<C>[],
  stats: PipelineStats
): Promise<RunResult> {
  const { logger, run, stateDb } = context;
  let current: string | null = null;

  createRun(stateDb, {
    runId: run.runId,
    runType,
    version: run.version,
    backupDir: run.backupDir,
    startedAt: run.startedAt,
  });

  try {
    await mkdir(context.layout.logsDir, { recursive: true });

    for (const stage of stages) {
      context.signal?.throwIfAborted();
      current = stage.name;
      logger.info({ stage: stage.name }, `Starting stage: ${stage.name}`);
      await stage.run(context, stats);
    }

    completeRun(stateDb, run.runId, stats, "completed");
    logger.info({ runId: run.runId, stats }, "Pipeline completed");
    return { success: true, runId: run.runId, stats };
  } catch (error) {
    const failedStage = error instanceof StageFailure ? error.stage : current;
    completeRun(stateDb, run.runId, stats, "failed", failedStage);
    logger.error({ runId: run.runId, stage: failedStage, err: error }, `Stage failed: ${failedStage ?? "setup"}`);

    return {
      success: false,
      runId: run.runId,
      stats,
      ...(failedStage !== null ? { failedStage } : {}),
      error: errorMessage(error),
    };
  }
}

/**
 * Acquire, resolve, extract, filter, assemble and optionally compress, in
 * that order. The first stage to throw ends the run as failed.
 */
export async function runBuildPipeline(config: PipelineConfig, options: BuildOptions): Promise<RunResult> {
  const stats = emptyStats();
  stats.totalGenomes = options.accessions.length;

  const stages: Stage[] = [
    acquireStage(options.accessions),
    ...(options.resolvers ?? []),
    extractStage,
    integrityStage,
    assembleStage,
  ];
  if (options.compress ?? true) {
    stages.push(compressStage);
  }

  return runStages(config, "build", stages, stats);
}

/** Compresses an already assembled artifact. No other stage runs. */
export async function runCompression(context: RunContext): Promise<RunResult> {
  return runStages(context, "compress", [compressStage], emptyStats());
}
