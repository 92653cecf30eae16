import { copyFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  ARCHIVE_EXTENSION,
  ExtractionError,
  PARTIAL_SUFFIX,
  SEQUENCE_EXTENSION,
  StageFailure,
  appendLine,
  backupSequencePath,
  errorMessage,
  fileSize,
  listFilesWithExtension,
  stripExtension,
} from "@refseq-db/core";
import { EXTRACT_RETRY_POLICY, extractEntries, withRetry } from "@refseq-db/ingest";
import { upsertEntry } from "../state/index";
import { DEFAULT_PROGRESS_INTERVAL, type ExtractionResult, type PipelineConfig, STAGES } from "./stages";

async function restoreFromBackup(config: PipelineConfig, accession: string): Promise<number | null> {
  const { backupDir } = config.run;
  if (!backupDir) return null;

  const source = backupSequencePath(backupDir, accession);
  const size = await fileSize(source);
  if (!size) return null;

  const target = config.layout.sequencePath(accession);
  const partial = `${target}${PARTIAL_SUFFIX}`;
  await copyFile(source, partial);
  await rename(partial, target);
  return size;
}

async function extractOne(config: PipelineConfig, accession: string, archive: string): Promise<ExtractionResult> {
  const { logger, signal } = config;
  const target = config.layout.sequencePath(accession);

  const existing = await fileSize(target);
  if (existing) {
    logger.debug({ accession }, "Sequence file already exists, skipping");
    return { accession, status: "cached", attempts: 0, bytes: existing };
  }

  const restored = await restoreFromBackup(config, accession);
  if (restored !== null) {
    logger.info({ accession }, "Copied sequence file from backup directory");
    return { accession, status: "restored_from_backup", attempts: 0, bytes: restored };
  }

  const partial = `${target}${PARTIAL_SUFFIX}`;
  let attempts = 0;

  try {
    const bytes = await withRetry(
      async (attempt) => {
        attempts = attempt;
        const { bytes } = await extractEntries(archive, partial, SEQUENCE_EXTENSION);
        if (bytes === 0) {
          throw new ExtractionError(accession, `No ${SEQUENCE_EXTENSION} data in ${archive}`);
        }
        await rename(partial, target);
        return bytes;
      },
      {
        policy: config.extractRetry ?? EXTRACT_RETRY_POLICY,
        sleep: config.sleep,
        signal,
        onRetry: (attempt, _delayMs, error) => {
          logger.warn({ accession, attempt, reason: error.message }, "Extraction failed, retrying");
        },
      }
    );
    return { accession, status: "extracted", attempts, bytes };
  } catch (error) {
    if (signal?.aborted) throw error;

    // A zero-length target lets the integrity filter report the accession.
    await rm(partial, { force: true });
    await writeFile(target, "");
    logger.error({ accession, attempts, reason: errorMessage(error) }, "Failed to extract archive");
    await appendLine(config.layout.extractionFailuresPath, accession);
    return { accession, status: "failed", attempts, bytes: null, error: errorMessage(error) };
  }
}

/**
 * Produces one sequence file per archive in the genomes directory, in
 * accession order. Fails the stage when there is nothing to extract.
 */
export async function* runExtractionStage(config: PipelineConfig): AsyncGenerator<ExtractionResult> {
  const { layout, logger, run, signal } = config;
  const interval = config.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const archives = await listFilesWithExtension(layout.genomesDir, ARCHIVE_EXTENSION);

  if (archives.length === 0) {
    throw new StageFailure(STAGES.EXTRACT, `No archives found in ${layout.genomesDir}`);
  }

  const total = archives.length;
  let current = 0;
  let failed = 0;
  logger.info({ total }, "Extracting sequence files");

  for (const name of archives) {
    signal?.throwIfAborted();
    current++;

    const accession = stripExtension(name, ARCHIVE_EXTENSION) ?? name;
    const result = await extractOne(config, accession, join(layout.genomesDir, name));
    if (result.status === "failed") failed++;

    upsertEntry(config.stateDb, {
      accession,
      version: run.version,
      extractStatus: result.status,
      sequenceBytes: result.bytes,
      ...(result.error !== undefined ? { errorLog: result.error } : {}),
    });

    yield result;

    if (current % interval === 0) {
      logger.info({ current, total, failed }, `Progress: ${current}/${total} archives extracted (${failed} failed)`);
    }
  }
}
