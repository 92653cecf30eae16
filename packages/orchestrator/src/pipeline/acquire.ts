import { copyFile, mkdir, rename, rm } from "node:fs/promises";
import {
  PARTIAL_SUFFIX,
  TransientFetchError,
  appendLine,
  backupArchivePath,
  errorMessage,
  fileSize,
} from "@refseq-db/core";
import { DOWNLOAD_RETRY_POLICY, withRetry } from "@refseq-db/ingest";
import { getEntry, upsertEntry } from "../state/index";
import { type AcquisitionResult, DEFAULT_PROGRESS_INTERVAL, type PipelineConfig } from "./stages";

/**
 * An existing archive counts as complete when it is non-empty and matches the
 * size recorded when it was written, if one was recorded.
 */
async function findCachedArchive(config: PipelineConfig, accession: string): Promise<number | null> {
  const archive = config.layout.archivePath(accession);
  const size = await fileSize(archive);
  if (size === null) return null;

  const recorded = getEntry(config.stateDb, accession)?.archiveBytes ?? null;
  if (size > 0 && (recorded === null || recorded === size)) {
    return size;
  }

  config.logger.warn({ accession, size, recorded }, "Discarding incomplete archive");
  await rm(archive, { force: true });
  return null;
}

async function restoreFromBackup(config: PipelineConfig, accession: string): Promise<number | null> {
  const { backupDir } = config.run;
  if (!backupDir) return null;

  const source = backupArchivePath(backupDir, accession);
  const size = await fileSize(source);
  if (!size) return null;

  const archive = config.layout.archivePath(accession);
  const partial = `${archive}${PARTIAL_SUFFIX}`;
  await copyFile(source, partial);
  await rename(partial, archive);
  return size;
}

interface AttemptCounter {
  attempts: number;
}

async function download(config: PipelineConfig, accession: string, counter: AttemptCounter): Promise<number> {
  const { fetcher, logger, signal } = config;
  const archive = config.layout.archivePath(accession);
  const partial = `${archive}${PARTIAL_SUFFIX}`;

  return withRetry(
    async (attempt) => {
      counter.attempts = attempt;
      logger.info({ accession, attempt }, "Download attempt");

      try {
        await fetcher.fetchArchive(accession, partial, signal);
      } catch (error) {
        await rm(partial, { force: true });
        throw error;
      }

      const size = await fileSize(partial);
      if (!size) {
        await rm(partial, { force: true });
        throw new TransientFetchError(accession, "Download appeared successful but file is missing or empty");
      }

      await rename(partial, archive);
      return size;
    },
    {
      policy: config.downloadRetry ?? DOWNLOAD_RETRY_POLICY,
      sleep: config.sleep,
      signal,
      onRetry: (attempt, delayMs, error) => {
        logger.warn(
          { accession, attempt, delaySeconds: delayMs / 1000, reason: error.message },
          `Attempt ${attempt} failed, retrying in ${delayMs / 1000} seconds`
        );
      },
    }
  );
}

async function acquireOne(config: PipelineConfig, accession: string): Promise<AcquisitionResult> {
  const { logger, signal } = config;

  const cached = await findCachedArchive(config, accession);
  if (cached !== null) {
    logger.info({ accession }, "Archive already exists, skipping");
    return { accession, status: "cached", attempts: 0, bytes: cached };
  }

  const restored = await restoreFromBackup(config, accession);
  if (restored !== null) {
    logger.info({ accession }, "Copied archive from backup directory");
    return { accession, status: "restored_from_backup", attempts: 0, bytes: restored };
  }

  const counter: AttemptCounter = { attempts: 0 };
  try {
    const bytes = await download(config, accession, counter);
    logger.info({ accession, bytes }, "Downloaded archive");
    return { accession, status: "downloaded", attempts: counter.attempts, bytes };
  } catch (error) {
    if (signal?.aborted) throw error;

    logger.error({ accession, attempts: counter.attempts, reason: errorMessage(error) }, "Failed all download attempts");
    await appendLine(config.layout.downloadFailuresPath, accession);
    return { accession, status: "failed", attempts: counter.attempts, bytes: null, error: errorMessage(error) };
  }
}

/**
 * Materializes one archive per accession: local copy, then backup copy, then
 * network fetch with retry. A failed accession is recorded and skipped.
 */
export async function* runAcquisitionStage(
  config: PipelineConfig,
  accessions: string[]
): AsyncGenerator<AcquisitionResult> {
  const { logger, run, signal } = config;
  const interval = config.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const total = accessions.length;
  let current = 0;
  const counts: Record<AcquisitionResult["status"], number> = {
    cached: 0,
    restored_from_backup: 0,
    downloaded: 0,
    failed: 0,
  };

  await mkdir(config.layout.genomesDir, { recursive: true });

  if (run.backupDir) {
    logger.info({ backupDir: run.backupDir }, "Using backup directory");
  }
  logger.info({ total }, "Beginning genome downloads");

  for (const accession of accessions) {
    signal?.throwIfAborted();
    current++;
    logger.debug({ accession, current, total }, "Processing genome");

    const result = await acquireOne(config, accession);
    counts[result.status]++;

    upsertEntry(config.stateDb, {
      accession,
      version: run.version,
      downloadStatus: result.status,
      archiveBytes: result.bytes,
      errorLog: result.error ?? null,
    });

    yield result;

    if (current % interval === 0) {
      logger.info(
        { current, total, failed: counts.failed },
        `Progress: ${current}/${total} genomes processed (${counts.failed} failed)`
      );
    }
  }

  logger.info({ total, ...counts }, "Download phase complete");
}
