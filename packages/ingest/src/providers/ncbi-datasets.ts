import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { NCBI_DATASETS_URL, NCBI_RATE_LIMITS, TransientFetchError, genomeDownloadUrl } from "@refseq-db/core";
import type { ArchiveFetcher, FetcherConfig } from "../fetcher";
import { RateLimiter } from "../rate-limiter";

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

export class NcbiDatasetsFetcher implements ArchiveFetcher {
  readonly name = "ncbi-datasets";
  private readonly rateLimiter: RateLimiter;
  private readonly baseUrl: string;
  private readonly apiKey: string | null;
  private readonly timeoutMs: number;

  constructor(config: Partial<FetcherConfig> = {}) {
    this.baseUrl = (config.baseUrl ?? NCBI_DATASETS_URL).replace(/\/+$/, "");
    this.apiKey = config.apiKey ?? null;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateLimiter = new RateLimiter(
      config.rateLimit ?? (this.apiKey ? NCBI_RATE_LIMITS.withApiKey : NCBI_RATE_LIMITS.anonymous)
    );
  }

  async fetchArchive(accession: string, destPath: string, signal?: AbortSignal): Promise<void> {
    await this.rateLimiter.acquire(signal);

    const headers: Record<string, string> = { Accept: "application/zip" };
    if (this.apiKey) headers["api-key"] = this.apiKey;

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const res = await fetch(genomeDownloadUrl(this.baseUrl, accession), {
      headers,
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    if (!res.ok) {
      throw new TransientFetchError(accession, `NCBI Datasets error: ${res.status}`, res.status);
    }

    if (!res.body) {
      throw new TransientFetchError(accession, "NCBI Datasets returned an empty body", res.status);
    }

    await pipeline(Readable.fromWeb(res.body), createWriteStream(destPath));
  }
}
