import type { RateLimiterConfig } from "./rate-limiter";

/**
 * Writes the sequence archive for one accession to `destPath`.
 * Rejects with a `TransientFetchError` when the remote reports a failure.
 */
export interface ArchiveFetcher {
  readonly name: string;
  fetchArchive(accession: string, destPath: string, signal?: AbortSignal): Promise<void>;
}

export interface FetcherConfig {
  baseUrl: string;
  apiKey: string | null;
  rateLimit: RateLimiterConfig;
  timeoutMs: number;
}
