import type { ArchiveFetcher, FetcherConfig } from "../fetcher";
import { NcbiDatasetsFetcher } from "./ncbi-datasets";

export { NcbiDatasetsFetcher } from "./ncbi-datasets";

export type FetcherName = "ncbi-datasets";

export function createFetcher(name: FetcherName, config: Partial<FetcherConfig> = {}): ArchiveFetcher {
  switch (name) {
    case "ncbi-datasets":
      return new NcbiDatasetsFetcher(config);
    default:
      throw new Error(`Unsupported fetcher: ${String(name)}`);
  }
}
