import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TransientFetchError } from "@refseq-db/core";
import { NcbiDatasetsFetcher } from "./ncbi-datasets";
import { createFetcher } from "./index";

describe("NcbiDatasetsFetcher", () => {
  let dir: string;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "refseq-fetch-"));
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    rmSync(dir, { recursive: true, force: true });
  });

  test("streams the archive body to the destination", async () => {
    fetchMock.mockResolvedValue(new Response("PK-archive-bytes", { status: 200 }));
    const fetcher = new NcbiDatasetsFetcher({ baseUrl: "https://datasets.test/v2" });
    const dest = join(dir, "GCF_000005845.2.zip.part");

    await fetcher.fetchArchive("GCF_000005845.2", dest);

    expect(readFileSync(dest, "utf8")).toBe("PK-archive-bytes");
  });

  test("requests the FASTA download for the accession", async () => {
    fetchMock.mockResolvedValue(new Response("x", { status: 200 }));
    const fetcher = new NcbiDatasetsFetcher({ baseUrl: "https://datasets.test/v2/" });

    await fetcher.fetchArchive("GCA_000001.1", join(dir, "a.zip"));

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(
      "https://datasets.test/v2/genome/accession/GCA_000001.1/download?include_annotation_type=GENOME_FASTA&filename=GCA_000001.1.zip"
    );
    expect(init?.headers).toEqual({ Accept: "application/zip" });
  });

  test("sends the API key header when configured", async () => {
    fetchMock.mockResolvedValue(new Response("x", { status: 200 }));
    const fetcher = new NcbiDatasetsFetcher({ apiKey: "test-key" });

    await fetcher.fetchArchive("GCF_1.1", join(dir, "b.zip"));

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ Accept: "application/zip", "api-key": "test-key" });
  });

  test("rejects non-2xx responses as transient failures", async () => {
    fetchMock.mockResolvedValue(new Response("not found", { status: 404 }));
    const fetcher = new NcbiDatasetsFetcher();

    const error = await fetcher.fetchArchive("GCF_404.1", join(dir, "c.zip")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientFetchError);
    if (error instanceof TransientFetchError) {
      expect(error.status).toBe(404);
      expect(error.accession).toBe("GCF_404.1");
    }
  });

  test("rejects a response without a body", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
    const fetcher = new NcbiDatasetsFetcher();

    await expect(fetcher.fetchArchive("GCF_2.1", join(dir, "d.zip"))).rejects.toThrow(
      "NCBI Datasets returned an empty body"
    );
  });
});

describe("createFetcher", () => {
  test("creates the NCBI Datasets fetcher", () => {
    expect(createFetcher("ncbi-datasets").name).toBe("ncbi-datasets");
  });
});
