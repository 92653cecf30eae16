import { describe, test, expect } from "vitest";
import { isAssemblyAccession, parseAccession, stripExtension, toBareAccession } from "./accession";

describe("parseAccession", () => {
  test("parses a RefSeq accession with version", () => {
    expect(parseAccession("GCF_000001405.40")).toEqual({
      prefix: "GCF",
      digits: "000001405",
      version: 40,
    });
  });

  test("parses a GenBank accession", () => {
    expect(parseAccession("GCA_000002035.4")?.prefix).toBe("GCA");
  });

  test("defaults missing version to 1", () => {
    expect(parseAccession("GCF_000005845")?.version).toBe(1);
  });

  test("returns null for other identifiers", () => {
    expect(parseAccession("SRR123456")).toBeNull();
    expect(parseAccession("GCF_abc.1")).toBeNull();
    expect(parseAccession("")).toBeNull();
  });
});

describe("isAssemblyAccession", () => {
  test("accepts both prefixes", () => {
    expect(isAssemblyAccession("GCF_000005845.2")).toBe(true);
    expect(isAssemblyAccession("GCA_000005845.2")).toBe(true);
  });

  test("rejects surrounding whitespace", () => {
    expect(isAssemblyAccession(" GCF_000005845.2")).toBe(false);
  });
});

describe("toBareAccession", () => {
  test("strips directory and extension", () => {
    expect(toBareAccession("./genomes/GCF_000005845.2.fna")).toBe("GCF_000005845.2");
  });

  test("keeps the version dot", () => {
    expect(toBareAccession("GCF_000005845.2.fna")).toBe("GCF_000005845.2");
  });

  test("leaves names without the extension alone", () => {
    expect(toBareAccession("GCF_000005845.2")).toBe("GCF_000005845.2");
  });
});

describe("stripExtension", () => {
  test("returns the stem when the extension matches", () => {
    expect(stripExtension("GCF_1.1.zip", ".zip")).toBe("GCF_1.1");
  });

  test("returns null when it does not", () => {
    expect(stripExtension("GCF_1.1.zip.part", ".zip")).toBeNull();
  });
});
