import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import { ManifestError, isAssemblyAccession } from "@refseq-db/core";

export interface ManifestWarning {
  line: number;
  message: string;
  value?: string;
}

export interface ParsedManifest {
  accessions: string[];
  dataRows: number;
  warnings: ManifestWarning[];
}

/**
 * Parses a tab-separated accession list. The first line is a header; the
 * accession is the first column of every following line.
 */
export function parseManifest(text: string): ParsedManifest {
  const lines = text.split(/\r?\n/);
  const accessions: string[] = [];
  const warnings: ManifestWarning[] = [];
  let dataRows = 0;

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (line === "") continue;
    dataRows++;

    const firstColumn = line.split("\t")[0] ?? "";
    const accession = firstColumn.replace(/\s+/g, "");
    const lineNumber = i + 1;

    if (accession === "") {
      warnings.push({ line: lineNumber, message: "Empty accession, skipping" });
      continue;
    }

    if (/[\\/]/.test(accession)) {
      warnings.push({ line: lineNumber, message: "Accession contains a path separator, skipping", value: accession });
      continue;
    }

    if (!isAssemblyAccession(accession)) {
      warnings.push({
        line: lineNumber,
        message: "Value does not look like a GCF_/GCA_ assembly accession",
        value: accession,
      });
    }

    accessions.push(accession);
  }

  return { accessions, dataRows, warnings };
}

export async function readManifest(path: string, logger?: Logger): Promise<string[]> {
  if (!existsSync(path)) {
    throw new ManifestError(`Genome manifest not found: ${path}`, path);
  }

  const parsed = parseManifest(await readFile(path, "utf8"));

  if (parsed.dataRows === 0) {
    throw new ManifestError(`Genome manifest has no data rows (only header?): ${path}`, path);
  }

  for (const warning of parsed.warnings) {
    logger?.warn({ manifest: path, line: warning.line, value: warning.value }, warning.message);
  }

  logger?.info({ manifest: path, genomes: parsed.accessions.length }, "Loaded genome manifest");

  return parsed.accessions;
}
