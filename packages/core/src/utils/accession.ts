import type { ParsedAccession } from "../types/genome";
import { SEQUENCE_EXTENSION } from "../constants/layout";

const ACCESSION_PATTERN = /^(GC[AF])_(\d+)(?:\.(\d+))?$/;

/**
 * Parses a GenBank/RefSeq assembly accession. A missing `.version` means version 1.
 */
export function parseAccession(value: string): ParsedAccession | null {
  const match = ACCESSION_PATTERN.exec(value);
  if (!match) return null;

  const prefix = match[1] === "GCF" ? "GCF" : "GCA";
  const digits = match[2] ?? "";
  const version = match[3] ? Number.parseInt(match[3], 10) : 1;

  return { prefix, digits, version };
}

export function isAssemblyAccession(value: string): boolean {
  return parseAccession(value) !== null;
}

/** Strips directory and `.fna` extension: `./genomes/GCF_1.1.fna` -> `GCF_1.1`. */
export function toBareAccession(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  return base.endsWith(SEQUENCE_EXTENSION) ? base.slice(0, -SEQUENCE_EXTENSION.length) : base;
}

export function stripExtension(fileName: string, extension: string): string | null {
  return fileName.endsWith(extension) ? fileName.slice(0, -extension.length) : null;
}
