export interface ParsedAccession {
  prefix: "GCF" | "GCA";
  digits: string;
  version: number;
}
