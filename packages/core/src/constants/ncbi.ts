export const NCBI_DATASETS_URL = "https://api.ncbi.nlm.nih.gov/datasets/v2alpha";

export const NCBI_RATE_LIMITS = {
  anonymous: { requests: 3, perSeconds: 1 },
  withApiKey: { requests: 10, perSeconds: 1 },
} as const;

export const SEQUENCE_ANNOTATION_TYPE = "GENOME_FASTA";

export function genomeDownloadUrl(baseUrl: string, accession: string): string {
  const id = encodeURIComponent(accession);
  return `${baseUrl}/genome/accession/${id}/download?include_annotation_type=${SEQUENCE_ANNOTATION_TYPE}&filename=${id}.zip`;
}
