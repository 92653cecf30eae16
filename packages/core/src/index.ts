export * from "./types/pipeline";
export * from "./types/genome";
export * from "./constants/layout";
export * from "./constants/ncbi";
export * from "./errors";
export * from "./utils/accession";
export * from "./utils/timestamp";
export * from "./utils/files";
