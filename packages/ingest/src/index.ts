export * from "./fetcher";
export * from "./retry";
export * from "./rate-limiter";
export * from "./providers/index";
export * from "./manifest/reader";
export * from "./archive/zip";
