export * from "./commands";
export * from "./config";
export * from "./logging";
export * from "./pipeline/index";
export * from "./state/index";
