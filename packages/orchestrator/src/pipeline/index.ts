export * from "./stages";
export * from "./acquire";
export * from "./extract";
export * from "./run";
