export * from "./integrity";
export * from "./assemble";
export * from "./compress";
export * from "./release";
