export * from "./loadConfig";
export * from "./template";
export * from "./types";
