export * from "./types";
export * from "./memory-cache-provider";
