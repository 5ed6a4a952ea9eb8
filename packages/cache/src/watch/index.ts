export * from "./types";
export * from "./fs-watcher";
