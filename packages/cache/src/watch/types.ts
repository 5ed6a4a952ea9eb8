export type ChangeReason = "modified" | "deleted" | "unreadable" | "error";

export type ChangeListener = (path: string, reason: ChangeReason) => void;

export interface WatchHandle {
  readonly id: number;
  readonly path: string;
}

export interface FileWatcher {
  watch(path: string, onChange: ChangeListener): WatchHandle;
  unwatch(handle: WatchHandle): void;
  close(): void;
}
