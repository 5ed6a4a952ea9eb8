import { accessSync, constants as fsConstants, statSync, watch as fsWatch, type FSWatcher } from "fs";
import path from "path";
import type { Logger } from "pino";
import { FileNotFoundError, toError } from "../errors";
import { createLogger } from "../logger";
import type { ChangeListener, ChangeReason, FileWatcher, WatchHandle } from "./types";

interface Fingerprint {
  ino: number;
  size: number;
  mtimeMs: number;
  ctimeMs: number;
}

interface WatchedFile {
  watcher: FSWatcher;
  fingerprint: Fingerprint;
  listeners: Map<number, ChangeListener>;
}

export interface FsFileWatcherOptions {
  logger?: Logger;
}

type FileState = { ok: true; fingerprint: Fingerprint } | { ok: false; reason: ChangeReason };

/**
 * File watcher on top of `fs.watch`. One OS watch is shared per resolved path; listeners are
 * notified when the file is gone, unreadable, or its stat fingerprint moved.
 */
export class FsFileWatcher implements FileWatcher {
  private readonly files = new Map<string, WatchedFile>();
  private readonly log: Logger;
  private nextId = 0;

  constructor(options: FsFileWatcherOptions = {}) {
    this.log = options.logger ?? createLogger("fs-watcher");
  }

  watch(filePath: string, onChange: ChangeListener): WatchHandle {
    const resolved = path.resolve(filePath);
    let file = this.files.get(resolved);
    if (!file) {
      file = this.open(resolved);
      this.files.set(resolved, file);
    }
    const handle: WatchHandle = { id: ++this.nextId, path: resolved };
    file.listeners.set(handle.id, onChange);
    return handle;
  }

  unwatch(handle: WatchHandle): void {
    const file = this.files.get(handle.path);
    if (!file) {
      return;
    }
    file.listeners.delete(handle.id);
    if (file.listeners.size === 0) {
      file.watcher.close();
      this.files.delete(handle.path);
    }
  }

  close(): void {
    for (const file of this.files.values()) {
      file.watcher.close();
    }
    this.files.clear();
  }

  /**
   * Number of OS-level watches currently open.
   */
  get watchedPaths(): number {
    return this.files.size;
  }

  private open(resolved: string): WatchedFile {
    const state = inspectFile(resolved);
    if (!state.ok) {
      if (state.reason === "deleted") {
        throw new FileNotFoundError(resolved);
      }
      throw new Error(`Cannot watch ${resolved}: file is ${state.reason}`);
    }

    // Not persistent: an open watch must not keep the process alive.
    const watcher = fsWatch(resolved, { persistent: false }, () => {
      this.check(resolved);
    });
    watcher.on("error", (error: unknown) => {
      this.log.warn({ path: resolved, err: toError(error) }, "file watcher error");
      this.notify(resolved, "error");
    });

    return { watcher, fingerprint: state.fingerprint, listeners: new Map() };
  }

  private check(resolved: string): void {
    const file = this.files.get(resolved);
    if (!file) {
      return;
    }
    const state = inspectFile(resolved);
    if (state.ok) {
      if (sameFingerprint(file.fingerprint, state.fingerprint)) {
        return;
      }
      file.fingerprint = state.fingerprint;
      this.notify(resolved, "modified");
      return;
    }
    this.notify(resolved, state.reason);
  }

  private notify(resolved: string, reason: ChangeReason): void {
    const file = this.files.get(resolved);
    if (!file) {
      return;
    }
    // Listeners usually unwatch themselves, so iterate over a copy.
    for (const listener of Array.from(file.listeners.values())) {
      listener(resolved, reason);
    }
  }
}

function inspectFile(resolved: string): FileState {
  try {
    const stats = statSync(resolved);
    if (!stats.isFile()) {
      return { ok: false, reason: "deleted" };
    }
    accessSync(resolved, fsConstants.R_OK);
    return {
      ok: true,
      fingerprint: { ino: stats.ino, size: stats.size, mtimeMs: stats.mtimeMs, ctimeMs: stats.ctimeMs }
    };
  } catch (error: unknown) {
    const code = (error as NodeJS.ErrnoException).code;
    return { ok: false, reason: code === "ENOENT" || code === "ENOTDIR" ? "deleted" : "unreadable" };
  }
}

function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
  return a.ino === b.ino && a.size === b.size && a.mtimeMs === b.mtimeMs && a.ctimeMs === b.ctimeMs;
}

export const createFsFileWatcher = (options?: FsFileWatcherOptions): FsFileWatcher => new FsFileWatcher(options);
