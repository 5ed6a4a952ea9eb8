import { accessSync, constants as fsConstants, statSync } from "fs";
import path from "path";
import type { Logger } from "pino";
import { parseCacheConfig, type CacheConfigInput, type LogLevel } from "../config";
import {
  CacheConfigError,
  CacheDisposedError,
  FileNotFoundError,
  TypeMismatchError,
  toError
} from "../errors";
import { compilePattern, hasMeaningfulData, requireNonEmpty, requireTtlMinutes, requireValue } from "../guards";
import { createLogger } from "../logger";
import { createMemoryStore } from "../store/memory-store";
import type { Store } from "../store/types";
import { describeValue, type ValueType } from "../value-types";
import { createFsFileWatcher } from "../watch/fs-watcher";
import type { ChangeReason, FileWatcher, WatchHandle } from "../watch/types";
import type { CacheEntry, CacheLookup, CacheProvider } from "./types";

const MS_PER_MINUTE = 60_000;

export interface MemoryCacheProviderOptions extends CacheConfigInput {
  /**
   * Backing store. When omitted a `MemoryStore` bounded by `maxEntries` is created.
   */
  store?: Store;
  /**
   * Watcher for file dependencies. An injected watcher is left open on `dispose()`.
   */
  watcher?: FileWatcher;
  logger?: Logger;
  /**
   * Epoch-millisecond clock used for expiry.
   */
  clock?: () => number;
}

export class MemoryCacheProvider implements CacheProvider {
  private readonly store: Store;
  private readonly watcher: FileWatcher;
  private readonly ownsWatcher: boolean;
  private readonly clock: () => number;
  private readonly log: Logger;
  private readonly watches = new Map<string, WatchHandle>();
  private readonly stopEvictionListener: (() => void) | null;
  private disposed = false;

  constructor(options: MemoryCacheProviderOptions = {}) {
    if (options.store && options.maxEntries !== undefined) {
      throw new CacheConfigError("maxEntries only applies to the default store");
    }
    const config = parseCacheConfig({ maxEntries: options.maxEntries, logLevel: options.logLevel });

    this.log = createLogger("memory-cache-provider", undefined, options.logger);
    if (config.logLevel) {
      this.log.level = config.logLevel;
    }
    this.store = options.store ?? createMemoryStore({ maxEntries: config.maxEntries });
    this.ownsWatcher = !options.watcher;
    this.watcher = options.watcher ?? this.createOwnedWatcher(options.logger, config.logLevel);
    this.clock = options.clock ?? Date.now;
    this.stopEvictionListener =
      this.store.onEvict?.((entry) => {
        this.releaseWatch(entry.key);
        this.log.debug({ key: entry.key }, "cache entry evicted");
      }) ?? null;
  }

  get<TValue, TFallback>(key: string, type: ValueType<TValue, TFallback>): TValue | TFallback {
    const result = this.lookup(key, type);
    switch (result.status) {
      case "found":
        return result.value;
      case "not-found":
        return type.fallback;
      case "type-mismatch":
        throw new TypeMismatchError(key, result.expected, result.actual);
    }
  }

  lookup<TValue, TFallback>(key: string, type: ValueType<TValue, TFallback>): CacheLookup<TValue> {
    this.ensureOpen();
    const entry = this.liveEntry(requireNonEmpty(key, "key"));
    if (!entry) {
      return { status: "not-found" };
    }
    const { value } = entry;
    if (!type.matches(value)) {
      return { status: "type-mismatch", expected: type.name, actual: describeValue(value) };
    }
    return { status: "found", value };
  }

  isSet(key: string): boolean {
    this.ensureOpen();
    return this.liveEntry(requireNonEmpty(key, "key")) !== undefined;
  }

  set(key: string, value: unknown, ttlMinutes: number): void;
  set(key: string, value: unknown, dependencyFilePath: string): void;
  set(key: string, value: unknown, retention: number | string): void {
    this.applySet(key, value, retention);
  }

  remove(key: string): void {
    this.ensureOpen();
    const checkedKey = requireNonEmpty(key, "key");
    this.discard(checkedKey);
    this.log.debug({ key: checkedKey }, "cache entry removed");
  }

  removeByPattern(pattern: string): void {
    this.ensureOpen();
    const regex = compilePattern(pattern, "pattern");
    let removed = 0;
    for (const key of this.store.keys()) {
      if (regex.test(key)) {
        this.discard(key);
        removed += 1;
      }
    }
    this.log.debug({ pattern: regex.source, removed }, "cache entries removed by pattern");
  }

  getAsync<TValue, TFallback>(key: string, type: ValueType<TValue, TFallback>): Promise<TValue | TFallback> {
    return Promise.resolve(this.get(key, type));
  }

  lookupAsync<TValue, TFallback>(key: string, type: ValueType<TValue, TFallback>): Promise<CacheLookup<TValue>> {
    return Promise.resolve(this.lookup(key, type));
  }

  isSetAsync(key: string): Promise<boolean> {
    return Promise.resolve(this.isSet(key));
  }

  setAsync(key: string, value: unknown, ttlMinutes: number): Promise<void>;
  setAsync(key: string, value: unknown, dependencyFilePath: string): Promise<void>;
  setAsync(key: string, value: unknown, retention: number | string): Promise<void> {
    this.applySet(key, value, retention);
    return Promise.resolve();
  }

  removeAsync(key: string): Promise<void> {
    this.remove(key);
    return Promise.resolve();
  }

  removeByPatternAsync(pattern: string): Promise<void> {
    this.removeByPattern(pattern);
    return Promise.resolve();
  }

  /**
   * Drops expired and invalidated entries still held by the store. Returns how many were dropped.
   */
  purgeExpired(): number {
    this.ensureOpen();
    let purged = 0;
    for (const key of this.store.keys()) {
      const entry = this.store.lookup(key);
      if (entry && !this.isLive(entry)) {
        this.discard(key);
        purged += 1;
      }
    }
    return purged;
  }

  clear(): void {
    this.ensureOpen();
    for (const handle of this.watches.values()) {
      this.watcher.unwatch(handle);
    }
    this.watches.clear();
    this.store.clear();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.clear();
    this.stopEvictionListener?.();
    if (this.ownsWatcher) {
      this.watcher.close();
    }
    this.disposed = true;
  }

  private applySet(key: string, value: unknown, retention: number | string): void {
    this.ensureOpen();
    const checkedKey = requireNonEmpty(key, "key");
    requireValue(value, "value");

    if (typeof retention === "string") {
      this.setWithDependency(checkedKey, value, retention);
      return;
    }

    const ttlMinutes = requireTtlMinutes(retention, "ttlMinutes");
    if (!hasMeaningfulData(value)) {
      this.log.debug({ key: checkedKey }, "skipping empty cache value");
      return;
    }
    const now = this.clock();
    this.install({
      key: checkedKey,
      value,
      retention: { kind: "absolute", expiresAt: now + ttlMinutes * MS_PER_MINUTE },
      createdAt: now
    });
  }

  private setWithDependency(key: string, value: unknown, dependencyFilePath: string): void {
    const dependency = requireNonEmpty(dependencyFilePath, "dependencyFilePath");
    const resolved = path.resolve(dependency);
    assertFileExists(dependency, resolved);
    if (!hasMeaningfulData(value)) {
      this.log.debug({ key }, "skipping empty cache value");
      return;
    }

    // Open the new watch before the old one is released so a shared path stays watched.
    const handle = this.openWatch(key, dependency, resolved);
    this.install(
      {
        key,
        value,
        retention: { kind: "file", path: resolved },
        createdAt: this.clock()
      },
      handle
    );
  }

  private openWatch(key: string, dependency: string, resolved: string): WatchHandle {
    let handle: WatchHandle | null = null;
    const onChange = (_changedPath: string, reason: ChangeReason) => {
      if (handle) {
        this.invalidateDependency(key, handle, reason);
      }
    };
    try {
      handle = this.watcher.watch(resolved, onChange);
      return handle;
    } catch (error: unknown) {
      if (!(error instanceof FileNotFoundError)) {
        this.log.warn({ key, path: resolved, err: toError(error) }, "could not watch dependency file");
      }
      throw new FileNotFoundError(dependency, { cause: error });
    }
  }

  private invalidateDependency(key: string, handle: WatchHandle, reason: ChangeReason): void {
    if (this.watches.get(key) !== handle) {
      // The entry was replaced or removed since this watch was opened.
      this.watcher.unwatch(handle);
      return;
    }
    const entry = this.store.lookup(key);
    if (entry) {
      entry.invalidated = true;
    }
    this.discard(key);
    this.log.info({ key, path: handle.path, reason }, "dependency changed, cache entry invalidated");
  }

  private install(entry: CacheEntry<unknown>, handle?: WatchHandle): void {
    try {
      this.store.insert(entry.key, entry);
    } catch (error: unknown) {
      if (handle) {
        this.watcher.unwatch(handle);
      }
      throw error;
    }
    this.releaseWatch(entry.key);
    if (handle) {
      this.watches.set(entry.key, handle);
    }
    this.log.debug({ key: entry.key, retention: entry.retention.kind }, "cache entry set");
  }

  private liveEntry(key: string): CacheEntry<unknown> | undefined {
    const entry = this.store.lookup(key);
    if (!entry) {
      return undefined;
    }
    if (this.isLive(entry)) {
      return entry;
    }
    this.discard(key);
    return undefined;
  }

  private isLive(entry: CacheEntry<unknown>): boolean {
    if (entry.invalidated) {
      return false;
    }
    if (entry.retention.kind === "absolute") {
      return this.clock() < entry.retention.expiresAt;
    }
    return true;
  }

  private discard(key: string): void {
    this.store.remove(key);
    this.releaseWatch(key);
  }

  private releaseWatch(key: string): void {
    const handle = this.watches.get(key);
    if (!handle) {
      return;
    }
    this.watches.delete(key);
    this.watcher.unwatch(handle);
  }

  private createOwnedWatcher(parent: Logger | undefined, level: LogLevel | undefined): FileWatcher {
    const watcherLog = createLogger("fs-watcher", undefined, parent);
    if (level) {
      watcherLog.level = level;
    }
    return createFsFileWatcher({ logger: watcherLog });
  }

  private ensureOpen(): void {
    if (this.disposed) {
      throw new CacheDisposedError();
    }
  }
}

function assertFileExists(dependency: string, resolved: string): void {
  let isFile = false;
  try {
    isFile = statSync(resolved).isFile();
    accessSync(resolved, fsConstants.R_OK);
  } catch (error: unknown) {
    throw new FileNotFoundError(dependency, { cause: error });
  }
  if (!isFile) {
    throw new FileNotFoundError(dependency);
  }
}

export const createMemoryCacheProvider = (options?: MemoryCacheProviderOptions): MemoryCacheProvider =>
  new MemoryCacheProvider(options);
