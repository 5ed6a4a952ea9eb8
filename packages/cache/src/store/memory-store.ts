import type { CacheEntry } from "../cache/types";
import { DEFAULT_MAX_ENTRIES } from "../config";
import type { EvictionListener, Store } from "./types";

export interface MemoryStoreOptions {
  /**
   * Upper bound on stored entries. Inserting past it evicts the least recently used key.
   */
  maxEntries?: number;
}

export class MemoryStore implements Store {
  private readonly entries = new Map<string, CacheEntry<unknown>>();
  private readonly listeners = new Set<EvictionListener>();
  private readonly maxEntries: number;

  constructor(options: MemoryStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
  }

  get size(): number {
    return this.entries.size;
  }

  insert(key: string, entry: CacheEntry<unknown>): void {
    // Re-inserting moves the key to the most recently used end.
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.evict(oldest.value);
    }
    this.entries.set(key, entry);
  }

  lookup(key: string): CacheEntry<unknown> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  contains(key: string): boolean {
    return this.entries.has(key);
  }

  remove(key: string): void {
    this.entries.delete(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }

  onEvict(listener: EvictionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private evict(key: string): void {
    const entry = this.entries.get(key);
    this.entries.delete(key);
    if (entry) {
      this.listeners.forEach((listener) => listener(entry));
    }
  }
}

export const createMemoryStore = (options?: MemoryStoreOptions): MemoryStore => new MemoryStore(options);
