import type { CacheEntry } from "../cache/types";

export type EvictionListener = (entry: CacheEntry<unknown>) => void;

/**
 * Container that physically holds entries. Liveness is the provider's concern; a store only
 * decides when to drop entries to stay within its own capacity.
 */
export interface Store {
  insert(key: string, entry: CacheEntry<unknown>): void;
  lookup(key: string): CacheEntry<unknown> | undefined;
  contains(key: string): boolean;
  remove(key: string): void;
  keys(): string[];
  clear(): void;
  /**
   * Subscribe to capacity evictions. Returns an unsubscribe function.
   */
  onEvict?(listener: EvictionListener): () => void;
}
