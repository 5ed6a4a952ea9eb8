import type { ValueType } from "../value-types";

export interface AbsoluteExpiry {
  kind: "absolute";
  /**
   * Epoch milliseconds; the entry is invalid at and after this instant.
   */
  expiresAt: number;
}

export interface FileDependency {
  kind: "file";
  path: string;
}

export type RetentionPolicy = AbsoluteExpiry | FileDependency;

export interface CacheEntry<TValue> {
  key: string;
  value: TValue;
  retention: RetentionPolicy;
  createdAt: number;
  /**
   * Set once the dependency file changed. The entry stays unreadable until it is purged.
   */
  invalidated?: boolean;
}

export type CacheLookup<TValue> =
  | { status: "found"; value: TValue }
  | { status: "not-found" }
  | { status: "type-mismatch"; expected: string; actual: string };

export interface CacheProvider {
  get<TValue, TFallback>(key: string, type: ValueType<TValue, TFallback>): TValue | TFallback;
  lookup<TValue, TFallback>(key: string, type: ValueType<TValue, TFallback>): CacheLookup<TValue>;
  isSet(key: string): boolean;
  set(key: string, value: unknown, ttlMinutes: number): void;
  set(key: string, value: unknown, dependencyFilePath: string): void;
  remove(key: string): void;
  removeByPattern(pattern: string): void;

  getAsync<TValue, TFallback>(key: string, type: ValueType<TValue, TFallback>): Promise<TValue | TFallback>;
  lookupAsync<TValue, TFallback>(key: string, type: ValueType<TValue, TFallback>): Promise<CacheLookup<TValue>>;
  isSetAsync(key: string): Promise<boolean>;
  setAsync(key: string, value: unknown, ttlMinutes: number): Promise<void>;
  setAsync(key: string, value: unknown, dependencyFilePath: string): Promise<void>;
  removeAsync(key: string): Promise<void>;
  removeByPatternAsync(pattern: string): Promise<void>;
}
