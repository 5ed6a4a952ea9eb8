export type CacheErrorCode =
  | "INVALID_ARGUMENT"
  | "FILE_NOT_FOUND"
  | "TYPE_MISMATCH"
  | "CACHE_DISPOSED"
  | "INVALID_CONFIG";

export class CacheError extends Error {
  readonly code: CacheErrorCode;

  constructor(code: CacheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidArgumentError extends CacheError {
  readonly argument: string;

  constructor(argument: string, reason: string, options?: { cause?: unknown }) {
    super("INVALID_ARGUMENT", `${argument} ${reason}`, options);
    this.argument = argument;
  }
}

export class FileNotFoundError extends CacheError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super("FILE_NOT_FOUND", `Dependency file not found: ${path}`, options);
    this.path = path;
  }
}

export class TypeMismatchError extends CacheError {
  readonly key: string;
  readonly expected: string;
  readonly actual: string;

  constructor(key: string, expected: string, actual: string) {
    super("TYPE_MISMATCH", `Cached value for "${key}" is ${actual}, expected ${expected}`);
    this.key = key;
    this.expected = expected;
    this.actual = actual;
  }
}

export class CacheDisposedError extends CacheError {
  constructor() {
    super("CACHE_DISPOSED", "Cache provider has been disposed");
  }
}

export class CacheConfigError extends CacheError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export const isCacheError = (error: unknown): error is CacheError => error instanceof CacheError;

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  try {
    return new Error(JSON.stringify(error));
  } catch {
    return new Error("Unknown error");
  }
}
