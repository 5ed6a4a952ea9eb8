export * from "./cache";
export * from "./store";
export * from "./watch";
export * from "./errors";
export * from "./config";
export { valueTypes, instanceOf, schema, describeValue } from "./value-types";
export type { ValueType } from "./value-types";
export { logger, createLogger, resolveLogLevel } from "./logger";
export type { Logger } from "./logger";
