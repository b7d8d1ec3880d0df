export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./schemas";
export * from "./ingest";
export * from "./mapping/mapper";
export * from "./validation/validator";
export * from "./export";
export * from "./store/intermediate";
export * from "./pipeline";
export { getLogger } from "./logger";
export type { Level, LogContext, LogFormat, LogOptions, Logger } from "./logger";
