export * from "./config";
export {
  cleanup,
  consoleFormat,
  createLogger,
  defaultLoggerOptions,
} from "./logger";
export type { ArmoryLogger, LoggerOptions, LogMeta, LogMethod } from "./logger";
export { default as logger } from "./logger";
