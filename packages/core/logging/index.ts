export {
  createConsoleLogger,
  createSilentLogger,
  scopedLogger,
  describeError,
  type Logger,
  type LogData,
  type ConsoleLoggerOptions,
} from "./logger";
