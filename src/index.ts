export * from "./core/lines";
export {
  type Config,
  configSchema,
  type LineReaderOptions,
  lineReaderOptionsSchema,
  loadConfig,
  type ResolvedLineReaderOptions,
} from "./config/schema";
export { createLogger, type Logger, setLogLevel } from "./core/logging/logger";
