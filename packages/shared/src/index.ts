/**
 * Shared infrastructure for the latency lab services.
 */

export { loadSecretsFromFiles, type LoadSecretsOptions } from "./config/loadSecrets";

export {
  type LogEntry,
  Logger,
  type LoggerConfig,
  LogLevel,
  type LogMetadata,
} from "./logger/Logger";

export {
  type Clock,
  type ClockStamp,
  ManualClock,
  SystemClock,
  wallUsToIso,
} from "./utils/time/Clock";
