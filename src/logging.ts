import { Layer, Logger, LogLevel } from "effect";
import type { LogConfigType, LogFormatType } from "./config/index.js";

const formatLoggers: Record<LogFormatType, Layer.Layer<never>> = {
  pretty: Logger.pretty,
  logfmt: Logger.logFmt,
  json: Logger.json,
};

/** Replaces the default logger with the configured format and threshold. */
export function loggerLayer(config: LogConfigType): Layer.Layer<never> {
  return Layer.merge(
    formatLoggers[config.format],
    Logger.minimumLogLevel(LogLevel.fromLiteral(config.level))
  );
}

/** Writes outside the runtime, before it exists or after it is gone. */
export function logStartup(message: string): void {
  process.stderr.write(`[presence] ${message}\n`);
}
