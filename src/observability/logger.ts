import { Layer, Logger, LogLevel } from "effect";

const LOG_PREFIX = "[steamwatch]";

export function formatLogMessage(message: unknown): string {
  if (Array.isArray(message)) return message.map((part) => formatLogMessage(part)).join(" ");
  if (message instanceof Error) return message.message;
  if (typeof message === "string") return message;
  return String(message);
}

export function formatLogLine(level: string, message: unknown): string {
  return `${LOG_PREFIX} ${level.toLowerCase()}: ${formatLogMessage(message)}`;
}

const stderrLogger = Logger.make(({ logLevel, message }) => {
  process.stderr.write(`${formatLogLine(logLevel.label, message)}\n`);
});

/** Diagnostics on stderr; stdout stays reserved for status lines */
export const loggingLayer = (debug: boolean) =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, stderrLogger),
    Logger.minimumLogLevel(debug ? LogLevel.Debug : LogLevel.Info)
  );
