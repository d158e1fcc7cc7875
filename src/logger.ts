import pino, { type Logger as PinoLogger } from "pino";
import { HashMap, Layer, List, Logger, LogLevel } from "effect";
import type { LogLevelName } from "./config.js";

type PinoMethod = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const pinoMethod = (level: LogLevel.LogLevel): PinoMethod => {
  switch (level._tag) {
    case "Trace":
    case "All":
      return "trace";
    case "Debug":
      return "debug";
    case "Warning":
      return "warn";
    case "Error":
      return "error";
    case "Fatal":
      return "fatal";
    default:
      return "info";
  }
};

const effectLevel = (name: LogLevelName): LogLevel.LogLevel => {
  switch (name) {
    case "trace":
      return LogLevel.Trace;
    case "debug":
      return LogLevel.Debug;
    case "info":
      return LogLevel.Info;
    case "warn":
      return LogLevel.Warning;
    case "error":
      return LogLevel.Error;
  }
};

/**
 * Effect logger that forwards to pino. String parts become the message;
 * object parts and log annotations are merged into the structured fields.
 */
export const makePinoLogger = (log: PinoLogger) =>
  Logger.make(({ logLevel, message, annotations, spans, cause }) => {
    const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message];
    const text = parts.filter((p): p is string => typeof p === "string").join(" ");
    const fields: Record<string, unknown> = Object.fromEntries(HashMap.toEntries(annotations));
    for (const part of parts) {
      if (typeof part === "object" && part !== null) Object.assign(fields, part);
    }
    const spanNames = List.toArray(spans).map((span) => span.label);
    if (spanNames.length > 0) fields.spans = spanNames;
    if (cause._tag !== "Empty") fields.cause = cause;

    log[pinoMethod(logLevel)](fields, text);
  });

/** Replace Effect's default logger with pino on stderr, filtered at `level`. */
export const PinoLoggerLive = (level: LogLevelName, name = "github-repo-analyzer") => {
  const log = pino({ name, level }, pino.destination(2));
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, makePinoLogger(log)),
    Logger.minimumLogLevel(effectLevel(level)),
  );
};
