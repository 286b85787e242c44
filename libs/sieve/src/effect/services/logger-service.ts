import { Context, Effect, Layer, LogLevel, Logger } from "effect";

import type { RuntimeLogLevel } from "./config-service.js";

export interface LogContext {
  readonly [key: string]: unknown;
}

export interface LogEntry {
  readonly level: RuntimeLogLevel;
  readonly message: string;
  readonly context: LogContext;
}

export interface LoggerService {
  readonly debug: (message: string, context?: LogContext) => Effect.Effect<void>;
  readonly info: (message: string, context?: LogContext) => Effect.Effect<void>;
  readonly warn: (message: string, context?: LogContext) => Effect.Effect<void>;
  readonly error: (message: string, context?: LogContext) => Effect.Effect<void>;
}

export const LoggerServiceTag = Context.GenericTag<LoggerService>("@dumpsieve/effect/LoggerService");

const LOG_SEVERITY: Readonly<Record<RuntimeLogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const shouldLog = (level: RuntimeLogLevel, minimumLevel: RuntimeLogLevel) =>
  LOG_SEVERITY[level] >= LOG_SEVERITY[minimumLevel];

type LogWriter = (level: RuntimeLogLevel, message: string, context: LogContext) => Effect.Effect<void>;

const makeFilteredLogger = (minimumLevel: RuntimeLogLevel, write: LogWriter): LoggerService => {
  const logWithLevel =
    (level: RuntimeLogLevel) =>
    (message: string, context: LogContext = {}): Effect.Effect<void> =>
      shouldLog(level, minimumLevel) ? write(level, message, context) : Effect.void;

  return {
    debug: logWithLevel("debug"),
    info: logWithLevel("info"),
    warn: logWithLevel("warn"),
    error: logWithLevel("error"),
  };
};

export const EFFECT_LOG_LEVELS: Readonly<Record<RuntimeLogLevel, LogLevel.LogLevel>> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
};

const writeToEffectLog: LogWriter = (level, message, context) =>
  Effect.logWithLevel(EFFECT_LOG_LEVELS[level], message).pipe(Effect.annotateLogs(context));

export const makeLoggerService = (minimumLevel: RuntimeLogLevel): LoggerService =>
  makeFilteredLogger(minimumLevel, writeToEffectLog);

// The runtime's own minimum is lowered too, or Effect would drop debug entries.
export const makeLoggerLayer = (minimumLevel: RuntimeLogLevel): Layer.Layer<LoggerService> =>
  Layer.merge(
    Layer.sync(LoggerServiceTag, () => makeLoggerService(minimumLevel)),
    Logger.minimumLogLevel(EFFECT_LOG_LEVELS[minimumLevel]),
  );

/** Appends every entry at or above `minimumLevel` to `sink`. */
export const makeRecordingLoggerLayer = (
  sink: LogEntry[],
  minimumLevel: RuntimeLogLevel = "debug",
): Layer.Layer<LoggerService> =>
  Layer.sync(LoggerServiceTag, () =>
    makeFilteredLogger(minimumLevel, (level, message, context) =>
      Effect.sync(() => {
        sink.push({ level, message, context });
      }),
    ),
  );

export const deterministicTestLoggerLayer: Layer.Layer<LoggerService> = Layer.sync(
  LoggerServiceTag,
  () => makeFilteredLogger("debug", () => Effect.void),
);
