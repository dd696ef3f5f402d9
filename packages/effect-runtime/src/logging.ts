/**
 * Structured logging and tracing integration.
 *
 * Provides a console logger that prints log annotations after the message,
 * a log-level parser for CLI flags, and a span helper.
 */
import { Effect, HashMap, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  const ann = [...HashMap.toEntries(annotations)].map(([k, v]) => `${k}=${String(v)}`).join(" ");
  const line = ann ? `[${ts}] ${lvl} ${msg} (${ann})` : `[${ts}] ${lvl} ${msg}`;
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) console.error(line);
  else console.log(line);
});

/** Swap the default logger for `prettyLogger` and filter below `level`. */
export function loggingLayer(level: LogLevel.LogLevel) {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}
