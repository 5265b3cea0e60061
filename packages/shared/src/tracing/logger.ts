/**
 * Structured JSON logger with automatic trace context inclusion.
 *
 * Every log line carries traceId and spanId from the active OTel span
 * (if any), enabling log→trace correlation in observability backends.
 */

import {
  pino,
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions as PinoOptions,
} from "pino"

import { activeTraceIds } from "./spans.js"

export type { Logger }

export interface LoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LevelWithSilent
  /** Service name included in every log line. */
  serviceName?: string
  /** Where lines are written. Defaults to stdout. */
  destination?: DestinationStream
}

/**
 * Pino settings shared by every logger in the service, including the one
 * Fastify builds for request logging.
 */
export function loggerSettings(options: Omit<LoggerOptions, "destination"> = {}): PinoOptions {
  return {
    level: options.level ?? "info",
    base: { service: options.serviceName ?? "warden" },
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin() {
      return activeTraceIds() ?? {}
    },
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = loggerSettings(options)
  return options.destination ? pino(settings, options.destination) : pino(settings)
}

/** Logger that discards everything; the default for library components. */
export function silentLogger(): Logger {
  return pino({ level: "silent" })
}

export function isLogLevel(value: string): value is LevelWithSilent {
  return ["fatal", "error", "warn", "info", "debug", "trace", "silent"].includes(value)
}
