/**
 * Configuration module — validates environment variables at startup.
 *
 * All config is sourced from process.env and validated eagerly.
 * Invalid values throw immediately so the process fails fast.
 */

import { loadConfig as loadTelegramConfig, type TelegramConfig } from "@warden/adapter-telegram"
import {
  DEFAULT_CONFIRMATION_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PARALLELISM,
  DEFAULT_PLAN_CAPACITY,
  MAX_CONFIRMATION_TIMEOUT_MS,
  MAX_TIMER_DELAY_MS,
} from "@warden/shared"
import { isLogLevel, type TracingConfig } from "@warden/shared/tracing"
import type { LevelWithSilent } from "pino"

import { DEFAULT_RETRY_CONFIG, type RetryConfig } from "./scheduler/retry.js"

export interface Config {
  /** HTTP server port */
  port: number
  /** HTTP server host (bind address) */
  host: string
  /** Node environment (development, production, test) */
  nodeEnv: string
  /** Pino log level */
  logLevel: LevelWithSilent
  /** Policy JSON file; the bundled default policy when unset */
  policyFile?: string
  confirmationTimeoutMs: number
  maxConfirmationTimeoutMs: number
  /** Attempts a task gets before an executor failure is final */
  taskMaxRetries: number
  schedulerParallelism: number
  /** Finished plans kept before the oldest are forgotten */
  planCapacity: number
  /** Backoff between executor retries; immediate retries when unset */
  retry?: RetryConfig
  /** Files hashed at startup and checked for tampering */
  integrityFiles: string[]
  /** OpenTelemetry tracing configuration */
  tracing: TracingConfig
  channels: {
    telegram?: TelegramConfig
  }
}

/**
 * Load and validate configuration from environment variables.
 * Throws on values that are present but unusable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const logLevel = env.LOG_LEVEL ?? "info"
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}`)
  }

  const exporterType = env.OTEL_EXPORTER_TYPE ?? "otlp"
  if (exporterType !== "otlp" && exporterType !== "console" && exporterType !== "none") {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be "otlp", "console", or "none".`,
    )
  }

  const maxConfirmationTimeoutMs = parseIntOr(
    env.MAX_CONFIRMATION_TIMEOUT_MS,
    MAX_CONFIRMATION_TIMEOUT_MS,
  )
  if (maxConfirmationTimeoutMs < 1 || maxConfirmationTimeoutMs > MAX_TIMER_DELAY_MS) {
    throw new Error(
      `MAX_CONFIRMATION_TIMEOUT_MS must be between 1 and ${MAX_TIMER_DELAY_MS}, got ${maxConfirmationTimeoutMs}`,
    )
  }
  const confirmationTimeoutMs = parseIntOr(
    env.CONFIRMATION_TIMEOUT_MS,
    DEFAULT_CONFIRMATION_TIMEOUT_MS,
  )
  if (confirmationTimeoutMs <= 0 || confirmationTimeoutMs > maxConfirmationTimeoutMs) {
    throw new Error(
      `CONFIRMATION_TIMEOUT_MS must be between 1 and ${maxConfirmationTimeoutMs}, got ${confirmationTimeoutMs}`,
    )
  }

  const taskMaxRetries = parseIntOr(env.TASK_MAX_RETRIES, DEFAULT_MAX_RETRIES)
  if (taskMaxRetries < 1) {
    throw new Error("TASK_MAX_RETRIES must be at least 1")
  }
  const schedulerParallelism = parseIntOr(env.SCHEDULER_PARALLELISM, DEFAULT_PARALLELISM)
  if (schedulerParallelism < 1) {
    throw new Error("SCHEDULER_PARALLELISM must be at least 1")
  }
  const planCapacity = parseIntOr(env.PLAN_CAPACITY, DEFAULT_PLAN_CAPACITY)
  if (planCapacity < 1) {
    throw new Error("PLAN_CAPACITY must be at least 1")
  }

  // Channels are optional; the REST API is always available to approvers.
  const channels: Config["channels"] = {}
  if (env.TELEGRAM_BOT_TOKEN) {
    channels.telegram = loadTelegramConfig(env)
  }

  return {
    port: parseIntOr(env.PORT, 4000),
    host: env.HOST ?? "0.0.0.0",
    nodeEnv: env.NODE_ENV ?? "development",
    logLevel,
    policyFile: env.WARDEN_POLICY_FILE || undefined,
    confirmationTimeoutMs,
    maxConfirmationTimeoutMs,
    taskMaxRetries,
    schedulerParallelism,
    planCapacity,
    retry: parseRetry(env),
    integrityFiles: parseList(env.INTEGRITY_FILES),
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318",
      sampleRate: parseFloatOr(env.OTEL_SAMPLE_RATE, 1.0),
      serviceName: env.OTEL_SERVICE_NAME ?? "warden-control-plane",
      exporterType,
    },
    channels,
  }
}

function parseRetry(env: Record<string, string | undefined>): RetryConfig | undefined {
  if (env.RETRY_BASE_DELAY_MS === undefined) return undefined
  const baseDelayMs = parseIntOr(env.RETRY_BASE_DELAY_MS, DEFAULT_RETRY_CONFIG.baseDelayMs)
  return {
    ...DEFAULT_RETRY_CONFIG,
    baseDelayMs,
    maxDelayMs: Math.max(
      baseDelayMs,
      parseIntOr(env.RETRY_MAX_DELAY_MS, DEFAULT_RETRY_CONFIG.maxDelayMs),
    ),
  }
}

function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) return fallback
  return parsed
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return Math.max(0, Math.min(1, parsed))
}
