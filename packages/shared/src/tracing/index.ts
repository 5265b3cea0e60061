/**
 * OpenTelemetry SDK initialization.
 *
 * Call `initTracing()` once before the application starts.
 * Call `shutdownTracing()` during graceful shutdown to flush buffered spans.
 *
 * When tracing is disabled the OTel API falls back to no-op
 * implementations, so span helpers stay cheap on the hot path.
 */

import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { resourceFromAttributes } from "@opentelemetry/resources"
import { NodeSDK } from "@opentelemetry/sdk-node"
import {
  AlwaysOnSampler,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  SimpleSpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"

export interface TracingConfig {
  /** Enable tracing (default: true) */
  enabled: boolean
  /** OTLP collector base endpoint (default: http://localhost:4318) */
  endpoint: string
  /** Sampling rate 0.0–1.0 (default: 1.0) */
  sampleRate: number
  /** Service name for resource attribution */
  serviceName: string
  /** Exporter type: otlp (production), console (dev), none (disabled) */
  exporterType: "otlp" | "console" | "none"
}

export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  enabled: true,
  endpoint: "http://localhost:4318",
  sampleRate: 1.0,
  serviceName: "warden-control-plane",
  exporterType: "otlp",
}

let sdk: NodeSDK | undefined

/**
 * Initialize the OpenTelemetry SDK. Must be called before any instrumented
 * code runs. Subsequent calls are no-ops.
 */
export function initTracing(config: Partial<TracingConfig> = {}): void {
  if (sdk) return

  const resolved: TracingConfig = { ...DEFAULT_TRACING_CONFIG, ...config }

  if (!resolved.enabled || resolved.exporterType === "none") {
    return
  }

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: resolved.serviceName,
    [ATTR_SERVICE_VERSION]: "0.1.0",
  })

  const sampler =
    resolved.sampleRate >= 1.0
      ? new AlwaysOnSampler()
      : new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(resolved.sampleRate) })

  const spanProcessor =
    resolved.exporterType === "console"
      ? new SimpleSpanProcessor(new ConsoleSpanExporter())
      : new BatchSpanProcessor(new OTLPTraceExporter({ url: `${resolved.endpoint}/v1/traces` }))

  sdk = new NodeSDK({
    resource,
    sampler,
    spanProcessors: [spanProcessor],
  })

  sdk.start()
}

/** Whether initTracing() started an SDK that has not been shut down yet. */
export function isTracingActive(): boolean {
  return sdk !== undefined
}

/**
 * Gracefully shut down the SDK, flushing any buffered spans.
 */
export async function shutdownTracing(): Promise<void> {
  if (!sdk) return
  try {
    await sdk.shutdown()
  } finally {
    sdk = undefined
  }
}

export { activeTraceIds, addSpanEvent, WardenAttributes, withSpan } from "./spans.js"
export {
  createLogger,
  isLogLevel,
  loggerSettings,
  silentLogger,
  type Logger,
  type LoggerOptions,
} from "./logger.js"
