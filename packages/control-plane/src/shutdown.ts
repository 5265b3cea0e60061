/**
 * Graceful shutdown for the control plane.
 *
 * SIGTERM/SIGINT close Fastify, whose onClose hooks cancel running plans,
 * deny pending confirmations and stop the approver channels. Tracing is
 * flushed last. A deadline keeps a hung hook from blocking the exit.
 */

import type { FastifyInstance } from "fastify"

export interface ShutdownDeps {
  fastify: FastifyInstance
  /** Runs after Fastify has closed, e.g. to flush tracing. */
  onClosed?: () => Promise<void>
  deadlineMs?: number
  exit?: (code: number) => void
}

/** Maximum time to wait for Fastify's onClose hooks before forcing exit */
const CLOSE_DEADLINE_MS = 10_000

/**
 * Register SIGTERM and SIGINT handlers that perform graceful shutdown.
 * Returns a cleanup function to remove the signal listeners.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): () => void {
  const exit = deps.exit ?? ((code: number) => process.exit(code))
  const deadlineMs = deps.deadlineMs ?? CLOSE_DEADLINE_MS
  let shuttingDown = false

  const shutdown = async (signal: string, code: number): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true

    deps.fastify.log.info({ signal }, "Shutdown signal received, draining…")

    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        deps.fastify.log.warn({ deadlineMs }, "Shutdown deadline reached, forcing exit")
        resolve()
      }, deadlineMs)
    })

    await Promise.race([deps.fastify.close(), deadline]).catch((err: unknown) => {
      deps.fastify.log.error({ err }, "Error closing Fastify")
    })
    clearTimeout(timer)

    if (deps.onClosed) {
      await deps.onClosed().catch((err: unknown) => {
        deps.fastify.log.error({ err }, "Error during post-close hooks")
      })
    }

    deps.fastify.log.info("Shutdown complete")
    exit(code)
  }

  const onSigterm = (): void => void shutdown("SIGTERM", 0)
  const onSigint = (): void => void shutdown("SIGINT", 0)

  process.on("SIGTERM", onSigterm)
  process.on("SIGINT", onSigint)

  // Catch unhandled errors so the process doesn't die silently
  const onUnhandledRejection = (err: unknown): void => {
    deps.fastify.log.fatal({ err }, "Unhandled promise rejection, shutting down")
    void shutdown("unhandledRejection", 1)
  }
  const onUncaughtException = (err: unknown): void => {
    deps.fastify.log.fatal({ err }, "Uncaught exception, shutting down")
    void shutdown("uncaughtException", 1)
  }

  process.on("unhandledRejection", onUnhandledRejection)
  process.on("uncaughtException", onUncaughtException)

  return () => {
    process.removeListener("SIGTERM", onSigterm)
    process.removeListener("SIGINT", onSigint)
    process.removeListener("unhandledRejection", onUnhandledRejection)
    process.removeListener("uncaughtException", onUncaughtException)
  }
}
