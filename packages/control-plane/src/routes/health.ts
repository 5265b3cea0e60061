import type { ApproverChannelRegistry } from "@warden/shared/channels"
import type { FastifyInstance } from "fastify"

import type { AuditLog } from "../audit/log.js"
import type { ConfirmationGateway } from "../confirmation/gateway.js"
import type { TaskScheduler } from "../scheduler/scheduler.js"

export interface HealthRouteDeps {
  gateway: ConfirmationGateway
  scheduler: TaskScheduler
  auditLog: AuditLog
  channels: ApproverChannelRegistry
}

export function healthRoutes(deps: HealthRouteDeps) {
  const { gateway, scheduler, auditLog, channels } = deps

  return function register(app: FastifyInstance): void {
    /** Liveness: always 200 while the process is up. */
    app.get("/healthz", async (_request, reply) => {
      return reply.send({ status: "ok" })
    })

    /**
     * Overall health. Degraded when an approver channel fails its health
     * check or the audit chain no longer verifies.
     */
    app.get("/health", async (_request, reply) => {
      const channelHealth = Object.fromEntries(await channels.healthCheckAll())
      const channelsHealthy = Object.values(channelHealth).every(Boolean)
      const audit = auditLog.verify()
      const runningPlans = scheduler.listPlans().filter((p) => scheduler.isRunning(p.id)).length

      return reply.send({
        status: channelsHealthy && audit.valid ? "ok" : "degraded",
        channels: channelHealth,
        pendingConfirmations: gateway.pendingCount,
        runningPlans,
        audit: { entries: auditLog.size, chainValid: audit.valid },
      })
    })
  }
}
