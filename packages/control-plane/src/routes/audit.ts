import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify"

import type { AuditLog } from "../audit/log.js"
import { DEFAULT_AUDIT_TAIL } from "../audit/log.js"

interface AuditQuery {
  limit?: number
  planId?: string
  taskId?: string
  requestId?: string
}

export interface AuditRouteDeps {
  auditLog: AuditLog
}

export function auditRoutes(deps: AuditRouteDeps) {
  const { auditLog } = deps

  return function register(app: FastifyInstance): void {
    /** Latest entries, optionally filtered to one plan, task or request. */
    app.get<{ Querystring: AuditQuery }>(
      "/audit",
      {
        schema: {
          querystring: {
            type: "object",
            properties: {
              limit: { type: "integer", minimum: 1, maximum: 10_000 },
              planId: { type: "string" },
              taskId: { type: "string" },
              requestId: { type: "string" },
            },
          },
        },
      },
      async (request: FastifyRequest<{ Querystring: AuditQuery }>, reply: FastifyReply) => {
        const { limit = DEFAULT_AUDIT_TAIL, planId, taskId, requestId } = request.query
        const filtered = planId !== undefined || taskId !== undefined || requestId !== undefined
        const entries = filtered
          ? auditLog.find({ planId, taskId, requestId }).slice(-limit)
          : auditLog.tail(limit)
        return reply.status(200).send({ entries, total: auditLog.size })
      },
    )

    app.get("/audit/export", async (_request, reply) => {
      return reply
        .status(200)
        .header("content-disposition", 'attachment; filename="audit-log.json"')
        .send(auditLog.exportAll())
    })

    app.get("/audit/verify", async (_request, reply) => {
      return reply.status(200).send(auditLog.verify({ full: true }))
    })
  }
}
