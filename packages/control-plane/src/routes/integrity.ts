import type { FastifyInstance } from "fastify"

import type { IntegrityChecker } from "../integrity/checker.js"

export interface IntegrityRouteDeps {
  checker?: IntegrityChecker
}

export function integrityRoutes(deps: IntegrityRouteDeps) {
  const { checker } = deps

  return function register(app: FastifyInstance): void {
    /** Re-hash the watched files against the startup baseline. */
    app.get("/integrity", async (_request, reply) => {
      if (!checker?.hasBaseline) {
        return reply.status(503).send({
          status: "unavailable",
          reason: "Integrity checking not configured",
        })
      }
      const report = await checker.verify()
      return reply.status(report.ok ? 200 : 409).send(report)
    })
  }
}
