import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify"

import type { ConfirmationGateway } from "../confirmation/gateway.js"
import { DEFAULT_HISTORY_LIMIT } from "../confirmation/gateway.js"
import { ConfirmationNotFoundError, DuplicateResolutionError } from "../errors.js"
import type { RiskClassifier } from "../policy/classifier.js"

interface RequestParams {
  id: string
}

interface HistoryQuery {
  limit?: number
}

interface RespondBody {
  approved: boolean
  resolverId: string
  reason?: string
}

interface ClassifyBody {
  actionType: string
  description: string
  details?: Record<string, unknown>
}

export interface ConfirmationRouteDeps {
  gateway: ConfirmationGateway
  classifier: RiskClassifier
}

const idParams = {
  type: "object",
  properties: {
    id: { type: "string", format: "uuid" },
  },
  required: ["id"],
} as const

export function confirmationRoutes(deps: ConfirmationRouteDeps) {
  const { gateway, classifier } = deps

  return function register(app: FastifyInstance): void {
    /** Requests currently waiting for an approver. */
    app.get("/confirmations", async (_request, reply) => {
      return reply.status(200).send({ requests: gateway.listPending() })
    })

    app.get<{ Querystring: HistoryQuery }>(
      "/confirmations/history",
      {
        schema: {
          querystring: {
            type: "object",
            properties: {
              limit: { type: "integer", minimum: 1, maximum: 1000 },
            },
          },
        },
      },
      async (request: FastifyRequest<{ Querystring: HistoryQuery }>, reply: FastifyReply) => {
        const limit = request.query.limit ?? DEFAULT_HISTORY_LIMIT
        return reply.status(200).send({ requests: gateway.getHistory(limit) })
      },
    )

    app.get<{ Params: RequestParams }>(
      "/confirmations/:id",
      { schema: { params: idParams } },
      async (request: FastifyRequest<{ Params: RequestParams }>, reply: FastifyReply) => {
        const found = gateway.getRequest(request.params.id)
        if (!found) {
          const err = new ConfirmationNotFoundError(request.params.id)
          return reply.status(404).send({ error: err.code, message: err.message })
        }
        return reply.status(200).send({ request: found })
      },
    )

    app.post<{ Params: RequestParams; Body: RespondBody }>(
      "/confirmations/:id/respond",
      {
        schema: {
          params: idParams,
          body: {
            type: "object",
            properties: {
              approved: { type: "boolean" },
              resolverId: { type: "string", minLength: 1, maxLength: 200 },
              reason: { type: "string", maxLength: 1000 },
            },
            required: ["approved", "resolverId"],
            additionalProperties: false,
          },
        },
      },
      async (
        request: FastifyRequest<{ Params: RequestParams; Body: RespondBody }>,
        reply: FastifyReply,
      ) => {
        const { id } = request.params
        const { approved, resolverId, reason } = request.body
        const result = gateway.submitResponse(id, approved, resolverId, reason)

        if (result.success) {
          return reply.status(200).send({ request: result.request })
        }
        if (result.error === "already_resolved") {
          const err = new DuplicateResolutionError(id, result.request?.status ?? "resolved")
          return reply
            .status(409)
            .send({ error: err.code, message: err.message, request: result.request })
        }
        const err = new ConfirmationNotFoundError(id)
        return reply.status(404).send({ error: err.code, message: err.message })
      },
    )

    /** Dry-run the classifier without creating a request. */
    app.post<{ Body: ClassifyBody }>(
      "/classify",
      {
        schema: {
          body: {
            type: "object",
            properties: {
              actionType: { type: "string", minLength: 1 },
              description: { type: "string" },
              details: { type: "object" },
            },
            required: ["actionType", "description"],
          },
        },
      },
      async (request: FastifyRequest<{ Body: ClassifyBody }>, reply: FastifyReply) => {
        const { actionType, description, details } = request.body
        const classification = classifier.classify({ actionType, description, details })
        return reply.status(200).send({ classification })
      },
    )
  }
}
