import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify"

import { PlanStateError, PlanValidationError } from "../errors.js"
import type { Executor } from "../scheduler/executor.js"
import { type DecomposedStep, type Plan, reflectOnPlan, summarizePlan } from "../scheduler/plan.js"
import type { TaskScheduler } from "../scheduler/scheduler.js"

interface PlanParams {
  id: string
}

interface CreatePlanBody {
  goal: string
  steps?: DecomposedStep[]
}

interface CancelPlanBody {
  reason?: string
}

export interface PlanRouteDeps {
  scheduler: TaskScheduler
  executor: Executor
}

const planParams = {
  type: "object",
  properties: {
    id: { type: "string", format: "uuid" },
  },
  required: ["id"],
} as const

const stepSchema = {
  type: "object",
  properties: {
    id: { type: "string", minLength: 1, maxLength: 100 },
    description: { type: "string", minLength: 1 },
    action: { type: "object", properties: { kind: { type: "string" } }, required: ["kind"] },
    name: { type: "string", minLength: 1 },
    dependencies: { type: "array", items: { type: "string" } },
    maxRetries: { type: "integer", minimum: 1, maximum: 100 },
  },
  required: ["description"],
} as const

export function planRoutes(deps: PlanRouteDeps) {
  const { scheduler, executor } = deps

  const notFound = (reply: FastifyReply, id: string) =>
    reply.status(404).send({ error: "not_found", message: `Plan ${id} not found` })

  return function register(app: FastifyInstance): void {
    /** Build a plan and run it in the background. */
    app.post<{ Body: CreatePlanBody }>(
      "/plans",
      {
        schema: {
          body: {
            type: "object",
            properties: {
              goal: { type: "string", minLength: 1, maxLength: 2000 },
              steps: { type: "array", items: stepSchema, maxItems: 500 },
            },
            required: ["goal"],
          },
        },
      },
      async (request: FastifyRequest<{ Body: CreatePlanBody }>, reply: FastifyReply) => {
        const { goal, steps } = request.body

        let plan: Plan
        try {
          plan = steps ? scheduler.buildPlan(goal, steps) : await scheduler.createPlan(goal)
        } catch (err) {
          if (err instanceof PlanValidationError) {
            return reply.status(400).send({ error: err.code, message: err.message })
          }
          throw err
        }

        scheduler.runPlan(plan, executor).catch((err: unknown) => {
          request.log.error({ err, planId: plan.id }, "Plan run failed")
        })

        return reply.status(202).send({ plan: scheduler.exportPlan(plan) })
      },
    )

    app.get("/plans", async (_request, reply) => {
      const plans = scheduler.listPlans().map((plan) => ({
        id: plan.id,
        goal: plan.goal,
        status: plan.status,
        createdAt: plan.createdAt,
        summary: summarizePlan(plan),
      }))
      return reply.status(200).send({ plans })
    })

    app.get<{ Params: PlanParams }>(
      "/plans/:id",
      { schema: { params: planParams } },
      async (request: FastifyRequest<{ Params: PlanParams }>, reply: FastifyReply) => {
        const plan = scheduler.getPlan(request.params.id)
        if (!plan) return notFound(reply, request.params.id)
        return reply.status(200).send({ plan: scheduler.exportPlan(plan) })
      },
    )

    app.get<{ Params: PlanParams }>(
      "/plans/:id/reflection",
      { schema: { params: planParams } },
      async (request: FastifyRequest<{ Params: PlanParams }>, reply: FastifyReply) => {
        const plan = scheduler.getPlan(request.params.id)
        if (!plan) return notFound(reply, request.params.id)
        return reply.status(200).send({ reflection: reflectOnPlan(plan) })
      },
    )

    app.post<{ Params: PlanParams; Body: CancelPlanBody }>(
      "/plans/:id/cancel",
      {
        schema: {
          params: planParams,
          body: {
            type: "object",
            properties: {
              reason: { type: "string", minLength: 1, maxLength: 1000 },
            },
          },
        },
      },
      async (
        request: FastifyRequest<{ Params: PlanParams; Body: CancelPlanBody }>,
        reply: FastifyReply,
      ) => {
        const plan = scheduler.getPlan(request.params.id)
        if (!plan) return notFound(reply, request.params.id)

        const cancelled = scheduler.cancelPlan(plan, request.body?.reason ?? "cancelled via API")
        if (!cancelled) {
          const err = new PlanStateError(plan.id, plan.status, "cancel")
          return reply.status(409).send({ error: err.code, message: err.message })
        }
        return reply.status(200).send({ summary: summarizePlan(plan) })
      },
    )
  }
}
