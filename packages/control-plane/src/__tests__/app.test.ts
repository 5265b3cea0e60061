import type { ConfirmationRequestRecord } from "@warden/shared"
import {
  type ApproverChannel,
  ApproverChannelRegistry,
  type ApproverResponseHandler,
} from "@warden/shared/channels"
import { silentLogger } from "@warden/shared/tracing"
import Fastify from "fastify"
import { afterEach, describe, expect, it, vi } from "vitest"

import { type AppContext, type AppOptions, buildApp } from "../app.js"
import { loadConfig } from "../config.js"
import { parsePolicy } from "../policy/policy-config.js"
import { registerShutdownHandlers } from "../shutdown.js"

const UNKNOWN_ID = "00000000-0000-4000-8000-000000000000"

class StubChannel implements ApproverChannel {
  readonly channelType = "stub"
  healthy = true
  stopped = false
  handler?: ApproverResponseHandler

  async start(): Promise<void> {}
  async stop(): Promise<void> {
    this.stopped = true
  }
  async healthCheck(): Promise<boolean> {
    return this.healthy
  }
  async publish(_request: ConfirmationRequestRecord): Promise<void> {}
  onResponse(handler: ApproverResponseHandler): void {
    this.handler = handler
  }
}

const contexts: AppContext[] = []

async function setup(options: Partial<AppOptions> = {}): Promise<AppContext> {
  const ctx = await buildApp({
    config: loadConfig({ LOG_LEVEL: "silent" }),
    policy: parsePolicy({ blockedPatterns: ["format_drive"] }),
    logger: silentLogger(),
    ...options,
  })
  contexts.push(ctx)
  return ctx
}

afterEach(async () => {
  await Promise.all(contexts.splice(0).map((ctx) => ctx.app.close()))
})

/** Leave one WARNING request waiting on the gateway. */
function requestWrite(ctx: AppContext) {
  const outcome = ctx.gateway.requestConfirmation("file_write", "Write notes", {
    path: "/tmp/warden-notes.txt",
  })
  const [pending] = ctx.gateway.listPending()
  if (!pending) throw new Error("expected a pending request")
  return { outcome, pending }
}

describe("health routes", () => {
  it("GET /healthz answers while the process is up", async () => {
    const { app } = await setup()

    const res = await app.inject({ method: "GET", url: "/healthz" })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ status: "ok" })
  })

  it("GET /health reports channels, confirmations, plans and the audit chain", async () => {
    const channels = new ApproverChannelRegistry()
    channels.register(new StubChannel())
    const ctx = await setup({ channels })
    requestWrite(ctx)

    const res = await ctx.app.inject({ method: "GET", url: "/health" })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({
      status: "ok",
      channels: { stub: true },
      pendingConfirmations: 1,
      runningPlans: 0,
      audit: { entries: 1, chainValid: true },
    })
  })

  it("GET /health keeps reporting the chain as entries are added", async () => {
    const ctx = await setup()
    requestWrite(ctx)
    await ctx.app.inject({ method: "GET", url: "/health" })
    requestWrite(ctx)

    const res = await ctx.app.inject({ method: "GET", url: "/health" })
    const verify = await ctx.app.inject({ method: "GET", url: "/audit/verify" })

    expect(res.json()).toMatchObject({ audit: { entries: 2, chainValid: true } })
    expect(verify.json()).toEqual({ valid: true, checked: 2 })
  })

  it("GET /health is degraded when a channel fails its check", async () => {
    const channel = new StubChannel()
    channel.healthy = false
    const channels = new ApproverChannelRegistry()
    channels.register(channel)
    const { app } = await setup({ channels })

    const res = await app.inject({ method: "GET", url: "/health" })

    expect(res.json()).toMatchObject({ status: "degraded", channels: { stub: false } })
  })
})

describe("confirmation routes", () => {
  it("lists pending requests", async () => {
    const ctx = await setup()
    const { pending } = requestWrite(ctx)

    const res = await ctx.app.inject({ method: "GET", url: "/confirmations" })

    expect(res.statusCode).toBe(200)
    const body = res.json<{ requests: ConfirmationRequestRecord[] }>()
    expect(body.requests).toHaveLength(1)
    expect(body.requests[0]).toMatchObject({
      id: pending.id,
      actionType: "file_write",
      riskTier: "WARNING",
      status: "PENDING",
    })
  })

  it("approves a pending request and resolves the waiting caller", async () => {
    const ctx = await setup()
    const { outcome, pending } = requestWrite(ctx)

    const res = await ctx.app.inject({
      method: "POST",
      url: `/confirmations/${pending.id}/respond`,
      payload: { approved: true, resolverId: "alice" },
    })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toMatchObject({
      request: { id: pending.id, status: "APPROVED", resolvedBy: "alice", reason: "approved by alice" },
    })
    await expect(outcome).resolves.toMatchObject({ approved: true, status: "APPROVED" })
  })

  it("returns 409 for a second response", async () => {
    const ctx = await setup()
    const { pending } = requestWrite(ctx)
    const respond = (approved: boolean) =>
      ctx.app.inject({
        method: "POST",
        url: `/confirmations/${pending.id}/respond`,
        payload: { approved, resolverId: "alice" },
      })

    await respond(false)
    const res = await respond(true)

    expect(res.statusCode).toBe(409)
    expect(res.json()).toMatchObject({
      error: "already_resolved",
      message: `Confirmation request ${pending.id} is already DENIED`,
      request: { status: "DENIED" },
    })
  })

  it("returns 404 for an unknown request", async () => {
    const { app } = await setup()

    const res = await app.inject({
      method: "POST",
      url: `/confirmations/${UNKNOWN_ID}/respond`,
      payload: { approved: true, resolverId: "alice" },
    })

    expect(res.statusCode).toBe(404)
    expect(res.json()).toEqual({
      error: "not_found",
      message: `Confirmation request ${UNKNOWN_ID} not found`,
    })
  })

  it("rejects a response without a resolver", async () => {
    const ctx = await setup()
    const { pending } = requestWrite(ctx)

    const res = await ctx.app.inject({
      method: "POST",
      url: `/confirmations/${pending.id}/respond`,
      payload: { approved: true },
    })

    expect(res.statusCode).toBe(400)
    expect(ctx.gateway.pendingCount).toBe(1)
  })

  it("rejects an id that is not a uuid", async () => {
    const { app } = await setup()

    const res = await app.inject({ method: "GET", url: "/confirmations/not-a-uuid" })

    expect(res.statusCode).toBe(400)
  })

  it("serves single requests and history", async () => {
    const ctx = await setup()
    const { pending } = requestWrite(ctx)
    ctx.gateway.submitResponse(pending.id, false, "bob", "not today")

    const single = await ctx.app.inject({ method: "GET", url: `/confirmations/${pending.id}` })
    const history = await ctx.app.inject({ method: "GET", url: "/confirmations/history?limit=5" })

    expect(single.json()).toMatchObject({
      request: { status: "DENIED", resolvedBy: "bob", reason: "not today" },
    })
    const requests = history.json<{ requests: ConfirmationRequestRecord[] }>().requests
    expect(requests.map((r) => r.id)).toEqual([pending.id])
  })

  it("classifies an action without creating a request", async () => {
    const ctx = await setup()

    const res = await ctx.app.inject({
      method: "POST",
      url: "/classify",
      payload: { actionType: "program_launch", description: "Run format_drive C:" },
    })

    expect(res.statusCode).toBe(200)
    expect(res.json()).toMatchObject({
      classification: { tier: "BLOCKED", matchedPattern: "format_drive" },
    })
    expect(ctx.gateway.pendingCount).toBe(0)
    expect(ctx.auditLog.size).toBe(0)
  })
})

describe("audit routes", () => {
  it("returns the newest entries and the chain status", async () => {
    const ctx = await setup()
    const { pending } = requestWrite(ctx)
    ctx.gateway.submitResponse(pending.id, true, "alice")

    const list = await ctx.app.inject({ method: "GET", url: "/audit" })
    const filtered = await ctx.app.inject({
      method: "GET",
      url: `/audit?requestId=${pending.id}&limit=1`,
    })
    const verify = await ctx.app.inject({ method: "GET", url: "/audit/verify" })

    const body = list.json<{ entries: { outcome: string; actor: string }[]; total: number }>()
    expect(body.total).toBe(2)
    expect(body.entries.map((e) => [e.actor, e.outcome])).toEqual([
      ["system", "requested"],
      ["user", "approved"],
    ])
    expect(filtered.json<{ entries: { outcome: string }[] }>().entries).toEqual([
      expect.objectContaining({ outcome: "approved" }),
    ])
    expect(verify.json()).toEqual({ valid: true, checked: 2 })
  })

  it("exports the full log as a download", async () => {
    const ctx = await setup()
    requestWrite(ctx)

    const res = await ctx.app.inject({ method: "GET", url: "/audit/export" })

    expect(res.statusCode).toBe(200)
    expect(res.headers["content-disposition"]).toBe('attachment; filename="audit-log.json"')
    expect(res.json()).toEqual(ctx.auditLog.exportAll())
  })
})

describe("plan routes", () => {
  it("accepts a plan and runs it in the background", async () => {
    const { app } = await setup()

    const created = await app.inject({
      method: "POST",
      url: "/plans",
      payload: {
        goal: "Tidy downloads",
        steps: [
          { id: "list", description: "List files" },
          { id: "note", description: "Record the listing", dependencies: ["list"] },
        ],
      },
    })

    expect(created.statusCode).toBe(202)
    const { plan } = created.json<{ plan: { id: string; goal: string } }>()
    expect(plan.goal).toBe("Tidy downloads")

    await vi.waitFor(async () => {
      const res = await app.inject({ method: "GET", url: `/plans/${plan.id}` })
      expect(res.json()).toMatchObject({ plan: { status: "COMPLETED" } })
    })

    const res = await app.inject({ method: "GET", url: `/plans/${plan.id}` })
    const tasks = res.json<{ plan: { tasks: { status: string; result: unknown }[] } }>().plan.tasks
    expect(tasks).toEqual([
      expect.objectContaining({
        status: "COMPLETED",
        result: { dryRun: true, performed: "No side effect" },
      }),
      expect.objectContaining({ status: "COMPLETED" }),
    ])

    const reflection = await app.inject({ method: "GET", url: `/plans/${plan.id}/reflection` })
    expect(reflection.json()).toEqual({
      reflection: { total: 2, completed: 2, failed: 0, successRate: 1, recommendations: [] },
    })
  })

  it("falls back to the generic steps for a bare goal", async () => {
    const { app } = await setup()

    const res = await app.inject({ method: "POST", url: "/plans", payload: { goal: "backup photos" } })

    expect(res.statusCode).toBe(202)
    expect(res.json<{ plan: { tasks: unknown[] } }>().plan.tasks).toHaveLength(7)
  })

  it("rejects steps that do not form a valid plan", async () => {
    const { app } = await setup()

    const res = await app.inject({
      method: "POST",
      url: "/plans",
      payload: { goal: "g", steps: [{ id: "a", description: "A", dependencies: ["ghost"] }] },
    })

    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({
      error: "plan_invalid",
      message: "Task a depends on unknown task ghost",
    })
  })

  it("lists plans with their summaries", async () => {
    const ctx = await setup()
    const plan = ctx.scheduler.buildPlan("Sort mail", [{ description: "Open inbox" }])

    const res = await ctx.app.inject({ method: "GET", url: "/plans" })

    expect(res.json()).toEqual({
      plans: [
        {
          id: plan.id,
          goal: "Sort mail",
          status: "PENDING",
          createdAt: plan.createdAt,
          summary: expect.objectContaining({ total: 1, pending: 1 }),
        },
      ],
    })
  })

  it("returns 404 for an unknown plan", async () => {
    const { app } = await setup()

    const res = await app.inject({ method: "GET", url: `/plans/${UNKNOWN_ID}` })

    expect(res.statusCode).toBe(404)
    expect(res.json()).toEqual({ error: "not_found", message: `Plan ${UNKNOWN_ID} not found` })
  })

  it("cancels a running plan and denies its pending confirmation", async () => {
    const ctx = await setup()
    const created = await ctx.app.inject({
      method: "POST",
      url: "/plans",
      payload: {
        goal: "Save notes",
        steps: [
          {
            id: "write",
            description: "Write notes",
            action: { kind: "file_write", path: "/tmp/warden-notes.txt" },
          },
        ],
      },
    })
    const planId = created.json<{ plan: { id: string } }>().plan.id
    await vi.waitFor(() => expect(ctx.gateway.pendingCount).toBe(1))

    const cancel = () =>
      ctx.app.inject({ method: "POST", url: `/plans/${planId}/cancel`, payload: {} })
    const first = await cancel()

    expect(first.statusCode).toBe(200)
    expect(first.json()).toMatchObject({ summary: { status: "CANCELLED", cancelled: 1 } })
    expect(ctx.gateway.pendingCount).toBe(0)

    const second = await cancel()
    expect(second.statusCode).toBe(409)
    expect(second.json()).toEqual({
      error: "plan_state",
      message: `Cannot cancel plan ${planId}: it is CANCELLED`,
    })
  })
})

describe("integrity route", () => {
  it("is unavailable without watched files", async () => {
    const { app } = await setup()

    const res = await app.inject({ method: "GET", url: "/integrity" })

    expect(res.statusCode).toBe(503)
    expect(res.json()).toEqual({
      status: "unavailable",
      reason: "Integrity checking not configured",
    })
  })
})

describe("shutdown", () => {
  it("denies pending confirmations and stops channels on close", async () => {
    const channel = new StubChannel()
    const channels = new ApproverChannelRegistry()
    channels.register(channel)
    // Closed here, so kept out of the afterEach list
    const ctx = await buildApp({
      config: loadConfig({ LOG_LEVEL: "silent" }),
      policy: parsePolicy({}),
      logger: silentLogger(),
      channels,
    })
    const { outcome } = requestWrite(ctx)

    await ctx.app.close()

    await expect(outcome).resolves.toMatchObject({
      approved: false,
      failureReason: "cancelled",
      reason: "service shutting down",
    })
    expect(channel.stopped).toBe(true)
  })

  it("removes its process listeners when cleaned up", () => {
    const before = process.listenerCount("SIGTERM")
    const cleanup = registerShutdownHandlers({ fastify: Fastify(), exit: vi.fn() })

    expect(process.listenerCount("SIGTERM")).toBe(before + 1)
    cleanup()
    expect(process.listenerCount("SIGTERM")).toBe(before)
  })
})
