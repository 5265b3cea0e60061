/**
 * TaskScheduler — drives a plan's task graph to completion.
 *
 * One loop per running plan. Each iteration dispatches runnable tasks up
 * to the parallelism limit and waits for any of them to finish (or for
 * the plan to be cancelled). Every task passes through the confirmation
 * gateway before its executor is called. Task failures are recorded on
 * the task and in the audit log; they never reject the run.
 */

import {
  DEFAULT_CONFIRMATION_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PARALLELISM,
  DEFAULT_PLAN_CAPACITY,
  type AuditActor,
  type PlanSummary,
} from "@warden/shared"
import { actionDetails } from "@warden/shared/actions"
import { addSpanEvent, silentLogger, WardenAttributes, withSpan } from "@warden/shared/tracing"
import type { Logger } from "pino"

import type { AuditLog } from "../audit/log.js"
import type { ConfirmationGateway } from "../confirmation/gateway.js"
import {
  approvalError,
  DependencyStalledError,
  ExecutorFailureError,
  InvalidTaskTransitionError,
  isRetryable,
  PlanStateError,
  PlanValidationError,
} from "../errors.js"
import type { Decomposer } from "./decomposition.js"
import type { Executor } from "./executor.js"
import {
  buildPlan,
  dependenciesCompleted,
  exportPlan,
  findStalledTasks,
  logExecution,
  nextRunnableTask,
  summarizePlan,
  transitionTask,
  type DecomposedStep,
  type Plan,
  type PlanExport,
  type Task,
} from "./plan.js"
import { calculateRetryDelay, sleep, type RetryConfig } from "./retry.js"
import { assertValidTaskTransition, isOpenStatus } from "./state-machine.js"

export interface TaskSchedulerDeps {
  gateway: ConfirmationGateway
  auditLog: AuditLog
  decomposer?: Decomposer
  logger?: Logger
  /** Per-task confirmation timeout. */
  confirmationTimeoutMs?: number
  /** Tasks of one plan dispatched at the same time. */
  parallelism?: number
  maxRetries?: number
  /** Backoff between executor retries; retries are immediate without it. */
  retry?: RetryConfig
  /** Finished plans kept for lookups; the oldest are forgotten beyond it. */
  planCapacity?: number
  now?: () => Date
}

interface ActiveRun {
  abort: AbortController
  inFlight: Map<string, Promise<void>>
}

export class TaskScheduler {
  private readonly gateway: ConfirmationGateway
  private readonly auditLog: AuditLog
  private readonly decomposer?: Decomposer
  private readonly logger: Logger
  private readonly confirmationTimeoutMs: number
  private readonly parallelism: number
  private readonly maxRetries: number
  private readonly retry?: RetryConfig
  private readonly planCapacity: number
  private readonly now: () => Date
  private readonly plans = new Map<string, Plan>()
  private readonly runs = new Map<string, ActiveRun>()

  constructor(deps: TaskSchedulerDeps) {
    this.gateway = deps.gateway
    this.auditLog = deps.auditLog
    this.decomposer = deps.decomposer
    this.logger = deps.logger ?? silentLogger()
    this.confirmationTimeoutMs = deps.confirmationTimeoutMs ?? DEFAULT_CONFIRMATION_TIMEOUT_MS
    this.parallelism = Math.max(1, deps.parallelism ?? DEFAULT_PARALLELISM)
    this.maxRetries = deps.maxRetries ?? DEFAULT_MAX_RETRIES
    this.retry = deps.retry
    this.planCapacity = Math.max(1, deps.planCapacity ?? DEFAULT_PLAN_CAPACITY)
    this.now = deps.now ?? (() => new Date())
  }

  // ──────────────────────────────────────────────────
  // Plans
  // ──────────────────────────────────────────────────

  /** Build and register a plan from explicit steps (or the fallback skeleton). */
  buildPlan(goal: string, steps?: readonly DecomposedStep[]): Plan {
    const plan = buildPlan(goal, steps, { maxRetries: this.maxRetries, now: this.now() })
    this.register(plan)
    return plan
  }

  /**
   * Build a plan for a goal using the decomposer. A failing decomposer, an
   * empty decomposition or one that does not validate falls back to the
   * generic skeleton.
   */
  async createPlan(goal: string): Promise<Plan> {
    const steps = await this.decompose(goal)
    if (steps) {
      try {
        return this.buildPlan(goal, steps)
      } catch (err) {
        if (!(err instanceof PlanValidationError)) throw err
        this.logger.warn({ err, goal }, "Decomposition did not validate, using fallback steps")
      }
    }
    return this.buildPlan(goal)
  }

  getPlan(planId: string): Plan | undefined {
    return this.plans.get(planId)
  }

  listPlans(): Plan[] {
    return [...this.plans.values()]
  }

  isRunning(planId: string): boolean {
    return this.runs.has(planId)
  }

  exportPlan(plan: Plan): PlanExport {
    return exportPlan(plan)
  }

  private register(plan: Plan): void {
    this.plans.set(plan.id, plan)
    this.evictFinished()
  }

  /** Forget the oldest finished plans once more than the capacity are held. */
  private evictFinished(): void {
    let excess = this.plans.size - this.planCapacity
    if (excess <= 0) return
    for (const [planId, plan] of this.plans) {
      if (excess === 0) break
      const finished = plan.status === "COMPLETED" || plan.status === "CANCELLED"
      if (!finished || this.runs.has(planId)) continue
      this.plans.delete(planId)
      excess--
      this.logger.debug({ planId }, "Finished plan evicted")
    }
  }

  private async decompose(goal: string): Promise<DecomposedStep[] | undefined> {
    if (!this.decomposer) return undefined
    try {
      const steps = await this.decomposer.decompose(goal)
      if (steps.length === 0) {
        this.logger.warn({ goal }, "Decomposer returned no steps, using fallback steps")
        return undefined
      }
      return steps
    } catch (err) {
      this.logger.warn({ err, goal }, "Decomposition failed, using fallback steps")
      return undefined
    }
  }

  // ──────────────────────────────────────────────────
  // Execution
  // ──────────────────────────────────────────────────

  /**
   * Run a PENDING plan until it is drained, cancelled or stalled. Tasks
   * that can never run because a dependency failed are cancelled with
   * reason "stalled" and reported in the summary.
   */
  async runPlan(plan: Plan, executor: Executor): Promise<PlanSummary> {
    if (plan.status !== "PENDING") {
      throw new PlanStateError(plan.id, plan.status, "run")
    }
    this.register(plan)

    const run: ActiveRun = { abort: new AbortController(), inFlight: new Map() }
    this.runs.set(plan.id, run)
    const aborted = new Promise<void>((resolve) => {
      run.abort.signal.addEventListener("abort", () => resolve(), { once: true })
    })

    const startedAt = this.now()
    plan.status = "RUNNING"
    plan.startedAt = startedAt.toISOString()
    logExecution(plan, null, "running", `${plan.tasks.length} tasks`, startedAt)
    this.auditLog.append({
      actor: "scheduler",
      action: `Plan: ${plan.goal}`,
      outcome: "plan_started",
      planId: plan.id,
    })
    this.logger.info({ planId: plan.id, tasks: plan.tasks.length }, "Plan started")

    try {
      while (!run.abort.signal.aborted) {
        this.promoteRunnable(plan)
        while (run.inFlight.size < this.parallelism) {
          const task = nextRunnableTask(plan)
          if (!task) break
          const execution = this.executeTask(plan, task, executor, run.abort.signal)
          run.inFlight.set(
            task.id,
            execution.finally(() => run.inFlight.delete(task.id)),
          )
        }
        if (run.inFlight.size === 0) break
        await Promise.race([...run.inFlight.values(), aborted])
      }
    } finally {
      this.runs.delete(plan.id)
    }

    if (plan.status === "RUNNING") {
      this.finish(plan)
    }
    this.evictFinished()
    return summarizePlan(plan)
  }

  /**
   * Run one attempt of a task: confirmation, then the executor. Denial,
   * timeout and blocking fail the task for good; executor errors send it
   * back to PENDING while attempts remain.
   */
  async executeTask(
    plan: Plan,
    task: Task,
    executor: Executor,
    signal: AbortSignal = new AbortController().signal,
  ): Promise<void> {
    if (!dependenciesCompleted(plan, task)) {
      throw new InvalidTaskTransitionError(task.id, task.status, "IN_PROGRESS")
    }
    // Refuse before touching the task so a rejected call leaves it as it was
    assertValidTaskTransition(task.id, task.status, "IN_PROGRESS")

    const startedAt = this.now()
    task.attempts += 1
    task.startedAt = startedAt.toISOString()
    task.failureReason = null
    transitionTask(plan, task, "IN_PROGRESS", `attempt ${task.attempts}`, startedAt)
    this.auditLog.append({
      actor: "scheduler",
      action: task.description,
      outcome: "started",
      planId: plan.id,
      taskId: task.id,
    })

    await withSpan(
      "warden.task.execute",
      async (span) => {
        const outcome = await this.gateway.requestConfirmation(
          task.actionName,
          task.description,
          actionDetails(task.action),
          {
            timeoutMs: this.confirmationTimeoutMs,
            actor: "scheduler",
            planId: plan.id,
            taskId: task.id,
            signal,
          },
        )
        span.setAttribute(WardenAttributes.RISK_TIER, outcome.tier)
        if (!stillInProgress(task)) return

        if (!outcome.approved) {
          const reason = outcome.failureReason ?? "denied"
          const err = approvalError(reason, outcome.reason, outcome.timeoutMs)
          span.setAttribute(WardenAttributes.ERROR_CODE, err.code)
          task.error = `not approved: ${outcome.reason}`
          task.failureReason = reason
          task.completedAt = this.now().toISOString()
          transitionTask(plan, task, reason === "cancelled" ? "CANCELLED" : "FAILED", task.error)
          this.logger.info({ err, planId: plan.id, taskId: task.id }, "Task not approved")
          return
        }

        let result: unknown
        try {
          result = await executor.execute(task, { planId: plan.id, attempt: task.attempts, signal })
        } catch (cause) {
          if (!stillInProgress(task)) return
          const err = new ExecutorFailureError(cause)
          span.setAttribute(WardenAttributes.ERROR_CODE, err.code)
          await this.handleExecutorFailure(plan, task, err, signal)
          return
        }

        if (!stillInProgress(task)) {
          this.logger.debug(
            { planId: plan.id, taskId: task.id },
            "Discarding result of cancelled task",
          )
          return
        }
        const completedAt = this.now()
        task.result = result
        task.completedAt = completedAt.toISOString()
        transitionTask(plan, task, "COMPLETED", "success", completedAt)
        this.auditLog.append({
          actor: "scheduler",
          action: task.description,
          riskTier: outcome.tier,
          outcome: "completed",
          planId: plan.id,
          taskId: task.id,
        })
      },
      {
        [WardenAttributes.PLAN_ID]: plan.id,
        [WardenAttributes.TASK_ID]: task.id,
        [WardenAttributes.TASK_ATTEMPT]: task.attempts,
        [WardenAttributes.ACTION_KIND]: task.action.kind,
      },
    )
  }

  private async handleExecutorFailure(
    plan: Plan,
    task: Task,
    err: ExecutorFailureError,
    signal: AbortSignal,
  ): Promise<void> {
    const retrying = isRetryable(err) && task.attempts < task.maxRetries
    task.error = err.message
    task.failureReason = "executor"
    if (!retrying) task.completedAt = this.now().toISOString()
    transitionTask(plan, task, "FAILED", err.message)
    this.auditLog.append({
      actor: "scheduler",
      action: task.description,
      outcome: "failed",
      error: err.message,
      planId: plan.id,
      taskId: task.id,
    })
    this.logger.warn(
      { err, planId: plan.id, taskId: task.id, attempt: task.attempts, retrying },
      "Task failed",
    )
    if (!retrying) return

    const delayMs = this.retry ? calculateRetryDelay(task.attempts - 1, this.retry) : 0
    addSpanEvent("warden.task.retry_scheduled", {
      [WardenAttributes.TASK_ATTEMPT]: task.attempts,
      delayMs,
    })
    if (delayMs > 0) {
      await sleep(delayMs, signal)
      if (task.status !== "FAILED") return
    }
    task.failureReason = null
    transitionTask(plan, task, "PENDING", `retry ${task.attempts + 1} of ${task.maxRetries}`)
    this.auditLog.append({
      actor: "scheduler",
      action: task.description,
      outcome: "retrying",
      error: err.message,
      planId: plan.id,
      taskId: task.id,
    })
  }

  private promoteRunnable(plan: Plan): void {
    for (const task of plan.tasks) {
      if (task.status === "PENDING" && dependenciesCompleted(plan, task)) {
        transitionTask(plan, task, "RUNNABLE", "dependencies completed", this.now())
      }
    }
  }

  private finish(plan: Plan): void {
    for (const { task, blockedBy } of findStalledTasks(plan)) {
      const err = new DependencyStalledError(task.id, blockedBy)
      task.error = err.message
      task.failureReason = "stalled"
      task.completedAt = this.now().toISOString()
      transitionTask(plan, task, "CANCELLED", err.message)
      this.auditLog.append({
        actor: "scheduler",
        action: task.description,
        outcome: "stalled",
        error: err.message,
        planId: plan.id,
        taskId: task.id,
      })
      this.logger.warn({ err, planId: plan.id, taskId: task.id }, "Task stalled")
    }

    const completedAt = this.now()
    plan.status = "COMPLETED"
    plan.completedAt = completedAt.toISOString()
    const summary = summarizePlan(plan)
    const message = `${summary.completed}/${summary.total} tasks completed`
    logExecution(plan, null, "completed", message, completedAt)
    this.auditLog.append({
      actor: "scheduler",
      action: `Plan: ${plan.goal}`,
      outcome: "plan_completed",
      ...(summary.completed < summary.total && {
        error: `${summary.failed} failed, ${summary.stalled} stalled`,
      }),
      planId: plan.id,
    })
    this.logger.info({ ...summary }, "Plan completed")
  }

  // ──────────────────────────────────────────────────
  // Cancellation
  // ──────────────────────────────────────────────────

  /**
   * Cancel every open task, force-deny the plan's pending confirmations
   * and stop its loop. Results of executor calls still in flight are
   * discarded when they return. Returns false if the plan already ended.
   */
  cancelPlan(plan: Plan, reason = "plan cancelled", actor: AuditActor = "user"): boolean {
    if (plan.status === "COMPLETED" || plan.status === "CANCELLED") return false

    const run = this.runs.get(plan.id)
    const now = this.now()
    for (const task of plan.tasks) {
      const awaitingRetry = task.status === "FAILED" && run?.inFlight.has(task.id) === true
      if (!isOpenStatus(task.status) && !awaitingRetry) continue
      task.error = reason
      task.failureReason = "cancelled"
      task.completedAt = now.toISOString()
      transitionTask(plan, task, "CANCELLED", reason, now)
    }

    const denied = this.gateway.cancelWhere((r) => r.planId === plan.id, reason, "scheduler")

    plan.status = "CANCELLED"
    plan.completedAt = now.toISOString()
    logExecution(plan, null, "cancelled", reason, now)
    this.auditLog.append({
      actor,
      action: `Plan: ${plan.goal}`,
      outcome: "plan_cancelled",
      error: reason,
      planId: plan.id,
    })
    run?.abort.abort(reason)
    this.logger.info({ planId: plan.id, deniedConfirmations: denied, reason }, "Plan cancelled")
    this.evictFinished()
    return true
  }

  /** Cancel every running plan, e.g. on shutdown. */
  cancelAll(reason: string): number {
    let count = 0
    for (const planId of [...this.runs.keys()]) {
      const plan = this.plans.get(planId)
      if (plan && this.cancelPlan(plan, reason, "system")) count++
    }
    return count
  }
}

function stillInProgress(task: Task): boolean {
  return task.status === "IN_PROGRESS"
}
