/**
 * Plan and Task model: building a plan from decomposed steps, picking the
 * next runnable task, detecting stalls and summarizing progress.
 *
 * Everything here is synchronous and works on plain objects; the
 * scheduler owns the loop that drives them.
 */

import {
  DEFAULT_MAX_RETRIES,
  type PlanStatus,
  type PlanSummary,
  type TaskFailureReason,
  type TaskStatus,
} from "@warden/shared"
import {
  ActionValidationError,
  createAction,
  type Action,
  type ActionInput,
} from "@warden/shared/actions"
import { v7 as uuidv7 } from "uuid"

import { PlanValidationError } from "../errors.js"
import { assertValidTaskTransition } from "./state-machine.js"

export interface Task {
  id: string
  description: string
  action: Action
  /** Name the policy sees; defaults to the action kind. */
  actionName: string
  dependencies: string[]
  status: TaskStatus
  attempts: number
  maxRetries: number
  result: unknown
  error: string | null
  failureReason: TaskFailureReason | null
  startedAt: string | null
  completedAt: string | null
}

export interface ExecutionLogEntry {
  /** Null for plan-level events. */
  taskId: string | null
  event: string
  timestamp: string
  message: string
}

export interface Plan {
  id: string
  goal: string
  tasks: Task[]
  status: PlanStatus
  createdAt: string
  startedAt: string | null
  completedAt: string | null
  executionLog: ExecutionLogEntry[]
}

/** One step as produced by a decomposer or supplied by the caller. */
export interface DecomposedStep {
  id?: string
  description: string
  action?: ActionInput
  /** Action name for the policy, e.g. "modify_registry". */
  name?: string
  dependencies?: string[]
  maxRetries?: number
}

export interface BuildPlanOptions {
  id?: string
  maxRetries?: number
  now?: Date
}

export interface StalledTask {
  task: Task
  /** The FAILED or CANCELLED task that keeps it from ever running. */
  blockedBy: string
}

export interface PlanExport {
  id: string
  goal: string
  status: PlanStatus
  createdAt: string
  startedAt: string | null
  completedAt: string | null
  tasks: Task[]
  summary: PlanSummary
  executionLog: ExecutionLogEntry[]
}

export interface PlanReflection {
  total: number
  completed: number
  failed: number
  successRate: number
  recommendations: string[]
}

/** Generic skeleton used when no decomposition is available. */
export function fallbackSteps(goal: string): DecomposedStep[] {
  return [
    { description: `Analyze: ${goal}` },
    { description: `Plan: Break down ${goal} into smaller parts` },
    { description: `Setup: Prepare environment for ${goal}` },
    { description: `Execute: Perform main ${goal}` },
    { description: `Validate: Check if ${goal} completed` },
    { description: `Optimize: Improve ${goal} execution` },
    { description: `Document: Log results of ${goal}` },
  ]
}

/**
 * Wrap decomposed steps into a PENDING plan. Steps without an id get
 * `step_<index>`; without steps the fallback skeleton is used.
 *
 * Throws PlanValidationError for an empty goal, duplicate ids, invalid
 * actions, unknown dependencies and dependency cycles.
 */
export function buildPlan(
  goal: string,
  steps?: readonly DecomposedStep[],
  options: BuildPlanOptions = {},
): Plan {
  const trimmedGoal = goal.trim()
  if (trimmedGoal.length === 0) {
    throw new PlanValidationError("Plan goal must not be empty")
  }

  const source = steps && steps.length > 0 ? steps : fallbackSteps(trimmedGoal)
  const tasks = source.map((step, i) => toTask(step, i, options.maxRetries))

  const ids = new Set<string>()
  for (const task of tasks) {
    if (ids.has(task.id)) {
      throw new PlanValidationError(`Duplicate task id: ${task.id}`)
    }
    ids.add(task.id)
  }
  for (const task of tasks) {
    const unknown = task.dependencies.find((dep) => !ids.has(dep))
    if (unknown !== undefined) {
      throw new PlanValidationError(`Task ${task.id} depends on unknown task ${unknown}`)
    }
  }
  assertAcyclic(tasks)

  const createdAt = (options.now ?? new Date()).toISOString()
  return {
    id: options.id ?? uuidv7(),
    goal: trimmedGoal,
    tasks,
    status: "PENDING",
    createdAt,
    startedAt: null,
    completedAt: null,
    executionLog: [{ taskId: null, event: "created", timestamp: createdAt, message: trimmedGoal }],
  }
}

function toTask(step: DecomposedStep, index: number, maxRetries: number | undefined): Task {
  const id = step.id ?? `step_${index}`
  const description = step.description.trim()
  if (description.length === 0) {
    throw new PlanValidationError(`Task ${id} has an empty description`)
  }

  let action: Action
  try {
    action = step.action ? createAction(step.action) : { kind: "noop" }
  } catch (err) {
    if (err instanceof ActionValidationError) {
      throw new PlanValidationError(`Task ${id}: ${err.message}`)
    }
    throw err
  }

  return {
    id,
    description,
    action,
    actionName: step.name ?? action.kind,
    dependencies: [...new Set(step.dependencies ?? [])],
    status: "PENDING",
    attempts: 0,
    maxRetries: step.maxRetries ?? maxRetries ?? DEFAULT_MAX_RETRIES,
    result: null,
    error: null,
    failureReason: null,
    startedAt: null,
    completedAt: null,
  }
}

function assertAcyclic(tasks: readonly Task[]): void {
  const byId = new Map(tasks.map((t) => [t.id, t]))
  const state = new Map<string, "visiting" | "done">()

  const visit = (id: string, trail: string[]): void => {
    const current = state.get(id)
    if (current === "done") return
    if (current === "visiting") {
      const cycle = [...trail.slice(trail.indexOf(id)), id]
      throw new PlanValidationError(`Dependency cycle: ${cycle.join(" → ")}`)
    }
    state.set(id, "visiting")
    for (const dep of byId.get(id)?.dependencies ?? []) {
      visit(dep, [...trail, id])
    }
    state.set(id, "done")
  }

  for (const task of tasks) visit(task.id, [])
}

// ──────────────────────────────────────────────────
// Queries
// ──────────────────────────────────────────────────

export function getTask(plan: Plan, taskId: string): Task | undefined {
  return plan.tasks.find((t) => t.id === taskId)
}

export function dependenciesCompleted(plan: Plan, task: Task): boolean {
  return task.dependencies.every((dep) => getTask(plan, dep)?.status === "COMPLETED")
}

/**
 * First task, in insertion order, that is waiting and has every
 * dependency COMPLETED.
 */
export function nextRunnableTask(plan: Plan): Task | undefined {
  return plan.tasks.find(
    (t) => (t.status === "PENDING" || t.status === "RUNNABLE") && dependenciesCompleted(plan, t),
  )
}

/** Waiting tasks whose dependency chain contains a FAILED or CANCELLED task. */
export function findStalledTasks(plan: Plan): StalledTask[] {
  const blockers = new Map<string, string | null>()

  const blockerOf = (task: Task): string | null => {
    const cached = blockers.get(task.id)
    if (cached !== undefined) return cached
    let found: string | null = null
    if (task.status === "FAILED" || task.status === "CANCELLED") {
      found = task.id
    } else if (task.status !== "COMPLETED") {
      for (const depId of task.dependencies) {
        const dep = getTask(plan, depId)
        found = dep ? blockerOf(dep) : depId
        if (found !== null) break
      }
    }
    blockers.set(task.id, found)
    return found
  }

  const stalled: StalledTask[] = []
  for (const task of plan.tasks) {
    if (task.status !== "PENDING" && task.status !== "RUNNABLE") continue
    const blockedBy = blockerOf(task)
    if (blockedBy !== null) stalled.push({ task, blockedBy })
  }
  return stalled
}

export function summarizePlan(plan: Plan): PlanSummary {
  const count = (status: TaskStatus): number => plan.tasks.filter((t) => t.status === status).length
  const total = plan.tasks.length
  const completed = count("COMPLETED")

  const stalledTaskIds = [
    ...plan.tasks.filter((t) => t.failureReason === "stalled").map((t) => t.id),
    ...findStalledTasks(plan).map((s) => s.task.id),
  ]

  return {
    planId: plan.id,
    goal: plan.goal,
    status: plan.status,
    total,
    completed,
    failed: count("FAILED"),
    cancelled: count("CANCELLED"),
    pending: count("PENDING") + count("RUNNABLE"),
    inProgress: count("IN_PROGRESS"),
    stalled: stalledTaskIds.length,
    stalledTaskIds,
    progressPercent: total > 0 ? Math.floor((completed / total) * 100) : 0,
  }
}

/** JSON-serializable copy of the plan. */
export function exportPlan(plan: Plan): PlanExport {
  return {
    id: plan.id,
    goal: plan.goal,
    status: plan.status,
    createdAt: plan.createdAt,
    startedAt: plan.startedAt,
    completedAt: plan.completedAt,
    tasks: plan.tasks.map((t) => ({ ...t, dependencies: [...t.dependencies] })),
    summary: summarizePlan(plan),
    executionLog: plan.executionLog.map((e) => ({ ...e })),
  }
}

/** Post-run review of what went wrong and what to look at next. */
export function reflectOnPlan(plan: Plan): PlanReflection {
  const summary = summarizePlan(plan)
  const withReason = (...reasons: TaskFailureReason[]): number =>
    plan.tasks.filter((t) => t.failureReason !== null && reasons.includes(t.failureReason)).length

  const recommendations: string[] = []
  const exhausted = withReason("executor")
  if (exhausted > 0) {
    recommendations.push(`Investigate ${exhausted} task(s) that failed after every retry`)
  }
  const notApproved = withReason("blocked", "denied", "timeout")
  if (notApproved > 0) {
    recommendations.push(`Review ${notApproved} task(s) that were not approved`)
  }
  if (summary.stalled > 0) {
    recommendations.push(`Unblock ${summary.stalled} task(s) stalled behind failed dependencies`)
  }

  return {
    total: summary.total,
    completed: summary.completed,
    failed: summary.failed,
    successRate: summary.total > 0 ? summary.completed / summary.total : 0,
    recommendations,
  }
}

// ──────────────────────────────────────────────────
// Mutation
// ──────────────────────────────────────────────────

export function logExecution(
  plan: Plan,
  taskId: string | null,
  event: string,
  message: string,
  now: Date = new Date(),
): void {
  plan.executionLog.push({ taskId, event, timestamp: now.toISOString(), message })
}

/** Move a task along a validated transition and record it in the execution log. */
export function transitionTask(
  plan: Plan,
  task: Task,
  to: TaskStatus,
  message: string,
  now: Date = new Date(),
): void {
  assertValidTaskTransition(task.id, task.status, to)
  task.status = to
  logExecution(plan, task.id, to.toLowerCase(), message, now)
}
