/**
 * Error taxonomy for the gatekeeping layer.
 *
 * Task-level failures are recorded on the task and in the audit log rather
 * than thrown out of the scheduler; the classes below give each failure a
 * stable `code` so that both places (and the REST surface) agree on it.
 */

import type { TaskFailureReason, TaskStatus } from "@warden/shared"

export type WardenErrorCode =
  | TaskFailureReason
  | "already_resolved"
  | "not_found"
  | "plan_invalid"
  | "plan_state"
  | "invalid_transition"
  | "policy_invalid"

export abstract class WardenError extends Error {
  abstract readonly code: WardenErrorCode
  readonly retryable: boolean = false
}

/** The action matched a blocked pattern, protected path or domain rule. */
export class ClassificationBlockedError extends WardenError {
  readonly code = "blocked" as const

  constructor(reason: string) {
    super(`Action blocked: ${reason}`)
    this.name = "ClassificationBlockedError"
  }
}

export class ApprovalDeniedError extends WardenError {
  readonly code = "denied" as const

  constructor(reason: string) {
    super(`Approval denied: ${reason}`)
    this.name = "ApprovalDeniedError"
  }
}

export class ApprovalTimedOutError extends WardenError {
  readonly code = "timeout" as const

  constructor(timeoutMs: number) {
    super(`Approval timed out after ${timeoutMs} ms`)
    this.name = "ApprovalTimedOutError"
  }
}

export class ApprovalCancelledError extends WardenError {
  readonly code = "cancelled" as const

  constructor(reason: string) {
    super(`Cancelled: ${reason}`)
    this.name = "ApprovalCancelledError"
  }
}

/** The executor threw. The only failure the scheduler retries. */
export class ExecutorFailureError extends WardenError {
  readonly code = "executor" as const
  override readonly retryable = true

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = "ExecutorFailureError"
  }
}

export class DependencyStalledError extends WardenError {
  readonly code = "stalled" as const
  readonly taskId: string
  readonly blockedBy: string

  constructor(taskId: string, blockedBy: string) {
    super(`Task ${taskId} can never run: dependency ${blockedBy} did not complete`)
    this.name = "DependencyStalledError"
    this.taskId = taskId
    this.blockedBy = blockedBy
  }
}

export class ConfirmationNotFoundError extends WardenError {
  readonly code = "not_found" as const

  constructor(requestId: string) {
    super(`Confirmation request ${requestId} not found`)
    this.name = "ConfirmationNotFoundError"
  }
}

/** A response arrived for a request that already has its resolution. */
export class DuplicateResolutionError extends WardenError {
  readonly code = "already_resolved" as const

  constructor(requestId: string, status: string) {
    super(`Confirmation request ${requestId} is already ${status}`)
    this.name = "DuplicateResolutionError"
  }
}

export class PlanValidationError extends WardenError {
  readonly code = "plan_invalid" as const

  constructor(message: string) {
    super(message)
    this.name = "PlanValidationError"
  }
}

export class PlanStateError extends WardenError {
  readonly code = "plan_state" as const

  constructor(planId: string, status: string, operation: string) {
    super(`Cannot ${operation} plan ${planId}: it is ${status}`)
    this.name = "PlanStateError"
  }
}

export class InvalidTaskTransitionError extends WardenError {
  readonly code = "invalid_transition" as const
  readonly from: TaskStatus
  readonly to: TaskStatus

  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super(`Invalid transition for task ${taskId}: ${from} → ${to}`)
    this.name = "InvalidTaskTransitionError"
    this.from = from
    this.to = to
  }
}

export class PolicyConfigError extends WardenError {
  readonly code = "policy_invalid" as const
  readonly issues: string[]

  constructor(source: string, issues: string[]) {
    super(`Invalid policy in ${source}: ${issues.join("; ")}`)
    this.name = "PolicyConfigError"
    this.issues = issues
  }
}

/** Only executor failures are worth another attempt. */
export function isRetryable(err: unknown): boolean {
  return err instanceof WardenError && err.retryable
}

/** Error for a non-approved gateway outcome, keyed by its failure reason. */
export function approvalError(
  reason: "blocked" | "denied" | "timeout" | "cancelled",
  detail: string,
  timeoutMs: number,
): WardenError {
  switch (reason) {
    case "blocked":
      return new ClassificationBlockedError(detail)
    case "denied":
      return new ApprovalDeniedError(detail)
    case "timeout":
      return new ApprovalTimedOutError(timeoutMs)
    case "cancelled":
      return new ApprovalCancelledError(detail)
  }
}
