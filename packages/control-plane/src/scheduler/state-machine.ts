/**
 * Task state machine.
 *
 * States:
 * - PENDING: waiting for dependencies (or re-queued after a retryable failure)
 * - RUNNABLE: every dependency is COMPLETED, waiting for a dispatch slot
 * - IN_PROGRESS: awaiting confirmation or the executor
 * - COMPLETED: executor returned a result
 * - FAILED: not approved, or the executor failed with no attempts left
 * - CANCELLED: plan cancelled, or the task can never run (stalled)
 *
 * FAILED → PENDING is the retry path and is only taken while attempts
 * remain; FAILED → CANCELLED covers a cancellation that lands while a
 * retry is waiting out its backoff.
 */

import type { TaskStatus } from "@warden/shared"

import { InvalidTaskTransitionError } from "../errors.js"

export const VALID_TASK_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  PENDING: ["RUNNABLE", "IN_PROGRESS", "CANCELLED"],
  RUNNABLE: ["IN_PROGRESS", "CANCELLED"],
  IN_PROGRESS: ["COMPLETED", "FAILED", "CANCELLED"],
  FAILED: ["PENDING", "CANCELLED"],
  COMPLETED: [],
  CANCELLED: [],
}

const TERMINAL: ReadonlySet<TaskStatus> = new Set(["COMPLETED", "CANCELLED"])

export function isValidTaskTransition(from: TaskStatus, to: TaskStatus): boolean {
  return VALID_TASK_TRANSITIONS[from].includes(to)
}

/** Throws InvalidTaskTransitionError if the transition is not allowed. */
export function assertValidTaskTransition(taskId: string, from: TaskStatus, to: TaskStatus): void {
  if (!isValidTaskTransition(from, to)) {
    throw new InvalidTaskTransitionError(taskId, from, to)
  }
}

/**
 * COMPLETED and CANCELLED never change again. FAILED is final only once
 * the scheduler has decided not to retry.
 */
export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL.has(status)
}

/** Statuses a task can still leave through normal scheduling. */
export function isOpenStatus(status: TaskStatus): boolean {
  return status === "PENDING" || status === "RUNNABLE" || status === "IN_PROGRESS"
}
