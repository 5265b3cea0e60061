import { describe, expect, it } from "vitest"

import {
  ApprovalCancelledError,
  ApprovalDeniedError,
  ApprovalTimedOutError,
  approvalError,
  ClassificationBlockedError,
  DependencyStalledError,
  DuplicateResolutionError,
  ExecutorFailureError,
  isRetryable,
  PlanStateError,
  WardenError,
} from "../errors.js"

describe("error taxonomy", () => {
  it("gives every failure a stable code", () => {
    expect(new ClassificationBlockedError("protected path").code).toBe("blocked")
    expect(new ApprovalDeniedError("no").code).toBe("denied")
    expect(new ApprovalTimedOutError(5_000).code).toBe("timeout")
    expect(new ApprovalCancelledError("shutdown").code).toBe("cancelled")
    expect(new DependencyStalledError("b", "a").code).toBe("stalled")
    expect(new DuplicateResolutionError("r1", "APPROVED").code).toBe("already_resolved")
    expect(new PlanStateError("p1", "CANCELLED", "run").code).toBe("plan_state")
  })

  it("formats readable messages", () => {
    expect(new ApprovalTimedOutError(5_000).message).toBe("Approval timed out after 5000 ms")
    expect(new DependencyStalledError("b", "a").message).toBe(
      "Task b can never run: dependency a did not complete",
    )
    expect(new DuplicateResolutionError("r1", "TIMED_OUT").message).toBe(
      "Confirmation request r1 is already TIMED_OUT",
    )
  })

  it("wraps executor failures and keeps the cause", () => {
    const cause = new Error("disk full")
    const err = new ExecutorFailureError(cause)

    expect(err.message).toBe("disk full")
    expect(err.cause).toBe(cause)
    expect(new ExecutorFailureError("plain string").message).toBe("plain string")
  })
})

describe("isRetryable", () => {
  it("retries executor failures only", () => {
    expect(isRetryable(new ExecutorFailureError(new Error("x")))).toBe(true)
    expect(isRetryable(new ApprovalDeniedError("no"))).toBe(false)
    expect(isRetryable(new ApprovalTimedOutError(1))).toBe(false)
    expect(isRetryable(new Error("unknown"))).toBe(false)
    expect(isRetryable("boom")).toBe(false)
  })
})

describe("approvalError", () => {
  it("maps each failure reason to its error class", () => {
    expect(approvalError("blocked", "protected path", 0)).toBeInstanceOf(ClassificationBlockedError)
    expect(approvalError("denied", "no", 0)).toBeInstanceOf(ApprovalDeniedError)
    expect(approvalError("cancelled", "shutdown", 0)).toBeInstanceOf(ApprovalCancelledError)

    const timeout = approvalError("timeout", "ignored", 2_500)
    expect(timeout).toBeInstanceOf(ApprovalTimedOutError)
    expect(timeout).toBeInstanceOf(WardenError)
    expect(timeout.message).toBe("Approval timed out after 2500 ms")
  })
})
