// ---------------------------------------------------------------------------
// Risk & Confirmation Types
// ---------------------------------------------------------------------------

export type RiskTier = "SAFE" | "WARNING" | "DANGER" | "BLOCKED"

export type ConfirmationStatus = "PENDING" | "APPROVED" | "DENIED" | "TIMED_OUT"

/** Default time a confirmation request waits for an approver: 60 seconds */
export const DEFAULT_CONFIRMATION_TIMEOUT_MS = 60_000

/** Maximum allowed confirmation timeout: 1 hour */
export const MAX_CONFIRMATION_TIMEOUT_MS = 3_600_000

/** Longest delay a Node timer honours; larger values fire almost at once */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

/** Prefix added to the description of actions on the critical list */
export const CRITICAL_ACTION_MARKER = "[CRITICAL]"

/** Who produced an audit entry */
export type AuditActor = "scheduler" | "user" | "system"

/**
 * Outcome written to the audit log. Gateway decisions use the confirmation
 * vocabulary; scheduler and integrity events add their own.
 */
export type AuditOutcome =
  | "requested"
  | "auto_approved"
  | "blocked"
  | "approved"
  | "denied"
  | "timed_out"
  | "cancelled"
  | "notification_failed"
  | "started"
  | "completed"
  | "failed"
  | "retrying"
  | "stalled"
  | "plan_started"
  | "plan_completed"
  | "plan_cancelled"
  | "tampered"
  | "verified"

/** Serializable snapshot of a confirmation request */
export interface ConfirmationRequestRecord {
  id: string
  actionType: string
  riskTier: RiskTier
  description: string
  details: Record<string, unknown>
  status: ConfirmationStatus
  createdAt: string
  expiresAt: string
  resolvedAt: string | null
  resolvedBy: string | null
  reason: string | null
  planId: string | null
  taskId: string | null
}

/** Result of submitting a response to a confirmation request */
export type ConfirmationDecisionResult =
  | { success: true; request: ConfirmationRequestRecord }
  | { success: false; error: "not_found" | "already_resolved"; request?: ConfirmationRequestRecord }

// ---------------------------------------------------------------------------
// Task & Plan Types
// ---------------------------------------------------------------------------

export type TaskStatus =
  | "PENDING"
  | "RUNNABLE"
  | "IN_PROGRESS"
  | "COMPLETED"
  | "FAILED"
  | "CANCELLED"

export type PlanStatus = "PENDING" | "RUNNING" | "COMPLETED" | "CANCELLED"

/** Why a task ended up FAILED or CANCELLED */
export type TaskFailureReason =
  | "blocked"
  | "denied"
  | "timeout"
  | "executor"
  | "stalled"
  | "cancelled"

/** Default number of attempts a task gets before failing permanently */
export const DEFAULT_MAX_RETRIES = 3

/** Default number of tasks of one plan dispatched at the same time */
export const DEFAULT_PARALLELISM = 1

/** Default number of finished plans the scheduler keeps for lookups */
export const DEFAULT_PLAN_CAPACITY = 1000

export interface PlanSummary {
  planId: string
  goal: string
  status: PlanStatus
  total: number
  completed: number
  failed: number
  cancelled: number
  pending: number
  inProgress: number
  stalled: number
  stalledTaskIds: string[]
  progressPercent: number
}
