export type {
  AuditActor,
  AuditOutcome,
  ConfirmationDecisionResult,
  ConfirmationRequestRecord,
  ConfirmationStatus,
  PlanStatus,
  PlanSummary,
  RiskTier,
  TaskFailureReason,
  TaskStatus,
} from "./types/index.js"
export {
  CRITICAL_ACTION_MARKER,
  DEFAULT_CONFIRMATION_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PARALLELISM,
  DEFAULT_PLAN_CAPACITY,
  MAX_CONFIRMATION_TIMEOUT_MS,
  MAX_TIMER_DELAY_MS,
} from "./types/index.js"
