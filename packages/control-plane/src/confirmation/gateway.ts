/**
 * ConfirmationGateway — holds non-safe actions until an approver answers.
 *
 * Each request gets its own deferred promise and timer. Whichever of
 * response, timeout or cancellation arrives first resolves the request;
 * every later attempt finds it no longer PENDING and changes nothing.
 * There is no shared lock: unrelated requests never wait on each other.
 */

import {
  DEFAULT_CONFIRMATION_TIMEOUT_MS,
  MAX_CONFIRMATION_TIMEOUT_MS,
  MAX_TIMER_DELAY_MS,
  type AuditActor,
  type AuditOutcome,
  type ConfirmationDecisionResult,
  type ConfirmationRequestRecord,
  type ConfirmationStatus,
  type RiskTier,
} from "@warden/shared"
import type { ApproverChannel, ApproverChannelRegistry } from "@warden/shared/channels"
import { silentLogger, WardenAttributes, withSpan } from "@warden/shared/tracing"
import type { Logger } from "pino"
import { v7 as uuidv7 } from "uuid"

import type { AuditLog } from "../audit/log.js"
import { DuplicateResolutionError } from "../errors.js"
import type { RiskClassifier } from "../policy/classifier.js"

export const DEFAULT_HISTORY_LIMIT = 50
const DEFAULT_HISTORY_CAPACITY = 1_000

export type ResolvedStatus = Exclude<ConfirmationStatus, "PENDING">

export type ApprovalFailureReason = "blocked" | "denied" | "timeout" | "cancelled"

export interface ApprovalOutcome {
  approved: boolean
  status: ResolvedStatus
  tier: RiskTier
  /** Human-readable explanation, stored on the task when not approved. */
  reason: string
  description: string
  failureReason?: ApprovalFailureReason
  /** Present only when a request was created (WARNING and DANGER). */
  requestId?: string
  timeoutMs: number
}

export interface ConfirmationOptions {
  timeoutMs?: number
  actor?: AuditActor
  planId?: string
  taskId?: string
  /** Aborting force-denies the request. */
  signal?: AbortSignal
}

export interface ConfirmationGatewayDeps {
  classifier: RiskClassifier
  auditLog: AuditLog
  channels?: ApproverChannelRegistry
  logger?: Logger
  defaultTimeoutMs?: number
  maxTimeoutMs?: number
  /** How many resolved requests are kept for history and late-response checks. */
  historyCapacity?: number
  now?: () => Date
}

interface Settlement {
  status: ResolvedStatus
  resolvedBy: string | null
  reason: string
  outcome: AuditOutcome
  actor: AuditActor
}

interface PendingRequest {
  record: ConfirmationRequestRecord
  timer: ReturnType<typeof setTimeout>
  resolve: (settlement: Settlement) => void
  detachAbort?: () => void
}

export class ConfirmationGateway {
  private readonly classifier: RiskClassifier
  private readonly auditLog: AuditLog
  private readonly channels: ApproverChannel[] = []
  private readonly logger: Logger
  private readonly defaultTimeoutMs: number
  private readonly maxTimeoutMs: number
  private readonly historyCapacity: number
  private readonly now: () => Date
  private readonly pending = new Map<string, PendingRequest>()
  private readonly resolved = new Map<string, ConfirmationRequestRecord>()

  constructor(deps: ConfirmationGatewayDeps) {
    this.classifier = deps.classifier
    this.auditLog = deps.auditLog
    this.logger = deps.logger ?? silentLogger()
    this.maxTimeoutMs = Math.min(
      deps.maxTimeoutMs ?? MAX_CONFIRMATION_TIMEOUT_MS,
      MAX_TIMER_DELAY_MS,
    )
    this.defaultTimeoutMs = Math.min(
      deps.defaultTimeoutMs ?? DEFAULT_CONFIRMATION_TIMEOUT_MS,
      this.maxTimeoutMs,
    )
    this.historyCapacity = deps.historyCapacity ?? DEFAULT_HISTORY_CAPACITY
    this.now = deps.now ?? (() => new Date())

    for (const channel of deps.channels?.getAll() ?? []) {
      this.connect(channel)
    }
  }

  /** Publish new requests to a channel and accept its responses. */
  connect(channel: ApproverChannel): void {
    this.channels.push(channel)
    channel.onResponse(async (response) =>
      this.submitResponse(
        response.requestId,
        response.approved,
        response.resolverId,
        response.reason,
      ),
    )
  }

  get pendingCount(): number {
    return this.pending.size
  }

  /**
   * Classify an action and, unless it is SAFE or BLOCKED, wait for an
   * approver or the timeout. Never rejects because of the approver side.
   */
  async requestConfirmation(
    actionType: string,
    description: string,
    details: Record<string, unknown> = {},
    options: ConfirmationOptions = {},
  ): Promise<ApprovalOutcome> {
    return withSpan<ApprovalOutcome>("warden.confirmation.request", async (span) => {
      const classification = this.classifier.classify({ actionType, description, details })
      const tier = classification.tier
      const actor = options.actor ?? "system"
      const timeoutMs = this.clampTimeout(options.timeoutMs)
      span.setAttribute(WardenAttributes.RISK_TIER, tier)

      const base = {
        tier,
        description: classification.description,
        timeoutMs,
      }
      const links = { planId: options.planId, taskId: options.taskId }

      if (tier === "SAFE") {
        this.auditLog.append({
          actor,
          action: classification.description,
          riskTier: tier,
          outcome: "auto_approved",
          ...links,
        })
        return { ...base, approved: true, status: "APPROVED", reason: classification.reason }
      }

      if (tier === "BLOCKED") {
        this.logger.warn(
          { actionType, reason: classification.reason, ...links },
          "Blocked action denied without confirmation",
        )
        this.auditLog.append({
          actor,
          action: classification.description,
          riskTier: tier,
          outcome: "blocked",
          error: classification.reason,
          ...links,
        })
        return {
          ...base,
          approved: false,
          status: "DENIED",
          reason: classification.reason,
          failureReason: "blocked",
        }
      }

      if (options.signal?.aborted) {
        const reason = abortReason(options.signal)
        this.auditLog.append({
          actor,
          action: classification.description,
          riskTier: tier,
          outcome: "cancelled",
          error: reason,
          ...links,
        })
        return { ...base, approved: false, status: "DENIED", reason, failureReason: "cancelled" }
      }

      const createdAt = this.now()
      const record: ConfirmationRequestRecord = {
        id: uuidv7(),
        actionType,
        riskTier: tier,
        description: classification.description,
        details: { ...details },
        status: "PENDING",
        createdAt: createdAt.toISOString(),
        expiresAt: new Date(createdAt.getTime() + timeoutMs).toISOString(),
        resolvedAt: null,
        resolvedBy: null,
        reason: null,
        planId: options.planId ?? null,
        taskId: options.taskId ?? null,
      }
      span.setAttribute(WardenAttributes.CONFIRMATION_ID, record.id)
      span.setAttribute(WardenAttributes.CONFIRMATION_TIMEOUT_MS, timeoutMs)

      const settled = this.track(record, timeoutMs, options.signal)

      this.auditLog.append({
        actor,
        action: record.description,
        riskTier: tier,
        outcome: "requested",
        requestId: record.id,
        ...links,
      })
      this.logger.info(
        { requestId: record.id, actionType, riskTier: tier, timeoutMs, ...links },
        "Confirmation requested",
      )
      this.publish(record)

      const settlement = await settled
      span.setAttribute(WardenAttributes.CONFIRMATION_STATUS, settlement.status)

      return {
        ...base,
        approved: settlement.status === "APPROVED",
        status: settlement.status,
        reason: settlement.reason,
        requestId: record.id,
        ...(settlement.status !== "APPROVED" && {
          failureReason: failureReasonOf(settlement.outcome),
        }),
      }
    })
  }

  /**
   * Apply an approver's answer. Late, duplicate and unknown responses are
   * reported in the result and change nothing.
   */
  submitResponse(
    requestId: string,
    approved: boolean,
    resolverId: string,
    reason?: string,
  ): ConfirmationDecisionResult {
    const entry = this.pending.get(requestId)
    if (!entry) {
      const past = this.resolved.get(requestId)
      if (past) {
        this.logger.warn(
          { err: new DuplicateResolutionError(requestId, past.status), resolverId },
          "Ignoring response to a resolved confirmation request",
        )
        return { success: false, error: "already_resolved", request: snapshot(past) }
      }
      return { success: false, error: "not_found" }
    }

    this.settle(requestId, {
      status: approved ? "APPROVED" : "DENIED",
      resolvedBy: resolverId,
      reason: reason ?? `${approved ? "approved" : "denied"} by ${resolverId}`,
      outcome: approved ? "approved" : "denied",
      actor: "user",
    })
    return { success: true, request: snapshot(entry.record) }
  }

  /** Force-deny one pending request. Returns false if it was not pending. */
  cancelRequest(requestId: string, reason: string, actor: AuditActor = "system"): boolean {
    return this.settle(requestId, cancellation(reason, actor))
  }

  /** Force-deny every pending request matching the predicate. */
  cancelWhere(
    predicate: (request: ConfirmationRequestRecord) => boolean,
    reason: string,
    actor: AuditActor = "system",
  ): number {
    let count = 0
    for (const entry of [...this.pending.values()]) {
      if (!predicate(snapshot(entry.record))) continue
      if (this.settle(entry.record.id, cancellation(reason, actor))) count++
    }
    return count
  }

  cancelAll(reason: string): number {
    return this.cancelWhere(() => true, reason)
  }

  listPending(): ConfirmationRequestRecord[] {
    return [...this.pending.values()].map((e) => snapshot(e.record))
  }

  /** The most recent resolved requests, oldest first. */
  getHistory(limit: number = DEFAULT_HISTORY_LIMIT): ConfirmationRequestRecord[] {
    if (limit <= 0) return []
    return [...this.resolved.values()].slice(-limit).map(snapshot)
  }

  getRequest(requestId: string): ConfirmationRequestRecord | undefined {
    const record = this.pending.get(requestId)?.record ?? this.resolved.get(requestId)
    return record ? snapshot(record) : undefined
  }

  private clampTimeout(timeoutMs: number | undefined): number {
    if (timeoutMs === undefined || !Number.isFinite(timeoutMs)) return this.defaultTimeoutMs
    return Math.min(Math.max(1, Math.floor(timeoutMs)), this.maxTimeoutMs)
  }

  private track(
    record: ConfirmationRequestRecord,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<Settlement> {
    return new Promise<Settlement>((resolve) => {
      const timer = setTimeout(() => {
        this.settle(record.id, {
          status: "TIMED_OUT",
          resolvedBy: null,
          reason: `no response within ${timeoutMs} ms`,
          outcome: "timed_out",
          actor: "system",
        })
      }, timeoutMs)

      const entry: PendingRequest = { record, timer, resolve }
      if (signal) {
        const onAbort = (): void => {
          this.settle(record.id, cancellation(abortReason(signal), "scheduler"))
        }
        signal.addEventListener("abort", onAbort, { once: true })
        entry.detachAbort = () => signal.removeEventListener("abort", onAbort)
      }
      this.pending.set(record.id, entry)
    })
  }

  /** The single place a request leaves PENDING. */
  private settle(requestId: string, settlement: Settlement): boolean {
    const entry = this.pending.get(requestId)
    if (!entry || entry.record.status !== "PENDING") return false

    clearTimeout(entry.timer)
    entry.detachAbort?.()
    this.pending.delete(requestId)

    const record = entry.record
    record.status = settlement.status
    record.resolvedAt = this.now().toISOString()
    record.resolvedBy = settlement.resolvedBy
    record.reason = settlement.reason
    this.remember(record)

    this.auditLog.append({
      actor: settlement.actor,
      action: record.description,
      riskTier: record.riskTier,
      outcome: settlement.outcome,
      ...(settlement.status !== "APPROVED" && { error: settlement.reason }),
      requestId,
      planId: record.planId ?? undefined,
      taskId: record.taskId ?? undefined,
    })
    this.logger.info(
      { requestId, status: record.status, resolvedBy: record.resolvedBy },
      "Confirmation resolved",
    )

    this.publishResolution(record)
    entry.resolve(settlement)
    return true
  }

  private remember(record: ConfirmationRequestRecord): void {
    this.resolved.set(record.id, record)
    if (this.resolved.size > this.historyCapacity) {
      const oldest = this.resolved.keys().next()
      if (!oldest.done) this.resolved.delete(oldest.value)
    }
  }

  private publish(record: ConfirmationRequestRecord): void {
    for (const channel of this.channels) {
      channel.publish(snapshot(record)).catch((err: unknown) => {
        this.logger.warn(
          { err, channel: channel.channelType, requestId: record.id },
          "Failed to publish confirmation request",
        )
        this.auditLog.append({
          actor: "system",
          action: `Notify ${channel.channelType}: ${record.description}`,
          riskTier: record.riskTier,
          outcome: "notification_failed",
          error: err instanceof Error ? err.message : String(err),
          requestId: record.id,
          planId: record.planId ?? undefined,
          taskId: record.taskId ?? undefined,
        })
      })
    }
  }

  private publishResolution(record: ConfirmationRequestRecord): void {
    for (const channel of this.channels) {
      channel.publishResolution?.(snapshot(record)).catch((err: unknown) => {
        this.logger.warn(
          { err, channel: channel.channelType, requestId: record.id },
          "Failed to publish confirmation resolution",
        )
      })
    }
  }
}

function snapshot(record: ConfirmationRequestRecord): ConfirmationRequestRecord {
  return { ...record, details: { ...record.details } }
}

function cancellation(reason: string, actor: AuditActor): Settlement {
  return { status: "DENIED", resolvedBy: actor, reason, outcome: "cancelled", actor }
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason
  if (typeof reason === "string") return reason
  if (reason instanceof Error && reason.name !== "AbortError") return reason.message
  return "cancelled"
}

function failureReasonOf(outcome: AuditOutcome): ApprovalFailureReason {
  switch (outcome) {
    case "timed_out":
      return "timeout"
    case "cancelled":
      return "cancelled"
    default:
      return "denied"
  }
}
