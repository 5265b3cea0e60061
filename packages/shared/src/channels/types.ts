/**
 * Approver Channel Types
 *
 * An approver channel carries confirmation requests out to a human (chat,
 * dashboard) and carries their answers back in. Publishing is
 * fire-and-forget: the gateway never waits on delivery.
 */

import type { ConfirmationDecisionResult, ConfirmationRequestRecord } from "../types/index.js"

// ──────────────────────────────────────────────────
// Inbound responses
// ──────────────────────────────────────────────────

export interface ApproverResponse {
  requestId: string
  approved: boolean
  /** Channel-qualified identity of whoever answered, e.g. "telegram:111". */
  resolverId: string
  reason?: string
}

export type ApproverResponseHandler = (
  response: ApproverResponse,
) => Promise<ConfirmationDecisionResult>

// ──────────────────────────────────────────────────
// Channel Interface
// ──────────────────────────────────────────────────

export interface ApproverChannel {
  readonly channelType: string

  start(): Promise<void>
  stop(): Promise<void>
  healthCheck(): Promise<boolean>

  /** Announce a new pending request to approvers. */
  publish(request: ConfirmationRequestRecord): Promise<void>
  /** Tell approvers a request was resolved (approved, denied or timed out). */
  publishResolution?(request: ConfirmationRequestRecord): Promise<void>

  onResponse(handler: ApproverResponseHandler): void
}
