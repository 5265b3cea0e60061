/**
 * Telegram rendering for confirmation requests.
 *
 * Callback data format: cfm:<action>:<request_id_hex>
 * - cfm:  routing prefix
 * - action: a (approve), r (deny), d (details)
 * - request_id_hex: UUID as 32 hex chars (no hyphens)
 *
 * Total: 38 bytes, within Telegram's 64-byte callback_data limit.
 */

import type { ConfirmationRequestRecord } from "@warden/shared"

export type CallbackAction = "a" | "r" | "d"

export interface ConfirmationCallback {
  action: CallbackAction
  requestId: string
}

/** Telegram caps callback query answers at 200 characters. */
const MAX_ALERT_LENGTH = 200

// ---------------------------------------------------------------------------
// Callback data
// ---------------------------------------------------------------------------

export function buildCallbackData(requestId: string, action: CallbackAction): string {
  return `cfm:${action}:${requestId.replace(/-/g, "")}`
}

/**
 * Parse callback_data back into an action and request id.
 * Returns null if the data doesn't match the confirmation callback format.
 */
export function parseCallbackData(data: string): ConfirmationCallback | null {
  const match = /^cfm:([ard]):([a-f0-9]{32})$/.exec(data)
  if (!match) return null

  const action = match[1]
  const hex = match[2]
  if ((action !== "a" && action !== "r" && action !== "d") || hex === undefined) return null

  const requestId = [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-")

  return { action, requestId }
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
}

export function formatDuration(ms: number): string {
  if (ms <= 0) return "expired"
  const totalSeconds = Math.floor(ms / 1000)
  const minutes = Math.floor(totalSeconds / 60)
  const seconds = totalSeconds % 60
  if (minutes > 0 && seconds > 0) return `${minutes}m ${seconds}s`
  if (minutes > 0) return `${minutes}m`
  return `${seconds}s`
}

const TIER_ICONS: Record<string, string> = {
  WARNING: "⚠️",
  DANGER: "\u{1f6a8}",
}

export function formatConfirmationRequest(
  request: ConfirmationRequestRecord,
  now: number = Date.now(),
): string {
  const expiresIn = formatDuration(new Date(request.expiresAt).getTime() - now)
  const icon = TIER_ICONS[request.riskTier] ?? "\u{1f512}"

  const lines = [
    `${icon} <b>Confirmation Required</b> (${request.riskTier})`,
    "",
    `<b>Action:</b> ${escapeHtml(request.actionType)}`,
  ]
  if (request.planId) {
    lines.push(`<b>Plan:</b> #${escapeHtml(request.planId.slice(0, 8))}`)
  }
  lines.push("", escapeHtml(request.description), "", `⏰ Expires in ${expiresIn}`)
  return lines.join("\n")
}

export function formatResolution(request: ConfirmationRequestRecord): string {
  const verb =
    request.status === "APPROVED"
      ? "✅ Approved"
      : request.status === "DENIED"
        ? "❌ Denied"
        : request.status === "TIMED_OUT"
          ? "⏰ Timed out"
          : "⏳ Pending"
  const byLine = request.resolvedBy ? ` by ${escapeHtml(request.resolvedBy)}` : ""

  const lines = [`<b>${verb}${byLine}</b>`, "", escapeHtml(request.description)]
  if (request.reason) {
    lines.push("", `<i>${escapeHtml(request.reason)}</i>`)
  }
  return lines.join("\n")
}

/** Plain-text details for a callback alert, truncated to Telegram's limit. */
export function formatDetailsAlert(request: ConfirmationRequestRecord): string {
  const lines = Object.entries(request.details).map(([key, value]) => {
    const label = key.replace(/_/g, " ")
    return `${label}: ${typeof value === "string" ? value : JSON.stringify(value)}`
  })
  const text = lines.length > 0 ? lines.join("\n") : request.description
  return text.length > MAX_ALERT_LENGTH ? `${text.slice(0, MAX_ALERT_LENGTH - 1)}…` : text
}
