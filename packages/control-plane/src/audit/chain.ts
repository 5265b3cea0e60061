/**
 * Hash chaining for audit entries.
 *
 * Each entry's hash covers its own fields plus the previous entry's hash,
 * so altering, removing or reordering any entry breaks every hash after it.
 */

import { createHash } from "node:crypto"

import type { AuditEntry } from "./log.js"

export type HashedFields = Omit<AuditEntry, "entryHash">

export function computeEntryHash(fields: HashedFields): string {
  const payload = JSON.stringify({
    sequence: fields.sequence,
    timestamp: fields.timestamp,
    actor: fields.actor,
    action: fields.action,
    riskTier: fields.riskTier,
    outcome: fields.outcome,
    error: fields.error ?? null,
    requestId: fields.requestId ?? null,
    planId: fields.planId ?? null,
    taskId: fields.taskId ?? null,
    previousHash: fields.previousHash ?? "",
  })
  return createHash("sha256").update(payload).digest("hex")
}

export interface ChainVerification {
  valid: boolean
  checked: number
  /** Sequence number of the first entry that fails verification. */
  brokenAt?: number
}

/**
 * Walk the chain and report the first broken link. Entries before `from`
 * are taken as already verified; only the link into `from` is checked.
 */
export function verifyAuditChain(entries: readonly AuditEntry[], from = 0): ChainVerification {
  let previous: AuditEntry | undefined = from > 0 ? entries[from - 1] : undefined
  for (let i = from; i < entries.length; i++) {
    const entry = entries[i]
    if (!entry) break
    const expectedPrev = previous?.entryHash ?? null
    if (entry.previousHash !== expectedPrev || computeEntryHash(entry) !== entry.entryHash) {
      return { valid: false, checked: i, brokenAt: entry.sequence }
    }
    previous = entry
  }

  return { valid: true, checked: entries.length }
}
