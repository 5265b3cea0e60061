/**
 * Append-only audit log.
 *
 * Entries are frozen once appended and readers always get a fresh array,
 * so exporting never interferes with concurrent appends.
 */

import type { AuditActor, AuditOutcome, RiskTier } from "@warden/shared"
import type { Logger } from "pino"

import { type ChainVerification, computeEntryHash, verifyAuditChain } from "./chain.js"

export const DEFAULT_AUDIT_TAIL = 100

export interface AuditEntry {
  sequence: number
  timestamp: string
  actor: AuditActor
  /** Human-readable description of what was attempted. */
  action: string
  /** Null for events that are not about a classified action. */
  riskTier: RiskTier | null
  outcome: AuditOutcome
  error?: string
  requestId?: string
  planId?: string
  taskId?: string
  previousHash: string | null
  entryHash: string
}

export type AuditEntryInput = Omit<
  AuditEntry,
  "sequence" | "timestamp" | "previousHash" | "entryHash" | "riskTier"
> & { riskTier?: RiskTier | null }

export interface AuditLogOptions {
  logger?: Logger
  now?: () => Date
}

export class AuditLog {
  private readonly entries: AuditEntry[] = []
  private verifiedCount = 0
  private readonly logger?: Logger
  private readonly now: () => Date

  constructor(options: AuditLogOptions = {}) {
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
  }

  get size(): number {
    return this.entries.length
  }

  append(input: AuditEntryInput): AuditEntry {
    const previous = this.entries.at(-1)
    const fields = {
      sequence: this.entries.length + 1,
      timestamp: this.now().toISOString(),
      actor: input.actor,
      action: input.action,
      riskTier: input.riskTier ?? null,
      outcome: input.outcome,
      ...(input.error !== undefined && { error: input.error }),
      ...(input.requestId !== undefined && { requestId: input.requestId }),
      ...(input.planId !== undefined && { planId: input.planId }),
      ...(input.taskId !== undefined && { taskId: input.taskId }),
      previousHash: previous?.entryHash ?? null,
    }
    const entry: AuditEntry = Object.freeze({ ...fields, entryHash: computeEntryHash(fields) })
    this.entries.push(entry)

    this.logger?.debug(
      { sequence: entry.sequence, outcome: entry.outcome, riskTier: entry.riskTier },
      entry.action,
    )
    return entry
  }

  /** The last `n` entries, oldest first. */
  tail(n: number = DEFAULT_AUDIT_TAIL): AuditEntry[] {
    if (n <= 0) return []
    return this.entries.slice(-n)
  }

  exportAll(): AuditEntry[] {
    return this.entries.slice()
  }

  /** Entries matching a plan, task or confirmation request. */
  find(filter: { planId?: string; taskId?: string; requestId?: string }): AuditEntry[] {
    return this.entries.filter(
      (e) =>
        (filter.planId === undefined || e.planId === filter.planId) &&
        (filter.taskId === undefined || e.taskId === filter.taskId) &&
        (filter.requestId === undefined || e.requestId === filter.requestId),
    )
  }

  /**
   * Check the hash chain. Entries are frozen once appended, so by default
   * only those added since the last clean verification are hashed;
   * `full` walks the whole chain again.
   */
  verify(options: { full?: boolean } = {}): ChainVerification {
    const from = options.full ? 0 : this.verifiedCount
    const result = verifyAuditChain(this.entries, from)
    if (result.valid) this.verifiedCount = result.checked
    return result
  }

  /** JSON array of every entry, as written by the export endpoint. */
  toJSON(): AuditEntry[] {
    return this.exportAll()
  }
}
