/**
 * Risk classifier — maps an action to SAFE, WARNING, DANGER or BLOCKED.
 *
 * Rules are checked in a fixed order and the first match wins:
 *   1. blocked pattern in the description or serialized details → BLOCKED
 *   2. write or delete inside a protected path                  → BLOCKED
 *   3. network access to a blocked or non-allowed domain        → BLOCKED
 *   4. action name on the critical list                         → DANGER
 *   5. category that requires approval                          → WARNING
 *      (DANGER instead when a critical keyword appears)
 *   6. anything else                                            → SAFE
 *
 * Classification is pure: the same input always yields the same result.
 */

import path from "node:path"

import { CRITICAL_ACTION_MARKER, type RiskTier } from "@warden/shared"
import {
  ACTION_CATEGORIES,
  ActionCategorySchema,
  actionDetails,
  describeAction,
  type Action,
  type ActionCategory,
  type ActionKind,
} from "@warden/shared/actions"

import type { PolicyConfig } from "./policy-config.js"

export interface ClassificationInput {
  /** Action kind or free-form action name, e.g. "file_write" or "modify_registry". */
  actionType: string
  description: string
  details?: Record<string, unknown>
}

export interface Classification {
  tier: RiskTier
  reason: string
  /** The configured pattern, path or domain that decided the tier. */
  matchedPattern?: string
  /** Description shown to approvers; critical actions carry the marker prefix. */
  description: string
  category?: ActionCategory
}

interface ProtectedPath {
  entry: string
  resolved: string
}

export class RiskClassifier {
  private readonly blockedPatterns: string[]
  private readonly criticalActions: Set<string>
  private readonly criticalKeywords: string[]
  private readonly approvalCategories: Set<ActionCategory>
  private readonly protectedPaths: ProtectedPath[]
  private readonly blockedDomains: string[]
  private readonly allowedDomains: string[]

  constructor(policy: PolicyConfig) {
    this.blockedPatterns = [...policy.blockedPatterns]
    this.criticalActions = new Set(policy.criticalActions)
    this.criticalKeywords = [...policy.criticalKeywords]
    this.approvalCategories = new Set(policy.approvalCategories)
    this.protectedPaths = policy.protectedPaths.map((entry) => ({
      entry,
      resolved: path.resolve(entry),
    }))
    this.blockedDomains = policy.blockedDomains.map(normalizeDomain)
    this.allowedDomains = policy.allowedDomains.map(normalizeDomain)
  }

  classify(input: ClassificationInput): Classification {
    const details = input.details ?? {}
    const category = resolveCategory(input.actionType, details)
    const haystack = `${input.description}\n${serialize(details)}`.toLowerCase()
    const base = { description: input.description, category }

    const pattern = this.blockedPatterns.find((p) => haystack.includes(p.toLowerCase()))
    if (pattern !== undefined) {
      return {
        ...base,
        tier: "BLOCKED",
        reason: `matches blocked pattern "${pattern}"`,
        matchedPattern: pattern,
      }
    }

    if (category === "file_mutation" || category === "download") {
      const target = stringField(details, category === "download" ? "destination" : "path")
      const hit = target === undefined ? undefined : this.protectedMatch(target)
      if (hit) {
        return { ...base, tier: "BLOCKED", reason: "protected path", matchedPattern: hit.entry }
      }
    }

    if (category === "network" || category === "download") {
      const url = stringField(details, "url")
      const verdict = url === undefined ? undefined : this.domainVerdict(url)
      if (verdict) {
        return { ...base, tier: "BLOCKED", ...verdict }
      }
    }

    if (this.criticalActions.has(input.actionType)) {
      return {
        ...base,
        tier: "DANGER",
        reason: `critical action ${input.actionType}`,
        matchedPattern: input.actionType,
        description: markCritical(input.description),
      }
    }

    if (category !== undefined && this.approvalCategories.has(category)) {
      const keyword = this.criticalKeywords.find((k) => haystack.includes(k.toLowerCase()))
      if (keyword !== undefined) {
        return {
          ...base,
          tier: "DANGER",
          reason: `critical keyword "${keyword}"`,
          matchedPattern: keyword,
          description: markCritical(input.description),
        }
      }
      return { ...base, tier: "WARNING", reason: `${category} requires approval` }
    }

    return { ...base, tier: "SAFE", reason: "no approval required" }
  }

  /** Classify a validated Action, describing it when no description is given. */
  classifyAction(action: Action, description: string = describeAction(action)): Classification {
    return this.classify({ actionType: action.kind, description, details: actionDetails(action) })
  }

  private protectedMatch(target: string): ProtectedPath | undefined {
    const resolved = path.resolve(target)
    return this.protectedPaths.find(
      (p) =>
        resolved === p.resolved ||
        resolved.startsWith(p.resolved.endsWith(path.sep) ? p.resolved : p.resolved + path.sep),
    )
  }

  private domainVerdict(url: string): { reason: string; matchedPattern?: string } | undefined {
    let host: string
    try {
      host = new URL(url).hostname.toLowerCase()
    } catch {
      return { reason: "unparseable URL" }
    }

    const blocked = this.blockedDomains.find((d) => matchesDomain(host, d))
    if (blocked !== undefined) {
      return { reason: `domain ${host} is blocked`, matchedPattern: blocked }
    }
    if (this.allowedDomains.length > 0 && !this.allowedDomains.some((d) => matchesDomain(host, d))) {
      return { reason: `domain ${host} is not on the allow list`, matchedPattern: host }
    }
    return undefined
  }
}

function isActionKind(value: string): value is ActionKind {
  return Object.hasOwn(ACTION_CATEGORIES, value)
}

function resolveCategory(
  actionType: string,
  details: Record<string, unknown>,
): ActionCategory | undefined {
  if (isActionKind(actionType)) return ACTION_CATEGORIES[actionType]
  const fromDetails = ActionCategorySchema.safeParse(details.category)
  if (fromDetails.success) return fromDetails.data
  const fromType = ActionCategorySchema.safeParse(actionType)
  return fromType.success ? fromType.data : undefined
}

function stringField(details: Record<string, unknown>, key: string): string | undefined {
  const value = details[key]
  return typeof value === "string" && value.length > 0 ? value : undefined
}

function serialize(details: Record<string, unknown>): string {
  try {
    return JSON.stringify(details)
  } catch {
    // Circular or BigInt values; match on the keys alone.
    return Object.keys(details).join(" ")
  }
}

function markCritical(description: string): string {
  return description.startsWith(CRITICAL_ACTION_MARKER)
    ? description
    : `${CRITICAL_ACTION_MARKER} ${description}`
}

function normalizeDomain(domain: string): string {
  return domain.toLowerCase().replace(/^\*?\./, "")
}

function matchesDomain(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`)
}
