/**
 * Policy configuration: the rule sets the risk classifier works from.
 *
 * A policy is a plain value. It is read from JSON once at startup,
 * validated, and handed to the classifier's constructor.
 */

import { readFile } from "node:fs/promises"
import { fileURLToPath } from "node:url"

import { ActionCategorySchema } from "@warden/shared/actions"
import { z } from "zod"

import { PolicyConfigError } from "../errors.js"

// Entries are matched verbatim, so "sudo " keeps its trailing space.
const patternList = z
  .array(z.string().refine((s) => s.trim().length > 0, "must not be blank"))
  .default([])

export const PolicyConfigSchema = z.object({
  /** Case-insensitive substrings that make an action BLOCKED. */
  blockedPatterns: patternList,
  /** Action names that always need confirmation and are flagged critical. */
  criticalActions: patternList,
  /** Substrings that escalate an approval-gated action to DANGER. */
  criticalKeywords: patternList,
  approvalCategories: z
    .array(ActionCategorySchema)
    .default(["file_mutation", "program_execution", "system", "network", "download"]),
  /** Files or directories that may be read but never written or deleted. */
  protectedPaths: patternList,
  blockedDomains: patternList,
  /** When non-empty, network access outside these domains is BLOCKED. */
  allowedDomains: patternList,
})

export type PolicyConfig = z.infer<typeof PolicyConfigSchema>
export type PolicyConfigInput = z.input<typeof PolicyConfigSchema>

export const DEFAULT_POLICY_PATH = fileURLToPath(
  new URL("../../policy/default-policy.json", import.meta.url),
)

export function parsePolicy(raw: unknown, source = "policy"): PolicyConfig {
  const parsed = PolicyConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new PolicyConfigError(
      source,
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    )
  }
  return parsed.data
}

/**
 * Read and validate a policy file. Without a path the bundled default
 * policy is used.
 */
export async function loadPolicyFile(path: string = DEFAULT_POLICY_PATH): Promise<PolicyConfig> {
  const text = await readFile(path, "utf8")
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new PolicyConfigError(path, [err instanceof Error ? err.message : String(err)])
  }
  return parsePolicy(raw, path)
}
