/**
 * Integrity checker for the agent's own files.
 *
 * `snapshot()` records a SHA-256 of every configured file; `verify()`
 * re-hashes them and reports anything modified or missing. Findings are
 * appended to the audit log as "tampered" entries.
 */

import { createHash } from "node:crypto"
import { readFile } from "node:fs/promises"
import path from "node:path"

import { silentLogger } from "@warden/shared/tracing"
import type { Logger } from "pino"

import type { AuditLog } from "../audit/log.js"

export interface IntegrityCheckerOptions {
  files: readonly string[]
  auditLog?: AuditLog
  logger?: Logger
}

export interface IntegrityReport {
  ok: boolean
  checked: number
  modified: string[]
  missing: string[]
}

export class IntegrityChecker {
  private readonly files: string[]
  private readonly auditLog?: AuditLog
  private readonly logger: Logger
  private baseline?: Map<string, string>

  constructor(options: IntegrityCheckerOptions) {
    this.files = [...new Set(options.files.map((f) => path.resolve(f)))]
    this.auditLog = options.auditLog
    this.logger = options.logger ?? silentLogger()
  }

  get watchedFiles(): readonly string[] {
    return this.files
  }

  get hasBaseline(): boolean {
    return this.baseline !== undefined
  }

  /** Record the current hash of every file. Files that do not exist are skipped. */
  async snapshot(): Promise<ReadonlyMap<string, string>> {
    const hashes = new Map<string, string>()
    for (const file of this.files) {
      const digest = await hashFile(file)
      if (digest === undefined) {
        this.logger.warn({ file }, "Integrity file not found, not watching it")
        continue
      }
      hashes.set(file, digest)
    }
    this.baseline = hashes
    this.logger.info({ files: hashes.size }, "Integrity baseline recorded")
    return new Map(hashes)
  }

  async verify(): Promise<IntegrityReport> {
    if (!this.baseline) {
      throw new Error("No integrity baseline: call snapshot() first")
    }

    const modified: string[] = []
    const missing: string[] = []
    for (const [file, expected] of this.baseline) {
      const actual = await hashFile(file)
      if (actual === undefined) missing.push(file)
      else if (actual !== expected) modified.push(file)
    }

    for (const file of modified) this.reportTampering(file, "content hash changed")
    for (const file of missing) this.reportTampering(file, "file missing")

    const report: IntegrityReport = {
      ok: modified.length === 0 && missing.length === 0,
      checked: this.baseline.size,
      modified,
      missing,
    }
    if (report.ok) {
      this.auditLog?.append({
        actor: "system",
        action: `Integrity check of ${report.checked} files`,
        outcome: "verified",
      })
    }
    return report
  }

  private reportTampering(file: string, error: string): void {
    this.logger.error({ file, error }, "Integrity violation")
    this.auditLog?.append({
      actor: "system",
      action: `Integrity check: ${file}`,
      outcome: "tampered",
      error,
    })
  }
}

/** SHA-256 of a file's contents, or undefined if it does not exist. */
export async function hashFile(file: string): Promise<string | undefined> {
  try {
    const content = await readFile(file)
    return createHash("sha256").update(content).digest("hex")
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined
    throw err
  }
}
