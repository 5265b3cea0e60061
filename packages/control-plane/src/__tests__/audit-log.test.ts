import { createHash } from "node:crypto"

import { beforeEach, describe, expect, it, vi } from "vitest"

import { computeEntryHash, verifyAuditChain } from "../audit/chain.js"
import { type AuditEntry, AuditLog } from "../audit/log.js"

vi.mock("node:crypto", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:crypto")>()
  return { ...actual, createHash: vi.fn(actual.createHash) }
})

function fixedClock(start = Date.parse("2026-01-01T00:00:00.000Z")): () => Date {
  let tick = 0
  return () => new Date(start + tick++ * 1000)
}

function seededLog(count: number): AuditLog {
  const log = new AuditLog({ now: fixedClock() })
  for (let i = 1; i <= count; i++) {
    log.append({ actor: "scheduler", action: `step ${i}`, outcome: "completed", planId: "plan-1" })
  }
  return log
}

describe("AuditLog", () => {
  it("numbers entries from 1 and links each to the previous hash", () => {
    const log = seededLog(3)
    const [first, second, third] = log.exportAll()

    expect(first?.sequence).toBe(1)
    expect(first?.previousHash).toBeNull()
    expect(second?.previousHash).toBe(first?.entryHash)
    expect(third?.previousHash).toBe(second?.entryHash)
    expect(third?.sequence).toBe(3)
  })

  it("stores optional links only when given", () => {
    const log = new AuditLog({ now: fixedClock() })
    const entry = log.append({ actor: "user", action: "Approve", outcome: "approved" })

    expect(entry).toEqual({
      sequence: 1,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "user",
      action: "Approve",
      riskTier: null,
      outcome: "approved",
      previousHash: null,
      entryHash: computeEntryHash({
        sequence: 1,
        timestamp: "2026-01-01T00:00:00.000Z",
        actor: "user",
        action: "Approve",
        riskTier: null,
        outcome: "approved",
        previousHash: null,
      }),
    })
    expect(Object.keys(entry)).not.toContain("planId")
  })

  it("freezes appended entries", () => {
    const entry = seededLog(1).exportAll()[0]

    expect(Object.isFrozen(entry)).toBe(true)
  })

  it("returns copies so readers cannot disturb the log", () => {
    const log = seededLog(2)
    const exported = log.exportAll()
    exported.pop()

    expect(log.size).toBe(2)
  })

  it("tails the newest entries, oldest first", () => {
    const log = seededLog(5)

    expect(log.tail(2).map((e) => e.action)).toEqual(["step 4", "step 5"])
    expect(log.tail(0)).toEqual([])
    expect(log.tail()).toHaveLength(5)
  })

  it("finds entries by plan, task and request", () => {
    const log = new AuditLog()
    log.append({ actor: "scheduler", action: "a", outcome: "started", planId: "p1", taskId: "t1" })
    log.append({ actor: "scheduler", action: "b", outcome: "started", planId: "p1", taskId: "t2" })
    log.append({ actor: "system", action: "c", outcome: "requested", requestId: "r1" })

    expect(log.find({ planId: "p1" })).toHaveLength(2)
    expect(log.find({ planId: "p1", taskId: "t2" }).map((e) => e.action)).toEqual(["b"])
    expect(log.find({ requestId: "r1" }).map((e) => e.action)).toEqual(["c"])
    expect(log.find({ planId: "p2" })).toEqual([])
  })

  it("serializes to a JSON array of entries", () => {
    const log = seededLog(2)
    const parsed: unknown = JSON.parse(JSON.stringify(log))

    expect(parsed).toEqual(log.exportAll())
  })
})

describe("verifyAuditChain", () => {
  it("accepts an untouched chain", () => {
    expect(seededLog(4).verify()).toEqual({ valid: true, checked: 4 })
  })

  it("accepts an empty chain", () => {
    expect(verifyAuditChain([])).toEqual({ valid: true, checked: 0 })
  })

  it("detects an edited entry", () => {
    const entries: AuditEntry[] = seededLog(4).exportAll()
    const original = entries[2]
    if (!original) throw new Error("missing entry")
    entries[2] = { ...original, outcome: "failed" }

    expect(verifyAuditChain(entries)).toEqual({ valid: false, checked: 2, brokenAt: 3 })
  })

  it("detects a removed entry", () => {
    const entries = seededLog(4).exportAll()
    entries.splice(1, 1)

    expect(verifyAuditChain(entries)).toEqual({ valid: false, checked: 1, brokenAt: 3 })
  })

  it("takes entries before the starting index as verified", () => {
    const entries: AuditEntry[] = seededLog(4).exportAll()
    const first = entries[0]
    if (!first) throw new Error("missing entry")
    entries[0] = { ...first, action: "rewritten" }

    expect(verifyAuditChain(entries)).toEqual({ valid: false, checked: 0, brokenAt: 1 })
    expect(verifyAuditChain(entries, 2)).toEqual({ valid: true, checked: 4 })
  })

  it("still checks the link into the starting entry", () => {
    const entries = seededLog(4).exportAll()
    entries.splice(1, 1)

    expect(verifyAuditChain(entries, 1)).toEqual({ valid: false, checked: 1, brokenAt: 3 })
  })

  it("detects reordered entries", () => {
    const entries = seededLog(3).exportAll().reverse()

    expect(verifyAuditChain(entries).valid).toBe(false)
    expect(verifyAuditChain(entries).brokenAt).toBe(3)
  })
})

describe("AuditLog.verify", () => {
  const hashes = vi.mocked(createHash)

  beforeEach(() => {
    hashes.mockClear()
  })

  it("hashes only entries appended since the last clean check", () => {
    const log = seededLog(3)
    hashes.mockClear()

    expect(log.verify()).toEqual({ valid: true, checked: 3 })
    expect(hashes).toHaveBeenCalledTimes(3)

    hashes.mockClear()
    expect(log.verify()).toEqual({ valid: true, checked: 3 })
    expect(hashes).not.toHaveBeenCalled()

    log.append({ actor: "user", action: "approve", outcome: "approved" })
    hashes.mockClear()
    expect(log.verify()).toEqual({ valid: true, checked: 4 })
    expect(hashes).toHaveBeenCalledTimes(1)
  })

  it("walks the whole chain when asked for a full check", () => {
    const log = seededLog(3)
    log.verify()
    hashes.mockClear()

    expect(log.verify({ full: true })).toEqual({ valid: true, checked: 3 })
    expect(hashes).toHaveBeenCalledTimes(3)
  })
})
