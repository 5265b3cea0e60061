import type { ConfirmationRequestRecord } from "@warden/shared"
import { describe, expect, it } from "vitest"

import {
  buildCallbackData,
  escapeHtml,
  formatConfirmationRequest,
  formatDetailsAlert,
  formatDuration,
  formatResolution,
  parseCallbackData,
} from "../formatter.js"

const REQUEST_ID = "01890a5d-ac96-774b-bcce-b302099a8057"

function makeRequest(overrides: Partial<ConfirmationRequestRecord> = {}): ConfirmationRequestRecord {
  return {
    id: REQUEST_ID,
    actionType: "program_launch",
    riskTier: "DANGER",
    description: "[CRITICAL] Launch setup.exe <silent>",
    details: { action: "program_launch", program: "setup.exe", args: ["/S"] },
    status: "PENDING",
    createdAt: "2026-01-01T00:00:00.000Z",
    expiresAt: "2026-01-01T00:01:30.000Z",
    resolvedAt: null,
    resolvedBy: null,
    reason: null,
    planId: "0190aaaa-bbbb-7ccc-8ddd-eeeeffff0000",
    taskId: "step_2",
    ...overrides,
  }
}

describe("callback data", () => {
  it("builds compact callback data", () => {
    expect(buildCallbackData(REQUEST_ID, "a")).toBe("cfm:a:01890a5dac96774bbcceb302099a8057")
  })

  it("parses callback data back to a UUID", () => {
    expect(parseCallbackData("cfm:r:01890a5dac96774bbcceb302099a8057")).toEqual({
      action: "r",
      requestId: REQUEST_ID,
    })
  })

  it("stays within Telegram's 64-byte limit", () => {
    expect(buildCallbackData(REQUEST_ID, "d").length).toBe(38)
  })

  it("rejects other formats", () => {
    expect(parseCallbackData("cfm:x:01890a5dac96774bbcceb302099a8057")).toBeNull()
    expect(parseCallbackData("cfm:a:123")).toBeNull()
    expect(parseCallbackData("apr:a:01890a5dac96774bbcceb302099a8057")).toBeNull()
  })
})

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">&</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;")
  })
})

describe("formatDuration", () => {
  it("formats minutes and seconds", () => {
    expect(formatDuration(90_000)).toBe("1m 30s")
    expect(formatDuration(120_000)).toBe("2m")
    expect(formatDuration(45_500)).toBe("45s")
    expect(formatDuration(0)).toBe("expired")
  })
})

describe("formatConfirmationRequest", () => {
  it("renders tier, action, plan and escaped description", () => {
    const text = formatConfirmationRequest(makeRequest(), Date.parse("2026-01-01T00:00:00.000Z"))

    expect(text).toBe(
      [
        "\u{1f6a8} <b>Confirmation Required</b> (DANGER)",
        "",
        "<b>Action:</b> program_launch",
        "<b>Plan:</b> #0190aaaa",
        "",
        "[CRITICAL] Launch setup.exe &lt;silent&gt;",
        "",
        "⏰ Expires in 1m 30s",
      ].join("\n"),
    )
  })

  it("omits the plan line for standalone requests", () => {
    const text = formatConfirmationRequest(makeRequest({ planId: null, riskTier: "WARNING" }))
    expect(text).not.toContain("<b>Plan:</b>")
    expect(text.startsWith("⚠️ <b>Confirmation Required</b> (WARNING)")).toBe(true)
  })
})

describe("formatResolution", () => {
  it("shows who denied and why", () => {
    const text = formatResolution(
      makeRequest({ status: "DENIED", resolvedBy: "api:alice", reason: "not today" }),
    )
    expect(text).toBe(
      [
        "<b>❌ Denied by api:alice</b>",
        "",
        "[CRITICAL] Launch setup.exe &lt;silent&gt;",
        "",
        "<i>not today</i>",
      ].join("\n"),
    )
  })

  it("shows timeouts without a resolver", () => {
    expect(formatResolution(makeRequest({ status: "TIMED_OUT" })).split("\n")[0]).toBe(
      "<b>⏰ Timed out</b>",
    )
  })
})

describe("formatDetailsAlert", () => {
  it("lists details as plain text", () => {
    expect(formatDetailsAlert(makeRequest())).toBe(
      'action: program_launch\nprogram: setup.exe\nargs: ["/S"]',
    )
  })

  it("truncates to 200 characters", () => {
    const text = formatDetailsAlert(makeRequest({ details: { blob: "x".repeat(500) } }))
    expect(text).toHaveLength(200)
    expect(text.endsWith("…")).toBe(true)
  })

  it("falls back to the description when there are no details", () => {
    expect(formatDetailsAlert(makeRequest({ details: {} }))).toBe(
      "[CRITICAL] Launch setup.exe <silent>",
    )
  })
})
