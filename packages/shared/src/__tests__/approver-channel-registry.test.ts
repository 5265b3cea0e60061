import { describe, expect, it, vi } from "vitest"

import { ApproverChannelRegistry } from "../channels/registry.js"

function createMockChannel(type: string, healthy = true) {
  return {
    channelType: type,
    start: vi.fn().mockResolvedValue(undefined),
    stop: vi.fn().mockResolvedValue(undefined),
    healthCheck: vi.fn().mockResolvedValue(healthy),
    publish: vi.fn().mockResolvedValue(undefined),
    onResponse: vi.fn(),
  }
}

describe("ApproverChannelRegistry", () => {
  it("registers and retrieves a channel", () => {
    const registry = new ApproverChannelRegistry()
    const channel = createMockChannel("telegram")

    registry.register(channel)

    expect(registry.get("telegram")).toBe(channel)
  })

  it("returns undefined for an unregistered channel", () => {
    const registry = new ApproverChannelRegistry()
    expect(registry.get("dashboard")).toBeUndefined()
  })

  it("throws when registering a duplicate channelType", () => {
    const registry = new ApproverChannelRegistry()
    registry.register(createMockChannel("telegram"))

    expect(() => registry.register(createMockChannel("telegram"))).toThrow("already registered")
  })

  it("startAll calls start() on every channel", async () => {
    const registry = new ApproverChannelRegistry()
    const tg = createMockChannel("telegram")
    const ui = createMockChannel("dashboard")
    registry.register(tg)
    registry.register(ui)

    await registry.startAll()

    expect(tg.start).toHaveBeenCalledOnce()
    expect(ui.start).toHaveBeenCalledOnce()
  })

  it("stopAll tolerates a channel that fails to stop", async () => {
    const registry = new ApproverChannelRegistry()
    const tg = createMockChannel("telegram")
    const ui = createMockChannel("dashboard")
    ui.stop.mockRejectedValue(new Error("boom"))
    registry.register(tg)
    registry.register(ui)

    await registry.stopAll()

    expect(tg.stop).toHaveBeenCalledOnce()
    expect(ui.stop).toHaveBeenCalledOnce()
  })

  it("healthCheckAll marks a throwing channel unhealthy", async () => {
    const registry = new ApproverChannelRegistry()
    const broken = createMockChannel("telegram")
    broken.healthCheck.mockRejectedValue(new Error("connection lost"))
    registry.register(broken)
    registry.register(createMockChannel("dashboard", true))

    const results = await registry.healthCheckAll()

    expect(results.get("telegram")).toBe(false)
    expect(results.get("dashboard")).toBe(true)
  })
})
