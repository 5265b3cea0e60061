/**
 * Approver Channel Registry
 *
 * Central registry for approver channels. Manages lookup, lifecycle
 * (start/stop) and health checks.
 */

import type { ApproverChannel } from "./types.js"

export class ApproverChannelRegistry {
  private readonly channels = new Map<string, ApproverChannel>()

  /** Register a channel. Throws if the channelType is already registered. */
  register(channel: ApproverChannel): void {
    if (this.channels.has(channel.channelType)) {
      throw new Error(`Approver channel '${channel.channelType}' already registered`)
    }
    this.channels.set(channel.channelType, channel)
  }

  get(channelType: string): ApproverChannel | undefined {
    return this.channels.get(channelType)
  }

  getAll(): ApproverChannel[] {
    return [...this.channels.values()]
  }

  async startAll(): Promise<void> {
    await Promise.all(this.getAll().map((c) => c.start()))
  }

  /** Stop every channel; individual failures are ignored. */
  async stopAll(): Promise<void> {
    await Promise.allSettled(this.getAll().map((c) => c.stop()))
  }

  /** Health check all channels. Returns a map of channelType → healthy. */
  async healthCheckAll(): Promise<Map<string, boolean>> {
    const entries = [...this.channels.entries()]
    const checks = await Promise.all(
      entries.map(async ([type, channel]) => {
        const healthy = await channel.healthCheck().catch(() => false)
        return [type, healthy] as const
      }),
    )
    return new Map(checks)
  }
}
