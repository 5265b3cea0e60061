import type { ConfirmationRequestRecord } from "@warden/shared"
import type { ApproverChannel, ApproverResponseHandler } from "@warden/shared/channels"
import { Bot, InlineKeyboard } from "grammy"
import type { Logger } from "pino"

import type { TelegramConfig } from "./config.js"
import {
  buildCallbackData,
  formatConfirmationRequest,
  formatDetailsAlert,
  formatResolution,
  parseCallbackData,
} from "./formatter.js"

interface SentMessage {
  chatId: number
  messageId: number
}

interface PublishedRequest {
  request: ConfirmationRequestRecord
  messages: SentMessage[]
  delivered: boolean
  /** Set when the request is resolved while its messages are still being sent. */
  resolution?: ConfirmationRequestRecord
}

export interface CallbackAnswer {
  text: string
  showAlert: boolean
}

export class TelegramApproverChannel implements ApproverChannel {
  readonly channelType = "telegram" as const
  private readonly bot: Bot
  private readonly config: TelegramConfig
  private readonly logger?: Logger
  private readonly published = new Map<string, PublishedRequest>()
  private responseHandler?: ApproverResponseHandler
  private started = false

  constructor(config: TelegramConfig, logger?: Logger) {
    this.config = config
    this.logger = logger
    this.bot = new Bot(config.botToken)

    // Registered once; the bot keeps its handlers across stop() and start().
    this.bot.on("callback_query:data", async (ctx) => {
      const answer = await this.handleCallback(ctx.from.id, ctx.callbackQuery.data)
      await ctx.answerCallbackQuery({ text: answer.text, show_alert: answer.showAlert })
    })

    this.bot.catch((err) => {
      this.logger?.error({ err: err.error }, "Telegram bot error")
    })
  }

  async start(): Promise<void> {
    if (this.started) return
    this.started = true

    // Long polling only settles when the bot stops.
    this.bot.start({ allowed_updates: ["callback_query"] }).catch((err: unknown) => {
      this.started = false
      this.logger?.error({ err }, "Telegram polling stopped unexpectedly")
    })
  }

  async stop(): Promise<void> {
    if (!this.started) return
    this.started = false
    await this.bot.stop()
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.bot.api.getMe()
      return true
    } catch {
      return false
    }
  }

  /**
   * Send the request to every configured chat with Approve / Deny / Details
   * buttons. Delivery failures propagate so the gateway can audit them.
   * A resolution that lands before the sends finish is applied to the
   * messages as soon as they exist.
   */
  async publish(request: ConfirmationRequestRecord): Promise<void> {
    const keyboard = new InlineKeyboard()
      .text("✅ Approve", buildCallbackData(request.id, "a"))
      .text("❌ Deny", buildCallbackData(request.id, "r"))
      .row()
      .text("📋 Details", buildCallbackData(request.id, "d"))

    const entry: PublishedRequest = { request, messages: [], delivered: false }
    this.published.set(request.id, entry)

    const text = formatConfirmationRequest(request)
    try {
      entry.messages = await Promise.all(
        this.config.chatIds.map(async (chatId) => {
          const sent = await this.bot.api.sendMessage(Number(chatId), text, {
            parse_mode: "HTML",
            reply_markup: keyboard,
          })
          return { chatId: Number(chatId), messageId: sent.message_id }
        }),
      )
    } catch (err) {
      this.published.delete(request.id)
      throw err
    }
    entry.delivered = true

    if (entry.resolution) {
      this.published.delete(request.id)
      await this.showResolution(entry.messages, entry.resolution)
    }
  }

  /** Replace the buttons of every sent copy with the final outcome. */
  async publishResolution(request: ConfirmationRequestRecord): Promise<void> {
    const entry = this.published.get(request.id)
    if (!entry) return
    if (!entry.delivered) {
      entry.resolution = request
      return
    }
    this.published.delete(request.id)
    await this.showResolution(entry.messages, request)
  }

  private async showResolution(
    messages: readonly SentMessage[],
    request: ConfirmationRequestRecord,
  ): Promise<void> {
    const text = formatResolution(request)
    await Promise.all(
      messages.map((m) =>
        this.bot.api.editMessageText(m.chatId, m.messageId, text, { parse_mode: "HTML" }),
      ),
    )
  }

  onResponse(handler: ApproverResponseHandler): void {
    this.responseHandler = handler
  }

  /** Turn a button press into a gateway response and the text shown back to the user. */
  async handleCallback(userId: number, data: string): Promise<CallbackAnswer> {
    if (!this.config.allowedUsers.has(userId)) {
      this.logger?.warn({ userId }, "Rejected confirmation callback from unauthorized user")
      return { text: "You are not allowed to answer confirmation requests.", showAlert: true }
    }

    const parsed = parseCallbackData(data)
    if (!parsed) {
      return { text: "Unknown action.", showAlert: false }
    }

    if (parsed.action === "d") {
      const entry = this.published.get(parsed.requestId)
      return entry && !entry.resolution
        ? { text: formatDetailsAlert(entry.request), showAlert: true }
        : { text: "This request is no longer pending.", showAlert: false }
    }

    if (!this.responseHandler) {
      return { text: "Responses are not being accepted right now.", showAlert: true }
    }

    const approved = parsed.action === "a"
    const result = await this.responseHandler({
      requestId: parsed.requestId,
      approved,
      resolverId: `telegram:${userId}`,
    })

    if (!result.success) {
      return {
        text:
          result.error === "already_resolved"
            ? "This request was already resolved."
            : "This request no longer exists.",
        showAlert: false,
      }
    }
    return { text: approved ? "Approved." : "Denied.", showAlert: false }
  }
}
