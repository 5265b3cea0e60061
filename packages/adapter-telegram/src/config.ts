export interface TelegramConfig {
  botToken: string
  /** Telegram user ids allowed to approve or deny requests. */
  allowedUsers: Set<number>
  /** Chats that receive confirmation requests. Defaults to the allowed users' private chats. */
  chatIds: string[]
}

export function loadConfig(env: Record<string, string | undefined> = process.env): TelegramConfig {
  const botToken = env["TELEGRAM_BOT_TOKEN"]
  if (!botToken) {
    throw new Error("TELEGRAM_BOT_TOKEN environment variable is required")
  }

  const allowedUsers = parseIdList(env["TELEGRAM_ALLOWED_USERS"] ?? "", "TELEGRAM_ALLOWED_USERS")
  if (allowedUsers.length === 0) {
    throw new Error("TELEGRAM_ALLOWED_USERS must list at least one user id")
  }

  const chatRaw = env["TELEGRAM_CHAT_IDS"] ?? ""
  const chatIds = chatRaw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)

  for (const chatId of chatIds) {
    if (!/^-?\d+$/.test(chatId)) {
      throw new Error(`Invalid chat ID in TELEGRAM_CHAT_IDS: "${chatId}"`)
    }
  }

  return {
    botToken,
    allowedUsers: new Set(allowedUsers),
    chatIds: chatIds.length > 0 ? chatIds : allowedUsers.map(String),
  }
}

function parseIdList(raw: string, name: string): number[] {
  const ids: number[] = []
  for (const part of raw.split(",")) {
    const trimmed = part.trim()
    if (trimmed.length === 0) continue
    const n = Number(trimmed)
    if (!Number.isInteger(n) || n <= 0) {
      throw new Error(`Invalid user ID in ${name}: "${trimmed}"`)
    }
    ids.push(n)
  }
  return ids
}
