export { type CallbackAnswer, TelegramApproverChannel } from "./adapter.js"
export { loadConfig, type TelegramConfig } from "./config.js"
export {
  buildCallbackData,
  type CallbackAction,
  type ConfirmationCallback,
  escapeHtml,
  formatConfirmationRequest,
  formatDetailsAlert,
  formatDuration,
  formatResolution,
  parseCallbackData,
} from "./formatter.js"
