export { ApproverChannelRegistry } from "./registry.js"
export type { ApproverChannel, ApproverResponse, ApproverResponseHandler } from "./types.js"
