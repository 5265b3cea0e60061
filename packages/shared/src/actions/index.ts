/**
 * Action model: typed, validated descriptions of side-effecting work.
 *
 * Every task carries exactly one Action. Parameters are validated when the
 * action is created, so the classifier and executors only ever see
 * well-formed values.
 */

import { ActionSchema, type Action, type ActionCategory, type ActionKind } from "./schemas.js"

export * from "./schemas.js"

export class ActionValidationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid action: ${issues.join("; ")}`)
    this.name = "ActionValidationError"
    this.issues = issues
  }
}

/** Category of each action kind; policies grant or gate by category. */
export const ACTION_CATEGORIES: Record<ActionKind, ActionCategory> = {
  mouse_click: "input",
  mouse_move: "input",
  keyboard_type: "input",
  keyboard_hotkey: "input",
  screen_capture: "observation",
  file_read: "file_read",
  file_write: "file_mutation",
  file_delete: "file_mutation",
  program_launch: "program_execution",
  system_command: "system",
  network_request: "network",
  download: "download",
  noop: "none",
}

/**
 * Validate raw input into an Action.
 * Throws ActionValidationError listing every issue found.
 */
export function createAction(input: unknown): Action {
  const parsed = ActionSchema.safeParse(input)
  if (!parsed.success) {
    throw new ActionValidationError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    )
  }
  return parsed.data
}

export function categoryOf(action: Action): ActionCategory {
  return ACTION_CATEGORIES[action.kind]
}

/** One-line human-readable rendering of an action. */
export function describeAction(action: Action): string {
  switch (action.kind) {
    case "mouse_click":
      return `Click ${action.button} mouse button at (${action.x}, ${action.y})`
    case "mouse_move":
      return `Move mouse to (${action.x}, ${action.y})`
    case "keyboard_type":
      return `Type ${action.text.length} characters`
    case "keyboard_hotkey":
      return `Press ${action.keys.join("+")}`
    case "screen_capture":
      return action.path ? `Capture screen to ${action.path}` : "Capture screen"
    case "file_read":
      return `Read file ${action.path}`
    case "file_write":
      return `Write file ${action.path}`
    case "file_delete":
      return `Delete file ${action.path}`
    case "program_launch":
      return [`Launch ${action.program}`, ...action.args].join(" ")
    case "system_command":
      return `Run system command: ${action.command}`
    case "network_request":
      return `${action.method} ${action.url}`
    case "download":
      return action.destination
        ? `Download ${action.url} to ${action.destination}`
        : `Download ${action.url}`
    case "noop":
      return "No side effect"
  }
}

/** Key/value details shown to approvers alongside the description. */
export function actionDetails(action: Action): Record<string, unknown> {
  const { kind, ...params } = action
  return { action: kind, category: categoryOf(action), ...params }
}

/** The filesystem path an action touches, if any. */
export function targetPath(action: Action): string | undefined {
  switch (action.kind) {
    case "file_read":
    case "file_write":
    case "file_delete":
      return action.path
    case "download":
      return action.destination
    case "screen_capture":
      return action.path
    default:
      return undefined
  }
}

/** The URL an action reaches out to, if any. */
export function targetUrl(action: Action): string | undefined {
  if (action.kind === "network_request" || action.kind === "download") return action.url
  return undefined
}
