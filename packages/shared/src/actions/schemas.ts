import { z } from "zod"

// ──────────────────────────────────────────────────
// Input devices
// ──────────────────────────────────────────────────

const CoordinateSchema = z.number().int().min(0)

export const MouseClickSchema = z.object({
  kind: z.literal("mouse_click"),
  x: CoordinateSchema,
  y: CoordinateSchema,
  button: z.enum(["left", "right", "middle"]).default("left"),
})

export const MouseMoveSchema = z.object({
  kind: z.literal("mouse_move"),
  x: CoordinateSchema,
  y: CoordinateSchema,
})

export const KeyboardTypeSchema = z.object({
  kind: z.literal("keyboard_type"),
  text: z.string().min(1),
})

export const KeyboardHotkeySchema = z.object({
  kind: z.literal("keyboard_hotkey"),
  keys: z.array(z.string().min(1)).min(1),
})

export const ScreenCaptureSchema = z.object({
  kind: z.literal("screen_capture"),
  path: z.string().min(1).optional(),
})

// ──────────────────────────────────────────────────
// Files, processes, network
// ──────────────────────────────────────────────────

export const FileReadSchema = z.object({
  kind: z.literal("file_read"),
  path: z.string().min(1),
})

export const FileWriteSchema = z.object({
  kind: z.literal("file_write"),
  path: z.string().min(1),
  content: z.string().optional(),
})

export const FileDeleteSchema = z.object({
  kind: z.literal("file_delete"),
  path: z.string().min(1),
})

export const ProgramLaunchSchema = z.object({
  kind: z.literal("program_launch"),
  program: z.string().min(1),
  args: z.array(z.string()).default([]),
})

export const SystemCommandSchema = z.object({
  kind: z.literal("system_command"),
  command: z.string().min(1),
})

export const NetworkRequestSchema = z.object({
  kind: z.literal("network_request"),
  url: z.string().url(),
  method: z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"]).default("GET"),
})

export const DownloadSchema = z.object({
  kind: z.literal("download"),
  url: z.string().url(),
  destination: z.string().min(1).optional(),
})

/** A task with no side effect of its own: analysis, validation, bookkeeping. */
export const NoopSchema = z.object({
  kind: z.literal("noop"),
})

// ──────────────────────────────────────────────────
// The tagged variant every task carries
// ──────────────────────────────────────────────────

export const ActionSchema = z.discriminatedUnion("kind", [
  MouseClickSchema,
  MouseMoveSchema,
  KeyboardTypeSchema,
  KeyboardHotkeySchema,
  ScreenCaptureSchema,
  FileReadSchema,
  FileWriteSchema,
  FileDeleteSchema,
  ProgramLaunchSchema,
  SystemCommandSchema,
  NetworkRequestSchema,
  DownloadSchema,
  NoopSchema,
])

export type Action = z.infer<typeof ActionSchema>
export type ActionInput = z.input<typeof ActionSchema>
export type ActionKind = Action["kind"]

export const ActionCategorySchema = z.enum([
  "input",
  "observation",
  "file_read",
  "file_mutation",
  "program_execution",
  "system",
  "network",
  "download",
  "none",
])

export type ActionCategory = z.infer<typeof ActionCategorySchema>
