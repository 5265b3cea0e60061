/**
 * Executor collaborator: performs a task's action once it is approved.
 * Input drivers, file and network tools live behind this interface.
 */

import { describeAction, targetPath, targetUrl } from "@warden/shared/actions"
import { silentLogger } from "@warden/shared/tracing"
import type { Logger } from "pino"

import type { Task } from "./plan.js"

export interface ExecutionContext {
  planId: string
  attempt: number
  /** Aborted when the plan is cancelled; the executor decides how to stop. */
  signal: AbortSignal
}

export interface Executor {
  /** Resolve with the task's result, or throw to have it retried. */
  execute(task: Readonly<Task>, context: ExecutionContext): Promise<unknown>
}

/**
 * Records what would have been done without touching the machine. The
 * service runs with this until a real executor is plugged in.
 */
export class DryRunExecutor implements Executor {
  private readonly logger: Logger

  constructor(logger: Logger = silentLogger()) {
    this.logger = logger
  }

  async execute(task: Readonly<Task>, context: ExecutionContext): Promise<unknown> {
    const performed = describeAction(task.action)
    this.logger.info(
      {
        planId: context.planId,
        taskId: task.id,
        attempt: context.attempt,
        action: task.action.kind,
        target: targetPath(task.action) ?? targetUrl(task.action),
      },
      `Dry run: ${performed}`,
    )
    return { dryRun: true, performed }
  }
}
