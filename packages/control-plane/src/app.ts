import { ApproverChannelRegistry } from "@warden/shared/channels"
import { createLogger, loggerSettings } from "@warden/shared/tracing"
import Fastify, { type FastifyInstance } from "fastify"
import type { Logger } from "pino"

import { AuditLog } from "./audit/log.js"
import type { Config } from "./config.js"
import { ConfirmationGateway } from "./confirmation/gateway.js"
import { IntegrityChecker } from "./integrity/checker.js"
import { RiskClassifier } from "./policy/classifier.js"
import type { PolicyConfig } from "./policy/policy-config.js"
import { auditRoutes } from "./routes/audit.js"
import { confirmationRoutes } from "./routes/confirmations.js"
import { healthRoutes } from "./routes/health.js"
import { integrityRoutes } from "./routes/integrity.js"
import { planRoutes } from "./routes/plans.js"
import type { Decomposer } from "./scheduler/decomposition.js"
import { DryRunExecutor, type Executor } from "./scheduler/executor.js"
import { TaskScheduler } from "./scheduler/scheduler.js"

export interface AppContext {
  app: FastifyInstance
  auditLog: AuditLog
  classifier: RiskClassifier
  gateway: ConfirmationGateway
  scheduler: TaskScheduler
  channels: ApproverChannelRegistry
  integrity?: IntegrityChecker
}

export interface AppOptions {
  config: Config
  policy: PolicyConfig
  logger?: Logger
  /** Approver channels; connected to the gateway but not started here. */
  channels?: ApproverChannelRegistry
  /** Defaults to the dry-run executor. */
  executor?: Executor
  decomposer?: Decomposer
}

export async function buildApp(options: AppOptions): Promise<AppContext> {
  const { config, policy } = options
  const logger =
    options.logger ??
    createLogger({ level: config.logLevel, serviceName: config.tracing.serviceName })

  const app = Fastify({
    logger: loggerSettings({ level: config.logLevel, serviceName: config.tracing.serviceName }),
  })

  const auditLog = new AuditLog({ logger: logger.child({ component: "audit" }) })

  // The agent must never be allowed to rewrite the files it is checked against.
  const classifier = new RiskClassifier({
    ...policy,
    protectedPaths: [...policy.protectedPaths, ...config.integrityFiles],
  })

  const channels = options.channels ?? new ApproverChannelRegistry()
  const gateway = new ConfirmationGateway({
    classifier,
    auditLog,
    channels,
    logger: logger.child({ component: "confirmation" }),
    defaultTimeoutMs: config.confirmationTimeoutMs,
    maxTimeoutMs: config.maxConfirmationTimeoutMs,
  })

  const scheduler = new TaskScheduler({
    gateway,
    auditLog,
    decomposer: options.decomposer,
    logger: logger.child({ component: "scheduler" }),
    confirmationTimeoutMs: config.confirmationTimeoutMs,
    parallelism: config.schedulerParallelism,
    maxRetries: config.taskMaxRetries,
    retry: config.retry,
    planCapacity: config.planCapacity,
  })

  const executor = options.executor ?? new DryRunExecutor(logger.child({ component: "executor" }))

  let integrity: IntegrityChecker | undefined
  if (config.integrityFiles.length > 0) {
    integrity = new IntegrityChecker({
      files: config.integrityFiles,
      auditLog,
      logger: logger.child({ component: "integrity" }),
    })
    await integrity.snapshot()
  }

  await app.register(healthRoutes({ gateway, scheduler, auditLog, channels }))
  await app.register(confirmationRoutes({ gateway, classifier }))
  await app.register(auditRoutes({ auditLog }))
  await app.register(planRoutes({ scheduler, executor }))
  await app.register(integrityRoutes({ checker: integrity }))

  // Nothing may stay pending once the server is gone
  app.addHook("onClose", async () => {
    const plans = scheduler.cancelAll("service shutting down")
    const requests = gateway.cancelAll("service shutting down")
    if (plans > 0 || requests > 0) {
      logger.info({ plans, requests }, "Cancelled outstanding work on shutdown")
    }
    await channels.stopAll()
  })

  return { app, auditLog, classifier, gateway, scheduler, channels, integrity }
}
