import { TelegramApproverChannel } from "@warden/adapter-telegram"
import { ApproverChannelRegistry } from "@warden/shared/channels"
import { createLogger, initTracing, shutdownTracing } from "@warden/shared/tracing"

import { buildApp } from "./app.js"
import { loadConfig } from "./config.js"
import { loadPolicyFile } from "./policy/policy-config.js"
import { registerShutdownHandlers } from "./shutdown.js"

const config = loadConfig()

// Initialize tracing before anything else
initTracing(config.tracing)

const logger = createLogger({ level: config.logLevel, serviceName: config.tracing.serviceName })

const policy = await loadPolicyFile(config.policyFile)

// ---------------------------------------------------------------------------
// Approver channels, instantiated from config
// ---------------------------------------------------------------------------
const channels = new ApproverChannelRegistry()

if (config.channels.telegram) {
  channels.register(
    new TelegramApproverChannel(config.channels.telegram, logger.child({ channel: "telegram" })),
  )
}

const { app } = await buildApp({ config, policy, logger, channels })

registerShutdownHandlers({ fastify: app, onClosed: shutdownTracing })

try {
  await channels.startAll()
  const address = await app.listen({ port: config.port, host: config.host })
  app.log.info(`Warden control plane listening on ${address}`)
} catch (err) {
  app.log.fatal(err)
  await channels.stopAll()
  await shutdownTracing()
  process.exit(1)
}
