import 'dotenv/config'

import { loadConfig } from './src/server/config/index.ts'
import { initEmbeddingsCapability } from './src/server/embeddings/backends/index.ts'
import { setupTelemetry, shutdownTelemetry } from './src/server/telemetry/setup.ts'

async function main(): Promise<void> {
  const config = loadConfig()
  const telemetry = setupTelemetry(config)
  // Loaded after telemetry so the HTTP and Express instrumentation can patch it.
  const { createApp } = await import('./api/app.ts')
  const capability = await initEmbeddingsCapability(config.embedding)

  const app = createApp({ config, capability, metrics: telemetry.embeddingsMetrics })

  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`[server] ${config.serviceName} ${config.serviceVersion} listening on http://${config.server.host}:${config.server.port}`)
    console.log(`[server] embeddings: ${capability.state} (backend=${config.embedding.backend}, model=${config.embedding.modelName})`)
  })

  let shuttingDown = false
  const shutdown = (): void => {
    if (shuttingDown) { return }
    shuttingDown = true
    console.log('[server] shutting down...')
    server.close(() => {
      shutdownTelemetry(telemetry)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error(error)
          process.exit(1)
        })
    })
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
