// src/index.ts — Entry point: boots the bridge or the gateway depending on ROLE
// Boot sequence: config → components → start loops → serve → graceful shutdown

import { serve } from "@hono/node-server"
import { loadBridgeConfig, loadGatewayConfig, parseRole } from "./config.js"
import { createBridgeRuntime } from "./bridge/runtime.js"
import { createGatewayRuntime } from "./gateway/runtime.js"

interface Running {
  fetch: (request: Request) => Response | Promise<Response>
  port: number
  host: string
  name: string
  stop: () => Promise<void>
}

async function boot(): Promise<Running> {
  const role = parseRole(process.env.ROLE)

  if (role === "gateway") {
    const config = loadGatewayConfig()
    console.log(`[gateway] config loaded: bridges=${config.bridges.map((b) => b.url).join(",")}, port=${config.port}`)
    const runtime = createGatewayRuntime(config)
    runtime.start()
    return { fetch: runtime.app.fetch, port: config.port, host: config.host, name: config.serviceName, stop: runtime.stop }
  }

  const config = loadBridgeConfig()
  console.log(`[bridge] config loaded: upstream=${config.upstream.baseUrl}, port=${config.port}`)
  const runtime = createBridgeRuntime(config)
  await runtime.start()
  return { fetch: runtime.app.fetch, port: config.port, host: config.host, name: config.serviceName, stop: runtime.stop }
}

async function main() {
  const bootStart = Date.now()
  const running = await boot()

  const server = serve({ fetch: running.fetch, port: running.port, hostname: running.host }, (info) => {
    console.log(`[${running.name}] ready on :${info.port} (boot: ${Date.now() - bootStart}ms)`)
  })

  // Close inbound first, then stop the loops
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[${running.name}] ${signal} received, shutting down gracefully...`)

    server.close()
    try {
      await running.stop()
    } catch (err) {
      console.error(`[${running.name}] component shutdown error:`, err)
    }

    console.log(`[${running.name}] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      console.error(`[${running.name}] forced shutdown after 30s timeout`)
      process.exit(1)
    }, 30_000).unref()

    void gracefulShutdown(signal)
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[inference-bridge] fatal:", err)
  process.exit(1)
})
