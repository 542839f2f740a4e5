// src/bridge/server.ts — Bridge HTTP surface: health, status, tool catalog, tool invocation

import { Hono } from "hono"
import type { ConnectionStatus } from "./types.js"
import type { DiscoveryStatus } from "./discovery.js"
import type { RecoveryStatus } from "./recovery-manager.js"
import type { ResourceMonitorStatus } from "./resource-monitor.js"
import { toOpenAIError, type ToolDescriptor, type ToolResult } from "./translator.js"
import type { PredictiveMonitorStatus } from "../maintenance/predictive-monitor.js"
import type { BridgeErrorCode } from "../shared/errors.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import { requestIdMiddleware } from "../shared/request-id.js"
import type { Clock } from "../shared/timing.js"

export type BridgeHealth = "healthy" | "degraded" | "starting"

export interface BridgeAppOptions {
  serviceName: string
  version: string
  upstreamUrl: string
  startedAt: number
  upstream: { getConnectionStatus(): ConnectionStatus }
  discovery: { hasModels(): boolean; getStatus(): DiscoveryStatus }
  resources: { getStatus(): ResourceMonitorStatus }
  recovery: { getStatus(): RecoveryStatus }
  maintenance: { getStatus(): PredictiveMonitorStatus }
  tools: {
    listTools(): ToolDescriptor[]
    invoke(name: string, parameters: unknown): Promise<ToolResult>
  }
  clock?: Clock
  logger?: Logger
}

export function deriveHealth(connection: ConnectionStatus, hasModels: boolean): BridgeHealth {
  if (!connection.healthy || connection.circuitState === "OPEN") return "degraded"
  if (!hasModels) return "starting"
  return "healthy"
}

function statusForError(code: BridgeErrorCode): 400 | 404 | 502 {
  switch (code) {
    case "VALIDATION_FAILED": return 400
    case "UNKNOWN_TOOL": return 404
    default: return 502
  }
}

export function createBridgeApp(opts: BridgeAppOptions) {
  const app = new Hono()
  const clock = opts.clock ?? Date.now
  const logger = opts.logger ?? createSilentLogger()
  const uptimeSeconds = () => Math.floor((clock() - opts.startedAt) / 1000)

  app.use("*", requestIdMiddleware())

  // Always 200: the payload carries the state
  app.get("/health", (c) => {
    const connection = opts.upstream.getConnectionStatus()
    const discovery = opts.discovery.getStatus()
    const resources = opts.resources.getStatus()
    const recovery = opts.recovery.getStatus()
    const maintenance = opts.maintenance.getStatus()

    return c.json({
      status: deriveHealth(connection, opts.discovery.hasModels()),
      service: opts.serviceName,
      version: opts.version,
      uptime_seconds: uptimeSeconds(),
      timestamp: new Date(clock()).toISOString(),
      dependencies: {
        upstream: {
          status: connection.healthy ? "connected" : "disconnected",
          url: connection.baseUrl,
          circuit_state: connection.circuitState,
          circuit_failures: connection.circuitFailures,
          seconds_since_last_success: Math.round(connection.secondsSinceLastSuccess),
        },
      },
      components: {
        model_discovery: {
          models: discovery.modelCount,
          consecutive_failures: discovery.consecutiveFailures,
          running: discovery.loop.running,
        },
        resource_monitor: {
          throttle_level: resources.throttle.level,
          user_active: resources.throttle.userActive,
          running: resources.loop.running,
        },
        recovery: {
          attempts: recovery.attempts,
          max_attempts: recovery.maxAttempts,
          recovery_available: recovery.recoveryAvailable,
        },
        predictive_maintenance: {
          memory_trend_per_hour: maintenance.trends.memoryPerHour,
          errors_last_hour: maintenance.errorsLastHour,
          running: maintenance.loop.running,
        },
      },
    })
  })

  app.get("/status", (c) => {
    return c.json({
      service: opts.serviceName,
      version: opts.version,
      uptime_seconds: uptimeSeconds(),
      started_at: new Date(opts.startedAt).toISOString(),
      upstream_url: opts.upstreamUrl,
      connection: opts.upstream.getConnectionStatus(),
      discovery: opts.discovery.getStatus(),
      resources: opts.resources.getStatus(),
      recovery: opts.recovery.getStatus(),
      maintenance: opts.maintenance.getStatus(),
    })
  })

  app.get("/tools", (c) => {
    return c.json({ tools: opts.tools.listTools() })
  })

  app.post("/mcp/tools/:name", async (c) => {
    const name = c.req.param("name")

    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json(
        { error: { message: "Invalid JSON body", type: "invalid_request_error", code: "invalid_request" } },
        400,
      )
    }

    const parameters = typeof body === "object" && body !== null && "parameters" in body ? body.parameters : {}
    const started = clock()
    const outcome = await opts.tools.invoke(name, parameters)

    if (outcome.ok) {
      logger.info(`tool ${name} succeeded`, { duration_ms: clock() - started })
      return c.json({ result: outcome.result })
    }

    logger.warn(`tool ${name} failed`, { code: outcome.error.code, duration_ms: clock() - started })
    return c.json(toOpenAIError(outcome.error), statusForError(outcome.error.code))
  })

  return app
}
