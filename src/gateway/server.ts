// src/gateway/server.ts — Gateway HTTP surface: health, tool catalog, routing, aggregation

import { Hono } from "hono"
import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { ResponseAggregator } from "./aggregator.js"
import type { RouteResult, ToolRouter } from "./router.js"
import type { ServiceDiscoveryClient, ServiceRegistry } from "./service-registry.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import { requestIdMiddleware } from "../shared/request-id.js"
import type { Clock } from "../shared/timing.js"

export const AggregateRequestSchema = Type.Object({
  calls: Type.Array(
    Type.Object({
      tool: Type.String({ minLength: 1 }),
      parameters: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
      service: Type.Optional(Type.String()),
    }),
  ),
})

const ParametersSchema = Type.Record(Type.String(), Type.Unknown())

export interface GatewayAppOptions {
  serviceName: string
  version: string
  startedAt: number
  registry: ServiceRegistry
  discovery: Pick<ServiceDiscoveryClient, "getLoopStatus">
  router: Pick<ToolRouter, "route" | "getStats">
  aggregator: Pick<ResponseAggregator, "aggregate">
  clock?: Clock
  logger?: Logger
}

export function httpStatusForRoute(result: { status: RouteResult["status"] | "no_calls" | "all_failed" }): 200 | 400 | 404 | 502 | 504 {
  switch (result.status) {
    case "success": return 200
    case "service_not_found": return 404
    case "timeout": return 504
    case "no_calls": return 400
    default: return 502
  }
}

export function createGatewayApp(opts: GatewayAppOptions) {
  const app = new Hono()
  const clock = opts.clock ?? Date.now
  const logger = opts.logger ?? createSilentLogger()

  app.use("*", requestIdMiddleware())

  app.get("/health", (c) => {
    const registry = opts.registry.getStatus()
    const discovery = opts.discovery.getLoopStatus()
    return c.json({
      status: registry.healthyServices > 0 ? "healthy" : "degraded",
      service: opts.serviceName,
      version: opts.version,
      uptime_seconds: Math.floor((clock() - opts.startedAt) / 1000),
      timestamp: new Date(clock()).toISOString(),
      registry: {
        services: registry.services,
        healthy_services: registry.healthyServices,
        tools: registry.tools,
        last_discovery: registry.lastDiscoveryAt === undefined ? null : new Date(registry.lastDiscoveryAt).toISOString(),
      },
      discovery: {
        running: discovery.running,
        cycles: discovery.cycles,
        last_error: discovery.lastError ?? null,
      },
      routing: opts.router.getStats().routed,
    })
  })

  app.get("/tools", (c) => {
    const tools = opts.registry.list().flatMap((entry) =>
      entry.tools.map((tool) => ({ ...tool, service: entry.name })),
    )
    return c.json({ tools })
  })

  app.post("/tools/:name", async (c) => {
    const name = c.req.param("name")

    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ error: "Invalid JSON body", status: "invalid_request" }, 400)
    }

    const raw = typeof body === "object" && body !== null && "parameters" in body ? body.parameters : {}
    if (!Value.Check(ParametersSchema, raw)) {
      return c.json({ error: "parameters must be an object", status: "invalid_request" }, 400)
    }

    const result = await opts.router.route(name, raw)
    logger.info(`routed ${name}`, { status: result.status })
    return c.json(result, httpStatusForRoute(result))
  })

  app.post("/aggregate", async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ error: "Invalid JSON body", status: "invalid_request" }, 400)
    }

    if (!Value.Check(AggregateRequestSchema, body)) {
      return c.json({ error: "Body must be { calls: [{ tool, parameters?, service? }] }", status: "invalid_request" }, 400)
    }

    const calls = body.calls.map((call) => ({
      tool: call.tool,
      parameters: call.parameters ?? {},
      service: call.service,
    }))
    const result = await opts.aggregator.aggregate(calls)
    logger.info("aggregated calls", { calls: calls.length, status: result.status })
    return c.json(result, httpStatusForRoute(result))
  })

  return app
}
