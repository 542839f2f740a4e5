// src/gateway/runtime.ts — Gateway component wiring and lifecycle

import { ResponseAggregator } from "./aggregator.js"
import { ToolRouter } from "./router.js"
import { createGatewayApp } from "./server.js"
import { ServiceDiscoveryClient, ServiceRegistry } from "./service-registry.js"
import type { GatewayConfig } from "../config.js"
import { createLogger, type Logger } from "../shared/logger.js"
import type { Clock, Sleeper } from "../shared/timing.js"

export interface GatewayRuntimeOptions {
  fetchFn?: typeof fetch
  clock?: Clock
  sleep?: Sleeper
  logger?: Logger
}

export interface GatewayRuntime {
  app: ReturnType<typeof createGatewayApp>
  registry: ServiceRegistry
  discovery: ServiceDiscoveryClient
  router: ToolRouter
  aggregator: ResponseAggregator
  start(): void
  stop(): Promise<void>
}

export function createGatewayRuntime(config: GatewayConfig, opts: GatewayRuntimeOptions = {}): GatewayRuntime {
  const clock = opts.clock ?? Date.now
  const logger = opts.logger ?? createLogger(config.serviceName, { level: config.logLevel })

  const registry = new ServiceRegistry()
  const discovery = new ServiceDiscoveryClient({
    targets: config.bridges,
    registry,
    intervalMs: config.discoveryIntervalMs,
    healthTimeoutMs: config.healthTimeoutMs,
    fetchFn: opts.fetchFn,
    clock,
    sleep: opts.sleep,
    logger: logger.child("discovery"),
  })
  const router = new ToolRouter({
    registry,
    timeoutMs: config.requestTimeoutMs,
    userAgent: `${config.serviceName}/${config.version}`,
    fetchFn: opts.fetchFn,
    logger: logger.child("router"),
  })
  const aggregator = new ResponseAggregator({
    router,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child("aggregator"),
  })
  const app = createGatewayApp({
    serviceName: config.serviceName,
    version: config.version,
    startedAt: clock(),
    registry,
    discovery,
    router,
    aggregator,
    clock,
    logger: logger.child("http"),
  })

  return {
    app,
    registry,
    discovery,
    router,
    aggregator,
    start(): void {
      discovery.start()
      logger.info("gateway components started", { bridges: config.bridges.map((b) => b.url) })
    },
    async stop(): Promise<void> {
      await discovery.stop()
      logger.info("gateway components stopped")
    },
  }
}
