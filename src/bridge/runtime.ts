// src/bridge/runtime.ts — Bridge component wiring and lifecycle
// Boot order: upstream client → resource monitor → maintenance → recovery → discovery → translator → app

import { mkdir } from "node:fs/promises"
import { CapabilityDiscovery } from "./discovery.js"
import { createHttpPool } from "./http-pool.js"
import { RecoveryManager } from "./recovery-manager.js"
import { ResourceMonitor, type PrioritySetter, type ResourceSampler } from "./resource-monitor.js"
import { createBridgeApp } from "./server.js"
import { ToolTranslator } from "./translator.js"
import { UpstreamClient } from "./upstream-client.js"
import type { BridgeConfig } from "../config.js"
import {
  createMaintenanceActions,
  createMetricsSampler,
  PredictiveMonitor,
  type MaintenanceActions,
  type MetricsSampler,
} from "../maintenance/predictive-monitor.js"
import { createLogger, type Logger } from "../shared/logger.js"
import type { Clock, Sleeper } from "../shared/timing.js"

export interface BridgeRuntimeOptions {
  fetchFn?: typeof fetch
  resourceSampler?: ResourceSampler
  metricsSampler?: MetricsSampler
  maintenanceActions?: MaintenanceActions
  setPriority?: PrioritySetter
  clock?: Clock
  sleep?: Sleeper
  logger?: Logger
}

export interface BridgeRuntime {
  app: ReturnType<typeof createBridgeApp>
  upstream: UpstreamClient
  resources: ResourceMonitor
  maintenance: PredictiveMonitor
  recovery: RecoveryManager
  discovery: CapabilityDiscovery
  translator: ToolTranslator
  start(): Promise<void>
  stop(): Promise<void>
}

export function createBridgeRuntime(config: BridgeConfig, opts: BridgeRuntimeOptions = {}): BridgeRuntime {
  const clock = opts.clock ?? Date.now
  const logger = opts.logger ?? createLogger(config.serviceName, { level: config.logLevel })
  const startedAt = clock()

  const upstream = new UpstreamClient({
    config: config.upstream,
    createPool: () => createHttpPool(opts.fetchFn),
    clock,
    sleep: opts.sleep,
    logger: logger.child("upstream"),
  })

  const resources = new ResourceMonitor({
    intervalMs: config.resources.intervalMs,
    caps: { maxCpuPercent: config.resources.maxCpuPercent, maxMemoryPercent: config.resources.maxMemoryPercent },
    sampler: opts.resourceSampler,
    setPriority: opts.setPriority,
    clock,
    sleep: opts.sleep,
    logger: logger.child("resources"),
  })
  upstream.setThrottleAdvisor(resources)

  const maintenanceLogger = logger.child("maintenance")
  const maintenance = new PredictiveMonitor({
    intervalMs: config.maintenance.intervalMs,
    sampler: opts.metricsSampler ?? createMetricsSampler(config.maintenance.diskPath, clock),
    actions: opts.maintenanceActions ?? createMaintenanceActions({
      tempDir: config.maintenance.tempDir,
      connections: upstream,
      priority: resources,
      clock,
      logger: maintenanceLogger,
    }),
    clock,
    sleep: opts.sleep,
    logger: maintenanceLogger,
  })

  const recovery = new RecoveryManager({
    target: upstream,
    maxAttempts: config.recovery.maxAttempts,
    cooldownMs: config.recovery.cooldownMs,
    recorder: maintenance,
    clock,
    sleep: opts.sleep,
    logger: logger.child("recovery"),
  })

  const discovery = new CapabilityDiscovery({
    source: upstream,
    intervalMs: config.discovery.intervalMs,
    maxIntervalMs: config.discovery.maxIntervalMs,
    failureThreshold: config.discovery.failureThreshold,
    recovery,
    throttle: resources,
    clock,
    sleep: opts.sleep,
    logger: logger.child("discovery"),
  })

  const translator = new ToolTranslator({
    backend: upstream,
    catalog: discovery,
    recovery,
    logger: logger.child("translator"),
  })

  const app = createBridgeApp({
    serviceName: config.serviceName,
    version: config.version,
    upstreamUrl: config.upstream.baseUrl,
    startedAt,
    upstream,
    discovery,
    resources,
    recovery,
    maintenance,
    tools: translator,
    clock,
    logger: logger.child("http"),
  })

  let started = false

  return {
    app,
    upstream,
    resources,
    maintenance,
    recovery,
    discovery,
    translator,

    async start(): Promise<void> {
      if (started) return
      started = true
      await mkdir(config.maintenance.tempDir, { recursive: true })
      resources.start()
      maintenance.start()
      discovery.start()
      logger.info("bridge components started", { upstream: config.upstream.baseUrl })
    },

    async stop(): Promise<void> {
      if (!started) return
      started = false
      await Promise.all([discovery.stop(), maintenance.stop(), resources.stop()])
      upstream.close()
      logger.info("bridge components stopped")
    },
  }
}
