// src/gateway/service-registry.ts — Registry of reachable bridges and their tool catalogs
//
// ServiceDiscoveryClient polls each bridge's /health then /tools and keeps the
// registry in step: a healthy bridge is upserted, anything else is removed.

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { BridgeTarget } from "../config.js"
import { errorMessage } from "../shared/errors.js"
import { PollLoop, type PollLoopStatus } from "../shared/poll-loop.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import { readBody } from "../shared/read-body.js"
import { linkedTimeoutSignal, type Clock, type Sleeper } from "../shared/timing.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const ToolCatalogSchema = Type.Object({
  tools: Type.Array(
    Type.Object({
      name: Type.String({ minLength: 1 }),
      description: Type.Optional(Type.String()),
      schema: Type.Optional(Type.Unknown()),
    }),
  ),
})

export type ToolCatalog = Static<typeof ToolCatalogSchema>
export type ToolCatalogEntry = ToolCatalog["tools"][number]

export interface ServiceRegistryEntry {
  name: string
  url: string
  tools: ToolCatalogEntry[]
  lastSeen: number
  healthy: boolean
}

export interface RegistryStatus {
  services: number
  healthyServices: number
  tools: number
  lastDiscoveryAt: number | undefined
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class ServiceRegistry {
  private readonly entries = new Map<string, ServiceRegistryEntry>()
  private lastDiscoveryAt: number | undefined

  upsert(entry: ServiceRegistryEntry): void {
    this.entries.set(entry.name, copyEntry(entry))
    this.lastDiscoveryAt = entry.lastSeen
  }

  /** Returns true when an entry was removed. */
  remove(name: string): boolean {
    return this.entries.delete(name)
  }

  get(name: string): ServiceRegistryEntry | undefined {
    const entry = this.entries.get(name)
    return entry ? copyEntry(entry) : undefined
  }

  list(): ServiceRegistryEntry[] {
    return [...this.entries.values()].map(copyEntry)
  }

  /** Healthy entries whose catalog names `toolName`, in registration order. */
  servicesForTool(toolName: string): ServiceRegistryEntry[] {
    const matches: ServiceRegistryEntry[] = []
    for (const entry of this.entries.values()) {
      if (entry.healthy && entry.tools.some((t) => t.name === toolName)) {
        matches.push(copyEntry(entry))
      }
    }
    return matches
  }

  get size(): number {
    return this.entries.size
  }

  getStatus(): RegistryStatus {
    let healthy = 0
    let tools = 0
    for (const entry of this.entries.values()) {
      if (entry.healthy) healthy++
      tools += entry.tools.length
    }
    return {
      services: this.entries.size,
      healthyServices: healthy,
      tools,
      lastDiscoveryAt: this.lastDiscoveryAt,
    }
  }
}

function copyEntry(entry: ServiceRegistryEntry): ServiceRegistryEntry {
  return { ...entry, tools: entry.tools.map((t) => ({ ...t })) }
}

// ---------------------------------------------------------------------------
// Discovery client
// ---------------------------------------------------------------------------

export interface ServiceDiscoveryOptions {
  targets: BridgeTarget[]
  registry: ServiceRegistry
  intervalMs: number
  healthTimeoutMs: number
  fetchFn?: typeof fetch
  clock?: Clock
  sleep?: Sleeper
  logger?: Logger
}

export type PollOutcome = "registered" | "unhealthy" | "catalog_failed" | "unreachable"

export class ServiceDiscoveryClient {
  private readonly targets: BridgeTarget[]
  private readonly registry: ServiceRegistry
  private readonly intervalMs: number
  private readonly healthTimeoutMs: number
  private readonly fetchFn: typeof fetch
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly loop: PollLoop

  constructor(opts: ServiceDiscoveryOptions) {
    this.targets = opts.targets
    this.registry = opts.registry
    this.intervalMs = opts.intervalMs
    this.healthTimeoutMs = opts.healthTimeoutMs
    this.fetchFn = opts.fetchFn ?? globalThis.fetch
    this.clock = opts.clock ?? Date.now
    this.logger = opts.logger ?? createSilentLogger()
    this.loop = new PollLoop({
      name: "service-discovery",
      cycle: (signal) => this.runCycle(signal),
      fallbackDelayMs: this.intervalMs,
      logger: this.logger,
      sleep: opts.sleep,
    })
  }

  start(): void {
    this.loop.start()
  }

  async stop(): Promise<void> {
    await this.loop.stop()
  }

  getLoopStatus(): PollLoopStatus {
    return this.loop.getStatus()
  }

  async runCycle(signal?: AbortSignal): Promise<number> {
    for (const target of this.targets) {
      if (signal?.aborted) break
      await this.pollTarget(target, signal)
    }
    return this.intervalMs
  }

  /** Poll one bridge. Never throws. */
  async pollTarget(target: BridgeTarget, signal?: AbortSignal): Promise<PollOutcome> {
    try {
      const health = await this.get(`${target.url}/health`, signal)
      if (health.status !== 200) {
        this.drop(target, `health returned ${health.status}`)
        return "unhealthy"
      }

      const res = await this.get(`${target.url}/tools`, signal)
      if (res.status !== 200) {
        this.drop(target, `tool catalog returned ${res.status}`)
        return "catalog_failed"
      }
      const body: unknown = JSON.parse(res.text)
      if (!Value.Check(ToolCatalogSchema, body)) {
        this.drop(target, "tool catalog has an invalid shape")
        return "catalog_failed"
      }

      this.registry.upsert({
        name: target.name,
        url: target.url,
        tools: body.tools,
        lastSeen: this.clock(),
        healthy: true,
      })
      this.logger.debug(`registry updated for ${target.name}`, { tools: body.tools.length })
      return "registered"
    } catch (err) {
      this.drop(target, errorMessage(err))
      return "unreachable"
    }
  }

  /** GET with the body read before the timeout is released. */
  private async get(url: string, signal?: AbortSignal): Promise<{ status: number; text: string }> {
    const timeout = linkedTimeoutSignal(this.healthTimeoutMs, signal)
    try {
      const res = await this.fetchFn(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: timeout.signal,
      })
      return { status: res.status, text: await readBody(res, timeout.signal) }
    } finally {
      timeout.dispose()
    }
  }

  private drop(target: BridgeTarget, reason: string): void {
    if (this.registry.remove(target.name)) {
      this.logger.info(`removed ${target.name} from registry`, { reason })
    } else {
      this.logger.debug(`${target.name} not available`, { reason })
    }
  }
}
