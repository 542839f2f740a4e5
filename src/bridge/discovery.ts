// src/bridge/discovery.ts — Polling capability discovery with an add/remove diff registry

import { EventEmitter } from "node:events"
import type { ModelEntry, ThrottleAdvisor, UpstreamResult } from "./types.js"
import type { BridgeError } from "../shared/errors.js"
import { PollLoop, type PollLoopStatus } from "../shared/poll-loop.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import type { Clock, Sleeper } from "../shared/timing.js"

// ── Types ───────────────────────────────────────────────────

export interface ModelRecord {
  id: string
  metadata: ModelEntry
  discoveredAt: number
}

export interface CatalogSource {
  listModels(opts?: { signal?: AbortSignal }): Promise<UpstreamResult<ModelEntry[]>>
}

export interface CatalogRecovery {
  handleError(error: unknown, context?: Record<string, unknown>, signal?: AbortSignal): Promise<boolean>
}

export interface CapabilityDiscoveryOptions {
  source: CatalogSource
  intervalMs: number
  maxIntervalMs: number
  failureThreshold: number
  recovery?: CatalogRecovery
  throttle?: ThrottleAdvisor
  clock?: Clock
  sleep?: Sleeper
  logger?: Logger
}

export interface DiscoveryStatus {
  modelCount: number
  modelIds: string[]
  consecutiveFailures: number
  lastSuccessAt: number | undefined
  lastError: string | undefined
  baseIntervalMs: number
  currentIntervalMs: number
  loop: PollLoopStatus
}

// ── CapabilityDiscovery ─────────────────────────────────────

/**
 * Keeps the model registry equal to the upstream catalog.
 * Emits "model:added" and "model:removed" with the affected ModelRecord.
 */
export class CapabilityDiscovery extends EventEmitter {
  private readonly source: CatalogSource
  private readonly baseIntervalMs: number
  private readonly maxIntervalMs: number
  private readonly failureThreshold: number
  private readonly recovery?: CatalogRecovery
  private readonly throttle?: ThrottleAdvisor
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly loop: PollLoop
  private readonly registry = new Map<string, ModelRecord>()
  private consecutiveFailures = 0
  private lastSuccessAt: number | undefined
  private lastError: string | undefined
  private currentIntervalMs: number

  constructor(opts: CapabilityDiscoveryOptions) {
    super()
    this.source = opts.source
    this.baseIntervalMs = opts.intervalMs
    this.maxIntervalMs = opts.maxIntervalMs
    this.failureThreshold = opts.failureThreshold
    this.recovery = opts.recovery
    this.throttle = opts.throttle
    this.clock = opts.clock ?? Date.now
    this.logger = opts.logger ?? createSilentLogger()
    this.currentIntervalMs = this.baseIntervalMs
    this.loop = new PollLoop({
      name: "model-discovery",
      cycle: (signal) => this.runCycle(signal),
      fallbackDelayMs: this.baseIntervalMs,
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

  /** One discovery cycle. Returns the wait before the next one. */
  async runCycle(signal?: AbortSignal): Promise<number> {
    const res = await this.source.listModels({ signal })

    if (res.ok) {
      this.applyCatalog(res.data)
      this.consecutiveFailures = 0
      this.lastSuccessAt = this.clock()
      this.lastError = undefined
      this.currentIntervalMs = this.baseIntervalMs
    } else if (res.error.code === "CANCELLED") {
      return this.baseIntervalMs
    } else {
      this.currentIntervalMs = await this.onFailure(res.error, signal)
    }

    let delay = this.currentIntervalMs
    if (this.throttle?.shouldThrottle()) {
      delay += this.throttle.recommendedDelayMs()
    }
    return delay
  }

  /** Run one cycle now and return the registry size. Never throws. */
  async force(): Promise<number> {
    try {
      await this.runCycle()
    } catch (err) {
      this.logger.error("forced discovery failed", err)
    }
    return this.registry.size
  }

  hasModels(): boolean {
    return this.registry.size > 0
  }

  get size(): number {
    return this.registry.size
  }

  getModels(): ModelRecord[] {
    return [...this.registry.values()].map(copyRecord)
  }

  getModel(id: string): ModelRecord | undefined {
    const record = this.registry.get(id)
    return record ? copyRecord(record) : undefined
  }

  getStatus(): DiscoveryStatus {
    return {
      modelCount: this.registry.size,
      modelIds: [...this.registry.keys()],
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      lastError: this.lastError,
      baseIntervalMs: this.baseIntervalMs,
      currentIntervalMs: this.currentIntervalMs,
      loop: this.loop.getStatus(),
    }
  }

  // ── Private ───────────────────────────────────────────────

  private applyCatalog(entries: ModelEntry[]): void {
    const now = this.clock()
    const current = new Map<string, ModelEntry>()
    for (const entry of entries) {
      current.set(entry.id, entry)
    }

    for (const [id, record] of this.registry) {
      if (!current.has(id)) {
        this.registry.delete(id)
        this.logger.info(`model removed: ${id}`)
        this.emit("model:removed", copyRecord(record))
      }
    }

    for (const [id, entry] of current) {
      const existing = this.registry.get(id)
      if (existing) {
        existing.metadata = { ...entry }
        continue
      }
      const record: ModelRecord = { id, metadata: { ...entry }, discoveredAt: now }
      this.registry.set(id, record)
      this.logger.info(`model added: ${id}`)
      this.emit("model:added", copyRecord(record))
    }
  }

  private async onFailure(error: BridgeError, signal?: AbortSignal): Promise<number> {
    this.consecutiveFailures++
    this.lastError = error.message
    this.logger.warn("model discovery failed", {
      consecutive_failures: this.consecutiveFailures,
      code: error.code,
      detail: error.message,
    })

    if (this.consecutiveFailures < this.failureThreshold || !this.recovery) {
      return this.baseIntervalMs
    }

    const recovered = await this.recovery.handleError(error, {
      component: "model_discovery",
      consecutive_failures: this.consecutiveFailures,
    }, signal)
    if (recovered) {
      return this.baseIntervalMs
    }

    const extended = Math.min(this.baseIntervalMs * 2, this.maxIntervalMs)
    this.logger.warn("recovery failed, extending poll interval", { next_interval_ms: extended })
    return extended
  }
}

function copyRecord(record: ModelRecord): ModelRecord {
  return { id: record.id, metadata: { ...record.metadata }, discoveredAt: record.discoveredAt }
}
