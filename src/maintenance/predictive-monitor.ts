// src/maintenance/predictive-monitor.ts — Trend-based predictive maintenance
//
// Samples memory/CPU/disk every cycle into 24h buffers, estimates trends and
// runs cooldown-gated preventive actions. Also owns the error log the recovery
// manager writes to.

import { EventEmitter } from "node:events"
import { lstat, readdir, rm, statfs } from "node:fs/promises"
import { join } from "node:path"
import { createSystemSampler } from "../bridge/resource-monitor.js"
import type { PriorityFloor } from "../bridge/types.js"
import { errorMessage, type ErrorPattern } from "../shared/errors.js"
import { PollLoop, type PollLoopStatus } from "../shared/poll-loop.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import type { Clock, Sleeper } from "../shared/timing.js"
import { calculateTrend, DAY_SECONDS, HOUR_SECONDS, mean, samplesSince, trimBefore, type Sample } from "./trend.js"

// ---------------------------------------------------------------------------
// Thresholds
// ---------------------------------------------------------------------------

const HOUR_MS = 3_600_000
export const RETENTION_MS = 24 * HOUR_MS
export const MEMORY_TREND_LIMIT_PER_HOUR = 5
export const CPU_SUSTAINED_LIMIT_PERCENT = 80
export const CPU_SUSTAINED_WINDOW_MS = 5 * 60_000
export const DISK_TREND_LIMIT_PER_DAY = 10
export const ERROR_FREQUENCY_LIMIT = 3
export const CLEANUP_COOLDOWN_MS = HOUR_MS
export const CPU_COOLDOWN_MS = HOUR_MS
export const RESTART_COOLDOWN_MS = 2 * HOUR_MS
export const TEMP_FILE_MAX_AGE_MS = 24 * HOUR_MS

// Throttle level whose tier is "below normal"
const LOWERED_PRIORITY_LEVEL = 1

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface MetricsSample {
  memoryPercent: number
  cpuPercent: number
  diskPercent: number
}

export interface MetricsSampler {
  sample(): Promise<MetricsSample>
}

export interface MaintenanceActions {
  /** Force garbage reclamation where the runtime exposes it. */
  reclaimMemory(): void
  lowerPriority(): void
  restorePriority(): void
  /** Delete own temp files older than `maxAgeMs`; returns the number removed. */
  cleanTempFiles(maxAgeMs: number): Promise<number>
  /** Reset pooled upstream connections; true when the upstream answered afterwards. */
  resetConnections(): Promise<boolean>
}

export function createMetricsSampler(diskPath: string, clock: Clock = Date.now): MetricsSampler {
  const system = createSystemSampler(clock)
  return {
    async sample(): Promise<MetricsSample> {
      const snapshot = system.sample()
      const fs = await statfs(diskPath)
      const diskPercent = fs.blocks > 0 ? ((fs.blocks - fs.bfree) / fs.blocks) * 100 : 0
      return {
        memoryPercent: snapshot.systemMemoryPercent,
        cpuPercent: snapshot.systemCpuPercent,
        diskPercent,
      }
    },
  }
}

export interface DefaultActionsOptions {
  tempDir: string
  connections: { attemptRecovery(): Promise<boolean> }
  priority: PriorityFloor
  clock?: Clock
  logger?: Logger
}

export function createMaintenanceActions(opts: DefaultActionsOptions): MaintenanceActions {
  const clock = opts.clock ?? Date.now
  const logger = opts.logger ?? createSilentLogger()

  return {
    reclaimMemory(): void {
      const gc: unknown = Reflect.get(globalThis, "gc")
      if (typeof gc === "function") {
        gc()
      } else {
        logger.debug("garbage collection not exposed (run with --expose-gc)")
      }
    },

    lowerPriority(): void {
      opts.priority.setPriorityFloor(LOWERED_PRIORITY_LEVEL)
    },

    restorePriority(): void {
      opts.priority.setPriorityFloor(0)
    },

    async cleanTempFiles(maxAgeMs: number): Promise<number> {
      let names: string[]
      try {
        names = await readdir(opts.tempDir)
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0
        throw err
      }

      const cutoff = clock() - maxAgeMs
      let removed = 0
      for (const name of names) {
        const path = join(opts.tempDir, name)
        try {
          const info = await lstat(path)
          if (info.mtimeMs < cutoff) {
            await rm(path, { recursive: true, force: true })
            removed++
          }
        } catch (err) {
          logger.debug("skipped temp entry", { path, detail: errorMessage(err) })
        }
      }
      return removed
    },

    resetConnections(): Promise<boolean> {
      return opts.connections.attemptRecovery()
    },
  }
}

// ---------------------------------------------------------------------------
// Monitor
// ---------------------------------------------------------------------------

export type MaintenanceAction = "memory_cleanup" | "cpu_optimization" | "cpu_restore" | "disk_cleanup" | "error_mitigation"

export interface MaintenanceEvent {
  action: MaintenanceAction
  at: number
  detail: Record<string, unknown>
}

export interface ErrorLogEntry {
  at: number
  pattern: ErrorPattern
}

export interface PredictiveMonitorOptions {
  intervalMs: number
  sampler: MetricsSampler
  actions: MaintenanceActions
  clock?: Clock
  sleep?: Sleeper
  logger?: Logger
}

export interface PredictiveMonitorStatus {
  trends: {
    memoryPerHour: number
    cpuPerHour: number
    diskPerDay: number
  }
  errorsLastHour: number
  priorityLowered: boolean
  lastActions: {
    cleanupAt: number | undefined
    cpuOptimizationAt: number | undefined
    errorMitigationAt: number | undefined
  }
  cooldownRemainingMs: {
    cleanup: number
    cpuOptimization: number
    errorMitigation: number
  }
  samples: {
    memory: number
    cpu: number
    disk: number
    errors: number
  }
  loop: PollLoopStatus
}

/**
 * Emits "maintenance:action" ({@link MaintenanceEvent}) after each action and
 * "cache:prune" when caches should drop what they can rebuild.
 */
export class PredictiveMonitor extends EventEmitter {
  private readonly sampler: MetricsSampler
  private readonly actions: MaintenanceActions
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly loop: PollLoop

  private readonly memory: Sample[] = []
  private readonly cpu: Sample[] = []
  private readonly disk: Sample[] = []
  private readonly errors: ErrorLogEntry[] = []

  private lastCleanupAt: number | undefined
  private lastCpuActionAt: number | undefined
  private lastRestartAt: number | undefined
  private priorityLowered = false

  constructor(opts: PredictiveMonitorOptions) {
    super()
    this.sampler = opts.sampler
    this.actions = opts.actions
    this.clock = opts.clock ?? Date.now
    this.logger = opts.logger ?? createSilentLogger()
    this.loop = new PollLoop({
      name: "predictive-maintenance",
      cycle: async () => {
        await this.runCycle()
        return opts.intervalMs
      },
      fallbackDelayMs: opts.intervalMs,
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

  recordError(pattern: ErrorPattern): void {
    this.errors.push({ at: this.clock(), pattern })
  }

  /** Record one set of samples directly (the cycle's sampling step). */
  recordSample(sample: MetricsSample, at: number = this.clock()): void {
    this.memory.push({ at, value: sample.memoryPercent })
    this.cpu.push({ at, value: sample.cpuPercent })
    this.disk.push({ at, value: sample.diskPercent })
  }

  /** Sample, trim and evaluate every rule once. */
  async runCycle(): Promise<void> {
    const sample = await this.sampler.sample()
    const now = this.clock()
    this.recordSample(sample, now)
    this.trim(now)
    this.logger.debug("metrics sampled", {
      memory_percent: sample.memoryPercent,
      cpu_percent: sample.cpuPercent,
      disk_percent: sample.diskPercent,
    })
    await this.evaluate(now)
  }

  /** Apply the rules against the current buffers. */
  async evaluate(now: number = this.clock()): Promise<void> {
    this.checkMemory(now)
    this.checkCpu(now)
    await this.checkDisk(now)
    await this.checkErrors(now)
  }

  getStatus(): PredictiveMonitorStatus {
    const now = this.clock()
    return {
      trends: {
        memoryPerHour: calculateTrend(this.memory, HOUR_MS, now, HOUR_SECONDS),
        cpuPerHour: calculateTrend(this.cpu, HOUR_MS, now, HOUR_SECONDS),
        diskPerDay: calculateTrend(this.disk, RETENTION_MS, now, DAY_SECONDS),
      },
      errorsLastHour: this.errorsSince(now - HOUR_MS),
      priorityLowered: this.priorityLowered,
      lastActions: {
        cleanupAt: this.lastCleanupAt,
        cpuOptimizationAt: this.lastCpuActionAt,
        errorMitigationAt: this.lastRestartAt,
      },
      cooldownRemainingMs: {
        cleanup: remaining(this.lastCleanupAt, CLEANUP_COOLDOWN_MS, now),
        cpuOptimization: remaining(this.lastCpuActionAt, CPU_COOLDOWN_MS, now),
        errorMitigation: remaining(this.lastRestartAt, RESTART_COOLDOWN_MS, now),
      },
      samples: {
        memory: this.memory.length,
        cpu: this.cpu.length,
        disk: this.disk.length,
        errors: this.errors.length,
      },
      loop: this.loop.getStatus(),
    }
  }

  // --- Rules ---

  private checkMemory(now: number): void {
    const trend = calculateTrend(this.memory, HOUR_MS, now, HOUR_SECONDS)
    if (trend <= MEMORY_TREND_LIMIT_PER_HOUR) return
    if (remaining(this.lastCleanupAt, CLEANUP_COOLDOWN_MS, now) > 0) {
      this.logger.debug("memory cleanup on cooldown")
      return
    }

    this.logger.warn("memory growth trend detected, running preemptive cleanup", {
      trend_per_hour: trend,
    })
    this.lastCleanupAt = now
    try {
      this.actions.reclaimMemory()
    } catch (err) {
      this.logger.error("memory reclamation failed", err)
    }
    this.emit("cache:prune")
    this.record("memory_cleanup", now, { trend_per_hour: trend })
  }

  private checkCpu(now: number): void {
    const recent = samplesSince(this.cpu, now - CPU_SUSTAINED_WINDOW_MS).map((s) => s.value)
    if (recent.length === 0) return
    const avg = mean(recent)

    if (avg > CPU_SUSTAINED_LIMIT_PERCENT) {
      if (this.priorityLowered) return
      if (remaining(this.lastCpuActionAt, CPU_COOLDOWN_MS, now) > 0) {
        this.logger.debug("cpu optimization on cooldown")
        return
      }
      this.logger.warn("sustained high cpu, lowering process priority", { mean_percent: avg })
      this.lastCpuActionAt = now
      try {
        this.actions.lowerPriority()
        this.priorityLowered = true
        this.record("cpu_optimization", now, { mean_percent: avg })
      } catch (err) {
        this.logger.error("could not lower process priority", err)
      }
      return
    }

    if (this.priorityLowered) {
      try {
        this.actions.restorePriority()
        this.logger.info("cpu back under threshold, priority restored", { mean_percent: avg })
        this.record("cpu_restore", now, { mean_percent: avg })
      } catch (err) {
        this.logger.warn("could not restore process priority", {
          detail: err instanceof Error ? err.message : String(err),
        })
      }
      this.priorityLowered = false
    }
  }

  private async checkDisk(now: number): Promise<void> {
    const trend = calculateTrend(this.disk, RETENTION_MS, now, DAY_SECONDS)
    if (trend <= DISK_TREND_LIMIT_PER_DAY) return
    if (remaining(this.lastCleanupAt, CLEANUP_COOLDOWN_MS, now) > 0) {
      this.logger.debug("disk cleanup on cooldown")
      return
    }

    this.logger.warn("disk usage growth trend detected, cleaning temp files", { trend_per_day: trend })
    this.lastCleanupAt = now
    try {
      const removed = await this.actions.cleanTempFiles(TEMP_FILE_MAX_AGE_MS)
      this.record("disk_cleanup", now, { trend_per_day: trend, removed })
    } catch (err) {
      this.logger.error("temp file cleanup failed", err)
    }
  }

  private async checkErrors(now: number): Promise<void> {
    const count = this.errorsSince(now - HOUR_MS)
    if (count <= ERROR_FREQUENCY_LIMIT) return
    if (remaining(this.lastRestartAt, RESTART_COOLDOWN_MS, now) > 0) {
      this.logger.debug("error mitigation on cooldown")
      return
    }

    this.logger.warn(`high error frequency: ${count} errors in the last hour, resetting connections`)
    this.lastRestartAt = now
    let recovered = false
    try {
      recovered = await this.actions.resetConnections()
    } catch (err) {
      this.logger.error("connection reset failed", err)
    }
    this.record("error_mitigation", now, { errors_last_hour: count, recovered })
  }

  // --- Helpers ---

  private errorsSince(since: number): number {
    return this.errors.filter((e) => e.at > since).length
  }

  private trim(now: number): void {
    const cutoff = now - RETENTION_MS
    trimBefore(this.memory, cutoff)
    trimBefore(this.cpu, cutoff)
    trimBefore(this.disk, cutoff)
    trimBefore(this.errors, cutoff)
  }

  private record(action: MaintenanceAction, at: number, detail: Record<string, unknown>): void {
    const event: MaintenanceEvent = { action, at, detail }
    this.emit("maintenance:action", event)
  }
}

function remaining(lastAt: number | undefined, cooldownMs: number, now: number): number {
  if (lastAt === undefined) return 0
  return Math.max(0, cooldownMs - (now - lastAt))
}
