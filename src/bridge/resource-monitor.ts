// src/bridge/resource-monitor.ts — Host/own-process pressure sampling and throttle level
//
// Each cycle samples CPU and memory, derives a 0..5 throttle level and moves the
// process scheduling priority with it. Consumers read the result through the
// ThrottleAdvisor interface only. Maintenance can hold the priority down through
// a floor level; the monitor applies whichever of the two is higher.

import { cpus, freemem, setPriority, totalmem } from "node:os"
import type { PriorityFloor, ThrottleAdvisor } from "./types.js"
import { PollLoop, type PollLoopStatus } from "../shared/poll-loop.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import type { Clock, Sleeper } from "../shared/timing.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResourceSnapshot {
  timestamp: number
  systemCpuPercent: number
  systemMemoryPercent: number
  ownCpuPercent: number
  ownMemoryPercent: number
}

export interface ThrottleState {
  level: number
  recommendedDelayMs: number
  userActive: boolean
  reasons: string[]
}

export interface ResourceCaps {
  maxCpuPercent: number
  maxMemoryPercent: number
}

export interface ResourceSampler {
  sample(): ResourceSnapshot
}

/** Applies a nice value to the current process. Throws when the OS refuses. */
export type PrioritySetter = (nice: number) => void

export const MAX_THROTTLE_LEVEL = 5
export const USER_ACTIVITY_MARGIN_PERCENT = 20
export const SYSTEM_CPU_LIMIT_PERCENT = 80
export const SYSTEM_MEMORY_LIMIT_PERCENT = 85

const DELAY_BY_LEVEL: Record<number, number> = {
  1: 100,
  2: 250,
  3: 500,
  4: 1000,
  5: 2000,
}

// normal / below-normal / low / idle
const NICE_BY_TIER = [0, 10, 15, 19] as const

// ---------------------------------------------------------------------------
// Pure rules
// ---------------------------------------------------------------------------

export function recommendedDelay(level: number): number {
  return DELAY_BY_LEVEL[level] ?? 0
}

export function detectUserActivity(snapshot: ResourceSnapshot): boolean {
  return snapshot.systemCpuPercent - snapshot.ownCpuPercent > USER_ACTIVITY_MARGIN_PERCENT
}

/** Maximum over the independent rules, +1 (capped) when the user is active and any rule fired. */
export function computeThrottleLevel(snapshot: ResourceSnapshot, caps: ResourceCaps): ThrottleState {
  const reasons: string[] = []
  let level = 0

  if (snapshot.systemCpuPercent > SYSTEM_CPU_LIMIT_PERCENT) {
    level = Math.max(level, 3)
    reasons.push(`system cpu ${snapshot.systemCpuPercent.toFixed(1)}%`)
  }
  if (snapshot.systemMemoryPercent > SYSTEM_MEMORY_LIMIT_PERCENT) {
    level = Math.max(level, 2)
    reasons.push(`system memory ${snapshot.systemMemoryPercent.toFixed(1)}%`)
  }
  if (snapshot.ownCpuPercent > caps.maxCpuPercent) {
    level = Math.max(level, 2)
    reasons.push(`own cpu ${snapshot.ownCpuPercent.toFixed(1)}%`)
  }
  if (snapshot.ownMemoryPercent > caps.maxMemoryPercent) {
    level = Math.max(level, 1)
    reasons.push(`own memory ${snapshot.ownMemoryPercent.toFixed(1)}%`)
  }

  const userActive = detectUserActivity(snapshot)
  if (userActive && level > 0) {
    level = Math.min(level + 1, MAX_THROTTLE_LEVEL)
    reasons.push("user active")
  }

  return { level, recommendedDelayMs: recommendedDelay(level), userActive, reasons }
}

export function niceForLevel(level: number): number {
  return NICE_BY_TIER[Math.min(Math.max(level, 0), NICE_BY_TIER.length - 1)]
}

// ---------------------------------------------------------------------------
// System sampler
// ---------------------------------------------------------------------------

interface CpuTimes {
  idle: number
  total: number
}

function readCpuTimes(): CpuTimes {
  let idle = 0
  let total = 0
  for (const cpu of cpus()) {
    const t = cpu.times
    idle += t.idle
    total += t.user + t.nice + t.sys + t.idle + t.irq
  }
  return { idle, total }
}

/**
 * Samples via node:os and process. CPU figures are deltas since the previous
 * sample, so the first call reports 0 %. Own CPU is normalised across cores.
 */
export function createSystemSampler(clock: Clock = Date.now): ResourceSampler {
  let lastCpu = readCpuTimes()
  let lastOwn = process.cpuUsage()
  let lastAt = clock()
  const cores = Math.max(cpus().length, 1)

  return {
    sample(): ResourceSnapshot {
      const now = clock()
      const cpu = readCpuTimes()
      const own = process.cpuUsage()

      const totalDelta = cpu.total - lastCpu.total
      const idleDelta = cpu.idle - lastCpu.idle
      const systemCpuPercent = totalDelta > 0 ? (1 - idleDelta / totalDelta) * 100 : 0

      const wallMicros = (now - lastAt) * 1000
      const ownMicros = own.user - lastOwn.user + (own.system - lastOwn.system)
      const ownCpuPercent = wallMicros > 0 ? (ownMicros / wallMicros / cores) * 100 : 0

      lastCpu = cpu
      lastOwn = own
      lastAt = now

      const total = totalmem()
      return {
        timestamp: now,
        systemCpuPercent: clampPercent(systemCpuPercent),
        systemMemoryPercent: clampPercent(((total - freemem()) / total) * 100),
        ownCpuPercent: clampPercent(ownCpuPercent),
        ownMemoryPercent: clampPercent((process.memoryUsage().rss / total) * 100),
      }
    },
  }
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0
  return Math.min(Math.max(value, 0), 100)
}

export const setProcessPriority: PrioritySetter = (nice) => {
  setPriority(nice)
}

// ---------------------------------------------------------------------------
// Monitor
// ---------------------------------------------------------------------------

export interface ResourceMonitorOptions {
  intervalMs: number
  caps: ResourceCaps
  sampler?: ResourceSampler
  setPriority?: PrioritySetter
  clock?: Clock
  sleep?: Sleeper
  logger?: Logger
}

export interface ResourceMonitorStatus {
  throttle: ThrottleState
  snapshot: ResourceSnapshot | undefined
  nice: number
  priorityFloor: number
  caps: ResourceCaps
  loop: PollLoopStatus
}

export class ResourceMonitor implements ThrottleAdvisor, PriorityFloor {
  private readonly intervalMs: number
  private readonly caps: ResourceCaps
  private readonly sampler: ResourceSampler
  private readonly applyPriority: PrioritySetter
  private readonly logger: Logger
  private readonly loop: PollLoop
  private snapshot: ResourceSnapshot | undefined
  private throttle: ThrottleState = { level: 0, recommendedDelayMs: 0, userActive: false, reasons: [] }
  private nice = 0
  private priorityFloor = 0

  constructor(opts: ResourceMonitorOptions) {
    this.intervalMs = opts.intervalMs
    this.caps = opts.caps
    this.sampler = opts.sampler ?? createSystemSampler(opts.clock)
    this.applyPriority = opts.setPriority ?? setProcessPriority
    this.logger = opts.logger ?? createSilentLogger()
    this.loop = new PollLoop({
      name: "resource-monitor",
      cycle: async () => {
        this.runCycle()
        return this.intervalMs
      },
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

  /** Sample once and recompute the throttle state. */
  runCycle(): ThrottleState {
    const snapshot = this.sampler.sample()
    const next = computeThrottleLevel(snapshot, this.caps)
    const previous = this.throttle.level

    this.snapshot = snapshot
    this.throttle = next

    if (next.level !== previous) {
      this.logger.info(`throttle level ${previous} -> ${next.level}`, {
        reasons: next.reasons,
        system_cpu: round(snapshot.systemCpuPercent),
        system_memory: round(snapshot.systemMemoryPercent),
        own_cpu: round(snapshot.ownCpuPercent),
        own_memory: round(snapshot.ownMemoryPercent),
      })
      this.adjustPriority(next.level)
    }
    return { ...next, reasons: [...next.reasons] }
  }

  shouldThrottle(): boolean {
    return this.throttle.level >= 2
  }

  recommendedDelayMs(): number {
    return this.throttle.recommendedDelayMs
  }

  setPriorityFloor(level: number): void {
    const floor = Math.min(Math.max(level, 0), MAX_THROTTLE_LEVEL)
    if (floor === this.priorityFloor) return
    this.priorityFloor = floor
    this.adjustPriority(this.throttle.level)
  }

  getThrottleState(): ThrottleState {
    return { ...this.throttle, reasons: [...this.throttle.reasons] }
  }

  getStatus(): ResourceMonitorStatus {
    return {
      throttle: this.getThrottleState(),
      snapshot: this.snapshot ? { ...this.snapshot } : undefined,
      nice: this.nice,
      priorityFloor: this.priorityFloor,
      caps: { ...this.caps },
      loop: this.loop.getStatus(),
    }
  }

  private adjustPriority(level: number): void {
    const nice = niceForLevel(Math.max(level, this.priorityFloor))
    if (nice === this.nice) return
    try {
      this.applyPriority(nice)
      this.nice = nice
      this.logger.debug("process priority adjusted", { nice, level })
    } catch (err) {
      this.logger.warn("could not adjust process priority", {
        nice,
        detail: err instanceof Error ? err.message : String(err),
      })
    }
  }
}

function round(value: number): number {
  return Math.round(value * 10) / 10
}
