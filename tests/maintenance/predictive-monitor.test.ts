// tests/maintenance/predictive-monitor.test.ts — Trend rules, cooldowns and maintenance actions

import { afterEach, describe, it, expect, vi } from "vitest"
import { mkdtemp, readdir, rm, symlink, utimes, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
  createMaintenanceActions,
  PredictiveMonitor,
  type MaintenanceActions,
  type MaintenanceEvent,
  type MetricsSample,
  type MetricsSampler,
} from "../../src/maintenance/predictive-monitor.js"
import { ResourceMonitor } from "../../src/bridge/resource-monitor.js"
import { manualClock } from "../helpers/fakes.js"

const HOUR_MS = 3_600_000

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

function sample(overrides: Partial<MetricsSample> = {}): MetricsSample {
  return { memoryPercent: 40, cpuPercent: 10, diskPercent: 50, ...overrides }
}

function queueSampler() {
  const queue: MetricsSample[] = []
  const sampler: MetricsSampler = {
    async sample() {
      return queue.shift() ?? sample()
    },
  }
  return { sampler, push: (s: MetricsSample) => queue.push(s) }
}

function fakeActions() {
  return {
    reclaimMemory: vi.fn(),
    lowerPriority: vi.fn(),
    restorePriority: vi.fn(),
    cleanTempFiles: vi.fn(async () => 2),
    resetConnections: vi.fn(async () => true),
  } satisfies MaintenanceActions
}

function makeMonitor() {
  const clock = manualClock(0)
  const { sampler, push } = queueSampler()
  const actions = fakeActions()
  const monitor = new PredictiveMonitor({ intervalMs: 60_000, sampler, actions, clock: clock.now })
  const events: MaintenanceEvent[] = []
  monitor.on("maintenance:action", (e: MaintenanceEvent) => events.push(e))
  return { monitor, clock, push, actions, events }
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

describe("PredictiveMonitor", () => {
  it("runs one memory cleanup at 6%/hour and none again inside the cooldown", async () => {
    const { monitor, clock, push, actions, events } = makeMonitor()
    const prune = vi.fn()
    monitor.on("cache:prune", prune)

    monitor.recordSample(sample({ memoryPercent: 50 }), 0)
    monitor.recordSample(sample({ memoryPercent: 51 }), 900_000)
    monitor.recordSample(sample({ memoryPercent: 53 }), 1_800_000)
    monitor.recordSample(sample({ memoryPercent: 52 }), 2_700_000)

    clock.set(HOUR_MS)
    push(sample({ memoryPercent: 56 }))
    await monitor.runCycle()

    expect(monitor.getStatus().trends.memoryPerHour).toBe(6)
    expect(actions.reclaimMemory).toHaveBeenCalledTimes(1)
    expect(prune).toHaveBeenCalledTimes(1)
    expect(events.map((e) => e.action)).toEqual(["memory_cleanup"])

    clock.advance(1_000)
    push(sample({ memoryPercent: 57 }))
    await monitor.runCycle()

    expect(actions.reclaimMemory).toHaveBeenCalledTimes(1)
    expect(monitor.getStatus().cooldownRemainingMs.cleanup).toBe(HOUR_MS - 1_000)
  })

  it("lowers priority on sustained CPU and restores it when the mean drops", async () => {
    const { monitor, clock, push, actions } = makeMonitor()

    push(sample({ cpuPercent: 90 }))
    await monitor.runCycle()
    expect(actions.lowerPriority).toHaveBeenCalledTimes(1)
    expect(monitor.getStatus().priorityLowered).toBe(true)

    clock.set(301_000)
    push(sample({ cpuPercent: 50 }))
    await monitor.runCycle()
    expect(actions.restorePriority).toHaveBeenCalledTimes(1)
    expect(monitor.getStatus().priorityLowered).toBe(false)

    // High again, but still inside the hour-long cooldown
    clock.set(700_000)
    push(sample({ cpuPercent: 90 }))
    await monitor.runCycle()
    expect(actions.lowerPriority).toHaveBeenCalledTimes(1)
  })

  it("cleans temp files on a disk growth trend above 10%/day", async () => {
    const { monitor, clock, push, actions, events } = makeMonitor()
    monitor.recordSample(sample({ diskPercent: 40 }), 0)
    monitor.recordSample(sample({ diskPercent: 41 }), 6 * HOUR_MS)
    monitor.recordSample(sample({ diskPercent: 42 }), 12 * HOUR_MS)
    monitor.recordSample(sample({ diskPercent: 43 }), 18 * HOUR_MS)

    clock.set(24 * HOUR_MS)
    push(sample({ diskPercent: 52 }))
    await monitor.runCycle()

    expect(monitor.getStatus().trends.diskPerDay).toBe(12)
    expect(actions.cleanTempFiles).toHaveBeenCalledWith(24 * HOUR_MS)
    expect(events).toEqual([
      { action: "disk_cleanup", at: 24 * HOUR_MS, detail: { trend_per_day: 12, removed: 2 } },
    ])
  })

  it("resets connections above three errors an hour, at most once per two hours", async () => {
    const { monitor, clock, actions } = makeMonitor()
    for (let i = 0; i < 4; i++) monitor.recordError("timeout")

    await monitor.runCycle()
    expect(actions.resetConnections).toHaveBeenCalledTimes(1)
    expect(monitor.getStatus().errorsLastHour).toBe(4)

    clock.advance(HOUR_MS)
    for (let i = 0; i < 4; i++) monitor.recordError("network_error")
    await monitor.runCycle()
    expect(actions.resetConnections).toHaveBeenCalledTimes(1)
    expect(monitor.getStatus().cooldownRemainingMs.errorMitigation).toBe(HOUR_MS)
  })

  it("does nothing at exactly three errors", async () => {
    const { monitor, actions } = makeMonitor()
    for (let i = 0; i < 3; i++) monitor.recordError("generic")

    await monitor.runCycle()

    expect(actions.resetConnections).not.toHaveBeenCalled()
  })

  it("trims samples and errors older than 24 hours", async () => {
    const { monitor, clock } = makeMonitor()
    monitor.recordError("timeout")
    await monitor.runCycle()
    expect(monitor.getStatus().samples).toEqual({ memory: 1, cpu: 1, disk: 1, errors: 1 })

    clock.advance(24 * HOUR_MS + 1)
    await monitor.runCycle()

    expect(monitor.getStatus().samples).toEqual({ memory: 1, cpu: 1, disk: 1, errors: 0 })
  })
})

// ---------------------------------------------------------------------------
// Default actions
// ---------------------------------------------------------------------------

describe("createMaintenanceActions", () => {
  const dirs: string[] = []

  afterEach(async () => {
    await Promise.all(dirs.splice(0).map((d) => rm(d, { recursive: true, force: true })))
  })

  it("deletes only temp files older than the cutoff", async () => {
    const dir = await mkdtemp(join(tmpdir(), "maintenance-test-"))
    dirs.push(dir)
    await writeFile(join(dir, "stale.tmp"), "old")
    await writeFile(join(dir, "fresh.tmp"), "new")
    const twoDaysAgo = (Date.now() - 48 * HOUR_MS) / 1000
    await utimes(join(dir, "stale.tmp"), twoDaysAgo, twoDaysAgo)

    const actions = createMaintenanceActions({
      tempDir: dir,
      connections: { attemptRecovery: async () => true },
      priority: { setPriorityFloor: () => {} },
    })

    expect(await actions.cleanTempFiles(24 * HOUR_MS)).toBe(1)
    expect(await readdir(dir)).toEqual(["fresh.tmp"])
  })

  it("keeps sweeping past entries it cannot judge", async () => {
    const dir = await mkdtemp(join(tmpdir(), "maintenance-test-"))
    dirs.push(dir)
    await symlink(join(dir, "missing-target"), join(dir, "a-dangling"))
    await writeFile(join(dir, "b-old.tmp"), "old")
    const threeDaysAgo = (Date.now() - 72 * HOUR_MS) / 1000
    await utimes(join(dir, "b-old.tmp"), threeDaysAgo, threeDaysAgo)

    const actions = createMaintenanceActions({
      tempDir: dir,
      connections: { attemptRecovery: async () => true },
      priority: { setPriorityFloor: () => {} },
    })

    expect(await actions.cleanTempFiles(86_400_000)).toBe(1)
    expect(await readdir(dir)).toEqual(["a-dangling"])
  })

  it("treats a missing temp dir as nothing to clean", async () => {
    const actions = createMaintenanceActions({
      tempDir: join(tmpdir(), "maintenance-test-missing-dir"),
      connections: { attemptRecovery: async () => true },
      priority: { setPriorityFloor: () => {} },
    })

    expect(await actions.cleanTempFiles(HOUR_MS)).toBe(0)
  })

  it("delegates connection resets and priority floors", async () => {
    const floors: number[] = []
    const attemptRecovery = vi.fn(async () => false)
    const actions = createMaintenanceActions({
      tempDir: tmpdir(),
      connections: { attemptRecovery },
      priority: { setPriorityFloor: (level) => floors.push(level) },
    })

    actions.lowerPriority()
    actions.restorePriority()

    expect(floors).toEqual([1, 0])
    expect(await actions.resetConnections()).toBe(false)
    expect(attemptRecovery).toHaveBeenCalledTimes(1)
  })
})

describe("priority under both monitors", () => {
  it("keeps the throttled priority when maintenance restores", async () => {
    const applied: number[] = []
    const resources = new ResourceMonitor({
      intervalMs: 10_000,
      caps: { maxCpuPercent: 50, maxMemoryPercent: 50 },
      sampler: {
        sample: () => ({ timestamp: 0, systemCpuPercent: 95, systemMemoryPercent: 40, ownCpuPercent: 5, ownMemoryPercent: 5 }),
      },
      setPriority: (nice) => applied.push(nice),
    })
    const clock = manualClock(0)
    const { sampler, push } = queueSampler()
    const monitor = new PredictiveMonitor({
      intervalMs: 60_000,
      sampler,
      actions: createMaintenanceActions({
        tempDir: tmpdir(),
        connections: { attemptRecovery: async () => true },
        priority: resources,
      }),
      clock: clock.now,
    })

    resources.runCycle()
    for (const [at, cpuPercent] of [[0, 95], [60_000, 95], [120_000, 95], [600_000, 10]]) {
      clock.set(at)
      push(sample({ cpuPercent }))
      await monitor.runCycle()
    }
    resources.runCycle()

    expect(monitor.getStatus().priorityLowered).toBe(false)
    expect(applied).toEqual([19])
    expect(resources.getStatus()).toMatchObject({ nice: 19, priorityFloor: 0 })
  })
})
