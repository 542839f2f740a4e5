// tests/bridge/discovery.test.ts — Catalog diffing, failure escalation and poll backoff

import { describe, it, expect, vi } from "vitest"
import { CapabilityDiscovery, type CatalogSource, type ModelRecord } from "../../src/bridge/discovery.js"
import type { ModelEntry, ThrottleAdvisor, UpstreamResult } from "../../src/bridge/types.js"
import { BridgeError } from "../../src/shared/errors.js"
import { manualClock } from "../helpers/fakes.js"

// ---------------------------------------------------------------------------
// Scripted catalog source
// ---------------------------------------------------------------------------

type Step = string[] | "fail"

function scriptedSource(steps: Step[]): CatalogSource & { calls: () => number } {
  let i = 0
  return {
    calls: () => i,
    async listModels(): Promise<UpstreamResult<ModelEntry[]>> {
      const step = steps[Math.min(i, steps.length - 1)]
      i++
      if (step === "fail") {
        return {
          ok: false,
          error: new BridgeError("UPSTREAM_UNAVAILABLE", "backend down", { pattern: "connection_refused" }),
        }
      }
      return { ok: true, status: 200, data: step.map((id) => ({ id, object: "model" })) }
    },
  }
}

function makeDiscovery(source: CatalogSource, opts: { recover?: boolean; throttle?: ThrottleAdvisor } = {}) {
  const clock = manualClock()
  const recovery = { handleError: vi.fn(async () => opts.recover ?? false) }
  const discovery = new CapabilityDiscovery({
    source,
    intervalMs: 30_000,
    maxIntervalMs: 300_000,
    failureThreshold: 3,
    recovery,
    throttle: opts.throttle,
    clock: clock.now,
  })
  return { discovery, recovery, clock }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("CapabilityDiscovery", () => {
  it("emits one add and one remove when {A,B} becomes {B,C}", async () => {
    const { discovery } = makeDiscovery(scriptedSource([["A", "B"], ["B", "C"]]))
    await discovery.runCycle()

    const added: string[] = []
    const removed: string[] = []
    discovery.on("model:added", (r: ModelRecord) => added.push(r.id))
    discovery.on("model:removed", (r: ModelRecord) => removed.push(r.id))

    await discovery.runCycle()

    expect(added).toEqual(["C"])
    expect(removed).toEqual(["A"])
    expect(discovery.getModels().map((m) => m.id).sort()).toEqual(["B", "C"])
  })

  it("keeps the discovery timestamp of models seen again", async () => {
    const { discovery, clock } = makeDiscovery(scriptedSource([["A"], ["A", "B"]]))
    await discovery.runCycle()
    const firstSeen = clock.now()

    clock.advance(30_000)
    await discovery.runCycle()

    expect(discovery.getModel("A")?.discoveredAt).toBe(firstSeen)
    expect(discovery.getModel("B")?.discoveredAt).toBe(firstSeen + 30_000)
  })

  it("returns the base interval while failures stay under the threshold", async () => {
    const { discovery, recovery } = makeDiscovery(scriptedSource(["fail"]))

    expect(await discovery.runCycle()).toBe(30_000)
    expect(await discovery.runCycle()).toBe(30_000)
    expect(recovery.handleError).not.toHaveBeenCalled()
    expect(discovery.getStatus().consecutiveFailures).toBe(2)
  })

  it("doubles the next wait after a failed recovery at three failures, then restores it", async () => {
    const { discovery, recovery } = makeDiscovery(scriptedSource(["fail", "fail", "fail", ["A"]]), { recover: false })

    await discovery.runCycle()
    await discovery.runCycle()
    const third = await discovery.runCycle()

    expect(recovery.handleError).toHaveBeenCalledTimes(1)
    expect(third).toBe(60_000)

    const fourth = await discovery.runCycle()
    expect(fourth).toBe(30_000)
    expect(discovery.getStatus().consecutiveFailures).toBe(0)
    expect(discovery.hasModels()).toBe(true)
  })

  it("keeps the base interval when recovery succeeds", async () => {
    const { discovery } = makeDiscovery(scriptedSource(["fail"]), { recover: true })

    await discovery.runCycle()
    await discovery.runCycle()
    expect(await discovery.runCycle()).toBe(30_000)
  })

  it("caps the extended interval", async () => {
    const clock = manualClock()
    const discovery = new CapabilityDiscovery({
      source: scriptedSource(["fail"]),
      intervalMs: 200_000,
      maxIntervalMs: 300_000,
      failureThreshold: 1,
      recovery: { handleError: async () => false },
      clock: clock.now,
    })

    expect(await discovery.runCycle()).toBe(300_000)
  })

  it("adds the throttle delay to the next wait under pressure", async () => {
    const throttle: ThrottleAdvisor = { shouldThrottle: () => true, recommendedDelayMs: () => 1_000 }
    const { discovery } = makeDiscovery(scriptedSource([["A"]]), { throttle })

    expect(await discovery.runCycle()).toBe(31_000)
  })

  it("force runs one cycle and returns the registry size", async () => {
    const { discovery } = makeDiscovery(scriptedSource([["A", "B", "C"]]))

    expect(discovery.hasModels()).toBe(false)
    expect(await discovery.force()).toBe(3)
    expect(discovery.hasModels()).toBe(true)
  })

  it("force never throws", async () => {
    const source: CatalogSource = {
      listModels: async () => {
        throw new Error("unexpected")
      },
    }
    const { discovery } = makeDiscovery(source)

    expect(await discovery.force()).toBe(0)
  })

  it("returns copies from accessors", async () => {
    const { discovery } = makeDiscovery(scriptedSource([["A"]]))
    await discovery.runCycle()

    const record = discovery.getModel("A")
    if (record) record.metadata.object = "changed"

    expect(discovery.getModel("A")?.metadata.object).toBe("model")
  })
})
