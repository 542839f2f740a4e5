// tests/bridge/server.test.ts — Bridge HTTP surface

import { describe, it, expect, vi } from "vitest"
import { createBridgeApp, deriveHealth } from "../../src/bridge/server.js"
import { CapabilityDiscovery, type CatalogSource } from "../../src/bridge/discovery.js"
import { RecoveryManager } from "../../src/bridge/recovery-manager.js"
import { ResourceMonitor } from "../../src/bridge/resource-monitor.js"
import type { ToolResult } from "../../src/bridge/translator.js"
import { TOOLS } from "../../src/bridge/translator.js"
import type { ConnectionStatus } from "../../src/bridge/types.js"
import { PredictiveMonitor } from "../../src/maintenance/predictive-monitor.js"
import { BridgeError } from "../../src/shared/errors.js"
import { manualClock } from "../helpers/fakes.js"

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

function connection(overrides: Partial<ConnectionStatus> = {}): ConnectionStatus {
  return {
    healthy: true,
    circuitState: "CLOSED",
    circuitFailures: 0,
    coolOffRemainingMs: 0,
    lastSuccessAt: 0,
    secondsSinceLastSuccess: 0,
    baseUrl: "http://upstream.test",
    ...overrides,
  }
}

const catalogWithOne: CatalogSource = {
  listModels: async () => ({ ok: true, status: 200, data: [{ id: "m1", object: "model" }] }),
}

function makeApp(opts: { conn?: ConnectionStatus; outcome?: ToolResult } = {}) {
  const clock = manualClock(1_700_000_000_000)
  const conn = opts.conn ?? connection()
  const discovery = new CapabilityDiscovery({
    source: catalogWithOne,
    intervalMs: 30_000,
    maxIntervalMs: 300_000,
    failureThreshold: 3,
    clock: clock.now,
  })
  const resources = new ResourceMonitor({
    intervalMs: 10_000,
    caps: { maxCpuPercent: 50, maxMemoryPercent: 50 },
    sampler: {
      sample: () => ({ timestamp: 0, systemCpuPercent: 10, systemMemoryPercent: 40, ownCpuPercent: 1, ownMemoryPercent: 1 }),
    },
    setPriority: () => {},
  })
  const recovery = new RecoveryManager({
    target: { attemptRecovery: async () => true, healthCheck: async () => true },
    maxAttempts: 5,
    cooldownMs: 60_000,
    clock: clock.now,
  })
  const maintenance = new PredictiveMonitor({
    intervalMs: 60_000,
    sampler: { sample: async () => ({ memoryPercent: 40, cpuPercent: 10, diskPercent: 50 }) },
    actions: {
      reclaimMemory: () => {},
      lowerPriority: () => {},
      restorePriority: () => {},
      cleanTempFiles: async () => 0,
      resetConnections: async () => true,
    },
    clock: clock.now,
  })
  const invoke = vi.fn(async (): Promise<ToolResult> => opts.outcome ?? { ok: true, result: { answer: 42 } })

  const app = createBridgeApp({
    serviceName: "inference-bridge",
    version: "1.0.0",
    upstreamUrl: "http://upstream.test",
    startedAt: clock.now() - 90_000,
    upstream: { getConnectionStatus: () => conn },
    discovery,
    resources,
    recovery,
    maintenance,
    tools: { listTools: () => TOOLS.map((t) => ({ ...t })), invoke },
    clock: clock.now,
  })
  return { app, discovery, invoke }
}

function postTool(name: string, body: string, headers: Record<string, string> = {}) {
  return {
    path: `http://bridge.test/mcp/tools/${name}`,
    init: { method: "POST", body, headers: { "Content-Type": "application/json", ...headers } },
  }
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe("deriveHealth", () => {
  it("is degraded when the upstream is unhealthy or the circuit is open", () => {
    expect(deriveHealth(connection({ healthy: false }), true)).toBe("degraded")
    expect(deriveHealth(connection({ circuitState: "OPEN" }), true)).toBe("degraded")
  })

  it("is starting until models are known", () => {
    expect(deriveHealth(connection(), false)).toBe("starting")
    expect(deriveHealth(connection(), true)).toBe("healthy")
  })
})

describe("GET /health", () => {
  it("reports starting before the first discovery", async () => {
    const { app } = makeApp()

    const res = await app.request("http://bridge.test/health")
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.status).toBe("starting")
    expect(body.uptime_seconds).toBe(90)
    expect(body.dependencies.upstream).toEqual({
      status: "connected",
      url: "http://upstream.test",
      circuit_state: "CLOSED",
      circuit_failures: 0,
      seconds_since_last_success: 0,
    })
  })

  it("reports healthy once models are discovered", async () => {
    const { app, discovery } = makeApp()
    await discovery.runCycle()

    const body = await (await app.request("http://bridge.test/health")).json()

    expect(body.status).toBe("healthy")
    expect(body.components.model_discovery.models).toBe(1)
  })

  it("answers 200 with degraded when the circuit is open", async () => {
    const { app } = makeApp({ conn: connection({ circuitState: "OPEN", circuitFailures: 5 }) })

    const res = await app.request("http://bridge.test/health")
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.status).toBe("degraded")
    expect(body.dependencies.upstream.circuit_failures).toBe(5)
  })
})

describe("GET /status and /tools", () => {
  it("returns component detail", async () => {
    const { app } = makeApp()

    const body = await (await app.request("http://bridge.test/status")).json()

    expect(body.upstream_url).toBe("http://upstream.test")
    expect(body.recovery.maxAttempts).toBe(5)
    expect(body.discovery.modelCount).toBe(0)
  })

  it("lists the tool catalog", async () => {
    const { app } = makeApp()

    const body = await (await app.request("http://bridge.test/tools")).json()

    expect(body.tools.map((t: { name: string }) => t.name)).toEqual(["inference", "list_models"])
  })
})

// ---------------------------------------------------------------------------
// Tool invocation
// ---------------------------------------------------------------------------

describe("POST /mcp/tools/:name", () => {
  it("returns the tool result and passes parameters through", async () => {
    const { app, invoke } = makeApp()
    const { path, init } = postTool("inference", JSON.stringify({ parameters: { prompt: "hi", model: "m1" } }))

    const res = await app.request(path, init)

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ result: { answer: 42 } })
    expect(invoke).toHaveBeenCalledWith("inference", { prompt: "hi", model: "m1" })
  })

  it("defaults missing parameters to an empty object", async () => {
    const { app, invoke } = makeApp()
    const { path, init } = postTool("list_models", "{}")

    await app.request(path, init)

    expect(invoke).toHaveBeenCalledWith("list_models", {})
  })

  it("rejects a malformed body with 400", async () => {
    const { app, invoke } = makeApp()
    const { path, init } = postTool("inference", "{not json")

    const res = await app.request(path, init)

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: { message: "Invalid JSON body", type: "invalid_request_error", code: "invalid_request" },
    })
    expect(invoke).not.toHaveBeenCalled()
  })

  it.each([
    ["VALIDATION_FAILED" as const, 400, "invalid_request"],
    ["UNKNOWN_TOOL" as const, 404, "invalid_request"],
    ["UPSTREAM_UNAVAILABLE" as const, 502, "api_error"],
  ])("maps %s to HTTP %i", async (code, status, errorCode) => {
    const { app } = makeApp({ outcome: { ok: false, error: new BridgeError(code, "scripted") } })
    const { path, init } = postTool("inference", "{}")

    const res = await app.request(path, init)
    const body = await res.json()

    expect(res.status).toBe(status)
    expect(body.error.code).toBe(errorCode)
    expect(body.error.message).toBe(`[bridge] ${code}: scripted`)
  })

  it("echoes the caller's request id", async () => {
    const { app } = makeApp()
    const { path, init } = postTool("inference", "{}", { "X-Request-Id": "req-123" })

    const res = await app.request(path, init)

    expect(res.headers.get("X-Request-Id")).toBe("req-123")
  })

  it("mints a ULID request id when none is sent", async () => {
    const { app } = makeApp()

    const res = await app.request("http://bridge.test/health")

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/)
  })
})
