// src/gateway/router.ts — Forwards tool invocations to the bridge that owns the tool

import type { ServiceRegistry, ServiceRegistryEntry, RegistryStatus } from "./service-registry.js"
import { errorMessage } from "../shared/errors.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import { readBody } from "../shared/read-body.js"
import { linkedTimeoutSignal } from "../shared/timing.js"

// --- Types ---

export type RouteResult =
  | { status: "success"; result: unknown; service: string }
  | { status: "service_not_found"; error: string }
  | { status: "service_error"; error: string; service: string; statusCode: number }
  | { status: "timeout"; error: string; service: string }
  | { status: "forward_error"; error: string; service: string }

export type RouteStatus = RouteResult["status"]

export interface RouteOptions {
  /** Restrict candidates to one registered service */
  service?: string
  signal?: AbortSignal
}

export interface RouterOptions {
  registry: ServiceRegistry
  timeoutMs: number
  userAgent: string
  fetchFn?: typeof fetch
  logger?: Logger
}

export interface RoutingStats {
  activeRoutes: number
  routed: Record<RouteStatus, number>
  registry: RegistryStatus
}

// --- Router ---

export class ToolRouter {
  private readonly registry: ServiceRegistry
  private readonly timeoutMs: number
  private readonly userAgent: string
  private readonly fetchFn: typeof fetch
  private readonly logger: Logger
  private readonly roundRobin = new Map<string, number>()
  private readonly routed: Record<RouteStatus, number> = {
    success: 0,
    service_not_found: 0,
    service_error: 0,
    timeout: 0,
    forward_error: 0,
  }

  constructor(opts: RouterOptions) {
    this.registry = opts.registry
    this.timeoutMs = opts.timeoutMs
    this.userAgent = opts.userAgent
    this.fetchFn = opts.fetchFn ?? globalThis.fetch
    this.logger = opts.logger ?? createSilentLogger()
  }

  /** Route one call. Never throws: every failure is a status. */
  async route(toolName: string, parameters: Record<string, unknown>, opts: RouteOptions = {}): Promise<RouteResult> {
    let candidates = this.registry.servicesForTool(toolName)
    if (opts.service !== undefined) {
      candidates = candidates.filter((c) => c.name === opts.service)
    }

    const target = this.pick(candidates)
    const result: RouteResult = target
      ? await this.forward(target, toolName, parameters, opts.signal)
      : { status: "service_not_found", error: `No service available for tool: ${toolName}` }

    this.routed[result.status]++
    return result
  }

  getStats(): RoutingStats {
    return {
      activeRoutes: this.roundRobin.size,
      routed: { ...this.routed },
      registry: this.registry.getStatus(),
    }
  }

  // --- Private ---

  /** Round-robin over the candidate set; a single candidate is always picked. */
  private pick(candidates: ServiceRegistryEntry[]): ServiceRegistryEntry | undefined {
    if (candidates.length === 0) return undefined
    if (candidates.length === 1) return candidates[0]

    const key = candidates.map((c) => c.name).sort().join(",")
    const counter = this.roundRobin.get(key) ?? 0
    this.roundRobin.set(key, counter + 1)
    return candidates[counter % candidates.length]
  }

  private async forward(
    service: ServiceRegistryEntry,
    toolName: string,
    parameters: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<RouteResult> {
    const url = `${service.url}/mcp/tools/${encodeURIComponent(toolName)}`
    const timeout = linkedTimeoutSignal(this.timeoutMs, signal)
    try {
      const res = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", "User-Agent": this.userAgent },
        body: JSON.stringify({ parameters }),
        signal: timeout.signal,
      })

      const text = await readBody(res, timeout.signal)
      if (res.status !== 200) {
        this.logger.warn(`${service.name} returned ${res.status} for ${toolName}`)
        return {
          status: "service_error",
          error: `Service returned ${res.status}`,
          service: service.name,
          statusCode: res.status,
        }
      }

      const result: unknown = JSON.parse(text)
      return { status: "success", result, service: service.name }
    } catch (err) {
      if (timeout.signal.aborted && !signal?.aborted) {
        this.logger.warn(`timeout forwarding ${toolName} to ${service.name}`, { timeout_ms: this.timeoutMs })
        return { status: "timeout", error: "Service timeout", service: service.name }
      }
      this.logger.error(`forward error to ${service.name}`, err, { tool: toolName })
      return { status: "forward_error", error: `Forward failed: ${errorMessage(err)}`, service: service.name }
    } finally {
      timeout.dispose()
    }
  }
}
