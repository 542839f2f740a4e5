// src/gateway/aggregator.ts — One or many routed calls, first success wins

import type { RouteOptions, RouteResult } from "./router.js"
import { errorMessage, namedError } from "../shared/errors.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import { withTimeout } from "../shared/timing.js"

export interface AggregateCall {
  tool: string
  parameters: Record<string, unknown>
  service?: string
}

export interface AggregateError {
  service: string
  error: string
}

export type AggregateResult =
  | RouteResult
  | { status: "no_calls"; error: string }
  | { status: "all_failed"; error: string; errors: AggregateError[] }

export interface CallRouter {
  route(toolName: string, parameters: Record<string, unknown>, opts?: RouteOptions): Promise<RouteResult>
}

export interface AggregatorOptions {
  router: CallRouter
  timeoutMs: number
  logger?: Logger
}

export class ResponseAggregator {
  private readonly router: CallRouter
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(opts: AggregatorOptions) {
    this.router = opts.router
    this.timeoutMs = opts.timeoutMs
    this.logger = opts.logger ?? createSilentLogger()
  }

  async aggregate(calls: readonly AggregateCall[]): Promise<AggregateResult> {
    if (calls.length === 0) {
      return { status: "no_calls", error: "No service calls provided" }
    }
    if (calls.length === 1) {
      const [call] = calls
      return this.router.route(call.tool, call.parameters, { service: call.service })
    }
    return this.fanOut(calls)
  }

  /**
   * Issue every call at once and resolve on the first success. Calls still
   * running at that point are aborted.
   */
  private fanOut(calls: readonly AggregateCall[]): Promise<AggregateResult> {
    const controller = new AbortController()
    const results: RouteResult[] = new Array(calls.length)
    let settled = 0

    return new Promise<AggregateResult>((resolve) => {
      let done = false

      calls.forEach((call, index) => {
        void this.runOne(call, controller.signal).then((result) => {
          if (done) return
          results[index] = result
          settled++

          if (result.status === "success") {
            done = true
            controller.abort()
            resolve(result)
            return
          }

          if (settled === calls.length) {
            done = true
            const errors = calls.map((c, i) => toAggregateError(c, results[i]))
            this.logger.warn("all aggregated calls failed", { calls: calls.length })
            resolve({ status: "all_failed", error: "All services failed", errors })
          }
        })
      })
    })
  }

  /**
   * One call under the per-call timeout. Resolves with a status, never rejects.
   * A call that times out is aborted through its own signal.
   */
  private async runOne(call: AggregateCall, fanOut: AbortSignal): Promise<RouteResult> {
    const service = call.service ?? call.tool
    const controller = new AbortController()
    const onFanOutAbort = () => controller.abort(fanOut.reason)
    fanOut.addEventListener("abort", onFanOutAbort, { once: true })

    try {
      const outcome = await withTimeout(
        this.router.route(call.tool, call.parameters, { service: call.service, signal: controller.signal }),
        this.timeoutMs,
      )
      if (outcome.timedOut) {
        controller.abort(namedError("TimeoutError", `Timed out after ${this.timeoutMs}ms`))
        this.logger.warn(`aggregated call to ${service} timed out`, { timeout_ms: this.timeoutMs })
        return { status: "timeout", error: "Service timeout", service }
      }
      return outcome.value
    } catch (err) {
      return { status: "forward_error", error: errorMessage(err), service }
    } finally {
      fanOut.removeEventListener("abort", onFanOutAbort)
    }
  }
}

function toAggregateError(call: AggregateCall, result: RouteResult): AggregateError {
  if (result.status === "success") {
    return { service: result.service, error: "unexpected success" }
  }
  const service = "service" in result ? result.service : call.service ?? call.tool
  return { service, error: result.error }
}
