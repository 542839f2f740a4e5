// src/bridge/upstream-client.ts — Resilient HTTP client for the inference backend
// Circuit breaker + bounded exponential retry + resource-aware backoff.

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { CircuitBreaker } from "./circuit-breaker.js"
import { createHttpPool, type HttpPool, type HttpPoolFactory } from "./http-pool.js"
import type {
  CompletionRequest,
  ConnectionStatus,
  HttpMethod,
  ModelEntry,
  RecoveryTarget,
  ThrottleAdvisor,
  UpstreamResult,
} from "./types.js"
import type { UpstreamConfig } from "../config.js"
import { BridgeError, errorMessage, isBridgeError } from "../shared/errors.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import { linkedTimeoutSignal, systemSleep, type Clock, type Sleeper } from "../shared/timing.js"

export const MODELS_PATH = "/v1/models"
export const COMPLETIONS_PATH = "/v1/completions"

/** Backoff ceiling per retry, before any throttle delay */
export const MAX_BACKOFF_MS = 30_000

const HEALTH_CHECK_TIMEOUT_MS = 5_000

const ModelListEnvelope = Type.Object({
  data: Type.Array(Type.Unknown()),
})

const JsonObject = Type.Record(Type.String(), Type.Unknown())

/** Delay after failed attempt `attempt` (0-based): min(2^n s, 30 s) plus the throttle delay. */
export function backoffDelayMs(attempt: number, throttleDelayMs = 0): number {
  return Math.min(2 ** attempt * 1000, MAX_BACKOFF_MS) + throttleDelayMs
}

export interface UpstreamClientOptions {
  config: UpstreamConfig
  throttle?: ThrottleAdvisor
  createPool?: HttpPoolFactory
  clock?: Clock
  sleep?: Sleeper
  logger?: Logger
}

export interface CallOptions {
  signal?: AbortSignal
}

type AttemptOutcome =
  | { kind: "success"; status: number; data: unknown }
  | { kind: "failure"; error: BridgeError }
  | { kind: "cancelled" }

export class UpstreamClient implements RecoveryTarget {
  private readonly config: UpstreamConfig
  private readonly breaker: CircuitBreaker
  private readonly createPool: HttpPoolFactory
  private readonly clock: Clock
  private readonly sleep: Sleeper
  private readonly logger: Logger
  private throttle?: ThrottleAdvisor
  private pool: HttpPool
  private healthy = true
  private lastSuccessAt: number

  constructor(opts: UpstreamClientOptions) {
    this.config = opts.config
    this.throttle = opts.throttle
    this.createPool = opts.createPool ?? (() => createHttpPool())
    this.clock = opts.clock ?? Date.now
    this.sleep = opts.sleep ?? systemSleep
    this.logger = opts.logger ?? createSilentLogger()
    this.pool = this.createPool()
    this.lastSuccessAt = this.clock()
    this.breaker = new CircuitBreaker(
      { threshold: this.config.breakerThreshold, coolOffMs: this.config.breakerCoolOffMs },
      this.clock,
    )
    this.breaker.on("circuit:opened", ({ failures }: { failures: number }) => {
      this.logger.warn("circuit breaker opened", { failures, cool_off_ms: this.config.breakerCoolOffMs })
    })
    this.breaker.on("circuit:closed", () => {
      this.logger.info("circuit breaker closed")
    })
  }

  get baseUrl(): string {
    return this.config.baseUrl
  }

  /** Attach the resource monitor after construction (boot order). */
  setThrottleAdvisor(throttle: ThrottleAdvisor): void {
    this.throttle = throttle
  }

  /**
   * One logical call: up to maxRetries+1 attempts. Surfaces CIRCUIT_OPEN,
   * terminal 4xx, CANCELLED, or UPSTREAM_UNAVAILABLE once retries run out.
   */
  async call(method: HttpMethod, path: string, body?: unknown, opts: CallOptions = {}): Promise<UpstreamResult<unknown>> {
    const { signal } = opts
    let lastError: BridgeError | undefined
    let attempts = 0

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (signal?.aborted) return this.cancelled(path)

      if (!this.breaker.canExecute()) {
        if (lastError) return { ok: false, error: this.exhausted(path, attempts, lastError) }
        const state = this.breaker.state
        return {
          ok: false,
          error: new BridgeError("CIRCUIT_OPEN", `Circuit breaker is open for ${path}`, {
            pattern: "circuit_breaker",
            context: { failures: state.failures, cool_off_remaining_ms: this.breaker.coolOffRemainingMs() },
          }),
        }
      }

      attempts++
      const outcome = await this.attempt(method, path, body, signal)

      if (outcome.kind === "success") {
        this.recordSuccess()
        return { ok: true, status: outcome.status, data: outcome.data }
      }
      if (outcome.kind === "cancelled") return this.cancelled(path)

      const error = outcome.error
      lastError = error
      this.recordFailure()
      this.logger.warn(`${method} ${path} failed on attempt ${attempt + 1}`, {
        code: error.code,
        pattern: error.pattern,
        status_code: error.statusCode,
        detail: error.message,
      })

      if (!error.retryable) return { ok: false, error }

      if (attempt < this.config.maxRetries) {
        const throttleDelay = this.throttle?.shouldThrottle() ? this.throttle.recommendedDelayMs() : 0
        const delay = backoffDelayMs(attempt, throttleDelay)
        if (throttleDelay > 0) {
          this.logger.info("resource throttling: extending retry backoff", { extra_delay_ms: throttleDelay })
        }
        this.logger.debug(`retrying ${path}`, { delay_ms: delay })
        await this.sleep(delay, signal)
      }
    }

    // Loop only exits here after at least one failed attempt
    return {
      ok: false,
      error: lastError
        ? this.exhausted(path, attempts, lastError)
        : new BridgeError("UPSTREAM_UNAVAILABLE", `Request to ${path} made no attempts`, { pattern: "network_error" }),
    }
  }

  /** GET /v1/models, keeping entries that carry a string id. */
  async listModels(opts: CallOptions = {}): Promise<UpstreamResult<ModelEntry[]>> {
    const res = await this.call("GET", MODELS_PATH, undefined, opts)
    if (!res.ok) return res

    if (!Value.Check(ModelListEnvelope, res.data)) {
      return {
        ok: false,
        error: new BridgeError("INVALID_RESPONSE", `${MODELS_PATH} did not return a { data: [...] } envelope`, {
          pattern: "generic",
        }),
      }
    }

    const models: ModelEntry[] = []
    for (const item of res.data.data) {
      const entry = toModelEntry(item)
      if (entry) models.push(entry)
    }
    this.logger.debug("fetched model catalog", { count: models.length })
    return { ok: true, status: res.status, data: models }
  }

  /** POST /v1/completions */
  async createCompletion(request: CompletionRequest, opts: CallOptions = {}): Promise<UpstreamResult<Record<string, unknown>>> {
    this.logger.info("creating completion", { model: request.model, prompt_length: request.prompt.length })
    const res = await this.call("POST", COMPLETIONS_PATH, request, opts)
    if (!res.ok) return res
    if (!Value.Check(JsonObject, res.data)) {
      return {
        ok: false,
        error: new BridgeError("INVALID_RESPONSE", `${COMPLETIONS_PATH} returned a non-object body`),
      }
    }
    return { ok: true, status: res.status, data: res.data }
  }

  /** One bare request: no retry, no breaker gating. A success counts as one. */
  async healthCheck(): Promise<boolean> {
    const { signal, dispose } = linkedTimeoutSignal(HEALTH_CHECK_TIMEOUT_MS)
    try {
      const res = await this.pool.fetch(this.url(MODELS_PATH), {
        method: "GET",
        headers: { Accept: "application/json" },
        signal,
      })
      if (res.ok) {
        this.recordSuccess()
        return true
      }
      return false
    } catch (err) {
      this.logger.debug("health check failed", { detail: errorMessage(err) })
      return false
    } finally {
      dispose()
    }
  }

  /** Reset the breaker, replace the connection pool, then check health once. */
  async attemptRecovery(): Promise<boolean> {
    this.logger.info("attempting connection recovery", { base_url: this.config.baseUrl })
    this.breaker.reset()
    try {
      this.pool.close()
      this.pool = this.createPool()
    } catch (err) {
      this.logger.error("connection pool reset failed", err)
      return false
    }

    const ok = await this.healthCheck()
    if (ok) {
      this.logger.info("connection recovery succeeded")
    } else {
      this.logger.warn("connection recovery failed: upstream still not responding")
    }
    return ok
  }

  getConnectionStatus(): ConnectionStatus {
    const state = this.breaker.state
    const now = this.clock()
    return {
      healthy: this.healthy,
      circuitState: state.state,
      circuitFailures: state.failures,
      coolOffRemainingMs: this.breaker.coolOffRemainingMs(),
      lastSuccessAt: this.lastSuccessAt,
      secondsSinceLastSuccess: (now - this.lastSuccessAt) / 1000,
      baseUrl: this.config.baseUrl,
    }
  }

  close(): void {
    this.pool.close()
  }

  // --- Private helpers ---

  private url(path: string): string {
    return `${this.config.baseUrl}${path}`
  }

  private async attempt(method: HttpMethod, path: string, body: unknown, signal?: AbortSignal): Promise<AttemptOutcome> {
    const timeout = linkedTimeoutSignal(this.config.timeoutMs, signal)
    try {
      const res = await this.pool.fetch(this.url(path), {
        method,
        headers: body === undefined
          ? { Accept: "application/json" }
          : { Accept: "application/json", "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: timeout.signal,
      })
      if (res.ok) {
        return { kind: "success", status: res.status, data: parseBody(res.text) }
      }
      return { kind: "failure", error: httpStatusError(res.status, path, res.text) }
    } catch (err) {
      if (signal?.aborted) return { kind: "cancelled" }
      return { kind: "failure", error: transportError(err, path) }
    } finally {
      timeout.dispose()
    }
  }

  private recordSuccess(): void {
    this.healthy = true
    this.lastSuccessAt = this.clock()
    this.breaker.recordSuccess()
  }

  private recordFailure(): void {
    this.healthy = false
    this.breaker.recordFailure()
  }

  private cancelled(path: string): UpstreamResult<never> {
    return { ok: false, error: new BridgeError("CANCELLED", `Request to ${path} was cancelled`) }
  }

  private exhausted(path: string, attempts: number, last: BridgeError): BridgeError {
    const circuitOpen = this.breaker.state.state === "OPEN"
    return new BridgeError("UPSTREAM_UNAVAILABLE", `Request to ${path} failed after ${attempts} attempts`, {
      pattern: last.pattern,
      statusCode: last.statusCode,
      retryable: true,
      context: { attempts, last_error: last.message, circuit_open: circuitOpen },
      cause: last,
    })
  }
}

// --- Failure-site classification ---

function parseBody(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch {
    return { text }
  }
}

export function httpStatusError(status: number, path: string, body: string): BridgeError {
  const message = `HTTP ${status} from ${path}: ${body.slice(0, 200)}`
  if (status >= 400 && status < 500 && status !== 429) {
    return new BridgeError("UPSTREAM_CLIENT_ERROR", message, { statusCode: status, pattern: "generic" })
  }
  return new BridgeError("UPSTREAM_SERVER_ERROR", message, {
    statusCode: status,
    retryable: true,
    pattern: status === 503 ? "service_unavailable" : "network_error",
  })
}

function causeCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined
  const candidates: unknown[] = [err, err.cause]
  for (const c of candidates) {
    if (typeof c === "object" && c !== null && "code" in c && typeof c.code === "string") {
      return c.code
    }
  }
  return undefined
}

export function transportError(err: unknown, path: string): BridgeError {
  if (isBridgeError(err)) return err
  const detail = errorMessage(err)

  if (err instanceof Error && err.name === "TimeoutError") {
    return new BridgeError("TRANSPORT_FAILURE", `Request to ${path} timed out`, {
      pattern: "timeout",
      retryable: true,
      cause: err,
    })
  }
  if (causeCode(err) === "ECONNREFUSED") {
    return new BridgeError("TRANSPORT_FAILURE", `Connection refused for ${path}`, {
      pattern: "connection_refused",
      retryable: true,
      cause: err,
    })
  }
  return new BridgeError("TRANSPORT_FAILURE", `Request to ${path} failed: ${detail}`, {
    pattern: "network_error",
    retryable: true,
    cause: err,
  })
}

function toModelEntry(item: unknown): ModelEntry | undefined {
  if (typeof item !== "object" || item === null || Array.isArray(item)) return undefined
  if (!("id" in item) || typeof item.id !== "string" || item.id === "") return undefined
  const entry: ModelEntry = { id: item.id }
  for (const [key, value] of Object.entries(item)) {
    entry[key] = value
  }
  return entry
}
