// src/bridge/circuit-breaker.ts — Two-state circuit breaker for the upstream request path

import { EventEmitter } from "node:events"
import type { Clock } from "../shared/timing.js"

// ── Types ───────────────────────────────────────────────────

export type CircuitState = "CLOSED" | "OPEN"

export interface CircuitBreakerConfig {
  threshold?: number      // Default: 5
  coolOffMs?: number      // Default: 60000
}

export interface CircuitBreakerState {
  state: CircuitState
  failures: number
  lastFailureAt?: number
  openedAt?: number
}

// ── CircuitBreaker ──────────────────────────────────────────

/**
 * CLOSED → OPEN after `threshold` consecutive failures. Once `coolOffMs` has
 * passed, OPEN lets one real attempt through without a separate half-open
 * state: its success closes the circuit, its failure reopens it with a fresh
 * timer.
 *
 * Emits "circuit:opened" and "circuit:closed" with `{ failures }`.
 */
export class CircuitBreaker extends EventEmitter {
  private readonly threshold: number
  private readonly coolOffMs: number
  private readonly now: Clock
  private _state: CircuitBreakerState = { state: "CLOSED", failures: 0 }

  constructor(config?: CircuitBreakerConfig, now?: Clock) {
    super()
    this.threshold = config?.threshold ?? 5
    this.coolOffMs = config?.coolOffMs ?? 60_000
    this.now = now ?? Date.now
  }

  get state(): CircuitBreakerState { return { ...this._state } }

  /** Whether an attempt may go out now. OPEN allows a trial once cool-off elapsed. */
  canExecute(): boolean {
    if (this._state.state === "CLOSED") return true
    return this.coolOffRemainingMs() === 0
  }

  /** Milliseconds until an OPEN circuit admits a trial; 0 when CLOSED. */
  coolOffRemainingMs(): number {
    if (this._state.state === "CLOSED") return 0
    const elapsed = this.now() - (this._state.openedAt ?? 0)
    return Math.max(0, this.coolOffMs - elapsed)
  }

  recordSuccess(): void {
    this._state.failures = 0
    if (this._state.state === "OPEN") {
      this.transitionTo("CLOSED")
    }
  }

  recordFailure(): void {
    const currentTime = this.now()
    this._state.failures += 1
    this._state.lastFailureAt = currentTime

    if (this._state.state === "OPEN") {
      // Failed trial: restart the cool-off
      this._state.openedAt = currentTime
      this.emit("circuit:opened", { failures: this._state.failures })
      return
    }

    if (this._state.failures >= this.threshold) {
      this.transitionTo("OPEN")
    }
  }

  /** Manual reset to CLOSED with a zero failure count. */
  reset(): void {
    this._state.failures = 0
    if (this._state.state === "OPEN") {
      this.transitionTo("CLOSED")
    }
  }

  private transitionTo(newState: CircuitState): void {
    this._state.state = newState

    if (newState === "OPEN") {
      this._state.openedAt = this.now()
      this.emit("circuit:opened", { failures: this._state.failures })
    } else {
      this._state.failures = 0
      this._state.openedAt = undefined
      this.emit("circuit:closed", { failures: 0 })
    }
  }
}
