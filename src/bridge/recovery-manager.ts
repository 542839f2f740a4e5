// src/bridge/recovery-manager.ts — Pattern-specific recovery under global attempt/cooldown limits

import type { RecoveryTarget } from "./types.js"
import { classifyError, errorMessage, type ErrorPattern } from "../shared/errors.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"
import { systemSleep, type Clock, type Sleeper } from "../shared/timing.js"

// --- Strategy table ---

type RecoveryAction = "reconnect" | "health_check"

interface RecoveryStrategy {
  /** Waits before each action; more than one means progressive backoff with a health check after each. */
  waitsMs: readonly number[]
  action: RecoveryAction
}

export const RECOVERY_STRATEGIES: Record<ErrorPattern, RecoveryStrategy> = {
  connection_refused: { waitsMs: [10_000], action: "reconnect" },
  timeout: { waitsMs: [5_000], action: "reconnect" },
  service_unavailable: { waitsMs: [30_000], action: "health_check" },
  circuit_breaker: { waitsMs: [60_000], action: "reconnect" },
  network_error: { waitsMs: [5_000, 15_000, 30_000], action: "health_check" },
  generic: { waitsMs: [10_000], action: "health_check" },
}

// --- Types ---

export type RecoveryReason = "recovered" | "cooldown" | "exhausted" | "strategy_failed"

export interface RecoveryOutcome {
  recovered: boolean
  reason: RecoveryReason
  pattern?: ErrorPattern
}

/** Sink for classified errors (the predictive maintenance error log). */
export interface ErrorRecorder {
  recordError(pattern: ErrorPattern): void
}

export interface RecoveryManagerOptions {
  target: RecoveryTarget
  maxAttempts: number
  cooldownMs: number
  recorder?: ErrorRecorder
  clock?: Clock
  sleep?: Sleeper
  logger?: Logger
}

export interface RecoveryStatus {
  attempts: number
  maxAttempts: number
  lastAttemptAt: number | undefined
  cooldownActive: boolean
  cooldownRemainingMs: number
  recoveryAvailable: boolean
  lastPattern: ErrorPattern | undefined
}

// --- Manager ---

export class RecoveryManager {
  private readonly target: RecoveryTarget
  private readonly maxAttempts: number
  private readonly cooldownMs: number
  private readonly clock: Clock
  private readonly sleep: Sleeper
  private readonly logger: Logger
  private readonly recorder: ErrorRecorder | undefined
  private attempts = 0
  private lastAttemptAt: number | undefined
  private lastPattern: ErrorPattern | undefined

  constructor(opts: RecoveryManagerOptions) {
    this.target = opts.target
    this.maxAttempts = opts.maxAttempts
    this.cooldownMs = opts.cooldownMs
    this.recorder = opts.recorder
    this.clock = opts.clock ?? Date.now
    this.sleep = opts.sleep ?? systemSleep
    this.logger = opts.logger ?? createSilentLogger()
  }

  /** Boolean view of {@link handle}. Never throws. */
  async handleError(error: unknown, context: Record<string, unknown> = {}, signal?: AbortSignal): Promise<boolean> {
    const outcome = await this.handle(error, context, signal)
    return outcome.recovered
  }

  async handle(error: unknown, context: Record<string, unknown> = {}, signal?: AbortSignal): Promise<RecoveryOutcome> {
    const remaining = this.cooldownRemainingMs()
    if (remaining > 0) {
      this.logger.debug("recovery skipped: cooldown active", { remaining_ms: remaining })
      return { recovered: false, reason: "cooldown" }
    }

    if (this.attempts >= this.maxAttempts) {
      this.logger.warn("recovery exhausted", { attempts: this.attempts, max_attempts: this.maxAttempts })
      return { recovered: false, reason: "exhausted" }
    }

    const pattern = classifyError(error)
    this.lastPattern = pattern
    this.recorder?.recordError(pattern)

    this.attempts++
    this.lastAttemptAt = this.clock()
    this.logger.info(`recovery attempt ${this.attempts}/${this.maxAttempts}`, {
      pattern,
      detail: errorMessage(error),
      ...context,
    })

    let ok: boolean
    try {
      ok = await this.runStrategy(pattern, signal)
    } catch (err) {
      this.logger.error("recovery strategy threw", err, { pattern })
      ok = false
    }

    if (ok) {
      this.logger.info("recovery succeeded", { pattern })
      this.attempts = 0
      return { recovered: true, reason: "recovered", pattern }
    }

    this.logger.warn("recovery failed", { pattern, attempts: this.attempts })
    return { recovered: false, reason: "strategy_failed", pattern }
  }

  getStatus(): RecoveryStatus {
    const remaining = this.cooldownRemainingMs()
    return {
      attempts: this.attempts,
      maxAttempts: this.maxAttempts,
      lastAttemptAt: this.lastAttemptAt,
      cooldownActive: remaining > 0,
      cooldownRemainingMs: remaining,
      recoveryAvailable: remaining === 0 && this.attempts < this.maxAttempts,
      lastPattern: this.lastPattern,
    }
  }

  /** Operator reset: clears the attempt count and cooldown. */
  reset(): void {
    this.attempts = 0
    this.lastAttemptAt = undefined
    this.logger.info("recovery state reset")
  }

  private cooldownRemainingMs(): number {
    if (this.lastAttemptAt === undefined) return 0
    return Math.max(0, this.cooldownMs - (this.clock() - this.lastAttemptAt))
  }

  private async runStrategy(pattern: ErrorPattern, signal?: AbortSignal): Promise<boolean> {
    const strategy = RECOVERY_STRATEGIES[pattern]
    for (const waitMs of strategy.waitsMs) {
      await this.sleep(waitMs, signal)
      if (signal?.aborted) return false
      const ok = strategy.action === "reconnect"
        ? await this.target.attemptRecovery()
        : await this.target.healthCheck()
      if (ok) return true
    }
    return false
  }
}
