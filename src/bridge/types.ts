// src/bridge/types.ts — Shared bridge types

import type { BridgeError } from "../shared/errors.js"

export type HttpMethod = "GET" | "POST"

/** Outcome of one logical upstream call */
export type UpstreamResult<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; error: BridgeError }

/** Read-only view of resource pressure consumed by the request path and pollers */
export interface ThrottleAdvisor {
  shouldThrottle(): boolean
  /** Extra delay for the current throttle level, 0 when not throttled */
  recommendedDelayMs(): number
}

/**
 * Minimum throttle level the process priority follows, whatever the sampled
 * level. The resource monitor stays the only writer of the priority.
 */
export interface PriorityFloor {
  setPriorityFloor(level: number): void
}

/** One entry of the upstream `/v1/models` catalog */
export interface ModelEntry {
  id: string
  [key: string]: unknown
}

export interface CompletionRequest {
  model: string
  prompt: string
  temperature: number
  max_tokens: number
  [key: string]: unknown
}

export interface ConnectionStatus {
  healthy: boolean
  circuitState: "CLOSED" | "OPEN"
  circuitFailures: number
  coolOffRemainingMs: number
  lastSuccessAt: number
  secondsSinceLastSuccess: number
  baseUrl: string
}

/** Reset and health-check hooks exposed by the upstream client */
export interface RecoveryTarget {
  attemptRecovery(): Promise<boolean>
  healthCheck(): Promise<boolean>
}
