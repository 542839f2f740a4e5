// src/config.ts — Configuration loader from environment variables

import { tmpdir } from "node:os"
import { join } from "node:path"
import { BridgeError } from "./shared/errors.js"
import { parseLogLevel, type LogLevel } from "./shared/logger.js"

type Env = Record<string, string | undefined>

export const VALID_ROLES = ["bridge", "gateway"] as const
export type Role = (typeof VALID_ROLES)[number]

export interface UpstreamConfig {
  baseUrl: string
  timeoutMs: number
  maxRetries: number
  breakerThreshold: number
  breakerCoolOffMs: number
}

export interface BridgeConfig {
  serviceName: string
  version: string
  port: number
  host: string
  logLevel: LogLevel

  upstream: UpstreamConfig

  discovery: {
    intervalMs: number
    /** Cap for the doubled interval after a failed recovery */
    maxIntervalMs: number
    /** Consecutive failures before recovery is attempted */
    failureThreshold: number
  }

  resources: {
    intervalMs: number
    /** Own-process CPU cap, percent of the whole host */
    maxCpuPercent: number
    /** Own-process memory cap, percent of host memory */
    maxMemoryPercent: number
  }

  recovery: {
    maxAttempts: number
    cooldownMs: number
  }

  maintenance: {
    intervalMs: number
    tempDir: string
    diskPath: string
  }
}

export interface BridgeTarget {
  name: string
  url: string
}

export interface GatewayConfig {
  serviceName: string
  version: string
  port: number
  host: string
  logLevel: LogLevel
  bridges: BridgeTarget[]
  discoveryIntervalMs: number
  healthTimeoutMs: number
  requestTimeoutMs: number
}

export const SERVICE_VERSION = "1.0.0"

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === "") return fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new BridgeError("CONFIG_INVALID", `${key} must be a valid integer (got "${raw}")`, {
      context: { key, value: raw },
    })
  }
  return value
}

function parseUrlEnv(env: Env, key: string, fallback: string): string {
  const raw = (env[key] ?? fallback).trim()
  try {
    new URL(raw)
  } catch {
    throw new BridgeError("CONFIG_INVALID", `${key} must be an absolute URL (got "${raw}")`, {
      context: { key, value: raw },
    })
  }
  return raw.replace(/\/+$/, "")
}

export function parseRole(value: string | undefined): Role {
  const v = (value ?? "bridge").trim().toLowerCase()
  for (const role of VALID_ROLES) {
    if (role === v) return role
  }
  throw new BridgeError("CONFIG_INVALID", `ROLE must be one of ${VALID_ROLES.join(", ")} (got "${value}")`)
}

export function loadBridgeConfig(env: Env = process.env): BridgeConfig {
  return {
    serviceName: env.SERVICE_NAME ?? "inference-bridge",
    version: SERVICE_VERSION,
    port: parseIntEnv(env, "PORT", 3000),
    host: env.HOST ?? "0.0.0.0",
    logLevel: parseLogLevel(env.LOG_LEVEL),

    upstream: {
      baseUrl: parseUrlEnv(env, "UPSTREAM_URL", "http://localhost:1234"),
      timeoutMs: parseIntEnv(env, "UPSTREAM_TIMEOUT_MS", 30_000),
      maxRetries: parseIntEnv(env, "UPSTREAM_MAX_RETRIES", 3),
      breakerThreshold: parseIntEnv(env, "BREAKER_THRESHOLD", 5),
      breakerCoolOffMs: parseIntEnv(env, "BREAKER_COOL_OFF_MS", 60_000),
    },

    discovery: {
      intervalMs: parseIntEnv(env, "POLL_INTERVAL_MS", 30_000),
      maxIntervalMs: parseIntEnv(env, "POLL_MAX_INTERVAL_MS", 300_000),
      failureThreshold: parseIntEnv(env, "DISCOVERY_FAILURE_THRESHOLD", 3),
    },

    resources: {
      intervalMs: parseIntEnv(env, "RESOURCE_INTERVAL_MS", 10_000),
      maxCpuPercent: parseIntEnv(env, "MAX_CPU_PERCENT", 50),
      maxMemoryPercent: parseIntEnv(env, "MAX_MEMORY_PERCENT", 50),
    },

    recovery: {
      maxAttempts: parseIntEnv(env, "RECOVERY_MAX_ATTEMPTS", 5),
      cooldownMs: parseIntEnv(env, "RECOVERY_COOLDOWN_MS", 60_000),
    },

    maintenance: {
      intervalMs: parseIntEnv(env, "MAINTENANCE_INTERVAL_MS", 60_000),
      tempDir: env.MAINTENANCE_TEMP_DIR ?? join(tmpdir(), "inference-bridge"),
      diskPath: env.DISK_PATH ?? "/",
    },
  }
}

export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  return {
    serviceName: env.SERVICE_NAME ?? "inference-gateway",
    version: SERVICE_VERSION,
    port: parseIntEnv(env, "PORT", 8080),
    host: env.HOST ?? "0.0.0.0",
    logLevel: parseLogLevel(env.LOG_LEVEL),
    bridges: [
      {
        name: env.BRIDGE_NAME ?? "inference-bridge",
        url: parseUrlEnv(env, "BRIDGE_URL", "http://localhost:3000"),
      },
    ],
    discoveryIntervalMs: parseIntEnv(env, "DISCOVERY_INTERVAL_MS", 30_000),
    healthTimeoutMs: parseIntEnv(env, "HEALTH_TIMEOUT_MS", 10_000),
    requestTimeoutMs: parseIntEnv(env, "REQUEST_TIMEOUT_MS", 30_000),
  }
}
