// tests/bridge/http-pool.test.ts — Closable fetch wrapper

import { describe, it, expect } from "vitest"
import { createHttpPool } from "../../src/bridge/http-pool.js"
import { BridgeError } from "../../src/shared/errors.js"
import { hangingFetch, jsonResponse, stalledBodyFetch } from "../helpers/fakes.js"

describe("createHttpPool", () => {
  it("passes requests through and tracks them while in flight", async () => {
    const pool = createHttpPool(async () => jsonResponse({ ok: true }))

    const res = await pool.fetch("http://upstream.test/v1/models", { method: "GET" })

    expect(res).toEqual({ status: 200, ok: true, text: '{"ok":true}' })
    expect(pool.inFlight).toBe(0)
  })

  it("keeps a request in flight until its body is read", async () => {
    const pool = createHttpPool(stalledBodyFetch())
    const controller = new AbortController()

    const pending = pool.fetch("http://upstream.test/v1/models", { method: "GET", signal: controller.signal })
    await new Promise((resolve) => setTimeout(resolve, 10))
    expect(pool.inFlight).toBe(1)
    controller.abort(new Error("body never finished"))

    await expect(pending).rejects.toThrow("body never finished")
    expect(pool.inFlight).toBe(0)
  })

  it("aborts in-flight requests on close", async () => {
    const pool = createHttpPool(hangingFetch())

    const pending = pool.fetch("http://upstream.test/v1/models", { method: "GET" })
    expect(pool.inFlight).toBe(1)
    pool.close()

    await expect(pending).rejects.toMatchObject({ name: "AbortError", message: "connection pool closed" })
    expect(pool.closed).toBe(true)
    expect(pool.inFlight).toBe(0)
  })

  it("refuses new requests once closed", async () => {
    const pool = createHttpPool(async () => jsonResponse({}))
    pool.close()

    const err = await pool.fetch("http://upstream.test/v1/models", { method: "GET" }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(BridgeError)
    expect(err).toMatchObject({ code: "TRANSPORT_FAILURE", pattern: "network_error", retryable: true })
  })

  it("follows the caller's signal", async () => {
    const pool = createHttpPool(hangingFetch())
    const controller = new AbortController()

    const pending = pool.fetch("http://upstream.test/v1/models", { method: "GET", signal: controller.signal })
    controller.abort(new Error("caller gave up"))

    await expect(pending).rejects.toThrow("caller gave up")
  })
})
