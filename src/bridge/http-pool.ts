// src/bridge/http-pool.ts — Closable fetch wrapper standing in for a connection pool
//
// Native fetch keeps its sockets in the global dispatcher, so "tearing down the
// pool" means aborting every request this pool still has in flight and refusing
// new ones. The owner then creates a fresh pool. A request stays in flight
// until its body has been read.

import { BridgeError, namedError } from "../shared/errors.js"
import { readBody } from "../shared/read-body.js"

/** Response with its body already read */
export interface PooledResponse {
  status: number
  ok: boolean
  text: string
}

export interface HttpPool {
  fetch(url: string, init: RequestInit): Promise<PooledResponse>
  close(): void
  readonly closed: boolean
  readonly inFlight: number
}

export type HttpPoolFactory = () => HttpPool

export function createHttpPool(fetchFn: typeof fetch = globalThis.fetch): HttpPool {
  const active = new Set<AbortController>()
  let closed = false

  return {
    get closed() {
      return closed
    },

    get inFlight() {
      return active.size
    },

    async fetch(url: string, init: RequestInit): Promise<PooledResponse> {
      if (closed) {
        throw new BridgeError("TRANSPORT_FAILURE", "connection pool is closed", {
          pattern: "network_error",
          retryable: true,
        })
      }

      const controller = new AbortController()
      const outer = init.signal ?? undefined
      const onOuterAbort = () => controller.abort(outer?.reason)
      if (outer?.aborted) {
        controller.abort(outer.reason)
      } else {
        outer?.addEventListener("abort", onOuterAbort, { once: true })
      }

      active.add(controller)
      try {
        const res = await fetchFn(url, { ...init, signal: controller.signal })
        const text = await readBody(res, controller.signal)
        return { status: res.status, ok: res.ok, text }
      } finally {
        active.delete(controller)
        outer?.removeEventListener("abort", onOuterAbort)
      }
    },

    close(): void {
      closed = true
      for (const controller of active) {
        controller.abort(namedError("AbortError", "connection pool closed"))
      }
      active.clear()
    },
  }
}
