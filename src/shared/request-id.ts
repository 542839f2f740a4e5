// src/shared/request-id.ts — X-Request-Id propagation for the HTTP surfaces

import type { MiddlewareHandler } from "hono"
import { ulid } from "ulid"

export const REQUEST_ID_HEADER = "X-Request-Id"

/** Echo the caller's request id or mint a ULID, on every response. */
export function requestIdMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const id = c.req.header(REQUEST_ID_HEADER) ?? ulid()
    await next()
    c.res.headers.set(REQUEST_ID_HEADER, id)
  }
}
