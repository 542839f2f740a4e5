// src/shared/timing.ts — Injectable clock/sleep and timeout helpers

import { namedError } from "./errors.js"

/** Epoch-millisecond clock. Components default to Date.now and tests pass their own. */
export type Clock = () => number

/** Waits `ms`; resolves early (never rejects) when `signal` aborts. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>

export const systemSleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const timer = setTimeout(done, ms)
    function done(): void {
      clearTimeout(timer)
      signal?.removeEventListener("abort", done)
      resolve()
    }
    signal?.addEventListener("abort", done, { once: true })
  })

export type TimeoutOutcome<T> =
  | { timedOut: false; value: T }
  | { timedOut: true }

/**
 * Race `promise` against a timer. The loser is ignored, not cancelled;
 * callers that own cancellable work pass their own AbortSignal to it.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<TimeoutOutcome<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<TimeoutOutcome<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), ms)
  })
  try {
    return await Promise.race([
      promise.then((value): TimeoutOutcome<T> => ({ timedOut: false, value })),
      timeout,
    ])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * AbortSignal that fires after `ms` or when `parent` aborts, whichever is first.
 * `dispose` clears the timer and detaches from the parent.
 */
export function linkedTimeoutSignal(ms: number, parent?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const timer = setTimeout(() => {
    controller.abort(namedError("TimeoutError", `Timed out after ${ms}ms`))
  }, ms)
  const onParentAbort = () => controller.abort(parent?.reason)
  if (parent?.aborted) {
    controller.abort(parent.reason)
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true })
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer)
      parent?.removeEventListener("abort", onParentAbort)
    },
  }
}
