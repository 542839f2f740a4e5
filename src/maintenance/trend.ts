// src/maintenance/trend.ts — Rolling metric buffers and first-vs-last trend estimate

export interface Sample {
  at: number
  value: number
}

/** Samples a buffer must hold before any trend is reported */
export const MIN_TREND_SAMPLES = 5

export const HOUR_SECONDS = 3600
export const DAY_SECONDS = 86_400

/**
 * Rate of change over the look-back window, in value units per `unitSeconds`.
 * Uses the first and last samples with `at >= now - windowMs` only; intermediate
 * samples do not contribute. Returns 0 below MIN_TREND_SAMPLES buffered samples,
 * with fewer than two samples in the window, or when they share a timestamp.
 */
export function calculateTrend(samples: readonly Sample[], windowMs: number, now: number, unitSeconds: number): number {
  if (samples.length < MIN_TREND_SAMPLES) return 0
  const windowed = samplesSince(samples, now - windowMs)
  if (windowed.length < 2) return 0

  const first = windowed[0]
  const last = windowed[windowed.length - 1]
  const spanSeconds = (last.at - first.at) / 1000
  if (spanSeconds <= 0) return 0
  return ((last.value - first.value) / spanSeconds) * unitSeconds
}

export function samplesSince(samples: readonly Sample[], since: number): Sample[] {
  return samples.filter((s) => s.at >= since)
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  let sum = 0
  for (const v of values) sum += v
  return sum / values.length
}

/** Drop entries older than `cutoff` in place. Buffers are insertion-ordered. */
export function trimBefore<T extends { at: number }>(buffer: T[], cutoff: number): void {
  let drop = 0
  while (drop < buffer.length && buffer[drop].at < cutoff) drop++
  if (drop > 0) buffer.splice(0, drop)
}
