// src/shared/poll-loop.ts — Cooperative periodic task with awaited stop

import { systemSleep, type Sleeper } from "./timing.js"
import type { Logger } from "./logger.js"

export interface PollLoopDef {
  name: string
  /**
   * One cycle. Returns the delay in ms before the next cycle. The signal
   * aborts when the loop is stopped; cycles pass it to their I/O.
   */
  cycle: (signal: AbortSignal) => Promise<number>
  /** Delay used when a cycle throws. */
  fallbackDelayMs: number
  /** Wait before the first cycle (default 0). */
  initialDelayMs?: number
  logger: Logger
  sleep?: Sleeper
}

export interface PollLoopStatus {
  name: string
  running: boolean
  cycles: number
  lastCycleAt: number | undefined
  lastError: string | undefined
  nextDelayMs: number | undefined
}

export class PollLoop {
  private controller: AbortController | undefined
  private task: Promise<void> | undefined
  private readonly sleep: Sleeper
  private cycles = 0
  private lastCycleAt: number | undefined
  private lastError: string | undefined
  private nextDelayMs: number | undefined

  constructor(private readonly def: PollLoopDef) {
    this.sleep = def.sleep ?? systemSleep
  }

  get running(): boolean {
    return this.task !== undefined
  }

  start(): void {
    if (this.task) return
    const controller = new AbortController()
    this.controller = controller
    this.def.logger.info(`${this.def.name} loop started`)
    this.task = this.run(controller.signal)
  }

  /** Abort the loop and wait for its current cycle to finish. Idempotent. */
  async stop(): Promise<void> {
    const task = this.task
    if (!task || !this.controller) return
    this.controller.abort()
    await task
    this.task = undefined
    this.controller = undefined
    this.def.logger.info(`${this.def.name} loop stopped`)
  }

  getStatus(): PollLoopStatus {
    return {
      name: this.def.name,
      running: this.running,
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt,
      lastError: this.lastError,
      nextDelayMs: this.nextDelayMs,
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    if (this.def.initialDelayMs) {
      await this.sleep(this.def.initialDelayMs, signal)
    }

    while (!signal.aborted) {
      let delay: number
      try {
        delay = await this.def.cycle(signal)
        this.lastError = undefined
      } catch (err) {
        this.lastError = err instanceof Error ? err.message : String(err)
        this.def.logger.error(`${this.def.name} cycle failed`, err)
        delay = this.def.fallbackDelayMs
      }
      this.cycles++
      this.lastCycleAt = Date.now()
      this.nextDelayMs = delay

      if (signal.aborted) break
      await this.sleep(delay, signal)
    }
  }
}
