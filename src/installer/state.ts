import { performance } from "perf_hooks"
import type { InstallErrorInfo } from "./error"

/**
 * The record of one installation attempt.
 *
 * All access goes through {@link InstallationState.guard}. Guarded sections are
 * synchronous, so nothing else on the event loop can run while one is open and
 * every reader sees a transition either fully applied or not at all.
 */
export class InstallationState {
  private fields: InstallationState.Fields = InstallationState.initial()
  private held = false

  /**
   * Run `fn` with exclusive access to the fields and release on every exit
   * path. `fn` must not await: the section ends when it returns.
   */
  guard<T>(fn: (fields: InstallationState.Fields) => T): T {
    if (this.held) throw new Error("InstallationState.guard is not re-entrant")
    this.held = true
    try {
      return fn(this.fields)
    } finally {
      this.held = false
    }
  }
}

export namespace InstallationState {
  export interface Fields {
    inProgress: boolean
    /** null: never attempted. false covers failed and cancelled. */
    outcome: boolean | null
    error: InstallErrorInfo | null
    /** epoch ms */
    startedAt: number | null
    /** seconds, stored once at the terminal transition */
    duration: number | null
    cancelRequested: boolean
    /** Only background attempts have one */
    worker: Promise<void> | null
  }

  export function initial(): Fields {
    return {
      inProgress: false,
      outcome: null,
      error: null,
      startedAt: null,
      duration: null,
      cancelRequested: false,
      worker: null,
    }
  }

  /** Reset the previous attempt's results and enter the in-progress state */
  export function begin(fields: Fields, now: number) {
    fields.outcome = null
    fields.error = null
    fields.duration = null
    fields.cancelRequested = false
    fields.worker = null
    fields.startedAt = now
    fields.inProgress = true
  }

  /** Terminal transition. The duration is computed here and never again for this attempt. */
  export function settle(fields: Fields, now: number, error: InstallErrorInfo | null) {
    fields.duration = elapsed(fields.startedAt ?? now, now)
    fields.outcome = error === null
    fields.error = error
    fields.inProgress = false
  }

  export function elapsed(startedAt: number, now: number): number {
    return Math.max(0, now - startedAt) / 1000
  }

  /** Epoch ms read once, then advanced by the monotonic timer, so wall-clock changes don't move it */
  export function steadyClock(): () => number {
    const origin = Date.now() - performance.now()
    return () => origin + performance.now()
  }
}
