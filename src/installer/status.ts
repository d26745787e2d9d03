import { InstallationState } from "./state"
import type { InstallErrorInfo } from "./error"

export namespace Status {
  /** The five-key view of an attempt returned by getInstallStatus */
  export interface Snapshot {
    inProgress: boolean
    outcome: boolean | null
    error: InstallErrorInfo | null
    startedAt: Date | null
    /** seconds */
    duration: number | null
  }

  /**
   * Project the state into a snapshot. Call inside the state guard so the five
   * values belong together; `now` is read once by the caller.
   */
  export function snapshot(fields: InstallationState.Fields, now: number): Snapshot {
    let duration: number | null = null
    if (fields.inProgress && fields.startedAt !== null) {
      duration = InstallationState.elapsed(fields.startedAt, now)
    } else if (fields.startedAt !== null) {
      duration = fields.duration
    }

    return {
      inProgress: fields.inProgress,
      outcome: fields.outcome,
      error: fields.error ? { ...fields.error } : null,
      startedAt: fields.startedAt === null ? null : new Date(fields.startedAt),
      duration,
    }
  }

  export function describe(snapshot: Snapshot): string {
    const took = snapshot.duration === null ? "" : ` (${snapshot.duration.toFixed(1)}s)`
    if (snapshot.inProgress) return `installing${took}`
    if (snapshot.outcome === null) return "not attempted"
    if (snapshot.outcome) return `installed${took}`
    if (snapshot.error?.kind === "Cancelled") return `cancelled${took}`
    return `failed${took}: ${snapshot.error?.message ?? "unknown error"}`
  }
}
