import type { InstallationState } from "./state"

export namespace Cancellation {
  /**
   * Ask the running worker to stop at its next checkpoint. Call inside the
   * state guard. Returns false when there is nothing that can be cancelled:
   * no attempt running, or a foreground attempt, which has no worker to signal.
   */
  export function request(fields: InstallationState.Fields): boolean {
    if (!fields.inProgress) return false
    if (fields.worker === null) return false
    fields.cancelRequested = true
    return true
  }
}
