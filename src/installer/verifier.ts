import { Shell } from "../executor/shell"
import { Log } from "../util/log"

export namespace Verifier {
  export interface Probe {
    /** A trivial invocation of the tool, e.g. ["radare2", "-v"] */
    command: string[]
    /** Text the probe output must contain */
    marker: string
  }

  export type Verification =
    | { ok: true; output: string }
    | { ok: false; reason: "absent" | "broken"; message: string }

  export const DEFAULT_TIMEOUT = 5_000

  /** Run the probe and report whether the tool answered. Never throws. */
  export async function verify(
    probe: Probe,
    opts?: { timeout?: number; runner?: Shell.Runner },
  ): Promise<Verification> {
    const run = opts?.runner ?? Shell.run
    try {
      const result = await run(probe.command, { timeout: opts?.timeout ?? DEFAULT_TIMEOUT })
      const output = `${result.stdout}\n${result.stderr}`
      if (result.code !== 0) {
        return { ok: false, reason: "broken", message: `${probe.command[0]} exited with ${result.code}` }
      }
      if (!output.toLowerCase().includes(probe.marker.toLowerCase())) {
        return { ok: false, reason: "broken", message: `${probe.command[0]} output does not mention "${probe.marker}"` }
      }
      return { ok: true, output: output.trim() }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      Log.debug(`verify ${probe.command.join(" ")}: ${message}`)
      if (err instanceof Shell.SpawnError && err.code === "ENOENT") return { ok: false, reason: "absent", message }
      return { ok: false, reason: "broken", message }
    }
  }
}
