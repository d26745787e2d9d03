import { spawn } from "child_process"
import { Log } from "../util/log"

/**
 * Process execution.
 *
 * Commands are argv vectors handed straight to spawn, never through a shell,
 * so package names and paths are never interpolated into a command string.
 */
export namespace Shell {
  export interface Options {
    cwd?: string
    /** Kill the process after this many ms (default: 30s) */
    timeout?: number
    env?: Record<string, string>
  }

  export interface Result {
    stdout: string
    stderr: string
    /** Exit code, or null when the process ended on a signal */
    code: number | null
  }

  /** Runs an argv to completion. Resolves for any exit code. */
  export type Runner = (argv: string[], opts?: Options) => Promise<Result>

  /** Thrown when a process is still running at its deadline */
  export class TimeoutError extends Error {
    argv: string[]
    timeout: number
    constructor(argv: string[], timeout: number) {
      super(`Command timed out after ${Math.round(timeout / 1000)}s: ${argv.join(" ").slice(0, 120)}`)
      this.name = "TimeoutError"
      this.argv = argv
      this.timeout = timeout
    }
  }

  /** Thrown when a process could not be started at all (missing binary, EACCES, ...) */
  export class SpawnError extends Error {
    argv: string[]
    code?: string
    constructor(argv: string[], message: string, code?: string) {
      super(`Command spawn failed: ${argv.join(" ").slice(0, 120)}\n${message}`)
      this.name = "SpawnError"
      this.argv = argv
      this.code = code
    }
  }

  export const DEFAULT_TIMEOUT = 30_000
  const KILL_GRACE = 3_000

  export const run: Runner = (argv, opts) => {
    const o = opts || {}
    const timeout = o.timeout ?? DEFAULT_TIMEOUT
    const [bin, ...args] = argv
    if (!bin) return Promise.reject(new SpawnError(argv, "empty command"))

    return new Promise((resolve, reject) => {
      Log.exec(argv)
      const proc = spawn(bin, args, {
        cwd: o.cwd,
        env: { ...process.env, ...o.env },
        stdio: ["ignore", "pipe", "pipe"],
      })

      let stdout = ""
      let stderr = ""
      let timedOut = false
      let settled = false

      const timer = setTimeout(() => {
        timedOut = true
        proc.kill("SIGTERM")
        setTimeout(() => {
          if (proc.exitCode === null && proc.signalCode === null) proc.kill("SIGKILL")
        }, KILL_GRACE).unref()
      }, timeout)

      // decode across chunk boundaries
      proc.stdout.setEncoding("utf8")
      proc.stderr.setEncoding("utf8")
      proc.stdout.on("data", (chunk: string) => {
        stdout += chunk
      })
      proc.stderr.on("data", (chunk: string) => {
        stderr += chunk
      })

      proc.on("error", (err: NodeJS.ErrnoException) => {
        clearTimeout(timer)
        if (settled) return
        settled = true
        Log.exec(argv, { ok: false, error: err.message })
        reject(new SpawnError(argv, err.message, err.code))
      })

      proc.on("close", (code) => {
        clearTimeout(timer)
        if (settled) return
        settled = true

        if (timedOut) {
          Log.exec(argv, { ok: false, error: `timeout after ${timeout}ms` })
          reject(new TimeoutError(argv, timeout))
          return
        }

        Log.exec(argv, code === 0 ? { ok: true, output: stdout } : { ok: false, error: `exit ${code}: ${stderr.slice(-500)}` })
        resolve({ stdout, stderr, code })
      })
    })
  }

  /** Resolve a command to its absolute path on PATH, or null if it isn't there */
  export async function which(
    cmd: string,
    runner: Runner = run,
    platform: NodeJS.Platform = process.platform,
  ): Promise<string | null> {
    const lookup = platform === "win32" ? ["where", cmd] : ["which", cmd]
    try {
      const result = await runner(lookup, { timeout: 5_000 })
      if (result.code !== 0) return null
      return result.stdout.split(/\r?\n/).find((line) => line.trim())?.trim() ?? null
    } catch (err) {
      Log.debug(`which ${cmd} failed: ${err instanceof Error ? err.message : String(err)}`)
      return null
    }
  }

  /** Check if a command exists */
  export async function has(
    cmd: string,
    runner: Runner = run,
    platform: NodeJS.Platform = process.platform,
  ): Promise<boolean> {
    return (await which(cmd, runner, platform)) !== null
  }
}
