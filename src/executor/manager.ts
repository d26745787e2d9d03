import { z } from "zod"
import { Shell } from "./shell"
import { Env } from "../detect/env"
import { InstallError } from "../installer/error"
import { Log } from "../util/log"

/**
 * Platform package managers.
 *
 * Maps (manager, package, privilege) to a fixed argv and runs it once under a
 * timeout. Whether to try again is the caller's decision.
 */
export namespace PackageManager {
  export const Name = z.enum(["brew", "port", "apt", "dnf", "yum", "pacman", "zypper", "apk", "winget", "choco"])
  export type Name = z.infer<typeof Name>

  export const DEFAULT_TIMEOUT = 300_000

  const TEMPLATES: Record<Name, (pkg: string) => string[]> = {
    brew: (pkg) => ["brew", "install", pkg],
    port: (pkg) => ["port", "-N", "install", pkg],
    apt: (pkg) => ["apt-get", "install", "-y", pkg],
    dnf: (pkg) => ["dnf", "install", "-y", pkg],
    yum: (pkg) => ["yum", "install", "-y", pkg],
    pacman: (pkg) => ["pacman", "-S", "--noconfirm", "--needed", pkg],
    zypper: (pkg) => ["zypper", "--non-interactive", "install", pkg],
    apk: (pkg) => ["apk", "add", "--no-progress", pkg],
    winget: (pkg) => ["winget", "install", "--exact", "--silent", "--accept-package-agreements", "--accept-source-agreements", "--id", pkg],
    choco: (pkg) => ["choco", "install", "-y", "--no-progress", pkg],
  }

  // Windows managers expect an already elevated shell, and Homebrew refuses to run as root.
  const ELEVATE: Record<Name, string[]> = {
    brew: [],
    port: ["sudo"],
    apt: ["sudo"],
    dnf: ["sudo"],
    yum: ["sudo"],
    pacman: ["sudo"],
    zypper: ["sudo"],
    apk: ["sudo"],
    winget: [],
    choco: [],
  }

  export type Result =
    | { ok: true; installed: true }
    | { ok: true; installed: false; reason: InstallError }
    | { ok: false; error: InstallError }

  export interface Options {
    /** ms, default 300s */
    timeout?: number
    runner?: Shell.Runner
    env?: NodeJS.ProcessEnv
  }

  export function isName(value: string): value is Name {
    return Name.safeParse(value).success
  }

  /** Build the argv for an install. Throws UnknownManager for anything not in the table. */
  export function command(manager: string, pkg: string, requiresPrivilege: boolean): string[] {
    if (!isName(manager)) throw new InstallError("UnknownManager", manager)
    const argv = TEMPLATES[manager](pkg)
    return requiresPrivilege ? [...ELEVATE[manager], ...argv] : argv
  }

  export async function installPackage(
    manager: string,
    pkg: string,
    requiresPrivilege: boolean,
    opts?: Options,
  ): Promise<Result> {
    let argv: string[]
    try {
      argv = command(manager, pkg, requiresPrivilege)
    } catch (err) {
      return { ok: false, error: InstallError.from(err) }
    }

    const env = opts?.env ?? process.env
    if (requiresPrivilege && Env.isCI(env)) {
      // Never run a privileged command unattended inside CI
      const reason = new InstallError(
        "SkippedCiPrivilege",
        `${argv.join(" ")} needs elevated privileges (${Env.ciPlatform(env)} detected)`,
      )
      Log.warn(reason.message)
      return { ok: true, installed: false, reason }
    }

    const run = opts?.runner ?? Shell.run
    const timeout = opts?.timeout ?? DEFAULT_TIMEOUT
    Log.stage("PackageManager:install", `${manager} ${pkg}${requiresPrivilege ? " (privileged)" : ""}`)

    let result: Shell.Result
    try {
      result = await run(argv, { timeout })
    } catch (err) {
      if (err instanceof Shell.TimeoutError) {
        return { ok: false, error: new InstallError("Timeout", `${argv.join(" ")} (${Math.round(timeout / 1000)}s)`) }
      }
      const msg = err instanceof Error ? err.message : String(err)
      return { ok: false, error: new InstallError("ExecutionError", msg) }
    }

    if (result.code !== 0) {
      const stderr = result.stderr.trim().slice(-500)
      return { ok: false, error: new InstallError("CommandFailed", stderr || `exit ${result.code}`) }
    }
    return { ok: true, installed: true }
  }
}
