import { existsSync, readFileSync } from "fs"
import { Shell } from "../executor/shell"
import { InstallError } from "../installer/error"
import type { PackageManager } from "../executor/manager"

export namespace OS {
  export interface Info {
    platform: NodeJS.Platform
    arch: string
    name: string
    version: string
    home: string
    user: string
  }

  /** Package managers tried on each platform, most preferred first */
  const MANAGERS: Partial<Record<NodeJS.Platform, PackageManager.Name[]>> = {
    darwin: ["brew", "port"],
    linux: ["apt", "dnf", "yum", "pacman", "zypper", "apk"],
    win32: ["winget", "choco"],
  }

  /** Binary whose presence on PATH means a manager is usable */
  const PROBE_BINARY: Record<PackageManager.Name, string> = {
    brew: "brew",
    port: "port",
    apt: "apt-get",
    dnf: "dnf",
    yum: "yum",
    pacman: "pacman",
    zypper: "zypper",
    apk: "apk",
    winget: "winget",
    choco: "choco",
  }

  export function detect(): Info {
    const platform = process.platform
    const arch = process.arch
    const home = process.env.HOME || process.env.USERPROFILE || "~"
    const user = process.env.USER || process.env.USERNAME || "unknown"

    let name: string = platform
    let version = ""

    if (platform === "darwin") name = "macOS"
    if (platform === "win32") name = "Windows"
    if (platform === "linux") {
      name = "Linux"
      if (existsSync("/etc/os-release")) {
        const release = readFileSync("/etc/os-release", "utf-8")
        const match = release.match(/PRETTY_NAME="(.+)"/)
        if (match?.[1]) name = match[1]
        const ver = release.match(/VERSION_ID="(.+)"/)
        if (ver?.[1]) version = ver[1]
      }
    }

    return { platform, arch, name, version, home, user }
  }

  export function supportedManagers(platform: NodeJS.Platform = process.platform): PackageManager.Name[] {
    return MANAGERS[platform] ?? []
  }

  /** Managers of this platform that are actually on PATH, in preference order */
  export async function packageManagers(
    platform: NodeJS.Platform = process.platform,
    runner: Shell.Runner = Shell.run,
  ): Promise<PackageManager.Name[]> {
    const candidates = supportedManagers(platform)
    const present = await Promise.all(candidates.map((m) => Shell.has(PROBE_BINARY[m], runner, platform)))
    return candidates.filter((_, i) => present[i])
  }

  /**
   * Pick the manager to install with. A preferred manager wins when it is
   * available; otherwise the platform's first available one.
   */
  export async function resolveManager(opts?: {
    platform?: NodeJS.Platform
    preferred?: PackageManager.Name
    runner?: Shell.Runner
  }): Promise<PackageManager.Name> {
    const platform = opts?.platform ?? process.platform
    if (supportedManagers(platform).length === 0) {
      throw new InstallError("PlatformUnsupported", platform)
    }

    const available = await packageManagers(platform, opts?.runner)
    if (opts?.preferred && available.includes(opts.preferred)) return opts.preferred

    const first = available[0]
    if (!first) {
      throw new InstallError("PackageManagerUnavailable", `looked for ${supportedManagers(platform).join(", ")}`)
    }
    return first
  }
}
