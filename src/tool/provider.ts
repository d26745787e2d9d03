import { Shell } from "../executor/shell"
import { Orchestrator } from "../installer/orchestrator"
import type { Status } from "../installer/status"
import { Log } from "../util/log"
import type { Tool } from "./tool"

export namespace ToolProvider {
  export interface Handle {
    binary: string
    /** Absolute path the binary resolved to */
    path: string
  }
}

/**
 * Readiness of one external tool. Looks the tool up on PATH and, when it is
 * missing, hands the installation to an {@link Orchestrator}.
 */
export class ToolProvider {
  private handle: ToolProvider.Handle | null = null
  private fallbackPath: string | null = null
  private readonly orchestrator: Orchestrator
  private readonly runner: Shell.Runner
  private readonly platform: NodeJS.Platform

  constructor(
    readonly tool: Tool.Info,
    opts: Orchestrator.Options = {},
  ) {
    this.runner = opts.runner ?? Shell.run
    this.platform = opts.platform ?? process.platform
    this.orchestrator = new Orchestrator(opts)
  }

  /**
   * Make the tool available if possible. Resolves once it is ready, or once a
   * background install has been started (the fallback is used meanwhile).
   */
  async ensure(): Promise<boolean> {
    if (await this.locate()) return true

    const fallback = this.tool.fallback
    this.fallbackPath = fallback ? await Shell.which(fallback, this.runner, this.platform) : null
    const mode = await this.orchestrator.start({ tool: this.tool, fallbackAvailable: this.fallbackPath !== null })

    if (mode === "foreground") return this.reloadTool()
    return false
  }

  isToolReady(): boolean {
    return this.handle !== null
  }

  /** Pick up a tool installed since the last lookup. No-op once initialized. */
  async reloadTool(): Promise<boolean> {
    if (this.handle) return true
    if (this.orchestrator.getInstallStatus().outcome !== true) return false
    const found = await this.locate()
    if (!found) Log.warn(`${this.tool.binary} was installed but is not on PATH`)
    return found
  }

  getInstallStatus(): Status.Snapshot {
    return this.orchestrator.getInstallStatus()
  }

  cancelInstall(): boolean {
    return this.orchestrator.cancelInstall()
  }

  /** Resolves when a background install has settled */
  wait(): Promise<void> {
    return this.orchestrator.wait()
  }

  /** Path of the tool when ready, else of its fallback, else null */
  activeBinary(): string | null {
    return this.handle?.path ?? this.fallbackPath
  }

  private async locate(): Promise<boolean> {
    const path = await Shell.which(this.tool.binary, this.runner, this.platform)
    if (!path) return false
    this.handle = { binary: this.tool.binary, path }
    Log.debug(`${this.tool.name} found at ${path}`)
    return true
  }
}
