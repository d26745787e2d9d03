import { setImmediate } from "timers/promises"
import { Env } from "../detect/env"
import { OS } from "../detect/os"
import { PackageManager } from "../executor/manager"
import { Shell } from "../executor/shell"
import { Tool } from "../tool/tool"
import { Log } from "../util/log"
import { Cancellation } from "./cancel"
import { InstallError } from "./error"
import { InstallationState } from "./state"
import { Status } from "./status"
import { Verifier } from "./verifier"

export namespace Orchestrator {
  /** How start() ran the attempt; "disabled" means no attempt was made */
  export type Mode = "background" | "foreground" | "disabled"

  export interface Request {
    tool: Tool.Info
    /** A stand-in binary is usable, so the caller need not wait */
    fallbackAvailable: boolean
  }

  export interface Options {
    /** epoch ms (default: a steady clock that ignores wall-clock changes) */
    clock?: () => number
    runner?: Shell.Runner
    env?: NodeJS.ProcessEnv
    platform?: NodeJS.Platform
    /** Tried first when it is available */
    manager?: PackageManager.Name
    /** Package manager timeout, ms */
    timeout?: number
    /** Verification probe timeout, ms */
    verifyTimeout?: number
    /** false behaves like the disable switch */
    autoInstall?: boolean
  }

  /** Everything the worker needs, copied at spawn time */
  export interface Context {
    tool: Tool.Info
    probe: Verifier.Probe
    platform: NodeJS.Platform
    preferred?: PackageManager.Name
    timeout: number
    verifyTimeout: number
  }
}

/**
 * Drives one installation attempt at a time through
 * NotStarted → InProgress → Succeeded | Failed | Cancelled.
 *
 * With a fallback available the attempt runs as a background worker and can be
 * cancelled; without one the caller awaits it and it can't be.
 */
export class Orchestrator {
  private readonly state = new InstallationState()
  private readonly clock: () => number
  private readonly runner: Shell.Runner
  private readonly env: NodeJS.ProcessEnv

  constructor(private readonly opts: Orchestrator.Options = {}) {
    this.clock = opts.clock ?? InstallationState.steadyClock()
    this.runner = opts.runner ?? Shell.run
    this.env = opts.env ?? process.env
  }

  isAutoInstallDisabled(): boolean {
    return this.opts.autoInstall === false || Env.isAutoInstallDisabled(this.env)
  }

  async start(request: Orchestrator.Request): Promise<Orchestrator.Mode> {
    if (this.isAutoInstallDisabled()) {
      Log.warn(`${request.tool.binary} not found and automatic installation is disabled.`)
      for (const hint of this.guidance(request.tool)) Log.info(`Install it manually with: ${hint}`)
      return "disabled"
    }

    const ctx = this.context(request.tool)
    const background = request.fallbackAvailable

    const running = this.state.guard((fields): Orchestrator.Mode | null => {
      if (fields.inProgress) return fields.worker ? "background" : "foreground"
      InstallationState.begin(fields, this.clock())
      if (background) {
        // Deferred to the next turn of the event loop so the caller gets control back first
        fields.worker = setImmediate().then(() => this.work(ctx))
      }
      return null
    })

    if (running) {
      Log.debug(`Install of ${ctx.tool.name} already running in ${running} mode`)
      return running
    }

    if (background) {
      Log.info(`Installing ${ctx.tool.name} in the background, using ${request.tool.fallback ?? "the fallback"} meanwhile`)
      return "background"
    }

    Log.info(`Installing ${ctx.tool.name}; no fallback available, waiting for it to finish`)
    await this.work(ctx)
    return "foreground"
  }

  getInstallStatus(): Status.Snapshot {
    return this.state.guard((fields) => Status.snapshot(fields, this.clock()))
  }

  cancelInstall(): boolean {
    const requested = this.state.guard(Cancellation.request)
    if (requested) Log.stage("Install:cancel-requested")
    return requested
  }

  /** Resolves once the current background worker has settled */
  async wait(): Promise<void> {
    const worker = this.state.guard((fields) => (fields.inProgress ? fields.worker : null))
    if (worker) await worker
  }

  private context(tool: Tool.Info): Orchestrator.Context {
    const owned = structuredClone(tool)
    return {
      tool: owned,
      probe: Tool.probe(owned),
      platform: this.opts.platform ?? process.platform,
      preferred: this.opts.manager,
      timeout: this.opts.timeout ?? PackageManager.DEFAULT_TIMEOUT,
      verifyTimeout: this.opts.verifyTimeout ?? Verifier.DEFAULT_TIMEOUT,
    }
  }

  /** Never rejects, and always leaves the attempt in a terminal state */
  private async work(ctx: Orchestrator.Context): Promise<void> {
    Log.stage("Install:start", ctx.tool.name)
    try {
      await this.attempt(ctx)
    } catch (err) {
      const error = InstallError.from(err)
      Log.error(`Installing ${ctx.tool.name} failed: ${error.message}`)
      this.finish(error)
    }
  }

  private async attempt(ctx: Orchestrator.Context) {
    if (this.checkpoint("before resolving the package manager")) return
    const manager = await OS.resolveManager({ platform: ctx.platform, preferred: ctx.preferred, runner: this.runner })
    const pkg = Tool.packageFor(ctx.tool, manager)
    if (!pkg) throw new InstallError("NoPackage", `${ctx.tool.name} has no ${manager} package`)

    if (this.checkpoint("before running the install command")) return
    const result = await PackageManager.installPackage(manager, pkg.name, pkg.privileged, {
      timeout: ctx.timeout,
      runner: this.runner,
      env: this.env,
    })

    if (this.checkpoint("after the install command returned")) return
    if (!result.ok) {
      Log.error(`Installing ${ctx.tool.name} failed: ${result.error.message}`)
      this.finish(result.error)
      return
    }
    if (!result.installed) {
      this.finish(result.reason)
      return
    }

    const verification = await Verifier.verify(ctx.probe, { timeout: ctx.verifyTimeout, runner: this.runner })
    if (!verification.ok) {
      // advisory: the package manager reported success, so the attempt still counts as one
      const warning = new InstallError("VerificationFailed", `${verification.reason}: ${verification.message}`)
      Log.warn(warning.message)
    }
    Log.success(`${ctx.tool.name} installed via ${manager}`)
    this.finish(null)
  }

  /** If cancellation was requested, settle as Cancelled and report true */
  private checkpoint(where: string): boolean {
    const cancelled = this.state.guard((fields) => {
      if (!fields.inProgress || !fields.cancelRequested) return false
      InstallationState.settle(fields, this.clock(), new InstallError("Cancelled", where).info())
      return true
    })
    if (cancelled) Log.warn(`Installation cancelled ${where}`)
    return cancelled
  }

  private finish(error: InstallError | null) {
    this.state.guard((fields) => {
      if (!fields.inProgress) return
      InstallationState.settle(fields, this.clock(), error ? error.info() : null)
    })
    Log.stage("Install:finish", error ? error.kind : "Succeeded")
  }

  private guidance(tool: Tool.Info): string[] {
    const hints: string[] = []
    for (const manager of OS.supportedManagers(this.opts.platform ?? process.platform)) {
      const pkg = Tool.packageFor(tool, manager)
      if (pkg) hints.push(PackageManager.command(manager, pkg.name, pkg.privileged).join(" "))
    }
    return hints
  }
}
