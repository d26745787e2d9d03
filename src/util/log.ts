import chalk from "chalk"
import { mkdirSync, appendFileSync } from "fs"
import { join } from "path"

export namespace Log {
  export type Level = "debug" | "info" | "warn" | "error"

  let currentLevel: Level = parseLevel(process.env.TOOLREADY_LOG_LEVEL) ?? "info"
  let logFile: string | null = null

  const LEVELS: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 }

  export function parseLevel(value: string | undefined): Level | undefined {
    if (value === "debug" || value === "info" || value === "warn" || value === "error") return value
    return undefined
  }

  export function setLevel(level: Level) {
    currentLevel = level
  }

  /** Initialize file logging. Call once at startup. */
  export function init() {
    const dir = logDir()
    try {
      mkdirSync(dir, { recursive: true })
    } catch (err) {
      debug(`Log directory unavailable, file logging disabled: ${err instanceof Error ? err.message : String(err)}`)
      return
    }
    const date = new Date().toISOString().slice(0, 10)
    logFile = join(dir, `toolready-${date}.log`)
    file("────────────────────────────────────────")
    file(`Session started at ${new Date().toISOString()}`)
    file(`Args: ${process.argv.slice(2).join(" ")}`)
    file("────────────────────────────────────────")
  }

  export function logDir(): string {
    const xdg = process.env.XDG_CONFIG_HOME
    const home = process.env.HOME || process.env.USERPROFILE || "~"
    const base = xdg ? join(xdg, "toolready") : join(home, ".config", "toolready")
    return join(base, "logs")
  }

  /** Get current log file path */
  export function logFilePath(): string | null {
    return logFile
  }

  function shouldLog(level: Level): boolean {
    return LEVELS[level] >= LEVELS[currentLevel]
  }

  /** Write a line to the log file (always, regardless of level) */
  export function file(msg: string) {
    if (!logFile) return
    const ts = new Date().toISOString().slice(11, 23)
    try {
      appendFileSync(logFile, `[${ts}] ${msg}\n`)
    } catch {
      // a log file that can't be appended to stops being used
      logFile = null
    }
  }

  /** Write a structured data block to the log file */
  export function fileData(label: string, data: unknown) {
    if (!logFile) return
    const sep = "·".repeat(40)
    let content: string
    if (typeof data === "string") {
      content = data
    } else {
      try {
        content = JSON.stringify(data, null, 2)
      } catch {
        content = String(data)
      }
    }
    file(`┌─ ${label} ${sep}\n${content}`)
    file(`└─ /${label}`)
  }

  // ─── Terminal output (controlled by level) ───

  export function debug(msg: string, ...args: unknown[]) {
    file(`[DEBUG] ${msg} ${args.length ? JSON.stringify(args) : ""}`)
    if (shouldLog("debug")) console.error(chalk.gray(`[debug] ${msg}`), ...args)
  }

  export function info(msg: string, ...args: unknown[]) {
    file(`[INFO] ${msg}`)
    if (shouldLog("info")) console.error(chalk.blue("ℹ"), msg, ...args)
  }

  export function success(msg: string, ...args: unknown[]) {
    file(`[OK] ${msg}`)
    if (shouldLog("info")) console.error(chalk.green("✔"), msg, ...args)
  }

  export function warn(msg: string, ...args: unknown[]) {
    file(`[WARN] ${msg}`)
    if (shouldLog("warn")) console.error(chalk.yellow("⚠"), msg, ...args)
  }

  export function error(msg: string, ...args: unknown[]) {
    file(`[ERROR] ${msg}`)
    if (shouldLog("error")) console.error(chalk.red("✖"), msg, ...args)
  }

  // ─── Specialized loggers for debugging ───

  /** Log a process invocation, and its result once it has one */
  export function exec(argv: string[], result?: { ok: boolean; output?: string; error?: string }) {
    const cmd = argv.join(" ")
    file(`[EXEC] $ ${cmd}`)
    if (result) {
      if (result.ok) {
        file(`[EXEC:OK] ${result.output?.slice(0, 500) || "(no output)"}`)
      } else {
        file(`[EXEC:FAIL] ${result.error || "(no error message)"}`)
      }
      return
    }
    if (shouldLog("debug")) {
      console.error(chalk.gray(`[exec] $ ${cmd.slice(0, 100)}${cmd.length > 100 ? "..." : ""}`))
    }
  }

  /** Log a stage/phase transition */
  export function stage(name: string, detail?: string) {
    const msg = detail ? `${name}: ${detail}` : name
    file(`[STAGE] ══ ${msg} ══`)
    if (shouldLog("debug")) {
      console.error(chalk.magenta(`[stage] ${msg}`))
    }
  }
}
