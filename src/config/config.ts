import { existsSync, readFileSync } from "fs"
import { join } from "path"
import YAML from "yaml"
import { ToolreadyConfig } from "./schema"
import { Registry, ready } from "../tool/registry"
import { Log } from "../util/log"

const CONFIG_NAMES = ["toolready.yaml", "toolready.yml", "toolready.json", ".toolready.yaml", ".toolready.yml"]

export namespace Config {
  /** Find and load config from a directory (walks up to find it) */
  export function load(dir?: string): ToolreadyConfig | null {
    let current = dir || process.cwd()

    while (true) {
      for (const name of CONFIG_NAMES) {
        const filepath = join(current, name)
        if (existsSync(filepath)) return parse(filepath)
      }

      const parent = join(current, "..")
      if (parent === current) break
      current = parent
    }

    return null
  }

  /** Parse a config file */
  export function parse(filepath: string): ToolreadyConfig {
    const content = readFileSync(filepath, "utf-8")

    let raw: unknown
    if (filepath.endsWith(".json")) {
      raw = JSON.parse(content)
    } else {
      raw = YAML.parse(content)
    }

    Log.debug(`Config loaded from ${filepath}`)
    // an empty YAML document parses to null
    return ToolreadyConfig.parse(raw ?? {})
  }

  /** Get the global config directory */
  export function globalDir(): string {
    const xdg = process.env.XDG_CONFIG_HOME
    if (xdg) return join(xdg, "toolready")
    const home = process.env.HOME || process.env.USERPROFILE || "~"
    return join(home, ".config", "toolready")
  }

  /** Load global config (~/.config/toolready/config.yaml) */
  export function loadGlobal(): ToolreadyConfig | null {
    const dir = globalDir()
    for (const name of ["config.yaml", "config.yml", "config.json"]) {
      const filepath = join(dir, name)
      if (existsSync(filepath)) return parse(filepath)
    }
    return null
  }

  /**
   * Resolve config with priority:
   * 1. TOOLREADY_CONFIG (explicit file path)
   * 2. Project config (toolready.yaml in cwd or a parent)
   * 3. Global config (~/.config/toolready/config.yaml)
   * 4. Defaults
   */
  export function resolve(dir?: string): ToolreadyConfig {
    const explicit = process.env.TOOLREADY_CONFIG
    if (explicit) return parse(explicit)
    return load(dir) ?? loadGlobal() ?? ToolreadyConfig.parse({})
  }

  /** Register the configured tools over the built-ins */
  export async function apply(config: ToolreadyConfig) {
    await ready
    for (const tool of config.tools) Registry.register(tool)
  }
}
