import { Tool } from "./tool"

const registry = new Map<string, Tool.Info>()

export namespace Registry {
  export function register(tool: Tool.Info) {
    registry.set(tool.name, tool)
  }

  export function get(name: string): Tool.Info | undefined {
    return registry.get(name)
  }

  export function all(): Tool.Info[] {
    return Array.from(registry.values())
  }

  export function names(): string[] {
    return Array.from(registry.keys())
  }

  export function search(query: string): Tool.Info[] {
    const lower = query.toLowerCase()
    return all().filter(
      (t) =>
        t.name.toLowerCase().includes(lower) ||
        t.binary.toLowerCase().includes(lower) ||
        t.description.toLowerCase().includes(lower),
    )
  }
}

// Auto-register all built-in tools
async function loadBuiltins() {
  const modules = [import("./tools/radare2"), import("./tools/gdb"), import("./tools/binutils")]
  const loaded = await Promise.all(modules)
  for (const mod of loaded) {
    Registry.register(mod.default)
  }
}

export const ready = loadBuiltins()
