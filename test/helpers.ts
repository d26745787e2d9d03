import { vi } from "vitest"
import type { Shell } from "../src/executor/shell"
import { Tool } from "../src/tool/tool"

export function result(code: number | null, stdout = "", stderr = ""): Shell.Result {
  return { stdout, stderr, code }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

/**
 * A runner standing in for the operating system. `which` answers from
 * `onPath`; every other argv goes to `run` (exit 0 by default).
 */
export function fakeRunner(system: { onPath: string[]; run?: (argv: string[]) => Shell.Result | Promise<Shell.Result> }) {
  return vi.fn(async (argv: string[], _opts?: Shell.Options): Promise<Shell.Result> => {
    const [bin, target] = argv
    if (bin === "which" || bin === "where") {
      return target && system.onPath.includes(target) ? result(0, `/usr/bin/${target}\n`) : result(1)
    }
    return system.run ? system.run(argv) : result(0)
  })
}

/** argvs the runner saw, `which` lookups excluded */
export function commands(runner: ReturnType<typeof fakeRunner>): string[][] {
  return runner.mock.calls.map(([argv]) => argv).filter((argv) => argv[0] !== "which" && argv[0] !== "where")
}

export const radare2 = Tool.define({
  name: "radare2",
  description: "test disassembler",
  binary: "radare2",
  probe: { args: ["-v"], marker: "radare2" },
  fallback: "objdump",
  packages: {
    brew: { name: "radare2" },
    apt: { name: "radare2", privileged: true },
  },
})
