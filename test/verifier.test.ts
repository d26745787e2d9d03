import { describe, it, expect } from "vitest"
import { Verifier } from "../src/installer/verifier"
import { Shell } from "../src/executor/shell"
import { fakeRunner, result } from "./helpers"

const probe: Verifier.Probe = { command: ["radare2", "-v"], marker: "radare2" }

describe("Verifier.verify", () => {
  it("passes when the probe exits 0 and prints the marker", async () => {
    const runner = fakeRunner({ onPath: [], run: () => result(0, "radare2 5.9.0 0 @ linux-x86-64\n") })
    const res = await Verifier.verify(probe, { runner })
    expect(res).toEqual({ ok: true, output: "radare2 5.9.0 0 @ linux-x86-64" })
    expect(runner).toHaveBeenCalledWith(["radare2", "-v"], { timeout: 5_000 })
  })

  it("matches the marker case-insensitively and on stderr too", async () => {
    const runner = fakeRunner({ onPath: [], run: () => result(0, "", "Radare2 5.9.0\n") })
    const res = await Verifier.verify(probe, { runner })
    expect(res.ok).toBe(true)
  })

  it("reports a broken tool on a non-zero exit", async () => {
    const runner = fakeRunner({ onPath: [], run: () => result(127, "", "error while loading shared libraries") })
    const res = await Verifier.verify(probe, { runner })
    expect(res).toEqual({ ok: false, reason: "broken", message: "radare2 exited with 127" })
  })

  it("reports a broken tool when the marker is missing", async () => {
    const runner = fakeRunner({ onPath: [], run: () => result(0, "something else\n") })
    const res = await Verifier.verify(probe, { runner })
    expect(res).toEqual({ ok: false, reason: "broken", message: 'radare2 output does not mention "radare2"' })
  })

  it("reports an absent tool when the binary can't be found", async () => {
    const runner = fakeRunner({
      onPath: [],
      run: (argv) => {
        throw new Shell.SpawnError(argv, "spawn radare2 ENOENT", "ENOENT")
      },
    })
    const res = await Verifier.verify(probe, { runner })
    expect(res.ok).toBe(false)
    if (res.ok) return
    expect(res.reason).toBe("absent")
  })

  it("never throws, even on a timeout", async () => {
    const runner = fakeRunner({
      onPath: [],
      run: (argv) => {
        throw new Shell.TimeoutError(argv, 5_000)
      },
    })
    const res = await Verifier.verify(probe, { runner, timeout: 5_000 })
    expect(res.ok).toBe(false)
    if (res.ok) return
    expect(res.reason).toBe("broken")
  })
})
