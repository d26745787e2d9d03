import { describe, it, expect } from "vitest"
import { ZodError } from "zod"
import { Tool } from "../src/tool/tool"
import { Registry, ready } from "../src/tool/registry"

describe("Tool.define", () => {
  it("applies defaults", () => {
    const tool = Tool.define({
      name: "strace",
      binary: "strace",
      probe: { marker: "strace" },
      packages: { apt: { name: "strace" } },
    })
    expect(tool.description).toBe("")
    expect(tool.packages.apt).toEqual({ name: "strace", privileged: false })
    expect(Tool.probe(tool)).toEqual({ command: ["strace", "--version"], marker: "strace" })
    expect(Tool.packageFor(tool, "brew")).toBeUndefined()
  })

  it("rejects packages for unknown managers", () => {
    const raw: unknown = { name: "x", binary: "x", probe: { marker: "x" }, packages: { emerge: { name: "x" } } }
    expect(() => Tool.Info.parse(raw)).toThrow(ZodError)
  })
})

describe("Registry", () => {
  it("loads the built-in tools", async () => {
    await ready
    expect(Registry.names()).toEqual(expect.arrayContaining(["radare2", "gdb", "binutils"]))
    expect(Registry.get("radare2")?.fallback).toBe("objdump")
  })

  it("searches names, binaries and descriptions", async () => {
    await ready
    expect(Registry.search("disassembl").map((t) => t.name)).toEqual(["radare2", "binutils"])
    expect(Registry.search("OBJDUMP").map((t) => t.name)).toEqual(["binutils"])
  })
})
