import { z } from "zod"
import type { PackageManager } from "../executor/manager"
import type { Verifier } from "../installer/verifier"

export namespace Tool {
  export const Package = z.object({
    name: z.string().min(1).describe("Package name in this manager's repositories"),
    privileged: z.boolean().default(false).describe("Install with sudo"),
  })
  export type Package = z.infer<typeof Package>

  export const Packages = z
    .object({
      brew: Package.optional(),
      port: Package.optional(),
      apt: Package.optional(),
      dnf: Package.optional(),
      yum: Package.optional(),
      pacman: Package.optional(),
      zypper: Package.optional(),
      apk: Package.optional(),
      winget: Package.optional(),
      choco: Package.optional(),
    })
    .strict()

  export const Info = z.object({
    name: z.string().min(1),
    description: z.string().default(""),
    binary: z.string().min(1).describe("Executable looked up on PATH"),
    probe: z.object({
      args: z.array(z.string()).default(["--version"]),
      marker: z.string().min(1).describe("Text the probe output must contain"),
    }),
    fallback: z.string().optional().describe("Binary that can stand in while the tool is being installed"),
    packages: Packages,
  })
  export type Info = z.infer<typeof Info>

  export function define(info: z.input<typeof Info>): Info {
    return Info.parse(info)
  }

  export function packageFor(info: Info, manager: PackageManager.Name): Package | undefined {
    return info.packages[manager]
  }

  export function probe(info: Info): Verifier.Probe {
    return { command: [info.binary, ...info.probe.args], marker: info.probe.marker }
  }
}
