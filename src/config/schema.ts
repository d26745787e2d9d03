import { z } from "zod"
import { PackageManager } from "../executor/manager"
import { Tool } from "../tool/tool"

export const InstallConfig = z.object({
  autoInstall: z.boolean().default(true).describe("Set to false to never install anything automatically"),
  timeout: z.number().positive().default(300).describe("Package manager timeout in seconds"),
  verifyTimeout: z.number().positive().default(5).describe("Post-install probe timeout in seconds"),
  manager: PackageManager.Name.optional().describe("Preferred package manager when several are available"),
})

export const ToolreadyConfig = z.object({
  install: InstallConfig.default({}),
  tools: z.array(Tool.Info).default([]).describe("Extra tool definitions, registered over the built-ins"),
})

export type InstallConfig = z.infer<typeof InstallConfig>
export type ToolreadyConfig = z.infer<typeof ToolreadyConfig>
