import type { CommandModule } from "yargs"
import chalk from "chalk"
import { Registry } from "../../tool/registry"
import { Shell } from "../../executor/shell"
import { Config } from "../../config/config"
import { UI } from "../ui"

interface ListArgs {
  search?: string
  missing?: boolean
}

export const ListCommand: CommandModule<object, ListArgs> = {
  command: "list",
  describe: "List known tools and whether they are on PATH",
  builder: (yargs) =>
    yargs
      .option("missing", {
        type: "boolean",
        describe: "Only show tools that are not installed",
      })
      .option("search", {
        alias: "s",
        type: "string",
        describe: "Search for a tool by name, binary or description",
      }),
  handler: async (argv) => {
    await Config.apply(Config.resolve())

    let tools = Registry.all()

    if (argv.search) {
      tools = Registry.search(argv.search)
      if (tools.length === 0) {
        console.log(chalk.yellow(`No tool matching "${argv.search}"`))
        return
      }
    }

    UI.header("Known Tools")

    const results = await Promise.all(
      tools.map(async (tool) => ({
        tool,
        path: await Shell.which(tool.binary),
        fallback: tool.fallback ? await Shell.which(tool.fallback) : null,
      })),
    )

    for (const { tool, path, fallback } of results) {
      if (argv.missing && path) continue

      const icon = path ? chalk.green("✔") : chalk.gray("○")
      const where = path ? chalk.green(path) : chalk.gray("not installed")
      console.log(`  ${icon} ${chalk.bold(tool.name.padEnd(12))} ${where} ${chalk.gray(tool.description)}`)
      if (tool.fallback) {
        console.log(`    ${chalk.gray(`fallback: ${tool.fallback}${fallback ? "" : " (missing)"}`)}`)
      }
    }

    console.log()
    console.log(chalk.gray(`  Total: ${results.length} known, ${results.filter((r) => r.path).length} installed`))
    console.log()
  },
}
