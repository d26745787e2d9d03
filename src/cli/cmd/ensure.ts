import type { CommandModule } from "yargs"
import chalk from "chalk"
import ora from "ora"
import { Config } from "../../config/config"
import { Registry } from "../../tool/registry"
import { ToolProvider } from "../../tool/provider"
import { Status } from "../../installer/status"
import { Log } from "../../util/log"
import { UI } from "../ui"

interface EnsureArgs {
  tool: string
  wait: boolean
}

const POLL_INTERVAL = 250

/**
 * Run `body` with the first Ctrl+C mapped to `cancel`; `notify` learns whether
 * that took. A second Ctrl+C exits.
 */
export async function interruptible<T>(
  cancel: () => boolean,
  notify: (cancelled: boolean) => void,
  body: () => Promise<T>,
): Promise<T> {
  let interrupts = 0
  const onInterrupt = () => {
    interrupts++
    if (interrupts >= 2) {
      console.log(chalk.red("\n⚠ Forced exit"))
      process.exit(130)
    }
    notify(cancel())
  }
  process.on("SIGINT", onInterrupt)
  try {
    return await body()
  } finally {
    process.off("SIGINT", onInterrupt)
  }
}

export const EnsureCommand: CommandModule<object, EnsureArgs> = {
  command: "ensure <tool>",
  describe: "Make sure a tool is installed, installing it if needed",
  builder: (yargs) =>
    yargs
      .positional("tool", {
        type: "string",
        describe: "Tool name (see `toolready list`)",
        demandOption: true,
      })
      .option("wait", {
        type: "boolean",
        describe: "Wait for a background install to finish instead of returning with the fallback",
        default: false,
      }),
  handler: async (argv) => {
    const config = Config.resolve()
    await Config.apply(config)

    const tool = Registry.get(argv.tool)
    if (!tool) {
      Log.error(`Unknown tool "${argv.tool}". Known tools: ${Registry.names().join(", ")}`)
      process.exitCode = 1
      return
    }

    const provider = new ToolProvider(tool, {
      manager: config.install.manager,
      timeout: config.install.timeout * 1000,
      verifyTimeout: config.install.verifyTimeout * 1000,
      autoInstall: config.install.autoInstall,
    })

    const spinner = ora(`Looking for ${tool.binary}`).start()
    const poll = setInterval(() => {
      const status = provider.getInstallStatus()
      if (status.inProgress) spinner.text = `${tool.name}: ${Status.describe(status)}`
    }, POLL_INTERVAL)

    const notify = (cancelled: boolean) => {
      if (cancelled) {
        spinner.text = `${tool.name}: cancelling after the current step`
      } else {
        spinner.warn("This installation can't be cancelled (press Ctrl+C again to exit)")
        spinner.start()
      }
    }

    const work = async () => {
      let ready = await provider.ensure()
      if (!ready && argv.wait) {
        await provider.wait()
        ready = await provider.reloadTool()
      }

      const status = provider.getInstallStatus()
      const active = provider.activeBinary()
      if (ready) spinner.succeed(`${tool.name} is ready`)
      else if (status.inProgress) spinner.info(`${tool.name} is installing in the background`)
      else spinner.fail(`${tool.name} is not available`)

      UI.table([
        ["Binary", active ?? chalk.gray("none")],
        ["Install", Status.describe(status)],
      ])

      if (!ready && !active) process.exitCode = 1

      // The worker keeps the process alive until it settles
      if (status.inProgress) {
        spinner.start(`${tool.name}: finishing the install before exiting (Ctrl+C cancels)`)
        await provider.wait()
        const final = provider.getInstallStatus()
        if (final.outcome) spinner.succeed(`${tool.name} ${Status.describe(final)}`)
        else spinner.fail(`${tool.name} ${Status.describe(final)}`)
      }
    }

    try {
      await interruptible(() => provider.cancelInstall(), notify, work)
    } finally {
      clearInterval(poll)
    }
  },
}
